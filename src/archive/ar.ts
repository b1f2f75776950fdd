import { ArchiveError } from "../errors";
import { AR, AR_FILE_MAGIC, AR_HEADER_SIZE, AR_MAGIC } from "./constants";
import type { ArEntry, ArHeader } from "./types";
import { concatBytes, decoder, encoder, readPadded, writePadded } from "./utils";

/** Regular file, rw-r--r--. */
const DEFAULT_MEMBER_MODE = 0o100644;

// ASCII code for the space character that pads every header field.
const SPACE = 32;

/** The 8-byte global header of every `ar` archive. */
export const AR_GLOBAL_HEADER = encoder.encode(AR_MAGIC);

const NEWLINE = encoder.encode("\n");
const EMPTY = new Uint8Array(0);

function formatField(
	field: keyof typeof AR,
	value: string,
	memberName: string,
): string {
	if (encoder.encode(value).length > AR[field].size) {
		throw new ArchiveError(
			`ar member "${memberName}" has a ${field} that does not fit in ${AR[field].size} bytes.`,
			{ field, value },
		);
	}
	return value;
}

/**
 * Member data is aligned to an even offset; odd-sized members get a single
 * newline of padding.
 */
export function arPadding(size: number): Uint8Array {
	return size % 2 === 1 ? NEWLINE : EMPTY;
}

/**
 * Creates a 60-byte `ar` member header. Numeric fields are decimal except
 * `mode`, which is octal, and every field is space-padded.
 */
export function createArHeader(header: ArHeader): Uint8Array {
	const { name } = header;

	if (name.length === 0 || name.includes("/")) {
		throw new ArchiveError(`Invalid ar member name "${name}".`);
	}

	const view = new Uint8Array(AR_HEADER_SIZE).fill(SPACE);
	const mtime = Math.floor((header.mtime?.getTime() ?? Date.now()) / 1000);

	writePadded(view, AR.name.offset, AR.name.size, formatField("name", name, name));
	writePadded(
		view,
		AR.mtime.offset,
		AR.mtime.size,
		formatField("mtime", String(mtime), name),
	);
	writePadded(
		view,
		AR.uid.offset,
		AR.uid.size,
		formatField("uid", String(header.uid ?? 0), name),
	);
	writePadded(
		view,
		AR.gid.offset,
		AR.gid.size,
		formatField("gid", String(header.gid ?? 0), name),
	);
	writePadded(
		view,
		AR.mode.offset,
		AR.mode.size,
		formatField("mode", (header.mode ?? DEFAULT_MEMBER_MODE).toString(8), name),
	);
	writePadded(
		view,
		AR.size.offset,
		AR.size.size,
		formatField("size", String(header.size), name),
	);
	writePadded(view, AR.magic.offset, AR.magic.size, AR_FILE_MAGIC);

	return view;
}

/**
 * Packs in-memory members into a complete `ar` archive, preserving their order.
 */
export function packAr(entries: readonly ArEntry[]): Uint8Array {
	const chunks: Uint8Array[] = [AR_GLOBAL_HEADER];

	for (const { header, data } of entries) {
		chunks.push(
			createArHeader({ ...header, size: data.length }),
			data,
			arPadding(data.length),
		);
	}

	return concatBytes(chunks);
}

/**
 * Parses a single 60-byte `ar` member header.
 */
export function parseArHeader(block: Uint8Array, offset = 0): ArHeader {
	const magic = decoder.decode(
		block.subarray(AR.magic.offset, AR.magic.offset + AR.magic.size),
	);
	if (magic !== AR_FILE_MAGIC) {
		throw new ArchiveError(`Invalid ar member header at offset ${offset}.`, {
			offset,
		});
	}

	let name = readPadded(block, AR.name.offset, AR.name.size);

	// GNU ar terminates names with a slash.
	if (name.endsWith("/")) name = name.slice(0, -1);

	return {
		name,
		mtime: new Date(
			Number.parseInt(readPadded(block, AR.mtime.offset, AR.mtime.size), 10) *
				1000,
		),
		uid: Number.parseInt(readPadded(block, AR.uid.offset, AR.uid.size), 10),
		gid: Number.parseInt(readPadded(block, AR.gid.offset, AR.gid.size), 10),
		mode: Number.parseInt(readPadded(block, AR.mode.offset, AR.mode.size), 8),
		size: Number.parseInt(readPadded(block, AR.size.offset, AR.size.size), 10),
	};
}

/**
 * Decodes a complete `ar` archive into its members, in archive order.
 */
export function unpackAr(archive: Uint8Array): ArEntry[] {
	if (decoder.decode(archive.subarray(0, AR_GLOBAL_HEADER.length)) !== AR_MAGIC) {
		throw new ArchiveError("Not an ar archive: missing global header.");
	}

	const entries: ArEntry[] = [];
	let offset = AR_GLOBAL_HEADER.length;

	while (offset + AR_HEADER_SIZE <= archive.length) {
		const header = parseArHeader(
			archive.subarray(offset, offset + AR_HEADER_SIZE),
			offset,
		);
		const dataStart = offset + AR_HEADER_SIZE;

		if (!Number.isFinite(header.size) || dataStart + header.size > archive.length) {
			throw new ArchiveError(`ar member "${header.name}" is truncated.`, {
				offset,
			});
		}

		entries.push({
			header,
			data: archive.slice(dataStart, dataStart + header.size),
		});
		offset = dataStart + header.size + (header.size % 2);
	}

	return entries;
}
