import { ArchiveError } from "../errors";
import { validateChecksum, writeChecksum } from "./checksum";
import {
	BLOCK_SIZE,
	BLOCK_SIZE_MASK,
	DEFAULT_DIR_MODE,
	DEFAULT_FILE_MODE,
	FLAGTYPE,
	TYPEFLAG,
	USTAR,
	USTAR_MAX_SIZE,
	USTAR_MAX_UID_GID,
	USTAR_VERSION,
} from "./constants";
import type { ParsedTarEntry, TarEntry, TarEntryType, TarHeader } from "./types";
import {
	byteLength,
	concatBytes,
	decoder,
	encoder,
	readOctal,
	readString,
	writeOctal,
	writeString,
} from "./utils";

/** Two zero-filled blocks that end every archive. */
export const TAR_EOF = new Uint8Array(BLOCK_SIZE * 2);

const ZERO_BLOCK = new Uint8Array(BLOCK_SIZE);

function isBodyless(header: TarHeader): boolean {
	return (
		header.type === "directory" ||
		header.type === "symlink" ||
		header.type === "link"
	);
}

/**
 * Zero padding that rounds `size` bytes of entry data up to a full block.
 */
export function tarPadding(size: number): Uint8Array {
	return ZERO_BLOCK.subarray(0, -size & BLOCK_SIZE_MASK);
}

/**
 * Creates a 512-byte USTAR header block from a {@link TarHeader}.
 */
export function createTarHeader(header: TarHeader, usePaxPath = false): Uint8Array {
	const view = new Uint8Array(BLOCK_SIZE);
	const size = isBodyless(header) ? 0 : header.size;

	if (size > USTAR_MAX_SIZE) {
		throw new ArchiveError(`"${header.name}" is too large for a tar entry.`, {
			size,
		});
	}

	// A name over 100 bytes may be split into a 155-byte prefix and a 100-byte name.
	let name = header.name;
	let prefix = "";

	if (!usePaxPath) {
		const split = findUstarSplit(name);
		if (split) {
			name = split.name;
			prefix = split.prefix;
		}
	}

	writeString(view, USTAR.name.offset, USTAR.name.size, name);
	writeOctal(
		view,
		USTAR.mode.offset,
		USTAR.mode.size,
		(header.mode ??
			(header.type === "directory" ? DEFAULT_DIR_MODE : DEFAULT_FILE_MODE)) &
			0o7777,
	);
	writeOctal(
		view,
		USTAR.uid.offset,
		USTAR.uid.size,
		Math.min(header.uid ?? 0, USTAR_MAX_UID_GID),
	);
	writeOctal(
		view,
		USTAR.gid.offset,
		USTAR.gid.size,
		Math.min(header.gid ?? 0, USTAR_MAX_UID_GID),
	);
	writeOctal(view, USTAR.size.offset, USTAR.size.size, size);
	writeOctal(
		view,
		USTAR.mtime.offset,
		USTAR.mtime.size,
		Math.floor((header.mtime?.getTime() ?? Date.now()) / 1000),
	);
	writeString(
		view,
		USTAR.typeflag.offset,
		USTAR.typeflag.size,
		TYPEFLAG[header.type ?? "file"],
	);
	writeString(
		view,
		USTAR.linkname.offset,
		USTAR.linkname.size,
		header.linkname,
	);
	writeString(view, USTAR.magic.offset, USTAR.magic.size, "ustar\0");
	writeString(view, USTAR.version.offset, USTAR.version.size, USTAR_VERSION);
	writeString(view, USTAR.uname.offset, USTAR.uname.size, header.uname);
	writeString(view, USTAR.gname.offset, USTAR.gname.size, header.gname);
	writeString(view, USTAR.prefix.offset, USTAR.prefix.size, prefix);

	writeChecksum(view);

	return view;
}

/**
 * Encodes the blocks for one entry header: an optional PAX extended header
 * (for paths or link targets USTAR cannot hold) followed by the USTAR block.
 * The entry body and its padding are the caller's responsibility.
 */
export function encodeTarHeader(header: TarHeader): Uint8Array[] {
	const pax = generatePax(header);
	if (!pax) return [createTarHeader(header)];

	return [
		pax.paxHeader,
		pax.paxBody,
		tarPadding(pax.paxBody.length),
		createTarHeader(header, pax.records.path !== undefined),
	];
}

// Generates a PAX header entry when the path or link target exceeds USTAR limits.
function generatePax(header: TarHeader): {
	paxHeader: Uint8Array;
	paxBody: Uint8Array;
	records: Record<string, string>;
} | null {
	const records: Record<string, string> = {};

	if (
		byteLength(header.name) > USTAR.name.size &&
		!findUstarSplit(header.name)
	) {
		records.path = header.name;
	}

	if (header.linkname && byteLength(header.linkname) > USTAR.linkname.size) {
		records.linkpath = header.linkname;
	}

	const entries = Object.entries(records);
	if (entries.length === 0) return null;

	const body = entries
		.map(([key, value]) => {
			const record = ` ${key}=${value}\n`;
			const recordLength = encoder.encode(record).length;

			// The length prefix counts its own digits.
			const lengthOfLength = String(recordLength).length;
			let length = recordLength + lengthOfLength;
			if (String(length).length !== lengthOfLength) length++;

			return `${length}${record}`;
		})
		.join("");

	const paxBody = encoder.encode(body);
	const paxHeader = createTarHeader(
		{
			name: `PaxHeader/${header.name.replace(/^\.\//, "")}`.slice(
				0,
				USTAR.name.size,
			),
			size: paxBody.length,
			mode: 0o644,
			mtime: header.mtime,
		},
		true,
	);

	// The entry type flag must be 'x' for an extended header.
	paxHeader[USTAR.typeflag.offset] = TYPEFLAG["pax-header"].charCodeAt(0);
	writeChecksum(paxHeader);

	return { paxHeader, paxBody, records };
}

// Attempts to split a long path into a USTAR-compatible name and prefix.
// Both limits are in UTF-8 bytes; the longest prefix that fits wins.
export function findUstarSplit(
	path: string,
): { name: string; prefix: string } | null {
	if (byteLength(path) <= USTAR.name.size) return null;

	for (
		let slashIndex = path.lastIndexOf("/");
		slashIndex > 0;
		slashIndex = path.lastIndexOf("/", slashIndex - 1)
	) {
		const prefix = path.slice(0, slashIndex);
		if (byteLength(prefix) > USTAR.prefix.size) continue;

		const name = path.slice(slashIndex + 1);
		return byteLength(name) <= USTAR.name.size ? { prefix, name } : null;
	}

	return null;
}

/**
 * Packs in-memory entries into a complete tar archive.
 *
 * @example
 * ```typescript
 * const tar = packTar([
 *   { header: { name: "./", type: "directory", size: 0 } },
 *   { header: { name: "./control", size: 14 }, body: "Package: demo\n" },
 * ]);
 * ```
 */
export function packTar(entries: readonly TarEntry[]): Uint8Array {
	const chunks: Uint8Array[] = [];

	for (const { header, body } of entries) {
		const data =
			typeof body === "string" ? encoder.encode(body) : (body ?? new Uint8Array(0));
		const sized = isBodyless(header) ? header : { ...header, size: data.length };

		chunks.push(...encodeTarHeader(sized));
		if (!isBodyless(header) && data.length > 0) {
			chunks.push(data, tarPadding(data.length));
		}
	}

	chunks.push(TAR_EOF);
	return concatBytes(chunks);
}

// Parses the records of a PAX extended header body.
function parsePax(body: Uint8Array): Record<string, string> {
	const records: Record<string, string> = {};
	let offset = 0;

	while (offset < body.length) {
		const space = body.indexOf(32, offset);
		if (space === -1) break;

		const length = Number.parseInt(decoder.decode(body.subarray(offset, space)), 10);
		if (!Number.isFinite(length) || length <= 0) break;

		const record = decoder.decode(body.subarray(space + 1, offset + length - 1));
		const eq = record.indexOf("=");
		if (eq > 0) records[record.slice(0, eq)] = record.slice(eq + 1);

		offset += length;
	}

	return records;
}

/**
 * Decodes a complete, uncompressed tar archive into buffered entries.
 * PAX `path` and `linkpath` records are applied to the entry they precede.
 */
export function unpackTar(archive: Uint8Array): ParsedTarEntry[] {
	const entries: ParsedTarEntry[] = [];
	let overrides: Record<string, string> = {};
	let offset = 0;

	while (offset + BLOCK_SIZE <= archive.length) {
		const block = archive.subarray(offset, offset + BLOCK_SIZE);

		// A zero block marks the end of the archive.
		if (block.every((byte) => byte === 0)) break;

		if (!validateChecksum(block)) {
			throw new ArchiveError(`Invalid tar header checksum at offset ${offset}.`);
		}

		const flag = String.fromCharCode(block[USTAR.typeflag.offset]);
		const type = FLAGTYPE[flag];
		if (type === undefined) {
			throw new ArchiveError(`Unsupported tar entry type "${flag}".`, {
				offset,
			});
		}

		const size = readOctal(block, USTAR.size.offset, USTAR.size.size);
		const dataStart = offset + BLOCK_SIZE;
		const data = archive.slice(dataStart, dataStart + size);
		offset = dataStart + size + (-size & BLOCK_SIZE_MASK);

		if (type === "pax-header") {
			overrides = parsePax(data);
			continue;
		}

		let name = readString(block, USTAR.name.offset, USTAR.name.size);
		const prefix = readString(block, USTAR.prefix.offset, USTAR.prefix.size);
		if (prefix) name = `${prefix}/${name}`;

		const entryType: TarEntryType = type;
		entries.push({
			header: {
				name: overrides.path ?? name,
				size,
				mode: readOctal(block, USTAR.mode.offset, USTAR.mode.size),
				mtime: new Date(
					readOctal(block, USTAR.mtime.offset, USTAR.mtime.size) * 1000,
				),
				type: entryType,
				uid: readOctal(block, USTAR.uid.offset, USTAR.uid.size),
				gid: readOctal(block, USTAR.gid.offset, USTAR.gid.size),
				uname: readString(block, USTAR.uname.offset, USTAR.uname.size),
				gname: readString(block, USTAR.gname.offset, USTAR.gname.size),
				linkname:
					overrides.linkpath ??
					readString(block, USTAR.linkname.offset, USTAR.linkname.size),
			},
			data,
		});
		overrides = {};
	}

	return entries;
}
