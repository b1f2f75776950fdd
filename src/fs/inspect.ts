import * as fs from "node:fs/promises";
import { gunzipSync } from "node:zlib";
import { unpackAr } from "../archive/ar";
import { DEB_MEMBERS } from "../archive/constants";
import { unpackTar } from "../archive/tar";
import type { ParsedTarEntry } from "../archive/types";
import { decoder } from "../archive/utils";
import { type ControlRecord, parseControl } from "../control";
import { ArchiveError } from "../errors";

export interface InspectedPackage {
	/** Contents of `debian-binary`, e.g. `"2.0\n"`. */
	debianBinary: string;
	control: ControlRecord;
	controlEntries: ParsedTarEntry[];
	dataEntries: ParsedTarEntry[];
}

/**
 * Finds an entry by name, with or without the leading `./`.
 */
export function findEntry(
	entries: readonly ParsedTarEntry[],
	name: string,
): ParsedTarEntry | undefined {
	const wanted = `./${name.replace(/^\.?\//, "")}`;
	return entries.find((entry) => entry.header.name === wanted);
}

/**
 * Reads a `.deb` back into its parts. Checks that the container holds exactly
 * `debian-binary`, `control.tar.gz` and `data.tar.gz`, in that order.
 */
export async function inspectDeb(debPath: string): Promise<InspectedPackage> {
	const members = unpackAr(new Uint8Array(await fs.readFile(debPath)));
	const names = members.map((member) => member.header.name);

	if (
		names.length !== DEB_MEMBERS.length ||
		names.some((name, i) => name !== DEB_MEMBERS[i])
	) {
		throw new ArchiveError(
			`Unexpected package members: ${names.join(", ")}.`,
			{ members: names },
		);
	}

	const [debianBinary, controlTarball, dataTarball] = members;
	const controlEntries = unpackTar(gunzipSync(controlTarball.data));
	const dataEntries = unpackTar(gunzipSync(dataTarball.data));

	const controlFile = findEntry(controlEntries, "control");
	if (!controlFile) {
		throw new ArchiveError("control.tar.gz has no control file.");
	}

	return {
		debianBinary: decoder.decode(debianBinary.data),
		control: parseControl(decoder.decode(controlFile.data)),
		controlEntries,
		dataEntries,
	};
}
