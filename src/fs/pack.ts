import { createReadStream, createWriteStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createGzip } from "node:zlib";
import { AR_GLOBAL_HEADER, arPadding, createArHeader } from "../archive/ar";
import { DEB_MEMBERS, DEBIAN_BINARY } from "../archive/constants";
import { encodeTarHeader, TAR_EOF, tarPadding } from "../archive/tar";
import type { TarHeader } from "../archive/types";
import type { BuildContext } from "./context";

export interface PackTreeOptions {
	/** Timestamp for every entry. Defaults to each file's own mtime. */
	mtime?: Date;
}

export interface ArMemberSource {
	/** Member name inside the archive. */
	name: string;
	/** File on disk holding the member's contents. */
	path: string;
}

const byName = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Pack a staged tree into a Node.js [`Readable`](https://nodejs.org/api/stream.html#class-streamreadable)
 * stream of tar archive bytes, the way `dpkg-deb` lays them out: entries are
 * named `./`, `./usr/`, `./usr/bin/tool`, owned by `root:root`, and visited in
 * name order so the same tree always yields the same archive.
 *
 * @example
 * ```typescript
 * await pipeline(
 *   packTree(context.staging.dataRoot),
 *   createGzip(),
 *   createWriteStream("data.tar.gz"),
 * );
 * ```
 */
export function packTree(root: string, options: PackTreeOptions = {}): Readable {
	async function* walk(
		relativePath: string, // Path inside the archive, without the "./" prefix
	): AsyncGenerator<Uint8Array> {
		const fullPath = path.join(root, relativePath);
		const stat = await fs.lstat(fullPath);

		const header: TarHeader = {
			name: `./${relativePath.split(path.sep).join("/")}`,
			mode: stat.mode & 0o7777,
			mtime: options.mtime ?? stat.mtime,
			uid: 0,
			gid: 0,
			uname: "root",
			gname: "root",
			size: 0,
			type: "file",
		};

		if (stat.isFile()) {
			header.size = stat.size;
		} else if (stat.isDirectory()) {
			header.type = "directory";
			if (!header.name.endsWith("/")) header.name += "/";
		} else if (stat.isSymbolicLink()) {
			header.type = "symlink";
			header.linkname = await fs.readlink(fullPath);
		} else {
			// Sockets, FIFOs and devices have no place in a package.
			return;
		}

		yield* encodeTarHeader(header);

		if (header.type === "file" && header.size > 0) {
			yield* createReadStream(fullPath);
			const padding = tarPadding(header.size);
			if (padding.length > 0) yield padding;
		}

		if (header.type === "directory") {
			const names = (await fs.readdir(fullPath)).sort(byName);
			for (const name of names) {
				yield* walk(path.join(relativePath, name));
			}
		}
	}

	return Readable.from(
		(async function* () {
			yield* walk("");
			// End with two zero-filled blocks
			yield TAR_EOF;
		})(),
	);
}

/**
 * Packs a staged tree into a gzip-compressed tarball at `destination`.
 */
export async function writeTarGz(
	root: string,
	destination: string,
	options: PackTreeOptions = {},
): Promise<void> {
	await pipeline(
		packTree(root, options),
		createGzip({ level: 9 }),
		createWriteStream(destination),
	);
}

/**
 * Writes an `ar` archive at `destination` holding the given files as members,
 * in the order given. A partially written archive is removed on failure.
 */
export async function writeAr(
	destination: string,
	members: readonly ArMemberSource[],
	options: { mtime?: Date } = {},
): Promise<void> {
	const mtime = options.mtime ?? new Date();

	async function* generate(): AsyncGenerator<Uint8Array> {
		yield AR_GLOBAL_HEADER;

		for (const member of members) {
			const { size } = await fs.stat(member.path);
			yield createArHeader({ name: member.name, size, mtime, mode: 0o100644 });
			yield* createReadStream(member.path);
			const padding = arPadding(size);
			if (padding.length > 0) yield padding;
		}
	}

	try {
		await pipeline(Readable.from(generate()), createWriteStream(destination));
	} catch (err) {
		await fs.rm(destination, { force: true });
		throw err;
	}
}

/**
 * Packs a finished build context into a `.deb` at `destination`:
 * `debian-binary`, `control.tar.gz` and `data.tar.gz`, in that order.
 * Any existing file at `destination` is replaced.
 *
 * @returns The absolute path of the package.
 */
export async function packDeb(
	context: BuildContext,
	destination: string,
	options: PackTreeOptions = {},
): Promise<string> {
	const { staging } = context;
	const [debianBinaryName, controlName, dataName] = DEB_MEMBERS;

	const controlTarball = staging.scratchPath(controlName);
	const dataTarball = staging.scratchPath(dataName);
	const debianBinary = staging.scratchPath(debianBinaryName);

	await writeTarGz(staging.controlRoot, controlTarball, options);
	await writeTarGz(staging.dataRoot, dataTarball, options);
	await fs.writeFile(debianBinary, DEBIAN_BINARY);

	const output = path.resolve(destination);
	await fs.rm(output, { force: true });

	// debian-binary must be the first member.
	await writeAr(
		output,
		[
			{ name: debianBinaryName, path: debianBinary },
			{ name: controlName, path: controlTarball },
			{ name: dataName, path: dataTarball },
		],
		{ mtime: options.mtime },
	);

	context.logger.info({ path: output }, "Packed package");
	return output;
}
