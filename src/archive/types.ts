/**
 * Entry types a package tarball carries.
 */
export type TarEntryType = "file" | "directory" | "symlink" | "link";

/**
 * Header information for a tar entry in USTAR format.
 */
export interface TarHeader {
	/** Entry name/path, e.g. `./usr/bin/tool`. Directories end with `/`. */
	name: string;
	/** Size of the entry data in bytes. Ignored for directories and links. */
	size: number;
	/** Modification time. Defaults to the current time if not specified. */
	mtime?: Date;
	/** Unix permission bits (e.g. 0o644). Defaults to 0o644 for files and 0o755 for directories. */
	mode?: number;
	/** Defaults to "file". */
	type?: TarEntryType;
	uid?: number;
	gid?: number;
	uname?: string;
	gname?: string;
	/** Target path for symlinks and hard links. */
	linkname?: string;
}

/**
 * An entry to be packed in memory.
 */
export interface TarEntry {
	header: TarHeader;
	body?: string | Uint8Array;
}

/**
 * An entry decoded from a tar archive with its buffered contents.
 */
export interface ParsedTarEntry {
	header: TarHeader & { type: TarEntryType };
	data: Uint8Array;
}

/**
 * Header fields of an `ar` archive member.
 */
export interface ArHeader {
	/** Member name, at most 16 bytes. */
	name: string;
	size: number;
	mtime?: Date;
	/** Defaults to 0o100644 (regular file, rw-r--r--). */
	mode?: number;
	uid?: number;
	gid?: number;
}

/**
 * An `ar` member with its contents, in memory.
 */
export interface ArEntry {
	header: ArHeader;
	data: Uint8Array;
}
