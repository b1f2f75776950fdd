/** Size of a TAR block in bytes. */
export const BLOCK_SIZE = 512;

/** Mask for rounding up to the next block boundary (`-size & BLOCK_SIZE_MASK`). */
export const BLOCK_SIZE_MASK = BLOCK_SIZE - 1;

/** Default permissions for regular files (rw-r--r--). */
export const DEFAULT_FILE_MODE = 0o644;

/** Default permissions for directories (rwxr-xr-x). */
export const DEFAULT_DIR_MODE = 0o755;

/** Largest value an 11-digit octal size field can hold. */
export const USTAR_MAX_SIZE = 0o77777777777;

/** Largest value a 7-digit octal uid/gid field can hold. */
export const USTAR_MAX_UID_GID = 0o7777777;

/** Offsets and sizes of fields in a USTAR header block.
 *
 * @see https://www.gnu.org/software/tar/manual/html_node/Standard.html
 */
export const USTAR = {
	name: { offset: 0, size: 100 },
	mode: { offset: 100, size: 8 },
	uid: { offset: 108, size: 8 },
	gid: { offset: 116, size: 8 },
	size: { offset: 124, size: 12 },
	mtime: { offset: 136, size: 12 },
	checksum: { offset: 148, size: 8 },
	typeflag: { offset: 156, size: 1 },
	linkname: { offset: 157, size: 100 },
	magic: { offset: 257, size: 6 },
	version: { offset: 263, size: 2 },
	uname: { offset: 265, size: 32 },
	gname: { offset: 297, size: 32 },
	prefix: { offset: 345, size: 155 },
} as const;

/** USTAR version ("00"). */
export const USTAR_VERSION = "00";

/** Type flag constants for the entry types a package tarball carries. */
export const TYPEFLAG = {
	file: "0",
	link: "1",
	symlink: "2",
	directory: "5",
	"pax-header": "x",
} as const;

/** Reverse mapping from flag characters to type names. */
export const FLAGTYPE: Record<string, keyof typeof TYPEFLAG> = {
	"0": "file",
	"\0": "file",
	"1": "link",
	"2": "symlink",
	"5": "directory",
	x: "pax-header",
};

/** Global header of every `ar` archive. */
export const AR_MAGIC = "!<arch>\n";

/** Size of an `ar` member header in bytes. */
export const AR_HEADER_SIZE = 60;

/** Trailer closing every `ar` member header. */
export const AR_FILE_MAGIC = "`\n";

/** Offsets and sizes of fields in an `ar` member header. All fields are ASCII, space-padded. */
export const AR = {
	name: { offset: 0, size: 16 },
	mtime: { offset: 16, size: 12 },
	uid: { offset: 28, size: 6 },
	gid: { offset: 34, size: 6 },
	mode: { offset: 40, size: 8 },
	size: { offset: 48, size: 10 },
	magic: { offset: 58, size: 2 },
} as const;

/** Contents of the `debian-binary` member: format version 2.0. */
export const DEBIAN_BINARY = "2.0\n";

/** Member names of a binary package, in the only order `dpkg` accepts. */
export const DEB_MEMBERS = [
	"debian-binary",
	"control.tar.gz",
	"data.tar.gz",
] as const;
