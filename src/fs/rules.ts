import * as fs from "node:fs/promises";
import * as path from "node:path";
import { DEFAULT_FILE_MODE } from "../archive/constants";
import type { PackageDescription } from "../package";
import type { BuildContext, MakeDirectoryOptions } from "./context";

/**
 * A single packaging action. Rules are applied in declaration order and
 * communicate only through the {@link BuildContext}.
 */
export interface Rule {
	readonly kind: string;
	apply(pkg: PackageDescription, context: BuildContext): Promise<void>;
}

export interface FileModeOptions {
	/** Permission bits of the staged file. */
	mode?: number;
}

/**
 * Applies the package's rules one after another. The first failure aborts.
 */
export async function applyRules(
	pkg: PackageDescription,
	context: BuildContext,
): Promise<void> {
	for (const [index, rule] of pkg.rules.entries()) {
		context.logger.debug({ rule: rule.kind, index }, "Applying rule");
		await rule.apply(pkg, context);
	}
}

/**
 * Copies a file from the build host to `target` on the installed system.
 * Keeps the source file's permissions unless `mode` is given.
 *
 * @example
 * ```typescript
 * placeFile("./dist/server.js", "/opt/app/server.js")
 * ```
 */
export function placeFile(
	source: string,
	target: string,
	options: FileModeOptions = {},
): Rule {
	return {
		kind: "place-file",
		async apply(_pkg, context) {
			const staged = await context.staging.dataPath(target);
			await fs.copyFile(source, staged);

			const mode = options.mode ?? (await fs.stat(source)).mode & 0o7777;
			await fs.chmod(staged, mode);
		},
	};
}

/**
 * Writes `content` to `target` on the installed system.
 */
export function writeFile(
	target: string,
	content: string | Uint8Array,
	options: FileModeOptions = {},
): Rule {
	return {
		kind: "write-file",
		async apply(_pkg, context) {
			const staged = await context.staging.dataPath(target);
			await fs.writeFile(staged, content);
			await fs.chmod(staged, options.mode ?? DEFAULT_FILE_MODE);
		},
	};
}

// Creates `target` unless an earlier rule already staged a directory there.
async function ensureDirectory(target: string): Promise<void> {
	try {
		await fs.mkdir(target);
	} catch (err) {
		if (!(err instanceof Error && "code" in err && err.code === "EEXIST")) {
			throw err;
		}
		if (!(await fs.lstat(target)).isDirectory()) throw err;
	}
}

// Copies a directory's contents in name order. Directory modes are applied
// after their contents so read-only directories can still be filled.
async function copyTree(sourceDir: string, targetDir: string): Promise<void> {
	const dirents = await fs.readdir(sourceDir, { withFileTypes: true });
	dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

	for (const dirent of dirents) {
		const sourcePath = path.join(sourceDir, dirent.name);
		const targetPath = path.join(targetDir, dirent.name);

		if (dirent.isDirectory()) {
			await ensureDirectory(targetPath);
			await copyTree(sourcePath, targetPath);
			await fs.chmod(targetPath, (await fs.stat(sourcePath)).mode & 0o7777);
		} else if (dirent.isSymbolicLink()) {
			await fs.symlink(await fs.readlink(sourcePath), targetPath);
		} else if (dirent.isFile()) {
			await fs.copyFile(sourcePath, targetPath);
			await fs.chmod(targetPath, (await fs.stat(sourcePath)).mode & 0o7777);
		}
	}
}

/**
 * Recursively copies a directory from the build host into `target`.
 * Files, directories and symbolic links are copied; other entries are skipped.
 */
export function copyDirectory(source: string, target: string): Rule {
	return {
		kind: "copy-directory",
		async apply(_pkg, context) {
			const staged = await context.staging.dataDirPath(target);
			await copyTree(source, staged);
		},
	};
}

/**
 * Creates an (empty) directory on the installed system, optionally owned by
 * a service user.
 *
 * @example
 * ```typescript
 * makeDirectory("/var/lib/app", { owner: "app", group: "app" })
 * ```
 */
export function makeDirectory(
	target: string,
	options: MakeDirectoryOptions = {},
): Rule {
	return {
		kind: "make-directory",
		async apply(_pkg, context) {
			await context.makeDirectory(target, options);
		},
	};
}

/**
 * Creates a symbolic link at `link` pointing at `source`, both paths on the
 * installed system. The link is created once all rules have run, so
 * `source` may be placed by a later rule.
 *
 * @example
 * ```typescript
 * makeSymlink("/opt/app/bin/app", "/usr/bin/app")
 * ```
 */
export function makeSymlink(source: string, link: string): Rule {
	return {
		kind: "make-symlink",
		async apply(_pkg, context) {
			context.addSymlink(source, link);
			await context.staging.dataPath(source);
		},
	};
}

/**
 * Appends a shell command to the `postinst` configure step.
 */
export function postinstCommand(command: string): Rule {
	return {
		kind: "postinst-command",
		async apply(_pkg, context) {
			context.addPostinstCommand(command);
		},
	};
}
