import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { DEFAULT_DIR_MODE } from "../archive/constants";
import { ConfigurationError } from "../errors";

export interface StagingOptions {
	/** Parent of the scratch root. Defaults to `os.tmpdir()`. */
	tmpDir?: string;
}

export interface DataDirOptions {
	/** Permissions applied to every directory below the data root. Defaults to 0o755. */
	mode?: number;
	/** Create the directory if it is missing. Defaults to `true`. */
	create?: boolean;
}

/**
 * Normalizes a path on the installed system to its absolute form
 * (`usr//bin/` becomes `/usr/bin`). `..` segments are rejected.
 */
export function toInstallPath(installPath: string): string {
	const segments = installPath.split("/").filter((s) => s !== "" && s !== ".");

	if (segments.includes("..")) {
		throw new ConfigurationError(
			"path",
			`"${installPath}" must not contain ".." segments`,
		);
	}

	return `/${segments.join("/")}`;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}

/**
 * A private scratch directory holding the two trees of a package: `data/`,
 * laid out like the installed system, and `control/`, holding package
 * metadata.
 *
 * The caller owns the scratch root and must {@link dispose} it.
 */
export class StagingFilesystem {
	private constructor(
		/** Scratch root. Also holds the intermediate tarballs. */
		readonly root: string,
		readonly dataRoot: string,
		readonly controlRoot: string,
	) {}

	static async create(options: StagingOptions = {}): Promise<StagingFilesystem> {
		const root = await fs.mkdtemp(
			path.join(options.tmpDir ?? os.tmpdir(), "debwrap-"),
		);
		const dataRoot = path.join(root, "data");
		const controlRoot = path.join(root, "control");

		for (const dir of [dataRoot, controlRoot]) {
			await fs.mkdir(dir);
			// mkdir is subject to the umask; the tarball's "./" entry takes this mode.
			await fs.chmod(dir, DEFAULT_DIR_MODE);
		}

		return new StagingFilesystem(root, dataRoot, controlRoot);
	}

	/**
	 * Path of a file in the control tree. Nothing is created.
	 */
	controlPath(filename: string): string {
		return path.join(this.controlRoot, filename);
	}

	/**
	 * Path of a scratch file outside both trees.
	 */
	scratchPath(filename: string): string {
		return path.join(this.root, filename);
	}

	/**
	 * Staging path for a file at `installPath`. Every directory between the
	 * data root and the file is created if missing and set to `mode`.
	 */
	async dataPath(
		installPath: string,
		mode: number = DEFAULT_DIR_MODE,
	): Promise<string> {
		const target = this.resolve(installPath);
		await this.mkdirp(path.dirname(target), mode);
		return target;
	}

	/**
	 * Staging path for a directory at `installPath`, created (along with its
	 * ancestors, all set to `mode`) unless `create` is `false`.
	 */
	async dataDirPath(
		installPath: string,
		options: DataDirOptions = {},
	): Promise<string> {
		const target = this.resolve(installPath);
		if (options.create ?? true) {
			await this.mkdirp(target, options.mode ?? DEFAULT_DIR_MODE);
		}
		return target;
	}

	/**
	 * Removes the scratch root and everything in it.
	 */
	async dispose(): Promise<void> {
		await fs.rm(this.root, { recursive: true, force: true });
	}

	private resolve(installPath: string): string {
		return path.join(this.dataRoot, toInstallPath(installPath));
	}

	// Walks from the data root down to `target`, creating missing directories
	// and setting `mode` on each one, whether new or not.
	private async mkdirp(target: string, mode: number): Promise<void> {
		const relative = path.relative(this.dataRoot, target);
		if (relative === "") return;

		let current = this.dataRoot;
		for (const segment of relative.split(path.sep)) {
			current = path.join(current, segment);

			try {
				await fs.mkdir(current);
			} catch (err) {
				if (!isErrnoException(err) || err.code !== "EEXIST") throw err;

				const stat = await fs.lstat(current);
				if (!stat.isDirectory()) {
					throw new Error(
						`"${path.relative(this.dataRoot, current)}" exists in the staging tree and is not a directory.`,
					);
				}
			}

			await fs.chmod(current, mode);
		}
	}
}
