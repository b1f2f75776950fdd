import { type Logger, logger as defaultLogger } from "../logger";
import { type StagingOptions, StagingFilesystem, toInstallPath } from "./staging";

/** A symbolic link to create at `link`, pointing at `source`. Both are install paths. */
export interface SymlinkPair {
	source: string;
	link: string;
}

export interface BuildContextOptions extends StagingOptions {
	logger?: Logger;
}

export interface MakeDirectoryOptions {
	/** Hand the directory (recursively) to this user at configure time. */
	owner?: string;
	/** Group for `owner`. Ignored without an owner. */
	group?: string;
	mode?: number;
}

/**
 * State accumulated during one build: the staging trees, the `postinst`
 * commands and the symlinks to create. Rules receive it and mutate it.
 */
export class BuildContext {
	readonly postinstCommands: string[] = [];
	readonly symlinks: SymlinkPair[] = [];

	private constructor(
		readonly staging: StagingFilesystem,
		readonly logger: Logger,
	) {}

	static async create(options: BuildContextOptions = {}): Promise<BuildContext> {
		const staging = await StagingFilesystem.create(options);
		const logger = options.logger ?? defaultLogger;
		logger.debug({ stagingPath: staging.root }, "Created staging directory");
		return new BuildContext(staging, logger);
	}

	/**
	 * Creates a directory in the data tree. With an owner, queues a recursive
	 * `chown` for configure time, since the build does not run as that user.
	 *
	 * The owner, group and path are written into the `postinst` line as-is,
	 * unquoted: none of them may contain whitespace or shell metacharacters.
	 */
	async makeDirectory(
		installPath: string,
		options: MakeDirectoryOptions = {},
	): Promise<string> {
		const stagedPath = await this.staging.dataDirPath(installPath, {
			mode: options.mode,
		});

		if (options.owner !== undefined) {
			const ownership =
				options.group !== undefined
					? `${options.owner}:${options.group}`
					: options.owner;
			this.addPostinstCommand(
				`chown -R ${ownership} ${toInstallPath(installPath)}`,
			);
		}

		return stagedPath;
	}

	addPostinstCommand(command: string): void {
		this.postinstCommands.push(command);
	}

	addSymlink(source: string, link: string): void {
		this.symlinks.push({
			source: toInstallPath(source),
			link: toInstallPath(link),
		});
	}
}
