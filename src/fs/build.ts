import * as fs from "node:fs/promises";
import * as path from "node:path";
import { loadConfig, sourceDateEpoch } from "../config";
import type { ArchitectureProbe, ControlRecord } from "../control";
import { BuildError } from "../errors";
import { createLogger, type Logger } from "../logger";
import type { PackageDescription } from "../package";
import { BuildContext } from "./context";
import { type LintOptions, type LintResult, runLinter } from "./lint";
import { writeMetadata } from "./metadata";
import { packDeb } from "./pack";
import { applyRules } from "./rules";

export interface BuildOptions {
	logger?: Logger;
	/** Parent of the scratch directory. Defaults to `DEBWRAP_TMPDIR`, then `os.tmpdir()`. */
	tmpDir?: string;
	/** Keep the scratch directory after a successful build. */
	keepStaging?: boolean;
	/** Host architecture probe. Defaults to `dpkg --print-architecture`. */
	probe?: ArchitectureProbe;
	/** Timestamp for archive entries. Defaults to `SOURCE_DATE_EPOCH`, then file mtimes. */
	mtime?: Date;
	/** Run the package linter on the result. */
	lint?: boolean | Omit<LintOptions, "logger">;
}

export interface BuildResult {
	/** Absolute path of the package. */
	path: string;
	architectures: string[];
	control: ControlRecord;
	conffiles: string[];
	/** Scratch directory, when kept with `keepStaging`. */
	stagingPath?: string;
	lint?: LintResult;
}

/**
 * Builds a `.deb` from a package description: stages files by applying its
 * rules in order, writes the package metadata, packs the archive and
 * optionally lints it.
 *
 * The scratch directory is removed after a successful build. On failure it is
 * kept for diagnosis, no package is left at `destination`, and the error is
 * rethrown as a {@link BuildError}.
 *
 * @example
 * ```typescript
 * const result = await buildPackage(pkg, "dist/hello_1.0.0_amd64.deb", {
 *   lint: { strict: true },
 * });
 * console.log(result.control.get("Architecture"));
 * ```
 */
export async function buildPackage(
	pkg: PackageDescription,
	destination: string,
	options: BuildOptions = {},
): Promise<BuildResult> {
	const config = loadConfig();
	const logger =
		options.logger?.child({ package: pkg.name }) ??
		createLogger({ package: pkg.name });
	const output = path.resolve(destination);

	let context: BuildContext | undefined;
	let result: BuildResult;

	try {
		context = await BuildContext.create({
			tmpDir: options.tmpDir ?? config.DEBWRAP_TMPDIR,
			logger,
		});

		await applyRules(pkg, context);
		const metadata = await writeMetadata(pkg, context, {
			probe: options.probe,
		});
		await packDeb(context, output, {
			mtime: options.mtime ?? sourceDateEpoch(config),
		});

		let lint: LintResult | undefined;
		if (options.lint) {
			lint = await runLinter(output, {
				...(options.lint === true ? {} : options.lint),
				logger,
			});
		}

		result = { path: output, ...metadata, lint };
	} catch (err) {
		const stagingPath = context?.staging.root;
		logger.error({ err, stagingPath }, "Build failed");

		await fs.rm(output, { force: true });
		throw new BuildError(pkg.name, stagingPath, err);
	}

	if (options.keepStaging) {
		result.stagingPath = context.staging.root;
	} else {
		await context.staging.dispose();
	}

	return result;
}
