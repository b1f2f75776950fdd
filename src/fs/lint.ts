import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { LintError } from "../errors";
import { type Logger, logger as defaultLogger } from "../logger";

const execFileAsync = promisify(execFile);

export interface LintOptions {
	/** Linter executable. Defaults to `lintian`. */
	command?: string;
	/** Arguments placed before the package path. Defaults to verbose, pedantic, uncolored. */
	args?: readonly string[];
	/** Throw a {@link LintError} when the linter reports defects. */
	strict?: boolean;
	logger?: Logger;
}

export type LintResult =
	| { status: "unavailable"; command: string }
	| { status: "passed"; output: string }
	| { status: "failed"; exitCode: number; output: string };

const DEFAULT_ARGS = ["-v", "--pedantic", "--color", "never"] as const;

// Verbose, pedantic runs on large packages print far more than execFile's 1 MiB default.
export const LINT_MAX_BUFFER = 64 * 1024 * 1024;

interface ExecFailure extends Error {
	code?: number | string | null;
	stdout?: string;
	stderr?: string;
}

function isExecFailure(err: unknown): err is ExecFailure {
	return err instanceof Error && "code" in err;
}

/**
 * Runs the package linter against a finished `.deb`. A linter that is not
 * installed is reported as `unavailable` rather than failing the build.
 */
export async function runLinter(
	debPath: string,
	options: LintOptions = {},
): Promise<LintResult> {
	const command = options.command ?? "lintian";
	const logger = options.logger ?? defaultLogger;

	try {
		const { stdout, stderr } = await execFileAsync(
			command,
			[...(options.args ?? DEFAULT_ARGS), debPath],
			{ encoding: "utf8", maxBuffer: LINT_MAX_BUFFER },
		);
		const output = `${stdout}${stderr}`;
		logger.info({ command, output }, "Linter passed");
		return { status: "passed", output };
	} catch (err) {
		if (!isExecFailure(err)) throw err;

		if (err.code === "ENOENT") {
			logger.warn({ command }, "Linter not found, skipping");
			return { status: "unavailable", command };
		}

		if (typeof err.code !== "number") throw err;

		const output = `${err.stdout ?? ""}${err.stderr ?? ""}`;
		logger.warn({ command, exitCode: err.code, output }, "Linter reported defects");

		if (options.strict) throw new LintError(err.code, output);
		return { status: "failed", exitCode: err.code, output };
	}
}
