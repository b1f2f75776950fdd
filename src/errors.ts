/**
 * Base class for every error raised by debwrap itself.
 *
 * Filesystem and subprocess failures are not wrapped at their origin; they
 * propagate as-is and are attached as the `cause` of a {@link BuildError}.
 */
export class DebwrapError extends Error {
	readonly code: string;
	readonly details?: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		details?: Record<string, unknown>,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "DebwrapError";
		this.code = code;
		this.details = details;
	}
}

/**
 * A malformed package description. Raised before any filesystem mutation.
 */
export class ConfigurationError extends DebwrapError {
	readonly field: string;

	constructor(field: string, message: string) {
		super(
			`Invalid package description: ${field}: ${message}`,
			"CONFIGURATION_ERROR",
			{ field },
		);
		this.name = "ConfigurationError";
		this.field = field;
	}
}

/**
 * A member or entry that cannot be represented in the tar or `ar` format,
 * or an archive that does not decode.
 */
export class ArchiveError extends DebwrapError {
	constructor(message: string, details?: Record<string, unknown>) {
		super(message, "ARCHIVE_ERROR", details);
		this.name = "ArchiveError";
	}
}

/**
 * The package linter reported defects and the build asked for strict linting.
 */
export class LintError extends DebwrapError {
	readonly exitCode: number;
	readonly output: string;

	constructor(exitCode: number, output: string) {
		super(`Linter failed with exit code ${exitCode}`, "LINT_ERROR", {
			exitCode,
		});
		this.name = "LintError";
		this.exitCode = exitCode;
		this.output = output;
	}
}

/**
 * A fatal failure during a build. The scratch directory is left in place at
 * `stagingPath` for diagnosis.
 */
export class BuildError extends DebwrapError {
	readonly stagingPath: string | undefined;

	constructor(packageName: string, stagingPath: string | undefined, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super(
			`Failed to build ${packageName}: ${reason}`,
			"BUILD_ERROR",
			{ packageName, stagingPath },
			{ cause },
		);
		this.name = "BuildError";
		this.stagingPath = stagingPath;
	}
}
