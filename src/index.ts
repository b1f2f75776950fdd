export * from "./archive/index";
export { type EnvConfig, loadConfig } from "./config";
export * from "./control/index";
export {
	ArchiveError,
	BuildError,
	ConfigurationError,
	DebwrapError,
	LintError,
} from "./errors";
export * from "./fs/index";
export { createLogger, type Logger, logger } from "./logger";
export {
	type Architecture,
	definePackage,
	type PackageDescription,
	type PackageInput,
	packageSchema,
} from "./package";
