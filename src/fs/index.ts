export { type BuildOptions, type BuildResult, buildPackage } from "./build";
export {
	BuildContext,
	type BuildContextOptions,
	type MakeDirectoryOptions,
	type SymlinkPair,
} from "./context";
export { probeHostArchitecture } from "./host";
export { findEntry, type InspectedPackage, inspectDeb } from "./inspect";
export { type LintOptions, type LintResult, runLinter } from "./lint";
export {
	collectConffiles,
	createSymlinks,
	type MetadataOptions,
	type WrittenMetadata,
	writeMetadata,
} from "./metadata";
export {
	type ArMemberSource,
	packDeb,
	packTree,
	type PackTreeOptions,
	writeAr,
	writeTarGz,
} from "./pack";
export {
	applyRules,
	copyDirectory,
	type FileModeOptions,
	makeDirectory,
	makeSymlink,
	placeFile,
	postinstCommand,
	type Rule,
	writeFile,
} from "./rules";
export {
	type DataDirOptions,
	StagingFilesystem,
	type StagingOptions,
	toInstallPath,
} from "./staging";
