export {
	type ArchitectureProbe,
	FALLBACK_ARCHITECTURE,
	type ResolveArchitectureOptions,
	resolveArchitectures,
} from "./architecture";
export {
	buildControlRecord,
	type ControlOptions,
	type ControlRecord,
	ensurePeriod,
	parseControl,
	renderControl,
} from "./control";
export { renderConffiles, renderPostinst } from "./scripts";
