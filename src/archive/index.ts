export {
	AR_GLOBAL_HEADER,
	arPadding,
	createArHeader,
	packAr,
	parseArHeader,
	unpackAr,
} from "./ar";
export { DEB_MEMBERS, DEBIAN_BINARY } from "./constants";
export {
	createTarHeader,
	encodeTarHeader,
	findUstarSplit,
	packTar,
	TAR_EOF,
	tarPadding,
	unpackTar,
} from "./tar";
export type {
	ArEntry,
	ArHeader,
	ParsedTarEntry,
	TarEntry,
	TarEntryType,
	TarHeader,
} from "./types";
export { decoder, encoder } from "./utils";
