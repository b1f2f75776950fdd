import type { PackageDescription } from "../package";

/**
 * Control fields in the order they are written.
 */
export type ControlRecord = Map<string, string>;

export interface ControlOptions {
	/** Render a binary package control file (with `Package`). Defaults to `true`. */
	binary?: boolean;
}

/**
 * Returns `text` with a trailing period, adding one only if it is missing.
 */
export function ensurePeriod(text: string): string {
	const trimmed = text.trimEnd();
	return trimmed.endsWith(".") ? trimmed : `${trimmed}.`;
}

/**
 * Formats the extended description as continuation lines: each line gets a
 * leading space and blank lines become ` .`.
 */
function formatLongDescription(text: string): string {
	return ensurePeriod(text.trim())
		.split("\n")
		.map((line) => (line.trim() === "" ? " ." : ` ${line.trimEnd()}`))
		.join("\n");
}

/**
 * Builds the control record for a package. Optional fields are present only
 * when their source value is set (or, for relationship lists, non-empty).
 */
export function buildControlRecord(
	pkg: PackageDescription,
	architectures: readonly string[],
	options: ControlOptions = {},
): ControlRecord {
	const binary = options.binary ?? true;
	const record: ControlRecord = new Map();

	record.set("Source", pkg.name);
	if (binary) record.set("Package", pkg.name);
	record.set("Version", pkg.version);
	record.set("Architecture", architectures.join(" "));
	record.set("Maintainer", `${pkg.maintainer.name} <${pkg.maintainer.email}>`);
	record.set(
		"Description",
		`${ensurePeriod(pkg.description)}\n${formatLongDescription(pkg.longDescription)}`,
	);

	if (pkg.homepage !== undefined) record.set("Homepage", pkg.homepage);
	if (pkg.section !== undefined) record.set("Section", pkg.section);
	if (pkg.priority !== undefined) record.set("Priority", pkg.priority);

	if (pkg.depends.length > 0) record.set("Depends", pkg.depends.join(", "));
	if (pkg.conflicts.length > 0) {
		record.set("Conflicts", pkg.conflicts.join(", "));
	}

	return record;
}

/**
 * Renders a control record as `Field: value` lines.
 */
export function renderControl(record: ControlRecord): string {
	let text = "";
	for (const [field, value] of record) {
		text += `${field}: ${value}\n`;
	}
	return text;
}

/**
 * Parses a single control paragraph. Continuation lines are kept verbatim
 * (leading space included), so `parseControl(renderControl(r))` equals `r`.
 */
export function parseControl(text: string): ControlRecord {
	const record: ControlRecord = new Map();
	let field: string | undefined;

	for (const line of text.split("\n")) {
		if (line === "") continue;

		if (line.startsWith(" ") || line.startsWith("\t")) {
			if (field === undefined) {
				throw new SyntaxError(`Continuation line without a field: "${line}"`);
			}
			record.set(field, `${record.get(field) ?? ""}\n${line}`);
			continue;
		}

		const colon = line.indexOf(":");
		if (colon <= 0) {
			throw new SyntaxError(`Malformed control line: "${line}"`);
		}

		field = line.slice(0, colon);
		record.set(field, line.slice(colon + 1).trim());
	}

	return record;
}
