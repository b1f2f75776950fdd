import type { Architecture } from "../package";

/**
 * Reports the build host's Debian architecture (e.g. `amd64`), or
 * `undefined` when it cannot be determined.
 */
export type ArchitectureProbe = () => Promise<string | undefined>;

/** Used when the host architecture cannot be determined. */
export const FALLBACK_ARCHITECTURE = "any";

export interface ResolveArchitectureOptions {
	/** Consulted only for `{ kind: "host" }`. */
	probe: ArchitectureProbe;
	/** Resolve for a source package control file, which must list `source`. */
	source?: boolean;
}

/**
 * Resolves an {@link Architecture} to the non-empty list written to the
 * `Architecture` field. A failing, missing or silent probe yields `["any"]`.
 */
export async function resolveArchitectures(
	architecture: Architecture,
	options: ResolveArchitectureOptions,
): Promise<string[]> {
	let values: string[];

	if (architecture.kind === "explicit") {
		values = [...architecture.values];
	} else {
		const detected = await options.probe().catch(() => undefined);
		const trimmed = detected?.trim();
		values = [trimmed ? trimmed : FALLBACK_ARCHITECTURE];
	}

	if (options.source && !values.includes("source")) {
		values.push("source");
	}

	return values;
}
