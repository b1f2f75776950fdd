import { z } from "zod";

const envSchema = z.object({
	LOG_LEVEL: z
		.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
		.default("info"),
	// Reproducible builds: clamp archive timestamps to this epoch (seconds).
	SOURCE_DATE_EPOCH: z.coerce.number().int().nonnegative().optional(),
	DEBWRAP_TMPDIR: z.string().min(1).optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Reads debwrap's settings from the environment. Unset or empty variables
 * fall back to their defaults; invalid values throw.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
	const present = Object.fromEntries(
		Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
	);
	return envSchema.parse(present);
}

/**
 * The archive timestamp configured through `SOURCE_DATE_EPOCH`, if any.
 */
export function sourceDateEpoch(config: EnvConfig): Date | undefined {
	return config.SOURCE_DATE_EPOCH === undefined
		? undefined
		: new Date(config.SOURCE_DATE_EPOCH * 1000);
}
