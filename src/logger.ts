import { type Logger, pino } from "pino";
import { loadConfig } from "./config";

export const logger = pino({
	level: loadConfig().LOG_LEVEL,
	formatters: {
		level: (label: string) => ({ level: label }),
	},
	timestamp: pino.stdTimeFunctions.isoTime,
	base: { service: "debwrap" },
});

export type { Logger };

/**
 * Create a child logger with additional context.
 */
export function createLogger(context: Record<string, unknown>): Logger {
	return logger.child(context);
}
