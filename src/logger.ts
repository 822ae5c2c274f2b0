/**
 * Structured logging with pino.
 *
 * One root logger per process; modules take a child carrying their name.
 * Level comes from LOG_LEVEL (tests run with "silent") and can be changed
 * at startup with setLogLevel.
 */

import { type Logger, pino } from "pino";

export type { Logger };

export const LOG_LEVELS = [
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * LOG_LEVEL when it names a pino level, otherwise "info". Unknown values are
 * reported by config validation.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
	return value !== undefined && isLogLevel(value) ? value : "info";
}

export const rootLogger: Logger = pino({
	name: "skillmatch",
	level: resolveLogLevel(process.env.LOG_LEVEL),
	timestamp: pino.stdTimeFunctions.isoTime,
});

const children = new Set<Logger>();

export function createLogger(module: string): Logger {
	const child = rootLogger.child({ module });
	children.add(child);
	return child;
}

/**
 * Children take their level when created, so update them too.
 */
export function setLogLevel(level: LogLevel): void {
	rootLogger.level = level;
	for (const child of children) {
		child.level = level;
	}
}
