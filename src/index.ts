/**
 * skillmatch: pick the skill documents relevant to a user's request.
 *
 * ```ts
 * const registry = createRegistry();
 * registry.load(skills);
 * const ranked = registry.search("set up a pre-commit hook");
 * ```
 */

export type { ServerConfig } from "./config.js";
export { loadSearchConfigFile, loadServerConfig } from "./config.js";
export * from "./core/index.js";
export * from "./http/index.js";
export type { Logger, LogLevel } from "./logger.js";
export {
	createLogger,
	LOG_LEVELS,
	resolveLogLevel,
	rootLogger,
	setLogLevel,
} from "./logger.js";
export * from "./registry/index.js";
export * from "./search/index.js";
export * from "./storage/index.js";
export * from "./types/index.js";
