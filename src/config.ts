/**
 * Server configuration from environment variables.
 *
 * - PORT: HTTP port (default 8787)
 * - SKILLS_DIR: directory holding `<skill>/SKILL.md` files (default ./skills)
 * - LOG_LEVEL: pino level (default info)
 * - SEARCH_CONFIG: optional path to a JSON file of scoring weights
 */

import * as fs from "node:fs/promises";
import { Result } from "better-result";
import { z } from "zod";
import { Errors, type ValidationError } from "./core/errors.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import { type SearchConfig, searchConfigSchema } from "./search/config.js";

const envSchema = z.object({
	PORT: z.coerce.number().int().min(1).max(65535).default(8787),
	SKILLS_DIR: z.string().min(1).default("./skills"),
	LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
	SEARCH_CONFIG: z.string().min(1).optional(),
});

export interface ServerConfig {
	port: number;
	skillsDir: string;
	logLevel: LogLevel;
	search: SearchConfig;
}

function zodIssues(error: z.ZodError): string[] {
	return error.issues.map(
		(issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
	);
}

/**
 * Read and validate a scoring config file.
 */
export async function loadSearchConfigFile(
	filePath: string,
): Promise<Result<SearchConfig, ValidationError>> {
	let raw: string;
	try {
		raw = await fs.readFile(filePath, "utf-8");
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		return Result.err(Errors.validation(filePath, [`unreadable: ${reason}`]));
	}

	const parsed = Result.try((): unknown => JSON.parse(raw));
	if (parsed.isErr()) {
		return Result.err(Errors.validation(filePath, ["invalid JSON"]));
	}

	const validated = searchConfigSchema.safeParse(parsed.value);
	if (!validated.success) {
		return Result.err(Errors.validation(filePath, zodIssues(validated.error)));
	}
	return Result.ok(validated.data);
}

/**
 * Build the server configuration from an environment.
 */
export async function loadServerConfig(
	env: Record<string, string | undefined> = process.env,
): Promise<Result<ServerConfig, ValidationError>> {
	const validated = envSchema.safeParse(env);
	if (!validated.success) {
		return Result.err(
			Errors.validation("environment", zodIssues(validated.error)),
		);
	}

	const { PORT, SKILLS_DIR, LOG_LEVEL, SEARCH_CONFIG } = validated.data;

	let search: SearchConfig = searchConfigSchema.parse({});
	if (SEARCH_CONFIG !== undefined) {
		const fromFile = await loadSearchConfigFile(SEARCH_CONFIG);
		if (fromFile.isErr()) {
			return Result.err(fromFile.error);
		}
		search = fromFile.value;
	}

	return Result.ok({
		port: PORT,
		skillsDir: SKILLS_DIR,
		logLevel: LOG_LEVEL,
		search,
	});
}
