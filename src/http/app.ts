import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import { z } from "zod";
import { type DomainError, ErrorCode, ValidationError } from "../core/errors.js";
import { createLogger } from "../logger.js";
import type { Registry, RegistrySnapshot } from "../registry/registry.js";
import { searchIndex } from "../search/search.js";

const log = createLogger("http");

/**
 * Variables set on every request context.
 */
export interface AppVariables {
	registry: Registry;
}

export interface AppEnv {
	Variables: AppVariables;
}

/**
 * App factory options.
 */
export interface CreateAppOptions {
	registry: Registry;
	/**
	 * Reads the corpus again for POST /reload/source (e.g. the skills
	 * directory). Without it that route answers 404.
	 */
	source?: () => Promise<readonly unknown[]>;
}

const searchQuerySchema = z.object({
	q: z.string({ required_error: "q is required" }),
	topK: z.coerce.number().int().positive().optional(),
	minScore: z.coerce.number().nonnegative().finite().optional(),
});

const reloadBodySchema = z.object({
	skills: z.array(z.unknown()),
});

type ErrorStatus = 400 | 404 | 422 | 500 | 503;

function errorBody(error: DomainError) {
	return error instanceof ValidationError
		? { error: error.message, code: error.code, issues: error.issues }
		: { error: error.message, code: error.code };
}

function statusFor(error: DomainError, validationStatus: 400 | 422): ErrorStatus {
	switch (error.code) {
		case ErrorCode.EMPTY_QUERY:
		case ErrorCode.UNENCODABLE_TEXT:
			return 400;
		case ErrorCode.VALIDATION_FAILED:
			return validationStatus;
		case ErrorCode.NOT_FOUND:
			return 404;
		case ErrorCode.REGISTRY_DISPOSED:
			return 503;
		default:
			return 500;
	}
}

function reloadSummary(snapshot: RegistrySnapshot) {
	return {
		generation: snapshot.generation,
		documents: snapshot.index.documents.size,
		warnings: snapshot.index.warnings,
	};
}

/**
 * Factory to create the HTTP app over a registry.
 */
export function createApp(options: CreateAppOptions) {
	const { registry, source } = options;
	const app = new Hono<AppEnv>().basePath("/api/v1");

	app.use("*", async (c, next) => {
		c.set("registry", registry);
		const started = Date.now();
		await next();
		log.debug(
			{
				method: c.req.method,
				path: c.req.path,
				status: c.res.status,
				ms: Date.now() - started,
			},
			"[HTTP] Request",
		);
	});

	app.onError((err, c) => {
		log.error({ err, path: c.req.path }, "[HTTP] Unhandled error");
		return c.json({ error: "Internal server error" }, 500);
	});

	// =========================================================================
	// Search
	// =========================================================================

	// GET /search?q=&topK=&minScore= - Ranked skills for a request
	app.get(
		"/search",
		zValidator("query", searchQuerySchema, (result, c) => {
			if (!result.success) {
				return c.json(
					{
						error: "Invalid search parameters",
						code: ErrorCode.VALIDATION_FAILED,
						issues: result.error.issues.map(
							(issue) => `${issue.path.join(".")}: ${issue.message}`,
						),
					},
					400,
				);
			}
		}),
		(c) => {
			const { q, topK, minScore } = c.req.valid("query");

			// One snapshot for the whole request, so the reported generation
			// is the one that produced the results
			const snapshot = c.get("registry").snapshot();
			if (snapshot.isErr()) {
				return c.json(errorBody(snapshot.error), statusFor(snapshot.error, 400));
			}

			const result = searchIndex(snapshot.value.index, q, { topK, minScore });
			if (result.isErr()) {
				return c.json(errorBody(result.error), statusFor(result.error, 400));
			}

			return c.json({
				generation: snapshot.value.generation,
				results: result.value,
			});
		},
	);

	// =========================================================================
	// Skills
	// =========================================================================

	// GET /skills - Skills in the current generation
	app.get("/skills", (c) => {
		const snapshot = c.get("registry").snapshot();
		if (snapshot.isErr()) {
			return c.json(errorBody(snapshot.error), statusFor(snapshot.error, 400));
		}

		const skills = [...snapshot.value.index.documents.values()]
			.sort((a, b) =>
				a.name < b.name ? -1 : a.name > b.name ? 1 : a.id < b.id ? -1 : 1,
			)
			.map(({ id, name, description, category, tags }) => ({
				id,
				name,
				description,
				category,
				tags,
			}));

		return c.json({ generation: snapshot.value.generation, skills });
	});

	// GET /skills/:id - Skill body as markdown
	app.get("/skills/:id", (c) => {
		const snapshot = c.get("registry").snapshot();
		if (snapshot.isErr()) {
			return c.json(errorBody(snapshot.error), statusFor(snapshot.error, 400));
		}

		const id = c.req.param("id");
		const document = snapshot.value.index.documents.get(id);
		if (!document) {
			return c.json(
				{ error: `Skill ${id} not found`, code: ErrorCode.NOT_FOUND },
				404,
			);
		}

		c.header("Content-Type", "text/markdown; charset=utf-8");
		c.header("X-Skill-Generation", String(snapshot.value.generation));
		return c.body(document.body, 200);
	});

	// =========================================================================
	// Administration
	// =========================================================================

	// GET /generation - Which build is being served
	app.get("/generation", (c) => {
		const snapshot = c.get("registry").snapshot();
		if (snapshot.isErr()) {
			return c.json(errorBody(snapshot.error), statusFor(snapshot.error, 400));
		}

		return c.json({
			...reloadSummary(snapshot.value),
			builtAt: snapshot.value.builtAt.toISOString(),
		});
	});

	// POST /reload - Replace the corpus with the posted skills
	app.post(
		"/reload",
		zValidator("json", reloadBodySchema, (result, c) => {
			if (!result.success) {
				return c.json(
					{
						error: "Body must be an object with a skills array",
						code: ErrorCode.VALIDATION_FAILED,
					},
					400,
				);
			}
		}),
		(c) => {
			const { skills } = c.req.valid("json");
			const result = c.get("registry").reload(skills);
			if (result.isErr()) {
				return c.json(errorBody(result.error), statusFor(result.error, 422));
			}
			return c.json(reloadSummary(result.value));
		},
	);

	// POST /reload/source - Re-read the corpus from its configured source
	app.post("/reload/source", async (c) => {
		if (!source) {
			return c.json(
				{ error: "No skill source configured", code: ErrorCode.NOT_FOUND },
				404,
			);
		}

		const documents = await source();
		const result = c.get("registry").reload(documents);
		if (result.isErr()) {
			return c.json(errorBody(result.error), statusFor(result.error, 422));
		}
		return c.json(reloadSummary(result.value));
	});

	return app;
}
