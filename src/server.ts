/**
 * Node.js entry point: load skills from SKILLS_DIR, publish them and serve
 * the HTTP API.
 */

import { serve } from "@hono/node-server";
import { loadServerConfig } from "./config.js";
import { loadSkillDocuments } from "./core/loader.js";
import { createApp } from "./http/app.js";
import { createLogger, setLogLevel } from "./logger.js";
import { createRegistry } from "./registry/registry.js";
import { FileSystemStorage } from "./storage/filesystem.js";

const log = createLogger("server");

async function main(): Promise<void> {
	const configResult = await loadServerConfig();
	if (configResult.isErr()) {
		log.fatal(
			{ issues: configResult.error.issues },
			"[SERVER] Invalid configuration",
		);
		process.exitCode = 1;
		return;
	}

	const config = configResult.value;
	setLogLevel(config.logLevel);

	const storage = new FileSystemStorage(config.skillsDir);
	const source = async () => (await loadSkillDocuments(storage)).documents;

	const registry = createRegistry({ search: config.search });
	const initial = registry.load(await source());
	if (initial.isErr()) {
		// Keep serving generation 0; POST /reload/source can recover
		log.error(
			{ skillsDir: config.skillsDir, error: initial.error.message },
			"[SERVER] Initial skill load failed",
		);
	}

	const app = createApp({ registry, source });
	const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
		log.info(
			{ port: info.port, generation: registry.currentGeneration() },
			"[SERVER] Listening",
		);
	});

	const shutdown = (signal: string) => {
		log.info({ signal }, "[SERVER] Shutting down");
		registry.dispose();
		server.close();
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
	log.fatal({ err }, "[SERVER] Failed to start");
	process.exitCode = 1;
});
