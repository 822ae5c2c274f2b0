/**
 * Skill loader.
 *
 * Reads every `SKILL.md` from a storage backend, parses its frontmatter and
 * turns it into a document record for the registry. Files that fail to
 * parse are skipped and reported; the rest still load.
 */

import { createLogger } from "../logger.js";
import type { StorageBackend } from "../storage/interface.js";
import type { SkillDocumentInput, SkillFrontmatter } from "../types/index.js";
import { type ParsedFrontmatter, parseFrontmatter } from "./frontmatter.js";

const log = createLogger("loader");

export const SKILL_FILE = "SKILL.md";

export interface SkillLoadFailure {
	key: string;
	reason: string;
}

export interface SkillLoadResult {
	documents: SkillDocumentInput[];
	failures: SkillLoadFailure[];
}

function asList(value: string | string[] | undefined): string[] {
	if (value === undefined) return [];
	return typeof value === "string" ? [value] : value;
}

function metadataString(
	metadata: SkillFrontmatter["metadata"],
	key: string,
): string | undefined {
	const value = metadata?.[key];
	return typeof value === "string" ? value : undefined;
}

/**
 * Map parsed frontmatter onto a registry record. Top-level `category`,
 * `tags` and `triggers` take part alongside the same keys under `metadata`.
 */
export function toSkillDocumentInput({
	frontmatter,
	body,
}: ParsedFrontmatter): SkillDocumentInput {
	const { metadata } = frontmatter;
	return {
		name: frontmatter.name,
		description: frontmatter.description,
		triggerTerms: [
			...asList(frontmatter.triggers),
			...asList(metadata?.triggers),
		],
		tags: [...asList(frontmatter.tags), ...asList(metadata?.tags)],
		category:
			frontmatter.category ?? metadataString(metadata, "category") ?? "general",
		compatibilityNote: frontmatter.compatibility ?? "",
		body,
	};
}

function isSkillFile(key: string): boolean {
	return key === SKILL_FILE || key.endsWith(`/${SKILL_FILE}`);
}

/**
 * Load all skill documents under a prefix of the storage backend.
 */
export async function loadSkillDocuments(
	storage: StorageBackend,
	prefix = "",
): Promise<SkillLoadResult> {
	const keys = (await storage.list(prefix)).filter(isSkillFile);
	log.info({ files: keys.length, prefix }, "[LOADER] Loading skills");

	const documents: SkillDocumentInput[] = [];
	const failures: SkillLoadFailure[] = [];

	for (const key of keys) {
		const content = await storage.get(key);
		if (content === null) {
			log.warn({ key }, "[LOADER] Skill file disappeared while loading");
			failures.push({ key, reason: "file not found" });
			continue;
		}

		const parsed = parseFrontmatter(content);
		if (parsed.isErr()) {
			const reason = parsed.error.details
				? `${parsed.error.message}: ${parsed.error.details}`
				: parsed.error.message;
			log.warn({ key, code: parsed.error.code, reason }, "[LOADER] Skipped skill");
			failures.push({ key, reason });
			continue;
		}

		documents.push(toSkillDocumentInput(parsed.value));
	}

	log.info(
		{ loaded: documents.length, failed: failures.length },
		"[LOADER] Skills loaded",
	);
	return { documents, failures };
}
