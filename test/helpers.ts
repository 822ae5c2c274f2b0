import { createRegistry, type Registry } from "../src/registry/index.js";
import type { SearchConfigInput } from "../src/search/index.js";
import type { SkillDocumentInput } from "../src/types/index.js";

/**
 * Build a skill record with sensible defaults for testing.
 */
export function makeSkill(
	name: string,
	options: Partial<SkillDocumentInput> = {},
): SkillDocumentInput {
	return {
		name,
		description: options.description ?? `A skill for ${name}`,
		triggerTerms: options.triggerTerms ?? [],
		tags: options.tags ?? [],
		category: options.category,
		compatibilityNote: options.compatibilityNote,
		body: options.body ?? `# ${name}`,
	};
}

export const cypressSkill: SkillDocumentInput = makeSkill("cypress", {
	description: "End-to-end browser testing for web apps, run in CI pipelines.",
	triggerTerms: ["cypress", "e2e testing", "browser testing"],
	tags: ["testing", "e2e"],
	category: "testing",
	body: "# Cypress\n\nnpx cypress run",
});

export const huskySkill: SkillDocumentInput = makeSkill("husky", {
	description: "Git hooks that run linters and tests before each commit.",
	triggerTerms: ["husky", "git hooks", "pre-commit"],
	tags: ["git", "hooks"],
	category: "devops",
	body: "# Husky\n\nnpx husky init",
});

export const sampleCorpus: SkillDocumentInput[] = [cypressSkill, huskySkill];

/**
 * Create a registry already loaded with the sample corpus.
 */
export function makeTestRegistry(options?: {
	skills?: readonly unknown[];
	search?: SearchConfigInput;
	getNow?: () => Date;
}): Registry {
	const registry = createRegistry({
		search: options?.search,
		getNow: options?.getNow,
	});
	const loaded = registry.load(options?.skills ?? sampleCorpus);
	if (loaded.isErr()) {
		throw new Error(`Failed to load test corpus: ${loaded.error.message}`);
	}
	return registry;
}

/**
 * A SKILL.md file with the given frontmatter lines.
 */
export function makeSkillFile(frontmatter: string[], body = "# Skill body"): string {
	return `---\n${frontmatter.join("\n")}\n---\n\n${body}`;
}
