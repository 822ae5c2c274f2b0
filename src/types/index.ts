import { z } from "zod";

// =============================================================================
// Skill Document Input
// =============================================================================

/**
 * Derive a document id from its name: lowercase, runs of anything that is not
 * a letter or digit collapsed to a single hyphen, no leading/trailing hyphen.
 * Example: "Docker Compose" -> "docker-compose"
 */
export function deriveSkillId(name: string): string {
	return name
		.normalize("NFKC")
		.toLowerCase()
		.replace(/[^\p{L}\p{N}]+/gu, "-")
		.replace(/^-+|-+$/g, "");
}

/**
 * A set of strings: trimmed, blanks dropped, first occurrence kept.
 */
const stringSetSchema = z
	.array(z.string())
	.default([])
	.transform((values) => {
		const seen = new Set<string>();
		const out: string[] = [];
		for (const value of values) {
			const trimmed = value.trim();
			if (trimmed === "" || seen.has(trimmed)) continue;
			seen.add(trimmed);
			out.push(trimmed);
		}
		return out;
	});

/**
 * Skill record as handed to the registry. Loading and frontmatter parsing
 * happen elsewhere; this is the boundary where records become typed.
 */
export const skillDocumentInputSchema = z.object({
	name: z
		.string({ required_error: "name is required" })
		.trim()
		.min(1, "name must not be blank")
		.refine((name) => deriveSkillId(name) !== "", {
			message: "name must contain at least one letter or digit",
		}),
	description: z
		.string({ required_error: "description is required" })
		.trim()
		.min(1, "description must not be blank"),
	triggerTerms: stringSetSchema,
	tags: stringSetSchema,
	category: z
		.string()
		.trim()
		.default("general")
		.transform((value) => (value === "" ? "general" : value)),
	compatibilityNote: z.string().default(""),
	body: z.string().default(""),
});

export type SkillDocumentInput = z.input<typeof skillDocumentInputSchema>;

/**
 * Validated skill document. `id` is derived from `name` and never changes.
 */
export interface SkillDocument extends z.output<typeof skillDocumentInputSchema> {
	readonly id: string;
}

// =============================================================================
// Index
// =============================================================================

/** A normalized token */
export type Term = string;

export const INDEXED_FIELDS = [
	"triggerTerm",
	"name",
	"tag",
	"description",
] as const;

export type IndexedField = (typeof INDEXED_FIELDS)[number];

export interface PostingEntry {
	readonly term: Term;
	readonly documentId: string;
	readonly field: IndexedField;
	/** Field weight x term frequency in that field */
	readonly weight: number;
}

/**
 * A multi-word trigger phrase, kept for exact-phrase bonus scoring.
 */
export interface PhraseEntry {
	/** The trigger term as the author wrote it */
	readonly phrase: string;
	/** NFKC-normalized, lowercased text matched against the raw query */
	readonly text: string;
	readonly documentId: string;
}

/**
 * A document that could not be indexed. The rest of its batch still builds.
 */
export interface IndexWarning {
	readonly documentId: string;
	readonly message: string;
}

// =============================================================================
// Query & Results
// =============================================================================

export interface Query {
	readonly text: string;
	readonly terms: readonly Term[];
}

export interface MatchResult {
	readonly id: string;
	readonly name: string;
	readonly score: number;
	/** Distinct query terms that hit the document, in query order */
	readonly matchedTerms: readonly Term[];
	/** Trigger phrases found verbatim in the query */
	readonly matchedPhrases: readonly string[];
}

/** Descending score, then name ascending, then id ascending */
export type RankedList = readonly MatchResult[];

/**
 * Search parameters. Both optional: all qualifying matches, any positive score.
 */
export const searchOptionsSchema = z.object({
	topK: z.number().int().positive().optional(),
	minScore: z.number().nonnegative().finite().optional(),
});

export type SearchOptions = z.infer<typeof searchOptionsSchema>;

// =============================================================================
// Skill Content Frontmatter (SKILL.md)
// =============================================================================

/**
 * Skill name for frontmatter: lowercase kebab-case, 1-64 chars.
 */
export const frontmatterNameSchema = z
	.string()
	.min(1)
	.max(64)
	.regex(
		/^[a-z0-9][a-z0-9-]*$/,
		"Name must be lowercase alphanumeric characters and hyphens",
	);

/**
 * Frontmatter description: 1-1024 characters, no markup
 */
export const frontmatterDescriptionSchema = z
	.string()
	.min(1, "Description is required")
	.max(1024, "Description must be 1024 characters or less")
	.refine((value) => !value.includes("<") && !value.includes(">"), {
		message: "Description must not contain XML tags",
	});

const frontmatterListSchema = z
	.union([z.array(z.string()), z.string()])
	.transform((value) => (typeof value === "string" ? [value] : value));

export const frontmatterMetadataSchema = z
	.record(z.string(), z.union([z.string(), z.array(z.string())]))
	.optional();

/**
 * Skill frontmatter schema (YAML header of a SKILL.md file)
 */
export const skillFrontmatterSchema = z.object({
	name: frontmatterNameSchema,
	description: frontmatterDescriptionSchema,
	/** License identifier (optional) */
	license: z.string().max(100).optional(),
	/** Tool compatibility hint (optional) */
	compatibility: z.string().max(500).optional(),
	category: z.string().optional(),
	tags: frontmatterListSchema.optional(),
	triggers: frontmatterListSchema.optional(),
	/** author, version, category, tags, triggers... */
	metadata: frontmatterMetadataSchema,
});

export type SkillFrontmatter = z.infer<typeof skillFrontmatterSchema>;

export const schemas = {
	skillDocumentInput: skillDocumentInputSchema,
	searchOptions: searchOptionsSchema,
	frontmatterName: frontmatterNameSchema,
	frontmatterDescription: frontmatterDescriptionSchema,
	skillFrontmatter: skillFrontmatterSchema,
} as const;
