/**
 * Tunable scoring configuration.
 *
 * Field weights rank intentional-match signal: a trigger term is the author
 * saying "pick me for this", a description word is incidental.
 */

import { z } from "zod";

export const fieldWeightsSchema = z
	.object({
		triggerTerm: z.number().positive().default(5),
		name: z.number().positive().default(4),
		tag: z.number().positive().default(2),
		description: z.number().positive().default(1),
	})
	.default({});

export type FieldWeights = z.infer<typeof fieldWeightsSchema>;

export const searchConfigSchema = z.object({
	weights: fieldWeightsSchema,
	/** Added once per distinct trigger phrase found in the query */
	phraseBonus: z.number().nonnegative().default(6),
	/** Tokens shorter than this are dropped unless a trigger term uses them */
	minTokenLength: z.number().int().positive().default(2),
	/** Light plural stemming */
	stem: z.boolean().default(true),
	/** token -> replacement, applied before length filtering and stemming */
	aliases: z.record(z.string(), z.string()).default({}),
});

export type SearchConfig = z.infer<typeof searchConfigSchema>;
export type SearchConfigInput = z.input<typeof searchConfigSchema>;

/**
 * Resolve a partial config against the defaults.
 */
export function resolveSearchConfig(input: SearchConfigInput = {}): SearchConfig {
	return searchConfigSchema.parse(input);
}

export const DEFAULT_SEARCH_CONFIG: SearchConfig = resolveSearchConfig();
