import type { MatchResult, RankedList, SearchOptions } from "../types/index.js";
import type { SearchIndex } from "./indexer.js";
import type { RawMatch } from "./matcher.js";

/** Scores are compared at this precision so summation order cannot split a tie */
const SCORE_PRECISION = 1e6;

export function roundScore(score: number): number {
	return Math.round(score * SCORE_PRECISION) / SCORE_PRECISION;
}

function compareCodeUnits(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Order by score descending, then name ascending, then id ascending.
 */
export function compareMatches(a: MatchResult, b: MatchResult): number {
	return (
		b.score - a.score ||
		compareCodeUnits(a.name, b.name) ||
		compareCodeUnits(a.id, b.id)
	);
}

/**
 * Turn raw matcher output into the final ranked list.
 *
 * Without `minScore` any positive score qualifies; with it, scores below it
 * are dropped. Without `topK` every qualifying match is returned.
 */
export function select(
	index: SearchIndex,
	rawScores: ReadonlyMap<string, RawMatch>,
	options: SearchOptions = {},
): RankedList {
	const { topK, minScore } = options;
	const ranked: MatchResult[] = [];

	for (const match of rawScores.values()) {
		const document = index.documents.get(match.documentId);
		if (!document) continue;

		const score = roundScore(match.score);
		if (score <= 0) continue;
		if (minScore !== undefined && score < minScore) continue;

		ranked.push({
			id: document.id,
			name: document.name,
			score,
			matchedTerms: match.matchedTerms,
			matchedPhrases: match.matchedPhrases,
		});
	}

	ranked.sort(compareMatches);
	return topK === undefined ? ranked : ranked.slice(0, topK);
}
