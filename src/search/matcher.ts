import { Result } from "better-result";
import { type DomainError, Errors } from "../core/errors.js";
import type { Query, Term } from "../types/index.js";
import type { SearchIndex } from "./indexer.js";
import { normalizeText } from "./tokenizer.js";

/**
 * Running score for one document. Only documents with at least one matching
 * term or phrase ever get one, which is how "no match" differs from a weak
 * match downstream.
 */
export interface RawMatch {
	readonly documentId: string;
	readonly score: number;
	readonly matchedTerms: readonly Term[];
	readonly matchedPhrases: readonly string[];
}

interface Accumulator {
	score: number;
	terms: Term[];
	seenTerms: Set<Term>;
	phrases: string[];
}

/**
 * Tokenize query text with the index's own tokenizer, so short trigger words
 * and aliases normalize the same way on both sides.
 */
export function parseQuery(
	index: SearchIndex,
	text: string,
): Result<Query, DomainError> {
	if (text.trim() === "") {
		return Result.err(Errors.emptyQuery());
	}

	const terms = index.tokenizer.tokenize(text);
	if (terms.isErr()) {
		return Result.err(terms.error);
	}
	return Result.ok({ text, terms: terms.value });
}

/**
 * Score a query against an index.
 *
 * Every occurrence of a query term adds the weight of each of its postings;
 * repeated query words count again. Each distinct trigger phrase found
 * verbatim in the raw query (case-insensitive) adds the phrase bonus once per
 * document.
 */
export function scoreQuery(
	index: SearchIndex,
	query: Query,
): Map<string, RawMatch> {
	const running = new Map<string, Accumulator>();

	function accumulatorFor(documentId: string): Accumulator {
		let acc = running.get(documentId);
		if (!acc) {
			acc = { score: 0, terms: [], seenTerms: new Set(), phrases: [] };
			running.set(documentId, acc);
		}
		return acc;
	}

	for (const term of query.terms) {
		const postings = index.postings.get(term);
		if (!postings) continue;

		for (const posting of postings) {
			const acc = accumulatorFor(posting.documentId);
			acc.score += posting.weight;
			if (!acc.seenTerms.has(term)) {
				acc.seenTerms.add(term);
				acc.terms.push(term);
			}
		}
	}

	const { phraseBonus } = index.config;
	const raw = normalizeText(query.text);
	for (const entry of index.phrases) {
		if (!raw.includes(entry.text)) continue;
		const acc = accumulatorFor(entry.documentId);
		acc.score += phraseBonus;
		acc.phrases.push(entry.phrase);
	}

	const matches = new Map<string, RawMatch>();
	for (const [documentId, acc] of running) {
		matches.set(documentId, {
			documentId,
			score: acc.score,
			matchedTerms: acc.terms,
			matchedPhrases: acc.phrases,
		});
	}
	return matches;
}
