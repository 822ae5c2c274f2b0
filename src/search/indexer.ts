/**
 * Inverted index builder.
 *
 * Validates a document batch, then tokenizes each document's name, trigger
 * terms, tags and description into weighted postings. Bodies are never
 * indexed. The result is frozen; a rebuild always produces a new value.
 */

import { Result } from "better-result";
import {
	type DomainError,
	Errors,
	type ValidationError,
} from "../core/errors.js";
import {
	deriveSkillId,
	type IndexedField,
	type IndexWarning,
	type PhraseEntry,
	type PostingEntry,
	type SkillDocument,
	skillDocumentInputSchema,
	type Term,
} from "../types/index.js";
import type { SearchConfig } from "./config.js";
import { makeTokenizer, normalizeText, type Tokenizer } from "./tokenizer.js";

export interface SearchIndex {
	readonly postings: ReadonlyMap<Term, readonly PostingEntry[]>;
	/** Indexed documents by id; skipped documents are absent */
	readonly documents: ReadonlyMap<string, SkillDocument>;
	readonly phrases: readonly PhraseEntry[];
	/** Short trigger-term words exempt from the length filter */
	readonly keep: ReadonlySet<Term>;
	/** Tokenizer queries against this index must use */
	readonly tokenizer: Tokenizer;
	readonly config: SearchConfig;
	readonly warnings: readonly IndexWarning[];
}

interface IndexedDocument {
	postings: PostingEntry[];
	phrases: PhraseEntry[];
}

/**
 * Validate every record and derive ids. All issues are collected so a caller
 * sees everything wrong with the batch at once.
 */
export function validateDocuments(
	documents: readonly unknown[],
): Result<SkillDocument[], ValidationError> {
	const issues: string[] = [];
	const valid: SkillDocument[] = [];
	const firstSeen = new Map<string, number>();

	documents.forEach((raw, position) => {
		const parsed = skillDocumentInputSchema.safeParse(raw);
		if (!parsed.success) {
			for (const issue of parsed.error.issues) {
				const path = issue.path.length > 0 ? `.${issue.path.join(".")}` : "";
				issues.push(`skills[${position}]${path}: ${issue.message}`);
			}
			return;
		}

		const id = deriveSkillId(parsed.data.name);
		const previous = firstSeen.get(id);
		if (previous !== undefined) {
			issues.push(
				`skills[${position}]: duplicate id "${id}" (first used by skills[${previous}])`,
			);
			return;
		}
		firstSeen.set(id, position);
		valid.push({ ...parsed.data, id });
	});

	if (issues.length > 0) {
		return Result.err(Errors.validation("skill batch", issues));
	}
	return Result.ok(valid);
}

function countTerms(terms: Iterable<Term>, into: Map<Term, number>): void {
	for (const term of terms) {
		into.set(term, (into.get(term) ?? 0) + 1);
	}
}

function indexDocument(
	document: SkillDocument,
	tokenizer: Tokenizer,
	config: SearchConfig,
): Result<IndexedDocument, DomainError> {
	const fields: Array<[IndexedField, readonly string[]]> = [
		["triggerTerm", document.triggerTerms],
		["name", [document.name]],
		["tag", document.tags],
		["description", [document.description]],
	];

	const postings: PostingEntry[] = [];
	const phrases: PhraseEntry[] = [];
	const seenPhrases = new Set<string>();

	for (const [field, values] of fields) {
		const frequencies = new Map<Term, number>();

		for (const value of values) {
			const terms = tokenizer.tokenize(value);
			if (terms.isErr()) {
				return Result.err(terms.error);
			}
			countTerms(terms.value, frequencies);

			if (field === "triggerTerm" && terms.value.length >= 2) {
				const text = normalizeText(value);
				if (!seenPhrases.has(text)) {
					seenPhrases.add(text);
					phrases.push(
						Object.freeze({ phrase: value, text, documentId: document.id }),
					);
				}
			}
		}

		for (const [term, frequency] of frequencies) {
			postings.push(
				Object.freeze({
					term,
					documentId: document.id,
					field,
					weight: config.weights[field] * frequency,
				}),
			);
		}
	}

	return Result.ok({ postings, phrases });
}

/**
 * Collect the words of every trigger term that the length filter would
 * otherwise drop ("c", "r", "k8" with a higher minimum...).
 */
function collectShortTriggerWords(
	documents: readonly SkillDocument[],
	config: SearchConfig,
): Set<Term> {
	const splitter = makeTokenizer({ ...config });
	const keep = new Set<Term>();
	for (const document of documents) {
		for (const trigger of document.triggerTerms) {
			const words = splitter.words(trigger);
			if (words.isErr()) continue;
			for (const word of words.value) {
				if (word.length < config.minTokenLength) keep.add(word);
			}
		}
	}
	return keep;
}

/**
 * Build a search index from a document batch.
 *
 * Fails atomically with a ValidationError on duplicate ids or missing
 * name/description. A document whose text cannot be tokenized is left out
 * and reported in `warnings`; the rest of the batch still builds.
 */
export function buildIndex(
	documents: readonly unknown[],
	config: SearchConfig,
): Result<SearchIndex, ValidationError> {
	const validated = validateDocuments(documents);
	if (validated.isErr()) {
		return Result.err(validated.error);
	}

	const keep = collectShortTriggerWords(validated.value, config);
	const tokenizer = makeTokenizer({ ...config, keep });

	const postings = new Map<Term, PostingEntry[]>();
	const indexed = new Map<string, SkillDocument>();
	const phrases: PhraseEntry[] = [];
	const warnings: IndexWarning[] = [];

	for (const document of validated.value) {
		const result = indexDocument(document, tokenizer, config);
		if (result.isErr()) {
			warnings.push(
				Object.freeze({
					documentId: document.id,
					message: result.error.message,
				}),
			);
			continue;
		}

		indexed.set(document.id, Object.freeze(document));
		phrases.push(...result.value.phrases);
		for (const posting of result.value.postings) {
			const list = postings.get(posting.term);
			if (list) {
				list.push(posting);
			} else {
				postings.set(posting.term, [posting]);
			}
		}
	}

	for (const list of postings.values()) {
		Object.freeze(list);
	}

	return Result.ok(
		Object.freeze({
			postings,
			documents: indexed,
			phrases: Object.freeze(phrases),
			keep,
			tokenizer,
			config,
			warnings: Object.freeze(warnings),
		}),
	);
}

/**
 * An index with no documents and no postings.
 */
export function emptyIndex(config: SearchConfig): SearchIndex {
	return Object.freeze({
		postings: new Map<Term, readonly PostingEntry[]>(),
		documents: new Map<string, SkillDocument>(),
		phrases: Object.freeze([]),
		keep: new Set<Term>(),
		tokenizer: makeTokenizer({ ...config }),
		config,
		warnings: Object.freeze([]),
	});
}
