import { describe, expect, it } from "vitest";
import { ErrorCode } from "../src/core/errors.js";
import { DEFAULT_SEARCH_CONFIG } from "../src/search/config.js";
import { buildIndex, type SearchIndex } from "../src/search/indexer.js";
import { parseQuery, type RawMatch, scoreQuery } from "../src/search/matcher.js";
import { sampleCorpus } from "./helpers.js";

function sampleIndex(): SearchIndex {
	const result = buildIndex(sampleCorpus, DEFAULT_SEARCH_CONFIG);
	if (result.isErr()) {
		throw new Error(result.error.message);
	}
	return result.value;
}

function score(index: SearchIndex, text: string): Map<string, RawMatch> {
	const query = parseQuery(index, text);
	if (query.isErr()) {
		throw new Error(query.error.message);
	}
	return scoreQuery(index, query.value);
}

describe("parseQuery", () => {
	it("rejects a blank query", () => {
		// Act
		const result = parseQuery(sampleIndex(), "   \t ");

		// Assert
		expect(result.isErr()).toBe(true);
		if (result.isErr()) {
			expect(result.error.code).toBe(ErrorCode.EMPTY_QUERY);
		}
	});

	it("accepts a query whose tokens are all filtered out", () => {
		// Act
		const result = parseQuery(sampleIndex(), "a ?");

		// Assert
		expect(result.isOk()).toBe(true);
		if (result.isOk()) {
			expect(result.value.terms).toEqual([]);
		}
	});

	it("rejects an unencodable query", () => {
		// Act
		const result = parseQuery(sampleIndex(), "hooks \uDC00");

		// Assert
		expect(result.isErr()).toBe(true);
		if (result.isErr()) {
			expect(result.error.code).toBe(ErrorCode.UNENCODABLE_TEXT);
		}
	});
});

describe("scoreQuery", () => {
	it("sums posting weights and the phrase bonus", () => {
		// Act
		const matches = score(sampleIndex(), "set up a pre-commit hook to run linters");

		// Assert
		expect(matches.get("husky")).toEqual({
			documentId: "husky",
			score: 27,
			matchedTerms: ["pre", "commit", "hook", "run", "linter"],
			matchedPhrases: ["pre-commit"],
		});
		expect(matches.get("cypress")).toEqual({
			documentId: "cypress",
			score: 2,
			matchedTerms: ["to", "run"],
			matchedPhrases: [],
		});
	});

	it("leaves out documents with no matching term", () => {
		// Act
		const matches = score(sampleIndex(), "xyz123 nonsense query");

		// Assert
		expect(matches.size).toBe(0);
	});

	it("counts repeated query words again", () => {
		// Act
		const matches = score(sampleIndex(), "hook hook");

		// Assert
		expect(matches.get("husky")?.score).toBe(16);
		expect(matches.get("husky")?.matchedTerms).toEqual(["hook"]);
	});

	it("adds the phrase bonus only when the query contains the phrase verbatim", () => {
		// Arrange
		const index = sampleIndex();

		// Act
		const reversed = score(index, "commit pre");
		const spaced = score(index, "pre commit");

		// Assert
		expect(reversed.get("husky")?.score).toBe(11);
		expect(spaced.get("husky")).toEqual({
			documentId: "husky",
			score: 11,
			matchedTerms: ["pre", "commit"],
			matchedPhrases: [],
		});
	});

	it("does not treat a stemmed query word as the phrase", () => {
		// Arrange
		const index = sampleIndex();

		// Act
		const singular = score(index, "git hook");
		const plural = score(index, "git hooks");

		// Assert
		expect(singular.get("husky")?.score).toBe(16);
		expect(singular.get("husky")?.matchedPhrases).toEqual([]);
		expect(plural.get("husky")?.score).toBe(22);
		expect(plural.get("husky")?.matchedPhrases).toEqual(["git hooks"]);
	});

	it("matches phrases case-insensitively", () => {
		// Act
		const matches = score(sampleIndex(), "PRE-COMMIT please");

		// Assert
		expect(matches.get("husky")?.score).toBe(17);
		expect(matches.get("husky")?.matchedPhrases).toEqual(["pre-commit"]);
	});

	it("adds each phrase bonus once per document", () => {
		// Act
		const matches = score(sampleIndex(), "pre-commit pre-commit");

		// Assert
		expect(matches.get("husky")?.score).toBe(28);
		expect(matches.get("husky")?.matchedPhrases).toEqual(["pre-commit"]);
	});

	it("does not mutate the index", () => {
		// Arrange
		const index = sampleIndex();
		const termsBefore = index.postings.size;
		const huskyBefore = index.postings.get("husky");

		// Act
		score(index, "husky husky git hooks");

		// Assert
		expect(index.postings.size).toBe(termsBefore);
		expect(index.postings.get("husky")).toBe(huskyBefore);
	});
});
