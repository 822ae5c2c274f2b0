import { describe, expect, it } from "vitest";
import { ErrorCode } from "../src/core/errors.js";
import { DEFAULT_SEARCH_CONFIG } from "../src/search/config.js";
import { makeTokenizer, stemTerm } from "../src/search/tokenizer.js";

const tokenizer = makeTokenizer({ ...DEFAULT_SEARCH_CONFIG });

function terms(text: string, tok = tokenizer): string[] {
	const result = tok.tokenize(text);
	if (result.isErr()) {
		throw new Error(`tokenize failed: ${result.error.message}`);
	}
	return result.value;
}

describe("Tokenizer", () => {
	describe("tokenize", () => {
		it("lowercases and splits on punctuation and whitespace", () => {
			expect(terms("Hello, World! Hello")).toEqual(["hello", "world", "hello"]);
		});

		it("drops tokens shorter than the minimum length", () => {
			expect(terms("a b cd")).toEqual(["cd"]);
		});

		it("keeps short tokens on the allow-list", () => {
			// Arrange
			const withKeep = makeTokenizer({
				...DEFAULT_SEARCH_CONFIG,
				keep: new Set(["c"]),
			});

			// Act & Assert
			expect(terms("write c code", withKeep)).toEqual(["write", "c", "code"]);
		});

		it("applies NFKC normalization", () => {
			expect(terms("ｃｙｐｒｅｓｓ")).toEqual(["cypress"]);
		});

		it("keeps non-ASCII letters inside tokens", () => {
			expect(terms("Café déjà-vu")).toEqual(["café", "déjà", "vu"]);
		});

		it("splits hyphenated words", () => {
			expect(terms("pre-commit")).toEqual(["pre", "commit"]);
		});

		it("folds plurals when stemming is on", () => {
			expect(terms("git hooks and libraries")).toEqual([
				"git",
				"hook",
				"and",
				"library",
			]);
		});

		it("leaves words as written when stemming is off", () => {
			// Arrange
			const plain = makeTokenizer({ ...DEFAULT_SEARCH_CONFIG, stem: false });

			// Act & Assert
			expect(terms("git hooks", plain)).toEqual(["git", "hooks"]);
		});

		it("applies aliases case-insensitively", () => {
			// Arrange
			const aliased = makeTokenizer({
				...DEFAULT_SEARCH_CONFIG,
				aliases: { TF: "Terraform" },
			});

			// Act & Assert
			expect(terms("tf plan", aliased)).toEqual(["terraform", "plan"]);
		});

		it("applies aliases before the length filter", () => {
			// Arrange
			const aliased = makeTokenizer({
				minTokenLength: 3,
				stem: true,
				aliases: { js: "javascript" },
			});

			// Act & Assert
			expect(terms("js tools", aliased)).toEqual(["javascript", "tool"]);
		});

		it("expands a multi-word alias target into separate words", () => {
			// Arrange
			const aliased = makeTokenizer({
				...DEFAULT_SEARCH_CONFIG,
				aliases: { CI: "Continuous Integration" },
			});

			// Act & Assert
			expect(terms("ci pipeline", aliased)).toEqual([
				"continuous",
				"integration",
				"pipeline",
			]);
		});

		it("returns an empty list for punctuation only", () => {
			expect(terms("!!! ... ???")).toEqual([]);
		});

		it("is deterministic", () => {
			const text = "Run end-to-end tests in CI";
			expect(terms(text)).toEqual(terms(text));
		});

		it("rejects text with an unpaired surrogate", () => {
			// Act
			const result = tokenizer.tokenize("bad \uD800 text");

			// Assert
			expect(result.isErr()).toBe(true);
			if (result.isErr()) {
				expect(result.error.code).toBe(ErrorCode.UNENCODABLE_TEXT);
				expect(result.error.message).toBe("Unencodable text: unpaired surrogate");
			}
		});

		it("accepts paired surrogates", () => {
			expect(terms("deploy 🚀 now")).toEqual(["deploy", "now"]);
		});
	});

	describe("words", () => {
		it("returns every word before filtering and stemming", () => {
			// Act
			const result = tokenizer.words("A-B hooks");

			// Assert
			expect(result.isOk()).toBe(true);
			if (result.isOk()) {
				expect(result.value).toEqual(["a", "b", "hooks"]);
			}
		});
	});

	describe("stemTerm", () => {
		it.each([
			["libraries", "library"],
			["classes", "class"],
			["hooks", "hook"],
			["tests", "test"],
			["cypress", "cypress"],
			["status", "status"],
			["redis", "redis"],
			["aws", "aws"],
			["testing", "testing"],
		])("stems %s to %s", (word, expected) => {
			expect(stemTerm(word)).toBe(expected);
		});
	});
});
