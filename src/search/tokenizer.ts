import { Result } from "better-result";
import { type DomainError, Errors } from "../core/errors.js";
import type { Term } from "../types/index.js";

export interface TokenizerOptions {
	minTokenLength: number;
	stem: boolean;
	aliases: Readonly<Record<string, string>>;
	/** Short tokens that survive the length filter (trigger-term words) */
	keep?: ReadonlySet<Term>;
}

export interface Tokenizer {
	/**
	 * Normalize text into an ordered term sequence. Adjacent duplicates are kept.
	 */
	tokenize(text: string): Result<Term[], DomainError>;

	/**
	 * Lowercased, aliased words before length filtering and stemming.
	 */
	words(text: string): Result<string[], DomainError>;
}

const UNPAIRED_SURROGATE =
	/[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const NON_WORD = /[^\p{L}\p{N}]+/u;

/**
 * Case folding shared by tokens and phrase matching.
 */
export function normalizeText(text: string): string {
	return text.normalize("NFKC").toLowerCase();
}

function splitWords(text: string): string[] {
	return normalizeText(text)
		.split(NON_WORD)
		.filter((word) => word !== "");
}

/**
 * Plural folding: "libraries" -> "library", "classes" -> "class",
 * "hooks" -> "hook". Words of three characters or fewer are left alone.
 */
export function stemTerm(word: string): Term {
	if (word.length <= 3) return word;
	if (word.endsWith("ies")) return `${word.slice(0, -3)}y`;
	if (word.endsWith("sses")) return word.slice(0, -2);
	if (word.endsWith("s") && !/(ss|us|is)$/.test(word)) {
		return word.slice(0, -1);
	}
	return word;
}

export function makeTokenizer(options: TokenizerOptions): Tokenizer {
	const { minTokenLength, stem } = options;
	const keep = options.keep ?? new Set<Term>();
	// A multi-word target ("ci" -> "continuous integration") expands to
	// several words
	const aliases = new Map<string, string[]>();
	for (const [from, to] of Object.entries(options.aliases)) {
		aliases.set(normalizeText(from), splitWords(to));
	}

	function words(text: string): Result<string[], DomainError> {
		if (UNPAIRED_SURROGATE.test(text)) {
			return Result.err(Errors.unencodableText("unpaired surrogate"));
		}

		const out: string[] = [];
		for (const raw of splitWords(text)) {
			const expanded = aliases.get(raw);
			if (expanded) {
				out.push(...expanded);
			} else {
				out.push(raw);
			}
		}
		return Result.ok(out);
	}

	return {
		words,

		tokenize(text: string): Result<Term[], DomainError> {
			const split = words(text);
			if (split.isErr()) {
				return Result.err(split.error);
			}

			const terms: Term[] = [];
			for (const word of split.value) {
				if (word.length < minTokenLength && !keep.has(word)) continue;
				terms.push(stem ? stemTerm(word) : word);
			}
			return Result.ok(terms);
		},
	};
}
