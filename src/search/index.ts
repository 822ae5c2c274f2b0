/**
 * Lexical skill selection: tokenize, index, score, rank.
 *
 * Every function here is pure over an immutable SearchIndex; the registry
 * is the only place an index is swapped.
 */

export type { FieldWeights, SearchConfig, SearchConfigInput } from "./config.js";
export {
	DEFAULT_SEARCH_CONFIG,
	resolveSearchConfig,
	searchConfigSchema,
} from "./config.js";
export type { SearchIndex } from "./indexer.js";
export { buildIndex, emptyIndex, validateDocuments } from "./indexer.js";
export type { RawMatch } from "./matcher.js";
export { parseQuery, scoreQuery } from "./matcher.js";
export { searchIndex } from "./search.js";
export { compareMatches, roundScore, select } from "./selector.js";
export type { Tokenizer, TokenizerOptions } from "./tokenizer.js";
export { makeTokenizer, normalizeText, stemTerm } from "./tokenizer.js";
