/**
 * One search against one index: validate parameters, tokenize the query,
 * score, rank.
 */

import { Result } from "better-result";
import { type DomainError, Errors } from "../core/errors.js";
import {
	type RankedList,
	type SearchOptions,
	searchOptionsSchema,
} from "../types/index.js";
import type { SearchIndex } from "./indexer.js";
import { parseQuery, scoreQuery } from "./matcher.js";
import { select } from "./selector.js";

/**
 * Search an index snapshot.
 *
 * Fails with EMPTY_QUERY for blank text and VALIDATION_FAILED for a bad
 * topK/minScore. A query that matches nothing is an empty list.
 */
export function searchIndex(
	index: SearchIndex,
	text: string,
	options: SearchOptions = {},
): Result<RankedList, DomainError> {
	const validated = searchOptionsSchema.safeParse(options);
	if (!validated.success) {
		return Result.err(
			Errors.validation(
				"search options",
				validated.error.issues.map(
					(issue) => `${issue.path.join(".")}: ${issue.message}`,
				),
			),
		);
	}

	const query = parseQuery(index, text);
	if (query.isErr()) {
		return Result.err(query.error);
	}

	const raw = scoreQuery(index, query.value);
	return Result.ok(select(index, raw, validated.data));
}
