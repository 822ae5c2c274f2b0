import { Result } from "better-result";
import { type DomainError, Errors, type ValidationError } from "../core/errors.js";
import { createLogger, type Logger } from "../logger.js";
import {
	resolveSearchConfig,
	type SearchConfig,
	type SearchConfigInput,
} from "../search/config.js";
import { buildIndex, emptyIndex, type SearchIndex } from "../search/indexer.js";
import { searchIndex } from "../search/search.js";
import type { RankedList, SearchOptions } from "../types/index.js";

const defaultLog = createLogger("registry");

/**
 * One immutable build of the index, stamped with its generation.
 * Generation 0 is the empty registry before any load.
 */
export interface RegistrySnapshot {
	readonly generation: number;
	readonly index: SearchIndex;
	readonly builtAt: Date;
}

/**
 * Registry configuration
 */
export interface RegistryOptions {
	search?: SearchConfigInput;
	logger?: Logger;
	getNow?: () => Date;
}

/**
 * Owner of the current snapshot and the only mutable state in the system.
 *
 * Readers take a snapshot and keep it for the whole operation, so a reload
 * that lands mid-search never changes what that search sees.
 */
export interface Registry {
	/**
	 * Build a new index off to the side and publish it. On failure the
	 * previously published snapshot stays in effect.
	 */
	load(
		documents: readonly unknown[],
	): Result<RegistrySnapshot, ValidationError | DomainError>;

	/** Same as load; replaces the whole corpus. */
	reload(
		documents: readonly unknown[],
	): Result<RegistrySnapshot, ValidationError | DomainError>;

	/** The current snapshot. Never blocks. */
	snapshot(): Result<RegistrySnapshot, DomainError>;

	currentGeneration(): number;

	search(
		text: string,
		options?: SearchOptions,
	): Result<RankedList, DomainError>;

	/** Drop the published snapshot; every later call fails. */
	dispose(): void;
}

/**
 * Create a registry. It starts at generation 0 with an empty index, so
 * searches before the first load return empty lists.
 */
export function createRegistry(options: RegistryOptions = {}): Registry {
	const config: SearchConfig = resolveSearchConfig(options.search);
	const log = options.logger ?? defaultLog;
	const getNow = options.getNow ?? (() => new Date());

	let current: RegistrySnapshot | null = Object.freeze({
		generation: 0,
		index: emptyIndex(config),
		builtAt: getNow(),
	});

	function load(
		documents: readonly unknown[],
	): Result<RegistrySnapshot, ValidationError | DomainError> {
		const previous = current;
		if (previous === null) {
			return Result.err(Errors.registryDisposed());
		}

		log.info(
			{ documents: documents.length, generation: previous.generation },
			"[REGISTRY] Building index",
		);

		const built = buildIndex(documents, config);
		if (built.isErr()) {
			log.warn(
				{ issues: built.error.issues, generation: previous.generation },
				"[REGISTRY] Rejected document batch, keeping current index",
			);
			return Result.err(built.error);
		}

		for (const warning of built.value.warnings) {
			log.warn(
				{ documentId: warning.documentId, reason: warning.message },
				"[INDEX] Skipped document",
			);
		}

		const next: RegistrySnapshot = Object.freeze({
			generation: previous.generation + 1,
			index: built.value,
			builtAt: getNow(),
		});
		current = next;

		log.info(
			{
				generation: next.generation,
				documents: next.index.documents.size,
				terms: next.index.postings.size,
				skipped: next.index.warnings.length,
			},
			"[REGISTRY] Published index",
		);
		return Result.ok(next);
	}

	function snapshot(): Result<RegistrySnapshot, DomainError> {
		if (current === null) {
			return Result.err(Errors.registryDisposed());
		}
		return Result.ok(current);
	}

	return {
		load,
		reload: load,
		snapshot,

		currentGeneration(): number {
			return current?.generation ?? 0;
		},

		search(
			text: string,
			searchOptions: SearchOptions = {},
		): Result<RankedList, DomainError> {
			const taken = snapshot();
			if (taken.isErr()) {
				return Result.err(taken.error);
			}

			const result = searchIndex(taken.value.index, text, searchOptions);
			if (result.isOk()) {
				log.debug(
					{
						generation: taken.value.generation,
						results: result.value.length,
					},
					"[REGISTRY] Search",
				);
			}
			return result;
		},

		dispose(): void {
			if (current !== null) {
				log.info({ generation: current.generation }, "[REGISTRY] Disposed");
			}
			current = null;
		},
	};
}
