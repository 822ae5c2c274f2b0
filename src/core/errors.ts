/**
 * Domain error codes for the skill selector.
 */
export const ErrorCode = {
	VALIDATION_FAILED: "VALIDATION_FAILED",
	EMPTY_QUERY: "EMPTY_QUERY",
	UNENCODABLE_TEXT: "UNENCODABLE_TEXT",
	NOT_FOUND: "NOT_FOUND",
	REGISTRY_DISPOSED: "REGISTRY_DISPOSED",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Domain error with typed code for pattern matching.
 */
export class DomainError extends Error {
	constructor(
		public readonly code: ErrorCode,
		message: string,
	) {
		super(message);
		this.name = "DomainError";
	}
}

/**
 * A document batch or a set of search parameters was rejected.
 * Carries every issue found, not just the first.
 */
export class ValidationError extends DomainError {
	constructor(
		message: string,
		public readonly issues: readonly string[],
	) {
		super(ErrorCode.VALIDATION_FAILED, message);
		this.name = "ValidationError";
	}
}

/**
 * The query was blank. Callers should ask for clarification.
 */
export class EmptyQueryError extends DomainError {
	constructor() {
		super(ErrorCode.EMPTY_QUERY, "Query must not be blank");
		this.name = "EmptyQueryError";
	}
}

/**
 * Factory functions for creating domain errors.
 */
export const Errors = {
	validation(subject: string, issues: readonly string[]): ValidationError {
		return new ValidationError(
			`Invalid ${subject}: ${issues.length} issue(s)`,
			issues,
		);
	},

	emptyQuery(): EmptyQueryError {
		return new EmptyQueryError();
	},

	unencodableText(reason: string): DomainError {
		return new DomainError(
			ErrorCode.UNENCODABLE_TEXT,
			`Unencodable text: ${reason}`,
		);
	},

	notFound(resource: string): DomainError {
		return new DomainError(ErrorCode.NOT_FOUND, `${resource} not found`);
	},

	registryDisposed(): DomainError {
		return new DomainError(
			ErrorCode.REGISTRY_DISPOSED,
			"Registry has been disposed",
		);
	},
} as const;
