/**
 * Structured error types for insert operations.
 *
 * All library errors extend SeedError, which includes an error code
 * for programmatic error handling.
 */

// ============================================================================
// Error Codes
// ============================================================================

export type SeedErrorCode =
	| "BUILDER_STATE_ERROR"
	| "BUILDER_ARGUMENT_ERROR"
	| "BIND_ERROR"
	| "CONFIG_ERROR"
	| "CONSTRAINT_VIOLATION";

// ============================================================================
// Base Error
// ============================================================================

/**
 * Base error class for all sqlseed errors.
 *
 * Includes an error code for programmatic handling.
 */
export class SeedError extends Error {
	readonly code: SeedErrorCode;

	constructor(code: SeedErrorCode, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "SeedError";
		this.code = code;

		// Maintains proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}
}

// ============================================================================
// Builder Errors
// ============================================================================

/**
 * Thrown when a builder is used in a state that forbids the call:
 * after build(), when columns are declared twice, or when build() has
 * nothing to insert.
 */
export class BuilderStateError extends SeedError {
	constructor(message: string, options?: ErrorOptions) {
		super("BUILDER_STATE_ERROR", message, options);
		this.name = "BuilderStateError";
	}
}

/**
 * Thrown when a builder call is given columns or values that don't match
 * the declared structure.
 */
export class BuilderArgumentError extends SeedError {
	/** The offending column names, when the error is about columns */
	readonly columns: readonly string[];

	constructor(
		message: string,
		columns: readonly string[] = [],
		options?: ErrorOptions,
	) {
		super("BUILDER_ARGUMENT_ERROR", message, options);
		this.name = "BuilderArgumentError";
		this.columns = columns;
	}
}

// ============================================================================
// Execution Errors
// ============================================================================

/**
 * Thrown by a built-in binder when a value can't be bound as its type.
 */
export class BindError extends SeedError {
	/** 1-based parameter position */
	readonly position: number;
	readonly value: unknown;

	constructor(
		message: string,
		details: {position: number; value: unknown},
		options?: ErrorOptions,
	) {
		super("BIND_ERROR", message, options);
		this.name = "BindError";
		this.position = details.position;
		this.value = details.value;
	}
}

/**
 * Thrown when a database constraint is violated.
 *
 * Constraint violations are detected at the database level and converted
 * from driver-specific errors into this normalized format. The original
 * driver error is kept as `cause`.
 */
export class ConstraintViolationError extends SeedError {
	/**
	 * Type of constraint that was violated.
	 * "unknown" if the specific type couldn't be determined from the error.
	 */
	readonly kind: "unique" | "foreign_key" | "check" | "not_null" | "unknown";

	/**
	 * Name of the constraint (e.g., "users_email_unique", "users.email").
	 * May be undefined if the database error didn't include it.
	 */
	readonly constraint?: string;

	readonly table?: string;

	readonly column?: string;

	constructor(
		message: string,
		details: {
			kind: "unique" | "foreign_key" | "check" | "not_null" | "unknown";
			constraint?: string;
			table?: string;
			column?: string;
		},
		options?: ErrorOptions,
	) {
		super("CONSTRAINT_VIOLATION", message, options);
		this.name = "ConstraintViolationError";
		this.kind = details.kind;
		this.constraint = details.constraint;
		this.table = details.table;
		this.column = details.column;
	}
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Thrown when configuration is invalid or names an unsupported database.
 */
export class ConfigError extends SeedError {
	/** One "path: message" entry per problem found */
	readonly issues: readonly string[];

	constructor(
		message: string,
		issues: readonly string[] = [],
		options?: ErrorOptions,
	) {
		super("CONFIG_ERROR", message, options);
		this.name = "ConfigError";
		this.issues = issues;
	}
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if an error is a SeedError.
 */
export function isSeedError(error: unknown): error is SeedError {
	return error instanceof SeedError;
}

/**
 * Check if an error has a specific error code.
 */
export function hasErrorCode(
	error: unknown,
	code: SeedErrorCode,
): error is SeedError {
	return isSeedError(error) && error.code === code;
}
