/**
 * Connection contracts implemented by the database adapters.
 *
 * An insert only needs a small slice of a driver: prepare one statement,
 * bind values by position, execute it repeatedly, and close it. Adapters
 * for better-sqlite3, postgres.js and mysql2 live in ../sqlite.ts,
 * ../postgres.ts and ../mysql.ts.
 */

import type {SQLDialect} from "./sql.js";
import type {BinderConfiguration} from "./binders.js";

export type {SQLDialect};

// ============================================================================
// Parameter Metadata
// ============================================================================

/**
 * Parameter type as reported by the database for a statement placeholder.
 */
export type ParameterType =
	| "text"
	| "integer"
	| "decimal"
	| "real"
	| "boolean"
	| "date"
	| "time"
	| "timestamp"
	| "timestamptz"
	| "json"
	| "binary"
	| "unknown";

/**
 * Type information for the placeholders of a prepared statement.
 */
export interface ParameterMetadata {
	/** Number of placeholders in the statement */
	readonly count: number;

	/**
	 * Type of the placeholder at a 1-based position.
	 * Returns "unknown" for positions the database did not describe.
	 */
	typeAt(position: number): ParameterType;
}

// ============================================================================
// Statements and Connections
// ============================================================================

/**
 * A statement prepared once and executed any number of times.
 *
 * Bound values persist across executions until they are bound again.
 */
export interface PreparedStatement {
	/**
	 * Bind a value to a 1-based parameter position.
	 */
	bind(position: number, value: unknown): void;

	/**
	 * Describe the statement's placeholders.
	 * Resolves to null when the database can't report parameter types.
	 */
	parameterMetadata(): Promise<ParameterMetadata | null>;

	/**
	 * Execute the statement with the current bindings and return the
	 * number of affected rows.
	 */
	executeUpdate(): Promise<number>;

	/**
	 * Release the statement. Further calls are not allowed.
	 */
	close(): Promise<void>;
}

export interface Connection {
	/** Decides the placeholder syntax of rendered statements */
	readonly dialect: SQLDialect;

	/**
	 * Prepare a parameterized statement.
	 */
	prepare(sql: string): Promise<PreparedStatement>;

	/**
	 * Close the database connection.
	 */
	close(): Promise<void>;
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Something that can be run against a connection to change its data.
 */
export interface Operation {
	/**
	 * Execute against the connection, resolving binders through the
	 * configuration. Resolves to the number of affected rows.
	 */
	execute(
		connection: Connection,
		configuration: BinderConfiguration,
	): Promise<number>;
}
