/**
 * postgres.js adapter for sqlseed
 *
 * Provides a Connection implementation for postgres.js.
 * Uses connection pooling - call close() when done to end all connections.
 *
 * Requires: postgres
 */

import postgres from "postgres";
import type {
	Connection,
	ParameterMetadata,
	ParameterType,
	PreparedStatement,
} from "./impl/connection.js";
import {ConstraintViolationError} from "./impl/errors.js";
import {createLogger} from "./impl/logger.js";

const DIALECT = "postgresql" as const;

const logger = createLogger("postgres");

type Sql = ReturnType<typeof postgres>;
type Parameter = NonNullable<Parameters<Sql["unsafe"]>[1]>[number];

// ============================================================================
// Parameter Types
// ============================================================================

/**
 * Built-in type OIDs, from pg_type.
 */
const PARAMETER_TYPES: ReadonlyMap<number, ParameterType> = new Map([
	[16, "boolean"],
	[17, "binary"],
	[18, "text"],
	[19, "text"],
	[20, "integer"],
	[21, "integer"],
	[23, "integer"],
	[25, "text"],
	[114, "json"],
	[700, "real"],
	[701, "real"],
	[1042, "text"],
	[1043, "text"],
	[1082, "date"],
	[1083, "time"],
	[1114, "timestamp"],
	[1184, "timestamptz"],
	[1266, "time"],
	[1700, "decimal"],
	[3802, "json"],
]);

/**
 * Map a PostgreSQL type OID to a parameter type.
 */
export function parameterTypeFromOID(oid: number): ParameterType {
	return PARAMETER_TYPES.get(oid) ?? "unknown";
}

class PostgresParameterMetadata implements ParameterMetadata {
	readonly #oids: readonly number[];

	constructor(oids: readonly number[]) {
		this.#oids = oids;
	}

	get count(): number {
		return this.#oids.length;
	}

	typeAt(position: number): ParameterType {
		const oid = this.#oids[position - 1];
		return oid === undefined ? "unknown" : parameterTypeFromOID(oid);
	}
}

// ============================================================================
// Encoding and Errors
// ============================================================================

/**
 * Encode a JS value as a postgres.js parameter.
 * postgres.js handles primitives, Dates and byte arrays natively; other
 * objects are sent as JSON text.
 */
export function encodeValue(value: unknown): Parameter {
	if (value === null || value === undefined) {
		return null;
	}
	if (
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "boolean" ||
		typeof value === "bigint" ||
		value instanceof Date ||
		value instanceof Uint8Array
	) {
		return value;
	}
	return JSON.stringify(value);
}

function errorField(error: object, ...fields: string[]): string | undefined {
	for (const field of fields) {
		const value: unknown = Reflect.get(error, field);
		if (typeof value === "string" && value) {
			return value;
		}
	}
	return undefined;
}

/**
 * Convert PostgreSQL constraint errors to ConstraintViolationError.
 * Other errors are rethrown unchanged.
 */
export function handleError(error: unknown): never {
	if (error && typeof error === "object" && "code" in error) {
		const code = errorField(error, "code");
		const message = errorField(error, "message") ?? String(error);
		const constraint = errorField(error, "constraint_name", "constraint");
		const table = errorField(error, "table_name", "table");
		const column = errorField(error, "column_name", "column");

		let kind: "unique" | "foreign_key" | "check" | "not_null" | "unknown" =
			"unknown";
		if (code === "23505") kind = "unique";
		else if (code === "23503") kind = "foreign_key";
		else if (code === "23502") kind = "not_null";
		else if (code === "23514") kind = "check";

		if (kind !== "unknown") {
			throw new ConstraintViolationError(
				message,
				{kind, constraint, table, column},
				{cause: error},
			);
		}
	}
	throw error;
}

// ============================================================================
// Connection
// ============================================================================

class PostgresStatement implements PreparedStatement {
	readonly #sql: Sql;
	readonly #query: string;
	readonly #params: Parameter[] = [];
	#closed = false;

	constructor(sql: Sql, query: string) {
		this.#sql = sql;
		this.#query = query;
	}

	bind(position: number, value: unknown): void {
		this.#assertOpen();
		this.#params[position - 1] = encodeValue(value);
	}

	/**
	 * Ask the server to describe the statement and report its parameter
	 * types.
	 */
	async parameterMetadata(): Promise<ParameterMetadata | null> {
		this.#assertOpen();
		try {
			const description = await this.#sql
				.unsafe(this.#query, [], {prepare: true})
				.describe();
			return new PostgresParameterMetadata(description.types);
		} catch (error) {
			return handleError(error);
		}
	}

	async executeUpdate(): Promise<number> {
		this.#assertOpen();
		try {
			const result = await this.#sql.unsafe(this.#query, this.#params, {
				prepare: true,
			});
			return result.count;
		} catch (error) {
			return handleError(error);
		}
	}

	async close(): Promise<void> {
		// postgres.js caches prepared statements per connection
		this.#closed = true;
	}

	#assertOpen(): void {
		if (this.#closed) {
			throw new Error("Statement is closed");
		}
	}
}

/**
 * Options for the postgres adapter.
 */
export interface PostgresOptions {
	/** Maximum number of connections in the pool (default: 10) */
	max?: number;
	/** Idle timeout in seconds before closing connections (default: 30) */
	idleTimeout?: number;
	/** Connection timeout in seconds (default: 30) */
	connectTimeout?: number;
}

/**
 * PostgreSQL connection using postgres.js.
 *
 * Parameter metadata comes from the server, so the default binder
 * configuration picks binders matching the column types.
 *
 * @example
 * import PostgresConnection from "sqlseed/postgres";
 *
 * const connection = new PostgresConnection("postgresql://localhost/fixtures");
 * await insert.execute(connection, DefaultBinderConfiguration.INSTANCE);
 * await connection.close();
 */
export default class PostgresConnection implements Connection {
	readonly dialect = DIALECT;
	#sql: Sql;

	constructor(url: string, options: PostgresOptions = {}) {
		this.#sql = postgres(url, {
			max: options.max ?? 10,
			idle_timeout: options.idleTimeout ?? 30,
			connect_timeout: options.connectTimeout ?? 30,
			onnotice: () => {}, // Suppress PostgreSQL NOTICE messages
		});
		logger.debug({max: options.max ?? 10}, "postgres pool created");
	}

	async prepare(sql: string): Promise<PreparedStatement> {
		return new PostgresStatement(this.#sql, sql);
	}

	async close(): Promise<void> {
		await this.#sql.end();
		logger.debug("postgres pool ended");
	}
}
