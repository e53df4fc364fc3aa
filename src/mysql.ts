/**
 * mysql2 adapter for sqlseed
 *
 * Provides a Connection implementation for mysql2.
 * Uses connection pooling - call close() when done to end all connections.
 *
 * Requires: mysql2
 */

import mysql, {
	type Pool,
	type PoolConnection,
	type PreparedStatementInfo,
} from "mysql2/promise";
import type {
	Connection,
	ParameterMetadata,
	PreparedStatement,
} from "./impl/connection.js";
import {ConstraintViolationError} from "./impl/errors.js";
import {createLogger} from "./impl/logger.js";

const DIALECT = "mysql" as const;

const logger = createLogger("mysql");

/**
 * Encode a JS value for mysql2. Plain objects and arrays are sent as
 * JSON text; everything else is handled by the driver.
 */
export function encodeValue(value: unknown): unknown {
	if (value === undefined) {
		return null;
	}
	if (
		value !== null &&
		typeof value === "object" &&
		!(value instanceof Date) &&
		!(value instanceof Uint8Array)
	) {
		return JSON.stringify(value);
	}
	return value;
}

function errorField(error: object, field: "code" | "message"): string {
	const value: unknown = Reflect.get(error, field);
	return typeof value === "string" ? value : "";
}

/**
 * Convert MySQL constraint errors to ConstraintViolationError.
 * Other errors are rethrown unchanged.
 */
export function handleError(error: unknown): never {
	if (error && typeof error === "object" && "code" in error) {
		const code = errorField(error, "code");
		const message = errorField(error, "message") || String(error);

		let kind: "unique" | "foreign_key" | "check" | "not_null" | "unknown" =
			"unknown";
		let constraint: string | undefined;
		let table: string | undefined;
		let column: string | undefined;

		if (code === "ER_DUP_ENTRY") {
			kind = "unique";
			// Example: "Duplicate entry 'a' for key 'users.email'"
			const keyMatch = message.match(/for key '([^']+)'/i);
			constraint = keyMatch ? keyMatch[1] : undefined;
			if (constraint) {
				const parts = constraint.split(".");
				if (parts.length > 1) {
					table = parts[0];
				}
			}
		} else if (
			code === "ER_NO_REFERENCED_ROW_2" ||
			code === "ER_ROW_IS_REFERENCED_2"
		) {
			kind = "foreign_key";
			const constraintMatch = message.match(/CONSTRAINT `([^`]+)`/i);
			constraint = constraintMatch ? constraintMatch[1] : undefined;
			const tableMatch = message.match(/`([^`]+)`\.`([^`]+)`/);
			if (tableMatch) {
				table = tableMatch[2];
			}
		} else if (code === "ER_BAD_NULL_ERROR") {
			kind = "not_null";
			// Example: "Column 'name' cannot be null"
			const columnMatch = message.match(/Column '([^']+)'/i);
			column = columnMatch ? columnMatch[1] : undefined;
		} else if (code === "ER_CHECK_CONSTRAINT_VIOLATED") {
			kind = "check";
			const constraintMatch = message.match(/Check constraint '([^']+)'/i);
			constraint = constraintMatch ? constraintMatch[1] : undefined;
		}

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

function affectedRows(result: unknown): number {
	if (result && typeof result === "object" && "affectedRows" in result) {
		const value: unknown = result.affectedRows;
		return typeof value === "number" ? value : 0;
	}
	return 0;
}

class MySQLStatement implements PreparedStatement {
	readonly #connection: PoolConnection;
	readonly #statement: PreparedStatementInfo;
	readonly #params: unknown[] = [];
	#closed = false;

	constructor(
		connection: PoolConnection,
		statement: PreparedStatementInfo,
	) {
		this.#connection = connection;
		this.#statement = statement;
	}

	bind(position: number, value: unknown): void {
		this.#assertOpen();
		this.#params[position - 1] = encodeValue(value);
	}

	/**
	 * MySQL describes statement parameters without usable types.
	 */
	async parameterMetadata(): Promise<ParameterMetadata | null> {
		this.#assertOpen();
		return null;
	}

	async executeUpdate(): Promise<number> {
		this.#assertOpen();
		try {
			const [result] = await this.#statement.execute(this.#params);
			return affectedRows(result);
		} catch (error) {
			return handleError(error);
		}
	}

	async close(): Promise<void> {
		if (this.#closed) {
			return;
		}
		this.#closed = true;
		try {
			await this.#statement.close();
		} finally {
			this.#connection.release();
		}
	}

	#assertOpen(): void {
		if (this.#closed) {
			throw new Error("Statement is closed");
		}
	}
}

/**
 * Options for the mysql adapter.
 */
export interface MySQLOptions {
	/** Maximum number of connections in the pool (default: 10) */
	connectionLimit?: number;
	/** Idle timeout in milliseconds (default: 60000) */
	idleTimeout?: number;
	/** Connection timeout in milliseconds (default: 10000) */
	connectTimeout?: number;
}

/**
 * MySQL connection using mysql2.
 *
 * Each prepared statement holds one pooled connection until it is closed.
 *
 * @example
 * import MySQLConnection from "sqlseed/mysql";
 *
 * const connection = new MySQLConnection("mysql://localhost/fixtures");
 * await insert.execute(connection, DefaultBinderConfiguration.INSTANCE);
 * await connection.close();
 */
export default class MySQLConnection implements Connection {
	readonly dialect = DIALECT;
	#pool: Pool;

	constructor(url: string, options: MySQLOptions = {}) {
		this.#pool = mysql.createPool({
			uri: url,
			connectionLimit: options.connectionLimit ?? 10,
			idleTimeout: options.idleTimeout ?? 60000,
			connectTimeout: options.connectTimeout ?? 10000,
		});
		logger.debug(
			{connectionLimit: options.connectionLimit ?? 10},
			"mysql pool created",
		);
	}

	async prepare(sql: string): Promise<PreparedStatement> {
		const connection = await this.#pool.getConnection();
		try {
			return new MySQLStatement(connection, await connection.prepare(sql));
		} catch (error) {
			connection.release();
			return handleError(error);
		}
	}

	async close(): Promise<void> {
		await this.#pool.end();
		logger.debug("mysql pool ended");
	}
}
