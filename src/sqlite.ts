/**
 * better-sqlite3 adapter for sqlseed
 *
 * Provides a Connection implementation for better-sqlite3 (Node.js).
 * The connection is persistent - call close() when done.
 *
 * Requires: better-sqlite3
 */

import Database from "better-sqlite3";
import type {
	Connection,
	ParameterMetadata,
	PreparedStatement,
} from "./impl/connection.js";
import {ConstraintViolationError} from "./impl/errors.js";
import {createLogger} from "./impl/logger.js";

const DIALECT = "sqlite" as const;

const logger = createLogger("sqlite");

/**
 * Encode a JS value for better-sqlite3, which only accepts numbers,
 * strings, bigints, Buffers and null.
 *
 * Dates become UTC "YYYY-MM-DD HH:MM:SS.mmm" text, which SQLite's date
 * functions understand. Other objects and arrays become JSON text; a
 * plain object passed to run() would be read as named parameters.
 */
export function encodeValue(value: unknown): unknown {
	if (value === undefined) {
		return null;
	}
	if (typeof value === "boolean") {
		return value ? 1 : 0;
	}
	if (value instanceof Date) {
		return value.toISOString().replace("T", " ").replace("Z", "");
	}
	if (
		value !== null &&
		typeof value === "object" &&
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
 * Convert SQLite constraint errors to ConstraintViolationError.
 * Other errors are rethrown unchanged.
 */
export function handleError(error: unknown): never {
	if (error && typeof error === "object" && "code" in error) {
		const code = errorField(error, "code");
		const message = errorField(error, "message") || String(error);

		if (code.startsWith("SQLITE_CONSTRAINT")) {
			// Example: "UNIQUE constraint failed: users.email"
			const match = message.match(/constraint failed: (\w+)\.(\w+)/i);
			const table = match ? match[1] : undefined;
			const column = match ? match[2] : undefined;
			const constraint = match ? `${table}.${column}` : undefined;

			let kind: "unique" | "foreign_key" | "check" | "not_null" | "unknown" =
				"unknown";
			if (
				code === "SQLITE_CONSTRAINT_UNIQUE" ||
				code === "SQLITE_CONSTRAINT_PRIMARYKEY" ||
				message.includes("UNIQUE")
			) {
				kind = "unique";
			} else if (
				code === "SQLITE_CONSTRAINT_FOREIGNKEY" ||
				message.includes("FOREIGN KEY")
			) {
				kind = "foreign_key";
			} else if (
				code === "SQLITE_CONSTRAINT_NOTNULL" ||
				message.includes("NOT NULL")
			) {
				kind = "not_null";
			} else if (
				code === "SQLITE_CONSTRAINT_CHECK" ||
				message.includes("CHECK")
			) {
				kind = "check";
			}

			throw new ConstraintViolationError(
				message,
				{kind, constraint, table, column},
				{cause: error},
			);
		}
	}
	throw error;
}

class SQLiteStatement implements PreparedStatement {
	readonly #statement: Database.Statement;
	readonly #params: unknown[] = [];
	#closed = false;

	constructor(statement: Database.Statement) {
		this.#statement = statement;
	}

	bind(position: number, value: unknown): void {
		this.#assertOpen();
		this.#params[position - 1] = encodeValue(value);
	}

	/**
	 * SQLite parameters have no declared type.
	 */
	async parameterMetadata(): Promise<ParameterMetadata | null> {
		this.#assertOpen();
		return null;
	}

	async executeUpdate(): Promise<number> {
		this.#assertOpen();
		try {
			return this.#statement.run(...this.#params).changes;
		} catch (error) {
			return handleError(error);
		}
	}

	async close(): Promise<void> {
		// better-sqlite3 finalizes statements when they are garbage collected
		this.#closed = true;
	}

	#assertOpen(): void {
		if (this.#closed) {
			throw new Error("Statement is closed");
		}
	}
}

/**
 * SQLite connection using better-sqlite3.
 *
 * @example
 * import SQLiteConnection from "sqlseed/sqlite";
 * import {Insert, DefaultBinderConfiguration} from "sqlseed";
 *
 * const connection = new SQLiteConnection("file:fixtures.db");
 * await Insert.into("users")
 *   .columns("id", "name")
 *   .values(1, "Alice")
 *   .build()
 *   .execute(connection, DefaultBinderConfiguration.INSTANCE);
 *
 * // When done:
 * await connection.close();
 */
export default class SQLiteConnection implements Connection {
	readonly dialect = DIALECT;
	#db: Database.Database;

	constructor(url: string) {
		// Handle file: prefix
		const path = url.startsWith("file:") ? url.slice(5) : url;
		this.#db = new Database(path);

		// Enable WAL mode for better concurrency
		this.#db.pragma("journal_mode = WAL");

		// Enable foreign key constraints
		this.#db.pragma("foreign_keys = ON");

		logger.debug({path}, "sqlite connection opened");
	}

	/**
	 * The underlying better-sqlite3 database, for setup and assertions
	 * outside of insert operations.
	 */
	get database(): Database.Database {
		return this.#db;
	}

	async prepare(sql: string): Promise<PreparedStatement> {
		try {
			return new SQLiteStatement(this.#db.prepare(sql));
		} catch (error) {
			return handleError(error);
		}
	}

	async close(): Promise<void> {
		this.#db.close();
		logger.debug("sqlite connection closed");
	}
}
