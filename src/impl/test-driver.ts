/**
 * Test connection that records statements without a real database.
 *
 * Every prepared statement keeps its SQL, its bindings at each execution,
 * and whether it was closed, so tests can assert what an operation sent.
 */

import type {
	Connection,
	ParameterMetadata,
	ParameterType,
	PreparedStatement,
} from "./connection.js";
import type {SQLDialect} from "./sql.js";

// ============================================================================
// Types
// ============================================================================

export interface RecordingOptions {
	dialect?: SQLDialect;
	/**
	 * Parameter types reported by every statement, by position (index 0 is
	 * parameter 1). Omit to report no metadata.
	 */
	parameterTypes?: readonly ParameterType[];
	/**
	 * Throw this error from executeUpdate() on the given 1-based execution.
	 */
	failOnExecution?: {execution: number; error: Error};
	/** Rows reported affected per execution (default: 1) */
	affectedRows?: number;
}

// ============================================================================
// Recording
// ============================================================================

class RecordingMetadata implements ParameterMetadata {
	readonly #types: readonly ParameterType[];

	constructor(types: readonly ParameterType[]) {
		this.#types = types;
	}

	get count(): number {
		return this.#types.length;
	}

	typeAt(position: number): ParameterType {
		return this.#types[position - 1] ?? "unknown";
	}
}

export class RecordingStatement implements PreparedStatement {
	readonly sql: string;
	/** Bindings by position, snapshotted at each executeUpdate() */
	readonly executions: Map<number, unknown>[] = [];
	metadataRequests = 0;
	closed = false;
	readonly #bindings = new Map<number, unknown>();
	readonly #options: RecordingOptions;

	constructor(sql: string, options: RecordingOptions) {
		this.sql = sql;
		this.#options = options;
	}

	bind(position: number, value: unknown): void {
		this.#assertOpen();
		this.#bindings.set(position, value);
	}

	async parameterMetadata(): Promise<ParameterMetadata | null> {
		this.#assertOpen();
		this.metadataRequests++;
		const types = this.#options.parameterTypes;
		return types ? new RecordingMetadata(types) : null;
	}

	async executeUpdate(): Promise<number> {
		this.#assertOpen();
		const failure = this.#options.failOnExecution;
		if (failure && failure.execution === this.executions.length + 1) {
			throw failure.error;
		}
		this.executions.push(new Map(this.#bindings));
		return this.#options.affectedRows ?? 1;
	}

	async close(): Promise<void> {
		this.closed = true;
	}

	/**
	 * Bound values of one execution, ordered by position.
	 */
	boundValues(execution: number): unknown[] {
		const bindings = this.executions[execution];
		if (!bindings) {
			throw new Error(`No execution ${execution}`);
		}
		return [...bindings.entries()]
			.sort(([a], [b]) => a - b)
			.map(([, value]) => value);
	}

	#assertOpen(): void {
		if (this.closed) {
			throw new Error("Statement is closed");
		}
	}
}

export class RecordingConnection implements Connection {
	readonly dialect: SQLDialect;
	readonly statements: RecordingStatement[] = [];
	closed = false;
	readonly #options: RecordingOptions;

	constructor(options: RecordingOptions = {}) {
		this.dialect = options.dialect ?? "sqlite";
		this.#options = options;
	}

	async prepare(sql: string): Promise<RecordingStatement> {
		const statement = new RecordingStatement(sql, this.#options);
		this.statements.push(statement);
		return statement;
	}

	async close(): Promise<void> {
		this.closed = true;
	}

	/**
	 * The most recently prepared statement.
	 */
	get lastStatement(): RecordingStatement {
		const statement = this.statements[this.statements.length - 1];
		if (!statement) {
			throw new Error("No statement has been prepared");
		}
		return statement;
	}
}
