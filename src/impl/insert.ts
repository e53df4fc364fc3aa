/**
 * INSERT operations for populating tables with fixture data.
 *
 * An Insert is declared through a single-use InsertBuilder and is immutable
 * once built. Executing it prepares one statement and runs it once per row.
 *
 * @example
 * const insert = Insert.into("users")
 *   .columns("id", "name")
 *   .values(1, "Alice")
 *   .values({id: 2, name: "Bob"})
 *   .row().column("id", 3).build()
 *   .withDefaultValue("deleted", false)
 *   .build();
 *
 * await insert.execute(connection, DefaultBinderConfiguration.INSTANCE);
 */

import type {Connection, Operation} from "./connection.js";
import {Binders, type Binder, type BinderConfiguration} from "./binders.js";
import {ValueGenerators, type ValueGenerator} from "./generators.js";
import {BuilderArgumentError, BuilderStateError} from "./errors.js";
import {renderInsert, type SQLDialect} from "./sql.js";
import {createLogger} from "./logger.js";

const logger = createLogger("insert");

export type Row = readonly unknown[];

/** Only build() holds this, so an Insert can't be constructed directly. */
const BUILD_TOKEN: unique symbol = Symbol("Insert.build");

interface InsertState {
	table: string;
	columnNames: readonly string[];
	rows: readonly Row[];
	valueGenerators: ReadonlyMap<string, ValueGenerator>;
	binders: ReadonlyMap<string, Binder>;
	metadataUsed: boolean;
}

/**
 * Check whether a values() argument is a name-keyed row rather than a
 * positional value.
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (value === null || typeof value !== "object") {
		return false;
	}
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

// ============================================================================
// Insert
// ============================================================================

/**
 * An immutable INSERT operation.
 *
 * Generated values are materialized when the insert is built, so every
 * execution binds exactly the same values. Binders resolved from parameter
 * metadata are looked up per execution and never stored on the insert.
 */
export class Insert implements Operation {
	readonly table: string;
	readonly columnNames: readonly string[];
	readonly rows: readonly Row[];
	readonly metadataUsed: boolean;
	readonly #generatedValues: Map<string, readonly unknown[]>;
	readonly #binders: Map<string, Binder>;

	/** @internal Use Insert.into() */
	constructor(token: typeof BUILD_TOKEN, state: InsertState) {
		if (token !== BUILD_TOKEN) {
			throw new BuilderStateError("An insert can only be built with Insert.into()");
		}
		this.table = state.table;
		this.columnNames = Object.freeze([...state.columnNames]);
		this.rows = Object.freeze(state.rows.map((row) => Object.freeze([...row])));

		const generated = new Map<string, readonly unknown[]>();
		for (const [column, generator] of state.valueGenerators) {
			const values: unknown[] = [];
			for (let i = 0; i < this.rows.length; i++) {
				values.push(generator.nextValue());
			}
			generated.set(column, Object.freeze(values));
		}
		this.#generatedValues = generated;
		this.#binders = new Map(state.binders);
		this.metadataUsed = state.metadataUsed;

		Object.freeze(this);
	}

	/**
	 * Start building an insert into the given table.
	 */
	static into(table: string): InsertBuilder {
		return new InsertBuilder(table);
	}

	/** Generated-value column → one value per row, in registration order */
	get generatedValues(): ReadonlyMap<string, readonly unknown[]> {
		return new Map(this.#generatedValues);
	}

	/** Explicitly associated binders */
	get binders(): ReadonlyMap<string, Binder> {
		return new Map(this.#binders);
	}

	get generatedColumnNames(): readonly string[] {
		return [...this.#generatedValues.keys()];
	}

	/**
	 * Declared columns followed by generated-value columns.
	 */
	get allColumnNames(): readonly string[] {
		return [...this.columnNames, ...this.#generatedValues.keys()];
	}

	get rowCount(): number {
		return this.rows.length;
	}

	/**
	 * The statement prepared by execute() for the given dialect.
	 */
	toSQL(dialect: SQLDialect): string {
		return renderInsert(this.table, this.allColumnNames, dialect);
	}

	/**
	 * Insert every row, in order, with a single prepared statement.
	 *
	 * Unless metadata use has been disabled, binders for columns without an
	 * explicit binder are chosen by the configuration from the statement's
	 * parameter metadata. The statement is closed whether or not a row fails;
	 * the first failure stops the remaining rows and is rethrown.
	 *
	 * @returns The total number of affected rows reported by the database
	 */
	async execute(
		connection: Connection,
		configuration: BinderConfiguration,
	): Promise<number> {
		const allColumnNames = this.allColumnNames;
		const sql = renderInsert(this.table, allColumnNames, connection.dialect);
		const statement = await connection.prepare(sql);

		try {
			const metadataBinders = new Map<string, Binder>();
			if (this.metadataUsed) {
				const metadata = await statement.parameterMetadata();
				allColumnNames.forEach((column, i) => {
					if (!this.#binders.has(column)) {
						metadataBinders.set(column, configuration.getBinder(metadata, i + 1));
					}
				});
			}

			logger.debug(
				{
					sql,
					rows: this.rows.length,
					explicitBinders: [...this.#binders.keys()],
					metadataBinders: [...metadataBinders.keys()],
				},
				"executing insert",
			);

			let affected = 0;
			for (let rowIndex = 0; rowIndex < this.rows.length; rowIndex++) {
				let position = 1;
				for (const [i, value] of this.rows[rowIndex].entries()) {
					this.#binderFor(this.columnNames[i], metadataBinders).bind(
						statement,
						position++,
						value,
					);
				}
				for (const [column, values] of this.#generatedValues) {
					this.#binderFor(column, metadataBinders).bind(
						statement,
						position++,
						values[rowIndex],
					);
				}
				affected += await statement.executeUpdate();
			}

			logger.debug({table: this.table, affected}, "insert executed");
			return affected;
		} finally {
			await statement.close();
		}
	}

	#binderFor(column: string, metadataBinders: Map<string, Binder>): Binder {
		return (
			this.#binders.get(column) ??
			metadataBinders.get(column) ??
			Binders.defaultBinder()
		);
	}

	toString(): string {
		const generated = [...this.#generatedValues]
			.map(([column, values]) => `${column}=${JSON.stringify(values, jsonReplacer)}`)
			.join(", ");
		return (
			`insert into ${this.table} [columns=[${this.columnNames.join(", ")}]` +
			`, generatedValues={${generated}}` +
			`, rows=${JSON.stringify(this.rows, jsonReplacer)}` +
			`, metadataUsed=${this.metadataUsed}` +
			`, binders=[${[...this.#binders.keys()].join(", ")}]]`
		);
	}
}

function jsonReplacer(_key: string, value: unknown): unknown {
	if (typeof value === "bigint") {
		return `${value}n`;
	}
	return value === undefined ? null : value;
}

// ============================================================================
// InsertBuilder
// ============================================================================

/**
 * Builder for an Insert. May only be used once: after build(), every method
 * throws BuilderStateError.
 */
export class InsertBuilder {
	readonly #table: string;
	readonly #columnNames: string[] = [];
	readonly #valueGenerators = new Map<string, ValueGenerator>();
	readonly #rows: Row[] = [];
	readonly #binders = new Map<string, Binder>();
	#metadataUsed = true;
	#built = false;

	/** @internal Use Insert.into() */
	constructor(table: string) {
		this.#table = table;
	}

	#checkNotBuilt(): void {
		if (this.#built) {
			throw new BuilderStateError("The insert has already been built");
		}
	}

	/**
	 * Declare the columns of the rows given to values() and row().
	 *
	 * @throws BuilderStateError if already built, if columns were already
	 * declared, or if a column is already a generated-value column
	 */
	columns(...columns: string[]): this {
		this.#checkNotBuilt();
		if (this.#columnNames.length > 0) {
			throw new BuilderStateError("columns have already been specified");
		}
		for (const column of columns) {
			if (this.#valueGenerators.has(column)) {
				throw new BuilderStateError(
					`column ${column} has already been specified as generated value column`,
				);
			}
		}
		this.#columnNames.push(...columns);
		return this;
	}

	/**
	 * Add a row.
	 *
	 * A single plain-object argument is a row keyed by column name: keys
	 * must be declared columns, and missing columns are inserted as null.
	 * Otherwise the arguments are the row's values in declared column order.
	 * To insert an object into a single column, use row().
	 *
	 * @throws BuilderArgumentError if the number of values doesn't match the
	 * number of columns, or if a key isn't a declared column
	 */
	values(row: Readonly<Record<string, unknown>>): this;
	values(...values: unknown[]): this;
	values(...values: unknown[]): this {
		this.#checkNotBuilt();
		const [first] = values;
		if (values.length === 1 && isPlainObject(first)) {
			const unknownColumns = Object.keys(first).filter(
				(column) => !this.#columnNames.includes(column),
			);
			if (unknownColumns.length > 0) {
				throw new BuilderArgumentError(
					`The following columns of the row don't match with any column name: ${unknownColumns.join(", ")}`,
					unknownColumns,
				);
			}
			return this.#appendRow(new Map(Object.entries(first)));
		}
		if (values.length !== this.#columnNames.length) {
			throw new BuilderArgumentError(
				`The number of values (${values.length}) doesn't match the number of columns (${this.#columnNames.length})`,
			);
		}
		this.#rows.push([...values]);
		return this;
	}

	/**
	 * Start a row built column by column. The row is added when its
	 * build() is called.
	 */
	row(): RowBuilder {
		this.#checkNotBuilt();
		return new RowBuilder(this, this.#columnNames, (row) =>
			this.#appendRow(row),
		);
	}

	// Shared by values(row) and RowBuilder.build(); keys are already checked
	#appendRow(row: ReadonlyMap<string, unknown>): this {
		this.#checkNotBuilt();
		this.#rows.push(
			this.#columnNames.map((column) =>
				row.has(column) ? row.get(column) : null,
			),
		);
		return this;
	}

	/**
	 * Associate a binder with columns. The binder always wins over
	 * metadata-resolved and default binders for these columns.
	 *
	 * @throws BuilderArgumentError if a column is neither declared nor
	 * generated
	 */
	withBinder(binder: Binder, ...columns: string[]): this {
		this.#checkNotBuilt();
		for (const column of columns) {
			if (
				!this.#columnNames.includes(column) &&
				!this.#valueGenerators.has(column)
			) {
				throw new BuilderArgumentError(
					`column ${column} is not one of the registered column names`,
					[column],
				);
			}
			this.#binders.set(column, binder);
		}
		return this;
	}

	/**
	 * Insert the same value in the column for every row.
	 */
	withDefaultValue(column: string, value: unknown): this {
		return this.withGeneratedValue(column, ValueGenerators.constant(value));
	}

	/**
	 * Generate the column's value for every row. Generated columns follow
	 * the declared columns, in registration order.
	 *
	 * @throws BuilderArgumentError if the column is a declared column
	 */
	withGeneratedValue(column: string, generator: ValueGenerator): this {
		this.#checkNotBuilt();
		if (this.#columnNames.includes(column)) {
			throw new BuilderArgumentError(
				`column ${column} is already listed in the list of column names`,
				[column],
			);
		}
		this.#valueGenerators.set(column, generator);
		return this;
	}

	/**
	 * Whether parameter metadata is used to choose binders (default true).
	 * Some drivers report metadata poorly or slowly; disabling it makes every
	 * column without an explicit binder use the default binder.
	 */
	useMetadata(useMetadata: boolean): this {
		this.#checkNotBuilt();
		this.#metadataUsed = useMetadata;
		return this;
	}

	/**
	 * Build the insert, generating the values of generated-value columns.
	 *
	 * @throws BuilderStateError if already built, or if there are no columns
	 * and no generated-value columns
	 */
	build(): Insert {
		this.#checkNotBuilt();
		if (this.#columnNames.length === 0 && this.#valueGenerators.size === 0) {
			throw new BuilderStateError(
				"no column and no generated value column has been specified",
			);
		}
		this.#built = true;
		return new Insert(BUILD_TOKEN, {
			table: this.#table,
			columnNames: this.#columnNames,
			rows: this.#rows,
			valueGenerators: this.#valueGenerators,
			binders: this.#binders,
			metadataUsed: this.#metadataUsed,
		});
	}
}

// ============================================================================
// RowBuilder
// ============================================================================

/**
 * Builds one row by column name. Columns left unset are inserted as null.
 *
 * @example
 * Insert.into("users")
 *   .columns("id", "name", "email")
 *   .row().column("id", 1).column("name", "Alice").build()
 *   .build();
 */
export class RowBuilder {
	readonly #builder: InsertBuilder;
	readonly #columnNames: readonly string[];
	readonly #append: (row: ReadonlyMap<string, unknown>) => void;
	readonly #row = new Map<string, unknown>();

	/** @internal Use InsertBuilder.row() */
	constructor(
		builder: InsertBuilder,
		columnNames: readonly string[],
		append: (row: ReadonlyMap<string, unknown>) => void,
	) {
		this.#builder = builder;
		this.#columnNames = columnNames;
		this.#append = append;
	}

	/**
	 * @throws BuilderArgumentError if the column isn't a declared column
	 */
	column(name: string, value: unknown): this {
		if (!this.#columnNames.includes(name)) {
			throw new BuilderArgumentError(
				`column ${name} is not one of the registered column names`,
				[name],
			);
		}
		this.#row.set(name, value);
		return this;
	}

	/**
	 * Add the row to the insert builder and return it.
	 */
	build(): InsertBuilder {
		this.#append(this.#row);
		return this.#builder;
	}
}
