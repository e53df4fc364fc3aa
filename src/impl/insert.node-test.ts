/**
 * Insert builder and execution tests (Node.js)
 *
 * Executes against RecordingConnection, which keeps the prepared SQL and
 * the values bound at each execution.
 */

import {describe, test, expect, thrown} from "./node-test-utils.js";
import {Insert} from "./insert.js";
import {Binders, DefaultBinderConfiguration, type Binder} from "./binders.js";
import {ValueGenerators} from "./generators.js";
import {BuilderArgumentError, BuilderStateError} from "./errors.js";
import {RecordingConnection} from "./test-driver.js";
import type {ParameterMetadata} from "./connection.js";

const config = DefaultBinderConfiguration.INSTANCE;

/**
 * Binder that tags values, so tests can see which binder bound them.
 */
function taggingBinder(tag: string): Binder {
	return {
		bind(statement, position, value) {
			statement.bind(position, `${tag}:${String(value)}`);
		},
	};
}

describe("InsertBuilder", () => {
	test("renders declared columns then generated columns", () => {
		const insert = Insert.into("USERS")
			.withDefaultValue("DELETED", false)
			.columns("ID", "NAME")
			.values(1, "John")
			.withGeneratedValue("VERSION", ValueGenerators.sequence())
			.build();

		expect(insert.allColumnNames).toEqual(["ID", "NAME", "DELETED", "VERSION"]);
		expect(insert.toSQL("sqlite")).toBe(
			"INSERT INTO USERS (ID, NAME, DELETED, VERSION) VALUES (?, ?, ?, ?)",
		);
		expect(insert.toSQL("postgresql")).toBe(
			"INSERT INTO USERS (ID, NAME, DELETED, VERSION) VALUES ($1, $2, $3, $4)",
		);
	});

	test("columns() can only be called once", () => {
		const builder = Insert.into("USERS").columns("ID");
		expect(() => builder.columns("NAME")).toThrow(BuilderStateError);
	});

	test("columns() rejects a generated-value column", () => {
		const builder = Insert.into("USERS").withDefaultValue("DELETED", false);
		expect(() => builder.columns("ID", "DELETED")).toThrow(
			"column DELETED has already been specified as generated value column",
		);
	});

	test("withGeneratedValue() rejects a declared column", () => {
		const builder = Insert.into("USERS").columns("ID", "NAME");
		const error = thrown(() =>
			builder.withGeneratedValue("NAME", ValueGenerators.constant("x")),
		);
		expect(error).toBeInstanceOf(BuilderArgumentError);
		if (error instanceof BuilderArgumentError) {
			expect(error.columns).toEqual(["NAME"]);
			expect(error.code).toBe("BUILDER_ARGUMENT_ERROR");
		}
	});

	test("values() fails immediately on a value count mismatch", () => {
		const builder = Insert.into("USERS").columns("ID", "NAME");
		expect(() => builder.values(1)).toThrow(
			"The number of values (1) doesn't match the number of columns (2)",
		);
		expect(() => builder.values(1, "John", true)).toThrow(BuilderArgumentError);
	});

	test("values(map) fills missing columns with null", () => {
		const insert = Insert.into("USERS")
			.columns("ID", "NAME")
			.values({ID: 2})
			.values({NAME: "Jane", ID: 3})
			.build();

		expect(insert.rows).toEqual([
			[2, null],
			[3, "Jane"],
		]);
	});

	test("values(map) rejects unknown columns, naming all of them", () => {
		const builder = Insert.into("USERS").columns("ID", "NAME");
		const error = thrown(() => builder.values({ID: 1, AGE: 30, EMAIL: "x"}));
		expect(error).toBeInstanceOf(BuilderArgumentError);
		if (error instanceof BuilderArgumentError) {
			expect(error.columns).toEqual(["AGE", "EMAIL"]);
			expect(error.message).toBe(
				"The following columns of the row don't match with any column name: AGE, EMAIL",
			);
		}
	});

	test("values() treats non-plain objects as positional values", () => {
		const created = new Date("2024-01-01T00:00:00Z");
		const insert = Insert.into("EVENTS").columns("CREATED").values(created).build();
		expect(insert.rows).toEqual([[created]]);
	});

	test("row() builds a row by column name", () => {
		const insert = Insert.into("USERS")
			.columns("ID", "NAME", "EMAIL")
			.row()
			.column("EMAIL", "jane@example.com")
			.column("ID", 1)
			.column("ID", 4)
			.build()
			.build();

		expect(insert.rows).toEqual([[4, null, "jane@example.com"]]);
	});

	test("row().column() rejects unknown columns", () => {
		const row = Insert.into("USERS").columns("ID").row();
		expect(() => row.column("NAME", "John")).toThrow(
			"column NAME is not one of the registered column names",
		);
	});

	test("withBinder() rejects unknown columns", () => {
		const builder = Insert.into("USERS")
			.columns("ID")
			.withDefaultValue("DELETED", false);
		expect(() =>
			builder.withBinder(Binders.stringBinder(), "ID", "DELETED", "NAME"),
		).toThrow(BuilderArgumentError);
	});

	test("build() requires columns or generated values", () => {
		expect(() => Insert.into("USERS").build()).toThrow(
			"no column and no generated value column has been specified",
		);
		const insert = Insert.into("USERS")
			.withDefaultValue("DELETED", false)
			.build();
		expect(insert.allColumnNames).toEqual(["DELETED"]);
		expect(insert.rowCount).toBe(0);
	});

	test("every mutator fails after build()", () => {
		const builder = Insert.into("USERS").columns("ID");
		const row = builder.row().column("ID", 1);
		builder.build();

		const calls: (() => unknown)[] = [
			() => builder.columns("NAME"),
			() => builder.values(1),
			() => builder.values({ID: 1}),
			() => builder.row(),
			() => builder.withBinder(Binders.stringBinder(), "ID"),
			() => builder.withDefaultValue("DELETED", false),
			() => builder.withGeneratedValue("V", ValueGenerators.sequence()),
			() => builder.useMetadata(false),
			() => builder.build(),
			() => row.build(),
		];
		for (const call of calls) {
			expect(call).toThrow("The insert has already been built");
		}
	});

	test("generated values are materialized once at build time", () => {
		let calls = 0;
		const insert = Insert.into("USERS")
			.withGeneratedValue("COUNTER", {
				nextValue: () => ++calls,
			})
			.columns("NAME")
			.values("a")
			.values("b")
			.build();

		expect(calls).toBe(2);
		expect(insert.generatedValues.get("COUNTER")).toEqual([1, 2]);
	});

	test("built insert is frozen", () => {
		const insert = Insert.into("USERS").columns("ID").values(1).build();
		expect(Object.isFrozen(insert)).toBe(true);
		expect(Object.isFrozen(insert.rows)).toBe(true);
		expect(Object.isFrozen(insert.rows[0])).toBe(true);
		expect(Object.isFrozen(insert.columnNames)).toBe(true);
	});

	test("generatedValues and binders can't be changed through their accessors", () => {
		const insert = Insert.into("USERS")
			.columns("ID")
			.values(1)
			.withDefaultValue("DELETED", false)
			.withBinder(Binders.integerBinder(), "ID")
			.build();

		const generated = insert.generatedValues;
		const binders = insert.binders;
		if (generated instanceof Map && binders instanceof Map) {
			generated.delete("DELETED");
			binders.clear();
		}

		expect(insert.generatedColumnNames).toEqual(["DELETED"]);
		expect(insert.binders.get("ID")).toBe(Binders.integerBinder());
		expect(insert.toSQL("sqlite")).toBe(
			"INSERT INTO USERS (ID, DELETED) VALUES (?, ?)",
		);
	});

	test("rows can only be added through values() and row()", () => {
		const builder = Insert.into("USERS").columns("ID");
		expect("addRow" in builder).toBe(false);

		const error = thrown(() =>
			Reflect.construct(Insert, [
				{
					table: "USERS",
					columnNames: ["A", "B"],
					rows: [[1]],
					valueGenerators: new Map(),
					binders: new Map(),
					metadataUsed: true,
				},
			]),
		);
		expect(error).toBeInstanceOf(BuilderStateError);
		expect(builder.build().rows).toEqual([]);
	});

	test("toString() describes the insert", () => {
		const insert = Insert.into("USERS")
			.columns("ID", "NAME")
			.values(1, "John")
			.withDefaultValue("DELETED", false)
			.withBinder(Binders.integerBinder(), "ID")
			.useMetadata(false)
			.build();

		expect(insert.toString()).toBe(
			'insert into USERS [columns=[ID, NAME], generatedValues={DELETED=[false]}, rows=[[1,"John"]], metadataUsed=false, binders=[ID]]',
		);
	});
});

describe("Insert.execute()", () => {
	test("binds declared then generated values for each row", async () => {
		const connection = new RecordingConnection();
		const insert = Insert.into("USERS")
			.columns("ID", "NAME")
			.values(1, "John")
			.withDefaultValue("DELETED", false)
			.build();

		const affected = await insert.execute(connection, config);

		const statement = connection.lastStatement;
		expect(statement.sql).toBe(
			"INSERT INTO USERS (ID, NAME, DELETED) VALUES (?, ?, ?)",
		);
		expect(statement.executions).toHaveLength(1);
		expect(statement.boundValues(0)).toEqual([1, "John", false]);
		expect(statement.closed).toBe(true);
		expect(affected).toBe(1);
	});

	test("map rows bind omitted columns as null", async () => {
		const connection = new RecordingConnection();
		await Insert.into("USERS")
			.columns("ID", "NAME")
			.values({ID: 2})
			.build()
			.execute(connection, config);

		expect(connection.lastStatement.boundValues(0)).toEqual([2, null]);
	});

	test("sequence values are fixed across executions", async () => {
		const insert = Insert.into("USERS")
			.columns("NAME")
			.values("a")
			.values("b")
			.withGeneratedValue("COUNTER", ValueGenerators.sequence())
			.build();

		const first = new RecordingConnection();
		const second = new RecordingConnection();
		await insert.execute(first, config);
		await insert.execute(second, config);

		for (const connection of [first, second]) {
			expect(connection.lastStatement.boundValues(0)).toEqual(["a", 1]);
			expect(connection.lastStatement.boundValues(1)).toEqual(["b", 2]);
		}
	});

	test("uses dialect placeholders", async () => {
		const connection = new RecordingConnection({dialect: "postgresql"});
		await Insert.into("public.users")
			.columns("id")
			.values(1)
			.withDefaultValue("active", true)
			.build()
			.execute(connection, config);

		expect(connection.lastStatement.sql).toBe(
			"INSERT INTO public.users (id, active) VALUES ($1, $2)",
		);
	});

	test("explicit binder wins over metadata, metadata over default", async () => {
		const connection = new RecordingConnection({
			parameterTypes: ["integer", "integer", "integer"],
		});
		await Insert.into("T")
			.columns("A", "B")
			.values("1", "2")
			.withDefaultValue("C", "3")
			.withBinder(taggingBinder("explicit"), "A")
			.build()
			.execute(connection, config);

		// B and C go through the integer binder resolved from metadata
		expect(connection.lastStatement.boundValues(0)).toEqual([
			"explicit:1",
			2,
			3,
		]);
	});

	test("later withBinder() calls overwrite earlier ones", async () => {
		const connection = new RecordingConnection();
		await Insert.into("T")
			.columns("A")
			.values("x")
			.withBinder(taggingBinder("first"), "A")
			.withBinder(taggingBinder("second"), "A")
			.build()
			.execute(connection, config);

		expect(connection.lastStatement.boundValues(0)).toEqual(["second:x"]);
	});

	test("metadata binders are resolved once per execution", async () => {
		const resolved: number[] = [];
		const configuration = {
			getBinder(metadata: ParameterMetadata | null, position: number): Binder {
				resolved.push(position);
				return DefaultBinderConfiguration.INSTANCE.getBinder(metadata, position);
			},
		};
		const connection = new RecordingConnection({
			parameterTypes: ["text", "text", "boolean"],
		});
		const insert = Insert.into("T")
			.columns("A", "B")
			.values(1, 2)
			.values(3, 4)
			.withDefaultValue("C", 1)
			.withBinder(taggingBinder("explicit"), "B")
			.build();

		await insert.execute(connection, configuration);

		expect(resolved).toEqual([1, 3]);
		expect(connection.lastStatement.metadataRequests).toBe(1);
		expect(connection.lastStatement.boundValues(0)).toEqual([
			"1",
			"explicit:2",
			true,
		]);
		expect(connection.lastStatement.boundValues(1)).toEqual([
			"3",
			"explicit:4",
			true,
		]);

		await insert.execute(connection, configuration);
		expect(resolved).toEqual([1, 3, 1, 3]);
	});

	test("useMetadata(false) skips metadata and uses the default binder", async () => {
		let lookups = 0;
		const configuration = {
			getBinder(): Binder {
				lookups++;
				return Binders.stringBinder();
			},
		};
		const connection = new RecordingConnection({
			parameterTypes: ["text", "text"],
		});
		await Insert.into("T")
			.columns("A", "B")
			.values(1, undefined)
			.useMetadata(false)
			.build()
			.execute(connection, configuration);

		expect(lookups).toBe(0);
		expect(connection.lastStatement.metadataRequests).toBe(0);
		expect(connection.lastStatement.boundValues(0)).toEqual([1, null]);
	});

	test("closes the statement and stops at the first failing row", async () => {
		const failure = new Error("duplicate key");
		const connection = new RecordingConnection({
			failOnExecution: {execution: 2, error: failure},
		});
		const insert = Insert.into("T")
			.columns("A")
			.values(1)
			.values(2)
			.values(3)
			.build();

		await expect(insert.execute(connection, config)).rejects.toThrow(
			"duplicate key",
		);
		expect(connection.lastStatement.executions).toHaveLength(1);
		expect(connection.lastStatement.closed).toBe(true);
	});

	test("closes the statement when a binder fails", async () => {
		const connection = new RecordingConnection();
		const insert = Insert.into("T")
			.columns("A")
			.values("not a number")
			.withBinder(Binders.integerBinder(), "A")
			.build();

		await expect(insert.execute(connection, config)).rejects.toThrow(
			'Cannot bind "not a number" as integer at parameter 1',
		);
		expect(connection.lastStatement.executions).toHaveLength(0);
		expect(connection.lastStatement.closed).toBe(true);
	});

	test("a failed insert can be executed again", async () => {
		const insert = Insert.into("T").columns("A").values(1).values(2).build();
		const failing = new RecordingConnection({
			failOnExecution: {execution: 1, error: new Error("boom")},
		});
		await expect(insert.execute(failing, config)).rejects.toThrow("boom");

		const connection = new RecordingConnection({affectedRows: 1});
		expect(await insert.execute(connection, config)).toBe(2);
		expect(connection.lastStatement.boundValues(1)).toEqual([2]);
	});

	test("executes nothing but still prepares when there are no rows", async () => {
		const connection = new RecordingConnection();
		const affected = await Insert.into("T")
			.columns("A")
			.build()
			.execute(connection, config);

		expect(affected).toBe(0);
		expect(connection.statements).toHaveLength(1);
		expect(connection.lastStatement.executions).toHaveLength(0);
		expect(connection.lastStatement.closed).toBe(true);
	});
});
