/**
 * SQLite connection tests (Node.js)
 *
 * Runs inserts end to end against an in-memory better-sqlite3 database.
 */

import {describe, test, expect, thrown} from "./node-test-utils.js";
import SQLiteConnection, {encodeValue, handleError} from "../sqlite.js";
import {Insert} from "./insert.js";
import {Binders, DefaultBinderConfiguration} from "./binders.js";
import {ValueGenerators} from "./generators.js";
import {ConstraintViolationError} from "./errors.js";

const config = DefaultBinderConfiguration.INSTANCE;

function createUsers(connection: SQLiteConnection): void {
	connection.database.exec(
		`CREATE TABLE users (
			id INTEGER PRIMARY KEY,
			name TEXT NOT NULL,
			email TEXT UNIQUE,
			deleted INTEGER NOT NULL,
			created_at TEXT,
			code TEXT
		)`,
	);
}

describe("SQLiteConnection", () => {
	test("inserts rows with generated values", async () => {
		const connection = new SQLiteConnection(":memory:");
		createUsers(connection);

		const affected = await Insert.into("users")
			.columns("id", "name", "email")
			.values(1, "John", "john@example.com")
			.values({id: 2, name: "Jane"})
			.row().column("id", 3).column("name", "Joe").build()
			.withDefaultValue("deleted", false)
			.withGeneratedValue(
				"code",
				ValueGenerators.stringSequence("U").withLeftPadding(2),
			)
			.build()
			.execute(connection, config);

		expect(affected).toBe(3);
		expect(
			connection.database
				.prepare("SELECT id, name, email, deleted, code FROM users ORDER BY id")
				.all(),
		).toEqual([
			{id: 1, name: "John", email: "john@example.com", deleted: 0, code: "U01"},
			{id: 2, name: "Jane", email: null, deleted: 0, code: "U02"},
			{id: 3, name: "Joe", email: null, deleted: 0, code: "U03"},
		]);

		await connection.close();
	});

	test("stores dates as UTC text", async () => {
		const connection = new SQLiteConnection(":memory:");
		createUsers(connection);

		await Insert.into("users")
			.columns("id", "name", "deleted", "created_at")
			.values(1, "John", true, new Date("2024-03-01T10:00:00Z"))
			.values(2, "Jane", 0, "2024-03-02T12:30:00Z")
			.withBinder(Binders.timestampBinder(), "created_at")
			.build()
			.execute(connection, config);

		expect(
			connection.database
				.prepare("SELECT deleted, created_at FROM users ORDER BY id")
				.all(),
		).toEqual([
			{deleted: 1, created_at: "2024-03-01 10:00:00.000"},
			{deleted: 0, created_at: "2024-03-02 12:30:00.000"},
		]);

		await connection.close();
	});

	test("stores object values as JSON text", async () => {
		const connection = new SQLiteConnection(":memory:");
		connection.database.exec("CREATE TABLE events (id INTEGER, payload TEXT)");

		const affected = await Insert.into("events")
			.columns("id", "payload")
			.values(1, {a: 1})
			.values(2, [1, "two"])
			.build()
			.execute(connection, config);

		expect(affected).toBe(2);
		expect(
			connection.database
				.prepare("SELECT id, payload FROM events ORDER BY id")
				.all(),
		).toEqual([
			{id: 1, payload: '{"a":1}'},
			{id: 2, payload: '[1,"two"]'},
		]);

		await connection.close();
	});

	test("translates unique violations and keeps earlier rows", async () => {
		const connection = new SQLiteConnection(":memory:");
		createUsers(connection);

		const insert = Insert.into("users")
			.columns("id", "name", "email")
			.values(1, "John", "same@example.com")
			.values(2, "Jane", "same@example.com")
			.withDefaultValue("deleted", false)
			.build();

		let error: unknown;
		try {
			await insert.execute(connection, config);
		} catch (err) {
			error = err;
		}

		expect(error).toBeInstanceOf(ConstraintViolationError);
		if (error instanceof ConstraintViolationError) {
			expect(error.kind).toBe("unique");
			expect(error.table).toBe("users");
			expect(error.column).toBe("email");
			expect(error.constraint).toBe("users.email");
		}
		expect(
			connection.database.prepare("SELECT COUNT(*) AS n FROM users").get(),
		).toEqual({n: 1});

		await connection.close();
	});

	test("translates not-null violations", async () => {
		const connection = new SQLiteConnection(":memory:");
		createUsers(connection);

		await expect(
			Insert.into("users")
				.columns("id", "name")
				.values({id: 1})
				.withDefaultValue("deleted", false)
				.build()
				.execute(connection, config),
		).rejects.toThrow(ConstraintViolationError);

		await connection.close();
	});

	test("propagates prepare errors unchanged", async () => {
		const connection = new SQLiteConnection(":memory:");

		await expect(
			Insert.into("missing")
				.columns("id")
				.values(1)
				.build()
				.execute(connection, config),
		).rejects.toThrow("no such table: missing");

		await connection.close();
	});
});

describe("encodeValue()", () => {
	test("encodes values better-sqlite3 can't bind", () => {
		expect(encodeValue(true)).toBe(1);
		expect(encodeValue(false)).toBe(0);
		expect(encodeValue(undefined)).toBeNull();
		expect(encodeValue(new Date("2024-03-01T10:00:00.123Z"))).toBe(
			"2024-03-01 10:00:00.123",
		);
		expect(encodeValue("text")).toBe("text");
		expect(encodeValue(7n)).toBe(7n);
	});

	test("encodes objects and arrays as JSON text", () => {
		const bytes = Buffer.from([1, 2]);
		expect(encodeValue({a: 1})).toBe('{"a":1}');
		expect(encodeValue(["x", 2])).toBe('["x",2]');
		expect(encodeValue(bytes)).toBe(bytes);
		expect(encodeValue(null)).toBeNull();
	});
});

describe("handleError()", () => {
	test("classifies constraint errors by code", () => {
		const cases = [
			{code: "SQLITE_CONSTRAINT_FOREIGNKEY", message: "FOREIGN KEY constraint failed", kind: "foreign_key"},
			{code: "SQLITE_CONSTRAINT_CHECK", message: "CHECK constraint failed: positive", kind: "check"},
			{code: "SQLITE_CONSTRAINT_PRIMARYKEY", message: "UNIQUE constraint failed: users.id", kind: "unique"},
		];
		for (const {code, message, kind} of cases) {
			const error = thrown(() => handleError(Object.assign(new Error(message), {code})));
			expect(error).toBeInstanceOf(ConstraintViolationError);
			if (error instanceof ConstraintViolationError) {
				expect<string>(error.kind).toBe(kind);
			}
		}
	});

	test("rethrows other errors", () => {
		const original = Object.assign(new Error("disk I/O error"), {code: "SQLITE_IOERR"});
		expect(thrown(() => handleError(original))).toBe(original);
	});
});
