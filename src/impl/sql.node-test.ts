import {describe, test, expect} from "./node-test-utils.js";
import {placeholder, renderInsert} from "./sql.js";

describe("placeholder()", () => {
	test("uses numbered placeholders for PostgreSQL only", () => {
		expect(placeholder(3, "postgresql")).toBe("$3");
		expect(placeholder(3, "sqlite")).toBe("?");
		expect(placeholder(3, "mysql")).toBe("?");
	});
});

describe("renderInsert()", () => {
	test("renders one placeholder per column", () => {
		expect(renderInsert("users", ["id", "name", "deleted"], "mysql")).toBe(
			"INSERT INTO users (id, name, deleted) VALUES (?, ?, ?)",
		);
	});

	test("writes names verbatim", () => {
		expect(renderInsert('app."Users"', ['"Id"'], "postgresql")).toBe(
			'INSERT INTO app."Users" ("Id") VALUES ($1)',
		);
	});
});
