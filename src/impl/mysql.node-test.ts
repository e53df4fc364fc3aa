/**
 * MySQL adapter tests (Node.js)
 *
 * Covers encoding and error translation, neither of which needs a server.
 */

import {describe, test, expect, thrown} from "./node-test-utils.js";
import {encodeValue, handleError} from "../mysql.js";
import {ConstraintViolationError} from "./errors.js";

describe("encodeValue()", () => {
	test("stringifies plain objects and arrays only", () => {
		const date = new Date("2024-03-01T10:00:00Z");
		expect(encodeValue(undefined)).toBeNull();
		expect(encodeValue(date)).toBe(date);
		expect(encodeValue(false)).toBe(false);
		expect(encodeValue([1, 2])).toBe("[1,2]");
	});
});

describe("handleError()", () => {
	test("translates duplicate entries", () => {
		const error = thrown(() =>
			handleError(
				Object.assign(new Error("Duplicate entry 'a@example.com' for key 'users.email'"), {
					code: "ER_DUP_ENTRY",
				}),
			),
		);
		expect(error).toBeInstanceOf(ConstraintViolationError);
		if (error instanceof ConstraintViolationError) {
			expect(error.kind).toBe("unique");
			expect(error.constraint).toBe("users.email");
			expect(error.table).toBe("users");
		}
	});

	test("translates null violations", () => {
		const error = thrown(() =>
			handleError(
				Object.assign(new Error("Column 'name' cannot be null"), {
					code: "ER_BAD_NULL_ERROR",
				}),
			),
		);
		expect(error).toBeInstanceOf(ConstraintViolationError);
		if (error instanceof ConstraintViolationError) {
			expect(error.kind).toBe("not_null");
			expect(error.column).toBe("name");
		}
	});

	test("rethrows other errors", () => {
		const original = Object.assign(new Error("Unknown column"), {
			code: "ER_BAD_FIELD_ERROR",
		});
		expect(thrown(() => handleError(original))).toBe(original);
	});
});
