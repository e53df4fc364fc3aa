/**
 * PostgreSQL adapter tests (Node.js)
 *
 * Covers type mapping, encoding and error translation, none of which
 * needs a server.
 */

import {describe, test, expect, thrown} from "./node-test-utils.js";
import {encodeValue, handleError, parameterTypeFromOID} from "../postgres.js";
import {ConstraintViolationError} from "./errors.js";

describe("parameterTypeFromOID()", () => {
	test("maps built-in type OIDs", () => {
		expect(parameterTypeFromOID(16)).toBe("boolean");
		expect(parameterTypeFromOID(23)).toBe("integer");
		expect(parameterTypeFromOID(20)).toBe("integer");
		expect(parameterTypeFromOID(1043)).toBe("text");
		expect(parameterTypeFromOID(1700)).toBe("decimal");
		expect(parameterTypeFromOID(701)).toBe("real");
		expect(parameterTypeFromOID(1082)).toBe("date");
		expect(parameterTypeFromOID(1083)).toBe("time");
		expect(parameterTypeFromOID(1114)).toBe("timestamp");
		expect(parameterTypeFromOID(1184)).toBe("timestamptz");
		expect(parameterTypeFromOID(3802)).toBe("json");
		expect(parameterTypeFromOID(17)).toBe("binary");
	});

	test("reports unknown for other OIDs", () => {
		expect(parameterTypeFromOID(2950)).toBe("unknown");
	});
});

describe("encodeValue()", () => {
	test("passes native values and stringifies objects", () => {
		const date = new Date("2024-03-01T10:00:00Z");
		expect(encodeValue(undefined)).toBeNull();
		expect(encodeValue(date)).toBe(date);
		expect(encodeValue(true)).toBe(true);
		expect(encodeValue(12n)).toBe(12n);
		expect(encodeValue({tags: ["a"]})).toBe('{"tags":["a"]}');
	});
});

describe("handleError()", () => {
	test("translates constraint violations", () => {
		const error = thrown(() =>
			handleError(
				Object.assign(new Error('duplicate key value violates unique constraint "users_email_key"'), {
					code: "23505",
					constraint_name: "users_email_key",
					table_name: "users",
				}),
			),
		);
		expect(error).toBeInstanceOf(ConstraintViolationError);
		if (error instanceof ConstraintViolationError) {
			expect(error.kind).toBe("unique");
			expect(error.constraint).toBe("users_email_key");
			expect(error.table).toBe("users");
			expect(error.column).toBeUndefined();
		}
	});

	test("rethrows other errors", () => {
		const original = Object.assign(new Error("syntax error"), {code: "42601"});
		expect(thrown(() => handleError(original))).toBe(original);
	});
});
