/**
 * Test utilities for Node's built-in test runner.
 *
 * Provides a describe, test, expect API over node:test and node:assert.
 */

import {describe as nodeDescribe, test as nodeTest} from "node:test";
import assert from "node:assert";

export {describe, test};

const describe = nodeDescribe;
const test = nodeTest;

type ErrorMatcher = string | RegExp | (new (...args: never[]) => Error);

function toAssertion(expected: ErrorMatcher): RegExp | ((error: unknown) => boolean) {
	if (typeof expected === "string") {
		return (error) => error instanceof Error && error.message.includes(expected);
	}
	if (expected instanceof RegExp) {
		return expected;
	}
	return (error) => error instanceof expected;
}

export function expect<T>(actual: T) {
	return {
		toBe(expected: T) {
			assert.strictEqual(actual, expected);
		},
		toEqual(expected: T) {
			assert.deepStrictEqual(actual, expected);
		},
		toBeNull() {
			assert.strictEqual(actual, null);
		},
		toBeUndefined() {
			assert.strictEqual(actual, undefined);
		},
		toBeInstanceOf(expected: new (...args: never[]) => unknown) {
			assert.ok(
				actual instanceof expected,
				`expected an instance of ${expected.name}`,
			);
		},
		toHaveLength(expected: number) {
			if (!Array.isArray(actual) && typeof actual !== "string") {
				throw new Error("toHaveLength expects an array or string");
			}
			assert.strictEqual(actual.length, expected);
		},
		toContain(expected: unknown) {
			if (Array.isArray(actual)) {
				assert.ok(actual.includes(expected));
			} else if (typeof actual === "string" && typeof expected === "string") {
				assert.ok(actual.includes(expected));
			} else {
				throw new Error("toContain expects an array or string");
			}
		},
		toThrow(expected?: ErrorMatcher) {
			if (typeof actual !== "function") {
				throw new Error("toThrow expects a function");
			}
			const fn = () => {
				actual();
			};
			if (expected) {
				assert.throws(fn, toAssertion(expected));
			} else {
				assert.throws(fn);
			}
		},
		not: {
			toBe(expected: T) {
				assert.notStrictEqual(actual, expected);
			},
			toEqual(expected: T) {
				assert.notDeepStrictEqual(actual, expected);
			},
		},
		rejects: {
			async toThrow(expected?: ErrorMatcher) {
				if (!(actual instanceof Promise)) {
					throw new Error("rejects.toThrow expects a Promise");
				}
				if (expected) {
					await assert.rejects(actual, toAssertion(expected));
				} else {
					await assert.rejects(actual);
				}
			},
		},
	};
}

/**
 * Catch the error thrown by fn, for assertions on its fields.
 */
export function thrown(fn: () => unknown): unknown {
	try {
		fn();
	} catch (error) {
		return error;
	}
	throw new Error("expected the function to throw");
}
