import {describe, test, expect, thrown} from "./node-test-utils.js";
import {Binders, DefaultBinderConfiguration, type Binder} from "./binders.js";
import type {
	ParameterMetadata,
	ParameterType,
	PreparedStatement,
} from "./connection.js";
import {BindError} from "./errors.js";

/**
 * Bind one value at position 3 and return what reached the statement.
 */
function bindWith(binder: Binder, value: unknown): unknown {
	const bound = new Map<number, unknown>();
	const statement: PreparedStatement = {
		bind: (position, v) => {
			bound.set(position, v);
		},
		parameterMetadata: async () => null,
		executeUpdate: async () => 1,
		close: async () => {},
	};
	binder.bind(statement, 3, value);
	return bound.get(3);
}

function metadata(...types: ParameterType[]): ParameterMetadata {
	return {
		count: types.length,
		typeAt: (position) => types[position - 1] ?? "unknown",
	};
}

describe("Binders", () => {
	test("every binder binds null and undefined as null", () => {
		const binders = [
			Binders.defaultBinder(),
			Binders.stringBinder(),
			Binders.integerBinder(),
			Binders.decimalBinder(),
			Binders.booleanBinder(),
			Binders.dateBinder(),
			Binders.timeBinder(),
			Binders.timestampBinder(),
			Binders.jsonBinder(),
		];
		for (const binder of binders) {
			expect(bindWith(binder, null)).toBeNull();
			expect(bindWith(binder, undefined)).toBeNull();
		}
	});

	test("defaultBinder() passes values through", () => {
		const date = new Date("2024-03-01T10:00:00Z");
		expect(bindWith(Binders.defaultBinder(), date)).toBe(date);
		expect(bindWith(Binders.defaultBinder(), {a: 1})).toEqual({a: 1});
	});

	test("stringBinder()", () => {
		const binder = Binders.stringBinder();
		expect(bindWith(binder, "abc")).toBe("abc");
		expect(bindWith(binder, 42)).toBe("42");
		expect(bindWith(binder, 10n)).toBe("10");
		expect(bindWith(binder, true)).toBe("true");
		expect(bindWith(binder, new Date("2024-03-01T10:00:00Z"))).toBe(
			"2024-03-01T10:00:00.000Z",
		);
		expect(() => bindWith(binder, {a: 1})).toThrow(BindError);
	});

	test("integerBinder()", () => {
		const binder = Binders.integerBinder();
		expect(bindWith(binder, 42)).toBe(42);
		expect(bindWith(binder, " 17 ")).toBe(17);
		expect(bindWith(binder, 5n)).toBe(5);
		expect(bindWith(binder, "9007199254740993")).toBe(9007199254740993n);
		expect(bindWith(binder, 2n ** 60n)).toBe(1152921504606846976n);
		expect(() => bindWith(binder, 1.5)).toThrow(BindError);
		expect(() => bindWith(binder, "12abc")).toThrow(BindError);
	});

	test("decimalBinder()", () => {
		const binder = Binders.decimalBinder();
		expect(bindWith(binder, 12.5)).toBe("12.5");
		expect(bindWith(binder, " 3.140 ")).toBe("3.140");
		expect(bindWith(binder, 10n)).toBe("10");
		expect(bindWith(binder, "-1e3")).toBe("-1e3");
		expect(() => bindWith(binder, "abc")).toThrow(BindError);
		expect(() => bindWith(binder, Number.POSITIVE_INFINITY)).toThrow(BindError);
	});

	test("booleanBinder()", () => {
		const binder = Binders.booleanBinder();
		expect(bindWith(binder, false)).toBe(false);
		expect(bindWith(binder, 1)).toBe(true);
		expect(bindWith(binder, 0)).toBe(false);
		expect(bindWith(binder, "true")).toBe(true);
		expect(() => bindWith(binder, "yes")).toThrow(BindError);
		expect(() => bindWith(binder, 2)).toThrow(BindError);
	});

	test("dateBinder()", () => {
		const binder = Binders.dateBinder();
		expect(bindWith(binder, new Date("2024-03-01T23:30:00Z"))).toBe("2024-03-01");
		expect(bindWith(binder, "2024-02-29")).toBe("2024-02-29");
		expect(() => bindWith(binder, "03/01/2024")).toThrow(BindError);
		expect(() => bindWith(binder, new Date("nope"))).toThrow(BindError);
	});

	test("timeBinder()", () => {
		const binder = Binders.timeBinder();
		expect(bindWith(binder, "10:30")).toBe("10:30:00");
		expect(bindWith(binder, "10:30:15.250")).toBe("10:30:15.250");
		expect(bindWith(binder, new Date("2024-03-01T08:05:09Z"))).toBe("08:05:09");
		expect(bindWith(binder, new Date("2024-03-01T08:05:09.007Z"))).toBe(
			"08:05:09.007",
		);
		expect(() => bindWith(binder, "8am")).toThrow(BindError);
	});

	test("timeBinder() rejects out-of-range times", () => {
		const binder = Binders.timeBinder();
		expect(bindWith(binder, "00:00")).toBe("00:00:00");
		expect(bindWith(binder, "23:59:59")).toBe("23:59:59");
		for (const time of ["24:00", "25:99", "12:60", "12:30:60"]) {
			expect(() => bindWith(binder, time)).toThrow(BindError);
		}
	});

	test("timestampBinder()", () => {
		const binder = Binders.timestampBinder();
		expect(bindWith(binder, "2024-03-01T10:00:00Z")).toEqual(
			new Date("2024-03-01T10:00:00Z"),
		);
		expect(bindWith(binder, 0)).toEqual(new Date(0));

		const date = new Date("2024-03-01T10:00:00Z");
		const bound = bindWith(binder, date);
		expect(bound).toEqual(date);
		expect(bound).not.toBe(date);

		expect(() => bindWith(binder, "garbage")).toThrow(BindError);
	});

	test("jsonBinder()", () => {
		const binder = Binders.jsonBinder();
		expect(bindWith(binder, {a: 1})).toBe('{"a":1}');
		expect(bindWith(binder, [1, 2])).toBe("[1,2]");
		expect(bindWith(binder, '{"b":2}')).toBe('{"b":2}');
		expect(bindWith(binder, false)).toBe("false");
		expect(() => bindWith(binder, () => 1)).toThrow(BindError);
		expect(() => bindWith(binder, 1n)).toThrow(BindError);
	});

	test("BindError carries position and value", () => {
		const error = thrown(() => bindWith(Binders.booleanBinder(), "maybe"));
		expect(error).toBeInstanceOf(BindError);
		if (error instanceof BindError) {
			expect(error.position).toBe(3);
			expect(error.value).toBe("maybe");
			expect(error.code).toBe("BIND_ERROR");
			expect(error.message.startsWith('Cannot bind "maybe" as boolean at parameter 3: ')).toBe(true);
		}
	});
});

describe("DefaultBinderConfiguration", () => {
	const configuration = DefaultBinderConfiguration.INSTANCE;

	test("uses the default binder without metadata", () => {
		expect(configuration.getBinder(null, 1)).toBe(Binders.defaultBinder());
	});

	test("maps parameter types to binders", () => {
		const meta = metadata(
			"text",
			"integer",
			"decimal",
			"boolean",
			"date",
			"time",
			"timestamp",
			"timestamptz",
			"json",
		);
		expect(configuration.getBinder(meta, 1)).toBe(Binders.stringBinder());
		expect(configuration.getBinder(meta, 2)).toBe(Binders.integerBinder());
		expect(configuration.getBinder(meta, 3)).toBe(Binders.decimalBinder());
		expect(configuration.getBinder(meta, 4)).toBe(Binders.booleanBinder());
		expect(configuration.getBinder(meta, 5)).toBe(Binders.dateBinder());
		expect(configuration.getBinder(meta, 6)).toBe(Binders.timeBinder());
		expect(configuration.getBinder(meta, 7)).toBe(Binders.timestampBinder());
		expect(configuration.getBinder(meta, 8)).toBe(Binders.timestampBinder());
		expect(configuration.getBinder(meta, 9)).toBe(Binders.jsonBinder());
	});

	test("falls back to the default binder for other types", () => {
		const meta = metadata("real", "binary", "unknown");
		for (const position of [1, 2, 3, 4]) {
			expect(configuration.getBinder(meta, position)).toBe(
				Binders.defaultBinder(),
			);
		}
	});
});
