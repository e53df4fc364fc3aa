import {describe, test, expect} from "./node-test-utils.js";
import {ValueGenerators, type ValueGenerator} from "./generators.js";

function take<T>(generator: ValueGenerator<T>, count: number): T[] {
	const values: T[] = [];
	for (let i = 0; i < count; i++) {
		values.push(generator.nextValue());
	}
	return values;
}

describe("ValueGenerators.constant()", () => {
	test("always returns the same value", () => {
		const value = {flag: true};
		const values = take(ValueGenerators.constant(value), 3);
		expect(values).toEqual([value, value, value]);
		expect(values[2]).toBe(value);
	});
});

describe("ValueGenerators.sequence()", () => {
	test("starts at 1 and increments by 1", () => {
		expect(take(ValueGenerators.sequence(), 3)).toEqual([1, 2, 3]);
	});

	test("can be reconfigured fluently", () => {
		const generator = ValueGenerators.sequence().startingAt(100).incrementingBy(-10);
		expect(take(generator, 3)).toEqual([100, 90, 80]);
	});

	test("rejects a zero increment", () => {
		expect(() => ValueGenerators.sequence().incrementingBy(0)).toThrow(
			"increment may not be 0",
		);
	});
});

describe("ValueGenerators.stringSequence()", () => {
	test("appends the sequence number to the prefix", () => {
		expect(take(ValueGenerators.stringSequence("USER_"), 2)).toEqual([
			"USER_1",
			"USER_2",
		]);
	});

	test("pads numbers with zeros", () => {
		const generator = ValueGenerators.stringSequence("U")
			.startingAt(9)
			.incrementingBy(1)
			.withLeftPadding(3);
		expect(take(generator, 2)).toEqual(["U009", "U010"]);
		generator.withoutLeftPadding();
		expect(generator.nextValue()).toBe("U11");
	});

	test("keeps the sign before the padding", () => {
		const generator = ValueGenerators.stringSequence("N")
			.startingAt(-2)
			.withLeftPadding(2);
		expect(take(generator, 3)).toEqual(["N-02", "N-01", "N00"]);
	});
});

describe("ValueGenerators.dateSequence()", () => {
	test("starts today at midnight UTC, one day apart", () => {
		const [first, second] = take(ValueGenerators.dateSequence(), 2);
		const now = new Date();
		expect(first.getUTCHours()).toBe(0);
		expect(first.getUTCMinutes()).toBe(0);
		expect(first.getUTCDate()).toBe(now.getUTCDate());
		expect(second.getTime() - first.getTime()).toBe(24 * 60 * 60 * 1000);
	});

	test("increments by fixed units", () => {
		const generator = ValueGenerators.dateSequence()
			.startingAt("2024-03-01T10:00:00Z")
			.incrementingBy(90, "minutes");
		expect(take(generator, 3).map((d) => d.toISOString())).toEqual([
			"2024-03-01T10:00:00.000Z",
			"2024-03-01T11:30:00.000Z",
			"2024-03-01T13:00:00.000Z",
		]);
	});

	test("increments by calendar months and years", () => {
		const months = ValueGenerators.dateSequence()
			.startingAt("2024-01-15")
			.incrementingBy(1, "months");
		expect(take(months, 3).map((d) => d.toISOString().slice(0, 10))).toEqual([
			"2024-01-15",
			"2024-02-15",
			"2024-03-15",
		]);

		const years = ValueGenerators.dateSequence()
			.startingAt(new Date("2020-06-01T00:00:00Z"))
			.incrementingBy(2, "years");
		expect(take(years, 2).map((d) => d.getUTCFullYear())).toEqual([2020, 2022]);
	});

	test("month increments keep the start's day, clamped to short months", () => {
		const months = ValueGenerators.dateSequence()
			.startingAt("2023-01-31")
			.incrementingBy(1, "months");
		expect(take(months, 4).map((d) => d.toISOString().slice(0, 10))).toEqual([
			"2023-01-31",
			"2023-02-28",
			"2023-03-31",
			"2023-04-30",
		]);

		const quarters = ValueGenerators.dateSequence()
			.startingAt("2023-11-30T08:00:00Z")
			.incrementingBy(3, "months");
		expect(take(quarters, 3).map((d) => d.toISOString())).toEqual([
			"2023-11-30T08:00:00.000Z",
			"2024-02-29T08:00:00.000Z",
			"2024-05-30T08:00:00.000Z",
		]);
	});

	test("year increments clamp February 29th", () => {
		const years = ValueGenerators.dateSequence()
			.startingAt("2024-02-29")
			.incrementingBy(1, "years");
		expect(take(years, 5).map((d) => d.toISOString().slice(0, 10))).toEqual([
			"2024-02-29",
			"2025-02-28",
			"2026-02-28",
			"2027-02-28",
			"2028-02-29",
		]);
	});

	test("incrementingBy() continues from the next value", () => {
		const generator = ValueGenerators.dateSequence().startingAt("2024-01-01");
		generator.nextValue();
		generator.incrementingBy(1, "months");
		expect(take(generator, 2).map((d) => d.toISOString().slice(0, 10))).toEqual([
			"2024-01-02",
			"2024-02-02",
		]);
	});

	test("returned dates are copies", () => {
		const generator = ValueGenerators.dateSequence().startingAt("2024-01-01");
		const first = generator.nextValue();
		first.setUTCFullYear(1999);
		expect(generator.nextValue().toISOString()).toBe("2024-01-02T00:00:00.000Z");
	});

	test("rejects unparseable start dates", () => {
		expect(() => ValueGenerators.dateSequence().startingAt("yesterday")).toThrow();
	});
});
