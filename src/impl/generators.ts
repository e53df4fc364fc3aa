/**
 * Value generators for generated-value columns.
 *
 * A generator is asked for one value per row when an insert is built,
 * so sequences are fixed at build time and repeat identically on every
 * execution.
 */

import {z} from "zod";

export interface ValueGenerator<T = unknown> {
	/**
	 * Produce the next value of the sequence.
	 */
	nextValue(): T;
}

// ============================================================================
// Constant
// ============================================================================

class ConstantValueGenerator<T> implements ValueGenerator<T> {
	readonly #value: T;

	constructor(value: T) {
		this.#value = value;
	}

	nextValue(): T {
		return this.#value;
	}

	toString(): string {
		return `ConstantValueGenerator[value=${String(this.#value)}]`;
	}
}

// ============================================================================
// Numeric Sequences
// ============================================================================

const IncrementSchema = z
	.number()
	.int()
	.refine((n) => n !== 0, "increment may not be 0");

/**
 * Generates 1, 2, 3, ... unless reconfigured.
 */
export class SequenceValueGenerator implements ValueGenerator<number> {
	#next = 1;
	#increment = 1;

	/**
	 * Restart the sequence at the given value.
	 */
	startingAt(start: number): this {
		this.#next = z.number().int().parse(start);
		return this;
	}

	/**
	 * Step between two consecutive values. May be negative, not 0.
	 */
	incrementingBy(increment: number): this {
		this.#increment = IncrementSchema.parse(increment);
		return this;
	}

	nextValue(): number {
		const result = this.#next;
		this.#next += this.#increment;
		return result;
	}

	toString(): string {
		return `SequenceValueGenerator[next=${this.#next}, increment=${this.#increment}]`;
	}
}

/**
 * Generates prefix + number: "USER_1", "USER_2", ...
 */
export class StringSequenceValueGenerator implements ValueGenerator<string> {
	readonly #prefix: string;
	readonly #sequence = new SequenceValueGenerator();
	#padding = 0;

	constructor(prefix: string) {
		this.#prefix = prefix;
	}

	startingAt(start: number): this {
		this.#sequence.startingAt(start);
		return this;
	}

	incrementingBy(increment: number): this {
		this.#sequence.incrementingBy(increment);
		return this;
	}

	/**
	 * Zero-pad the number to the given length: prefix "U", length 3
	 * generates "U001", "U002", ...
	 */
	withLeftPadding(length: number): this {
		this.#padding = z.number().int().min(1).parse(length);
		return this;
	}

	withoutLeftPadding(): this {
		this.#padding = 0;
		return this;
	}

	nextValue(): string {
		const n = this.#sequence.nextValue();
		const digits = String(Math.abs(n)).padStart(this.#padding, "0");
		return `${this.#prefix}${n < 0 ? "-" : ""}${digits}`;
	}

	toString(): string {
		return `StringSequenceValueGenerator[prefix=${this.#prefix}, sequence=${this.#sequence}, padding=${this.#padding}]`;
	}
}

// ============================================================================
// Date Sequences
// ============================================================================

export type DateUnit =
	| "milliseconds"
	| "seconds"
	| "minutes"
	| "hours"
	| "days"
	| "months"
	| "years";

const UNIT_MILLISECONDS: Partial<Record<DateUnit, number>> = {
	milliseconds: 1,
	seconds: 1000,
	minutes: 60 * 1000,
	hours: 60 * 60 * 1000,
	days: 24 * 60 * 60 * 1000,
};

const StartDateSchema = z.union([z.date(), z.iso.datetime(), z.iso.date()]);

function startOfTodayUTC(): Date {
	const now = new Date();
	return new Date(
		Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()),
	);
}

/**
 * Add calendar months in UTC, keeping the day of month but clamping it to
 * the length of the target month.
 */
function addMonths(date: Date, months: number): Date {
	const result = new Date(date.getTime());
	const day = date.getUTCDate();
	result.setUTCDate(1);
	result.setUTCMonth(result.getUTCMonth() + months);
	const lastDay = new Date(
		Date.UTC(result.getUTCFullYear(), result.getUTCMonth() + 1, 0),
	).getUTCDate();
	result.setUTCDate(Math.min(day, lastDay));
	return result;
}

/**
 * Generates Dates, by default today at 00:00 UTC, then one day later
 * each time. Months and years are added in UTC calendar terms, counted
 * from the start date, so a sequence starting on the 31st lands on the
 * last day of shorter months and returns to the 31st afterwards.
 */
export class DateSequenceValueGenerator implements ValueGenerator<Date> {
	#start: Date = startOfTodayUTC();
	#index = 0;
	#amount = 1;
	#unit: DateUnit = "days";

	startingAt(start: Date | string): this {
		const parsed = StartDateSchema.parse(start);
		const date = parsed instanceof Date ? parsed : new Date(parsed);
		this.#start = new Date(date.getTime());
		this.#index = 0;
		return this;
	}

	/**
	 * Change the increment. Values already generated are kept; the sequence
	 * continues from its next value.
	 */
	incrementingBy(amount: number, unit: DateUnit): this {
		const parsed = IncrementSchema.parse(amount);
		this.#start = this.#valueAt(this.#index);
		this.#index = 0;
		this.#amount = parsed;
		this.#unit = unit;
		return this;
	}

	nextValue(): Date {
		return this.#valueAt(this.#index++);
	}

	#valueAt(index: number): Date {
		const steps = index * this.#amount;
		const ms = UNIT_MILLISECONDS[this.#unit];
		if (ms !== undefined) {
			return new Date(this.#start.getTime() + steps * ms);
		}
		return addMonths(this.#start, this.#unit === "months" ? steps : steps * 12);
	}

	toString(): string {
		return `DateSequenceValueGenerator[next=${this.#valueAt(this.#index).toISOString()}, increment=${this.#amount} ${this.#unit}]`;
	}
}

// ============================================================================
// Factories
// ============================================================================

/**
 * Factories for the built-in value generators.
 *
 * @example
 * Insert.into("users")
 *   .columns("name")
 *   .values("Alice")
 *   .values("Bob")
 *   .withGeneratedValue("id", ValueGenerators.sequence().startingAt(100))
 *   .withGeneratedValue("code", ValueGenerators.stringSequence("U-").withLeftPadding(3))
 *   .build();
 */
export const ValueGenerators = {
	/**
	 * Always generates the same value. Used for default values.
	 */
	constant<T>(value: T): ValueGenerator<T> {
		return new ConstantValueGenerator(value);
	},

	sequence(): SequenceValueGenerator {
		return new SequenceValueGenerator();
	},

	stringSequence(prefix: string): StringSequenceValueGenerator {
		return new StringSequenceValueGenerator(prefix);
	},

	dateSequence(): DateSequenceValueGenerator {
		return new DateSequenceValueGenerator();
	},
};
