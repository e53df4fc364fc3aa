/**
 * Binders attach values to prepared statement parameters.
 *
 * Each column of an insert is bound through the first binder found among:
 * 1. A binder explicitly associated with the column (always wins)
 * 2. A binder chosen by a BinderConfiguration from parameter metadata
 * 3. Binders.defaultBinder()
 *
 * Built-in binders validate their input with zod and throw BindError for
 * values they can't convert.
 */

import {z} from "zod";
import type {
	ParameterMetadata,
	ParameterType,
	PreparedStatement,
} from "./connection.js";
import {BindError} from "./errors.js";

export interface Binder {
	/**
	 * Bind a value to a 1-based parameter position of the statement.
	 *
	 * @throws BindError if the value can't be bound by this binder
	 */
	bind(statement: PreparedStatement, position: number, value: unknown): void;
}

// ============================================================================
// Conversion Schemas
// ============================================================================

// z.date() rejects Invalid Date, so Date inputs need no further check.

const StringValue = z
	.union([z.string(), z.number(), z.bigint(), z.boolean(), z.date()])
	.transform((v) => (v instanceof Date ? v.toISOString() : String(v)));

const IntegerValue = z
	.union([
		z.number().int(),
		z.bigint(),
		z
			.string()
			.trim()
			.regex(/^[-+]?\d+$/, "not an integer")
			.transform((s) => BigInt(s)),
	])
	.transform((v) =>
		typeof v === "bigint" &&
		v >= BigInt(Number.MIN_SAFE_INTEGER) &&
		v <= BigInt(Number.MAX_SAFE_INTEGER)
			? Number(v)
			: v,
	)
	.refine(
		(v) => typeof v === "bigint" || Number.isSafeInteger(v),
		"integer is outside the safe range; pass a bigint",
	);

const DecimalValue = z
	.union([
		z.number().finite(),
		z.bigint(),
		z
			.string()
			.trim()
			.regex(/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/, "not a decimal"),
	])
	.transform((v) => (typeof v === "string" ? v : v.toString()));

const BooleanValue = z.union([
	z.boolean(),
	z.literal(0).transform(() => false),
	z.literal(1).transform(() => true),
	z.enum(["true", "false"]).transform((s) => s === "true"),
]);

const DateValue = z
	.union([z.date(), z.iso.date()])
	.transform((v) => (v instanceof Date ? v.toISOString().slice(0, 10) : v));

const TimeValue = z
	.union([
		z.date(),
		z
			.string()
			.regex(/^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d(\.\d{1,6})?)?$/, "not a time"),
	])
	.transform((v) => {
		if (typeof v === "string") {
			return v.length === 5 ? `${v}:00` : v;
		}
		const time = v.toISOString().slice(11, 19);
		const ms = v.getUTCMilliseconds();
		return ms === 0 ? time : `${time}.${String(ms).padStart(3, "0")}`;
	});

const TimestampValue = z
	.union([z.date(), z.number().finite(), z.string()])
	.transform((v) => new Date(v instanceof Date ? v.getTime() : v))
	.refine((d) => !isNaN(d.getTime()), "not a date-time");

const JSONValue = z.unknown().transform((v, ctx) => {
	if (typeof v === "string") {
		return v;
	}
	let text: string | undefined;
	try {
		text = JSON.stringify(v);
	} catch (error) {
		ctx.addIssue({
			code: "custom",
			message: error instanceof Error ? error.message : String(error),
		});
		return z.NEVER;
	}
	if (text === undefined) {
		ctx.addIssue({code: "custom", message: "value has no JSON representation"});
		return z.NEVER;
	}
	return text;
});

/**
 * Build a binder that converts non-null values through a schema.
 * null and undefined are always bound as null.
 */
function converting(type: string, schema: z.ZodType): Binder {
	return {
		bind(statement, position, value) {
			if (value === null || value === undefined) {
				statement.bind(position, null);
				return;
			}
			const result = schema.safeParse(value);
			if (!result.success) {
				throw new BindError(
					`Cannot bind ${describe(value)} as ${type} at parameter ${position}: ${result.error.issues[0]?.message ?? "invalid value"}`,
					{position, value},
					{cause: result.error},
				);
			}
			statement.bind(position, result.data);
		},
	};
}

function describe(value: unknown): string {
	if (value instanceof Date) {
		return isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
	}
	if (typeof value === "string") {
		return JSON.stringify(value);
	}
	if (typeof value === "object" && value !== null) {
		return value.constructor?.name ?? "object";
	}
	return String(value);
}

// ============================================================================
// Built-in Binders
// ============================================================================

const defaultBinder: Binder = {
	bind(statement, position, value) {
		statement.bind(position, value === undefined ? null : value);
	},
};

const stringBinder = converting("string", StringValue);
const integerBinder = converting("integer", IntegerValue);
const decimalBinder = converting("decimal", DecimalValue);
const booleanBinder = converting("boolean", BooleanValue);
const dateBinder = converting("date", DateValue);
const timeBinder = converting("time", TimeValue);
const timestampBinder = converting("timestamp", TimestampValue);
const jsonBinder = converting("json", JSONValue);

/**
 * The built-in binders.
 *
 * @example
 * Insert.into("events")
 *   .columns("id", "payload", "occurred_at")
 *   .values(1, {kind: "signup"}, "2024-03-01T10:00:00Z")
 *   .withBinder(Binders.jsonBinder(), "payload")
 *   .withBinder(Binders.timestampBinder(), "occurred_at")
 *   .build();
 */
export const Binders = {
	/**
	 * Binds the value as-is and lets the driver encode it.
	 * undefined is bound as null.
	 */
	defaultBinder(): Binder {
		return defaultBinder;
	},

	/**
	 * Binds strings, numbers, bigints and booleans as text; Dates as ISO-8601.
	 */
	stringBinder(): Binder {
		return stringBinder;
	},

	/**
	 * Binds integers, bigints and integer strings. Values within the safe
	 * integer range are bound as numbers, larger ones as bigints.
	 */
	integerBinder(): Binder {
		return integerBinder;
	},

	/**
	 * Binds numbers, bigints and decimal strings as decimal text, so no
	 * precision is lost on the way to NUMERIC columns.
	 */
	decimalBinder(): Binder {
		return decimalBinder;
	},

	/**
	 * Binds booleans, 0/1 and "true"/"false".
	 */
	booleanBinder(): Binder {
		return booleanBinder;
	},

	/**
	 * Binds a Date (its UTC calendar date) or a "YYYY-MM-DD" string
	 * as "YYYY-MM-DD".
	 */
	dateBinder(): Binder {
		return dateBinder;
	},

	/**
	 * Binds a Date (its UTC time of day) or an "HH:MM[:SS[.fff]]" string
	 * as "HH:MM:SS[.fff]".
	 */
	timeBinder(): Binder {
		return timeBinder;
	},

	/**
	 * Binds a Date, a date-time string or epoch milliseconds as a Date.
	 */
	timestampBinder(): Binder {
		return timestampBinder;
	},

	/**
	 * Binds JSON text. Strings are assumed to be JSON already.
	 */
	jsonBinder(): Binder {
		return jsonBinder;
	},
};

// ============================================================================
// Binder Configuration
// ============================================================================

/**
 * Chooses a binder for a parameter from the statement's metadata.
 */
export interface BinderConfiguration {
	/**
	 * @param metadata - null when the database doesn't describe parameters
	 * @param position - 1-based parameter position
	 */
	getBinder(metadata: ParameterMetadata | null, position: number): Binder;
}

const BINDERS_BY_TYPE: Partial<Record<ParameterType, Binder>> = {
	text: stringBinder,
	integer: integerBinder,
	decimal: decimalBinder,
	boolean: booleanBinder,
	date: dateBinder,
	time: timeBinder,
	timestamp: timestampBinder,
	timestamptz: timestampBinder,
	json: jsonBinder,
};

/**
 * Maps parameter types to the built-in binders. Types without a specific
 * binder, and statements without metadata, use the default binder.
 */
export class DefaultBinderConfiguration implements BinderConfiguration {
	static readonly INSTANCE = new DefaultBinderConfiguration();

	getBinder(metadata: ParameterMetadata | null, position: number): Binder {
		if (metadata === null) {
			return defaultBinder;
		}
		return BINDERS_BY_TYPE[metadata.typeAt(position)] ?? defaultBinder;
	}

	toString(): string {
		return "DefaultBinderConfiguration";
	}
}
