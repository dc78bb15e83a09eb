import Decimal from "decimal.js";
import {
	type Basetype,
	type BasetypeName,
	type CellValue,
	type Codec,
	type DatatypeFormat,
	type FormatObject,
	describeValue,
	invalid,
} from "./codec";
import { InvalidDescriptionError } from "./errors";
import { NumberPattern } from "./numberPattern";

/**
 * A numeric `format`, resolved once per datatype.
 *
 * `groupChar` and `decimalChar` default to `,` and `.` when the pattern uses them.
 */
interface NumberFormat {
	readonly pattern: NumberPattern | undefined;
	readonly groupChar: string | undefined;
	readonly decimalChar: string | undefined;
}

const SPECIALS: ReadonlyMap<string, number> = new Map([
	["INF", Infinity],
	["-INF", -Infinity],
	["NaN", NaN],
]);

const DECIMAL = /^[+-]?(?:[0-9]+(?:\.[0-9]*)?|\.[0-9]+)$/;
const FLOAT = /^[+-]?(?:[0-9]+(?:\.[0-9]*)?|\.[0-9]+)(?:[eE][+-]?[0-9]+)?$/;

function resolveFormat(name: BasetypeName, format: DatatypeFormat | undefined): NumberFormat {
	if (format === undefined) {
		return { pattern: undefined, groupChar: undefined, decimalChar: undefined };
	}
	const spec: FormatObject = typeof format === "string" ? { pattern: format } : format;
	const { pattern, groupChar, decimalChar } = spec;
	if (groupChar !== undefined && decimalChar !== undefined && groupChar === decimalChar) {
		throw new InvalidDescriptionError(`${name} format uses ${JSON.stringify(groupChar)} as both groupChar and decimalChar`);
	}
	return {
		pattern: pattern === undefined ? undefined : new NumberPattern(pattern),
		groupChar: groupChar ?? (pattern?.includes(",") ? "," : undefined),
		decimalChar: decimalChar ?? (pattern?.includes(".") ? "." : undefined),
	};
}

function translate(text: string, mapping: ReadonlyMap<string, string>): string {
	return [...text].map((c) => mapping.get(c) ?? c).join("");
}

/** Maps the datatype's separators onto the `,`/`.` that number patterns are written with. */
function normalize(text: string, fmt: NumberFormat): string {
	const mapping = new Map<string, string>();
	if (fmt.groupChar) mapping.set(fmt.groupChar, ",");
	if (fmt.decimalChar) mapping.set(fmt.decimalChar, ".");
	return translate(text, mapping);
}

function localize(text: string, fmt: NumberFormat): string {
	const mapping = new Map<string, string>();
	if (fmt.groupChar) mapping.set(",", fmt.groupChar);
	if (fmt.decimalChar) mapping.set(".", fmt.decimalChar);
	return translate(text, mapping);
}

/**
 * Strips group separators, swaps in `.` for the decimal separator and drops a percent or
 * permille sign. Returns the plain numeral and the factor the sign stood for.
 */
function plain(text: string, fmt: NumberFormat): { numeral: string; factor: number } {
	let numeral = text;
	if (fmt.groupChar) {
		numeral = numeral.replaceAll(fmt.groupChar, "");
	}
	if (fmt.decimalChar && fmt.decimalChar !== ".") {
		numeral = numeral.replaceAll(fmt.decimalChar, ".");
	}
	if (numeral.includes("%")) {
		return { numeral: numeral.replaceAll("%", ""), factor: 0.01 };
	}
	if (numeral.includes("‰")) {
		return { numeral: numeral.replaceAll("‰", ""), factor: 0.001 };
	}
	return { numeral, factor: 1 };
}

function checkPattern(name: BasetypeName, text: string, fmt: NumberFormat): void {
	if (fmt.pattern && !fmt.pattern.isValid(normalize(text, fmt))) {
		throw invalid(name, text, `does not match pattern ${fmt.pattern.pattern}`);
	}
}

function groupThousands(numeral: string): string {
	const m = /^(-?)([0-9]+)(.*)$/.exec(numeral);
	if (!m) {
		return numeral;
	}
	return m[1] + m[2].replace(/\B(?=(?:[0-9]{3})+$)/g, ",") + m[3];
}

export function toDecimal(name: BasetypeName, value: CellValue): Decimal {
	if (value instanceof Decimal) {
		return value;
	}
	if (typeof value === "bigint") {
		return new Decimal(value.toString());
	}
	if (typeof value === "number") {
		return new Decimal(value);
	}
	throw invalid(name, describeValue(value), "not a number");
}

function parseDecimal(name: BasetypeName, text: string, fmt: NumberFormat): Decimal {
	if (/e/i.test(text)) {
		throw invalid(name, text, "scientific notation is not allowed");
	}
	const groupChar = fmt.groupChar ?? ",";
	if (text.includes(groupChar + groupChar)) {
		throw invalid(name, text, "repeated group separator");
	}
	checkPattern(name, text, fmt);
	const special = SPECIALS.get(text);
	if (special !== undefined) {
		return new Decimal(special);
	}
	const { numeral, factor } = plain(text, fmt);
	if (!DECIMAL.test(numeral)) {
		throw invalid(name, text);
	}
	const value = new Decimal(numeral);
	return factor === 1 ? value : value.times(factor);
}

function formatDecimal(value: Decimal, fmt: NumberFormat): string {
	if (value.isNaN()) {
		return "NaN";
	}
	if (!value.isFinite()) {
		return value.isNegative() ? "-INF" : "INF";
	}
	if (fmt.pattern) {
		return localize(fmt.pattern.format(value), fmt);
	}
	const numeral = value.toFixed();
	return localize(fmt.groupChar ? groupThousands(numeral) : numeral, fmt);
}

function compareNumbers(name: BasetypeName) {
	return (a: CellValue, b: CellValue): number => toDecimal(name, a).comparedTo(toDecimal(name, b));
}

// === decimal ===

function decimal(): Basetype {
	return {
		name: "decimal",
		family: "numeric",
		example: "5",
		ordered: true,
		derive(format): Codec {
			const fmt = resolveFormat("decimal", format);
			return {
				parse: (text) => parseDecimal("decimal", text, fmt),
				format: (value) => formatDecimal(toDecimal("decimal", value), fmt),
				compare: compareNumbers("decimal"),
			};
		},
	};
}

// === integers ===

function integer(name: BasetypeName, example: string, min?: bigint, max?: bigint): Basetype {
	const describeRange = (): string =>
		min === undefined ? `at most ${max}` : max === undefined ? `at least ${min}` : `between ${min} and ${max}`;

	return {
		name,
		family: "numeric",
		example,
		ordered: true,
		derive(format): Codec {
			const fmt = resolveFormat(name, format);
			return {
				parse(text) {
					const value = parseDecimal(name, text, fmt);
					if (!value.isFinite() || !value.isInteger()) {
						throw invalid(name, text, "not an integer");
					}
					const n = BigInt(value.toFixed(0));
					if ((min !== undefined && n < min) || (max !== undefined && n > max)) {
						throw invalid(name, text, `must be an integer ${describeRange()}`);
					}
					return n;
				},
				format: (value) => formatDecimal(toDecimal(name, value), fmt),
				compare: compareNumbers(name),
			};
		},
	};
}

// === floating point ===

function float(name: BasetypeName): Basetype {
	return {
		name,
		family: "numeric",
		example: "5.3",
		ordered: true,
		derive(format): Codec {
			const fmt = resolveFormat(name, format);
			return {
				parse(text) {
					checkPattern(name, text, fmt);
					const special = SPECIALS.get(text);
					if (special !== undefined) {
						return special;
					}
					const { numeral, factor } = plain(text, fmt);
					if (!FLOAT.test(numeral)) {
						throw invalid(name, text);
					}
					return Number(numeral) * factor;
				},
				format(value) {
					const n = typeof value === "number" ? value : toDecimal(name, value).toNumber();
					if (!Number.isFinite(n)) {
						return Number.isNaN(n) ? "NaN" : n < 0 ? "-INF" : "INF";
					}
					return fmt.pattern ? localize(fmt.pattern.format(new Decimal(n)), fmt) : localize(String(n), fmt);
				},
				compare: compareNumbers(name),
			};
		},
	};
}

export const NUMERIC_BASETYPES = {
	decimal: decimal(),
	integer: integer("integer", "5"),
	int: integer("int", "5"),
	long: integer("long", "5", -(2n ** 63n), 2n ** 63n - 1n),
	short: integer("short", "5", -32768n, 32767n),
	byte: integer("byte", "5", -128n, 127n),
	unsignedLong: integer("unsignedLong", "5", 0n, 2n ** 64n - 1n),
	unsignedInt: integer("unsignedInt", "5", 0n, 4294967295n),
	unsignedShort: integer("unsignedShort", "5", 0n, 65535n),
	unsignedByte: integer("unsignedByte", "5", 0n, 255n),
	nonNegativeInteger: integer("nonNegativeInteger", "5", 0n),
	positiveInteger: integer("positiveInteger", "5", 1n),
	nonPositiveInteger: integer("nonPositiveInteger", "-5", undefined, 0n),
	negativeInteger: integer("negativeInteger", "-5", undefined, -1n),
	float: float("float"),
	double: float("double"),
	number: float("number"),
} satisfies Partial<Record<BasetypeName, Basetype>>;
