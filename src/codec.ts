import type Decimal from "decimal.js";
import type { DateTimeValue } from "./dateTimeValue";
import type { Duration } from "./duration";
import { InvalidDescriptionError, InvalidLexicalValueError } from "./errors";

// === Values ===

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Everything a basetype can decode a cell into.
 *
 * - string family, `any`: string
 * - boolean: boolean
 * - binary: Uint8Array
 * - decimal: Decimal; integer subtypes: bigint; float/double/number: number
 * - date/time: DateTimeValue; durations: Duration
 * - json: JsonValue
 */
export type CellValue = string | boolean | number | bigint | Decimal | Uint8Array | DateTimeValue | Duration | JsonValue;

// === Basetypes ===

export const BASETYPE_NAMES = [
	"any",
	"string",
	"anyURI",
	"NMTOKEN",
	"normalizedString",
	"token",
	"language",
	"Name",
	"NCName",
	"QName",
	"gDay",
	"gMonth",
	"gMonthDay",
	"gYear",
	"gYearMonth",
	"xml",
	"html",
	"json",
	"boolean",
	"base64Binary",
	"binary",
	"hexBinary",
	"decimal",
	"integer",
	"int",
	"long",
	"short",
	"byte",
	"unsignedLong",
	"unsignedInt",
	"unsignedShort",
	"unsignedByte",
	"nonNegativeInteger",
	"positiveInteger",
	"nonPositiveInteger",
	"negativeInteger",
	"float",
	"double",
	"number",
	"date",
	"datetime",
	"dateTime",
	"dateTimeStamp",
	"time",
	"duration",
	"dayTimeDuration",
	"yearMonthDuration",
] as const;

export type BasetypeName = (typeof BASETYPE_NAMES)[number];

export type BasetypeFamily = "any" | "string" | "boolean" | "binary" | "numeric" | "temporal" | "duration" | "json";

/**
 * The `format` annotation of a datatype: a pattern string, or an object carrying a pattern
 * and the separator characters of a numeric format.
 */
export type DatatypeFormat = string | FormatObject;

export interface FormatObject {
	readonly pattern?: string;
	readonly decimalChar?: string;
	readonly groupChar?: string;
}

/**
 * A basetype bound to one datatype's format. Built once per datatype, so nothing here
 * re-reads the format spec per cell.
 */
export interface Codec {
	parse(text: string): CellValue;
	format(value: CellValue): string;
	/** Ordering used for bound checks. Only ordered families provide one. */
	compare?(a: CellValue, b: CellValue): number;
	/** Length in characters (strings) or bytes (binary). */
	length?(value: CellValue): number;
}

export interface Basetype {
	readonly name: BasetypeName;
	readonly family: BasetypeFamily;
	/** A literal that survives parse then format unchanged, unless documented otherwise. */
	readonly example: string;
	/** Whether bound constraints (minimum, maxExclusive, ...) apply. */
	readonly ordered: boolean;
	derive(format: DatatypeFormat | undefined): Codec;
}

// === Helpers ===

const NAMES: readonly string[] = BASETYPE_NAMES;

export function isBasetypeName(name: string): name is BasetypeName {
	return NAMES.includes(name);
}

export function invalid(name: BasetypeName, text: string, reason?: string): InvalidLexicalValueError {
	return new InvalidLexicalValueError(name, text, reason);
}

/**
 * The pattern part of a format, whichever shape it was given in.
 */
export function patternOf(name: BasetypeName, format: DatatypeFormat | undefined): string | undefined {
	if (format === undefined) {
		return undefined;
	}
	if (typeof format === "string") {
		return format;
	}
	if (format.decimalChar !== undefined || format.groupChar !== undefined) {
		throw new InvalidDescriptionError(`${name} does not take decimalChar or groupChar in its format`);
	}
	return format.pattern;
}

/**
 * Compile a regex given as `format`, anchored at both ends.
 */
export function compileFormatRegex(name: BasetypeName, format: DatatypeFormat | undefined): RegExp | undefined {
	const pattern = patternOf(name, format);
	if (pattern === undefined) {
		return undefined;
	}
	try {
		return new RegExp(`^(?:${pattern})$`, "u");
	} catch (e) {
		throw new InvalidDescriptionError(
			`Invalid regex pattern as ${name} format: ${pattern} (${e instanceof Error ? e.message : String(e)})`
		);
	}
}

export function isJsonValue(value: unknown): value is JsonValue {
	if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
		return true;
	}
	if (Array.isArray(value)) {
		return value.every(isJsonValue);
	}
	if (typeof value === "object" && Object.getPrototypeOf(value) === Object.prototype) {
		return Object.values(value).every(isJsonValue);
	}
	return false;
}

export function asJsonList(items: readonly unknown[]): JsonValue[] | undefined {
	const result: JsonValue[] = [];
	for (const item of items) {
		if (!isJsonValue(item)) {
			return undefined;
		}
		result.push(item);
	}
	return result;
}

export function describeValue(value: unknown): string {
	if (typeof value === "string") {
		return value;
	}
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (value === null || value === undefined) {
		return String(value);
	}
	if (typeof value === "object" && !Array.isArray(value) && value.constructor !== Object) {
		return String(value);
	}
	return JSON.stringify(value);
}
