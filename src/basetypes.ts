import Ajv, { type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import {
	type Basetype,
	type BasetypeName,
	type CellValue,
	type Codec,
	type DatatypeFormat,
	type JsonValue,
	compileFormatRegex,
	describeValue,
	invalid,
	patternOf,
} from "./codec";
import { InvalidDescriptionError } from "./errors";
import { NUMERIC_BASETYPES } from "./numeric";
import { TEMPORAL_BASETYPES } from "./temporal";

// === string family ===

interface StringOptions {
	readonly example?: string;
	/** Maps the raw text onto the value space before anything else runs. */
	readonly normalize?: (text: string) => string;
	/** Lexical space of the type itself, on top of any format regex. */
	readonly lexical?: RegExp;
	readonly canonical?: (value: string) => string;
}

function asString(name: BasetypeName, value: CellValue): string {
	if (typeof value !== "string") {
		throw invalid(name, describeValue(value), "not a string");
	}
	return value;
}

function stringType(name: BasetypeName, options: StringOptions = {}): Basetype {
	return {
		name,
		family: "string",
		example: options.example ?? "x",
		ordered: false,
		derive(format): Codec {
			const regex = compileFormatRegex(name, format);
			return {
				parse(text) {
					const value = options.normalize ? options.normalize(text) : text;
					if (options.lexical && !options.lexical.test(value)) {
						throw invalid(name, text);
					}
					if (regex && !regex.test(value)) {
						throw invalid(name, text, `does not match ${regex.source}`);
					}
					return value;
				},
				format(value) {
					const s = asString(name, value);
					return options.canonical ? options.canonical(s) : s;
				},
				length: (value) => [...asString(name, value)].length,
			};
		},
	};
}

function normalizeSpace(text: string): string {
	return text.replace(/[\r\n\t]/g, " ").trim();
}

/**
 * Lowercases scheme and host and uppercases percent-escapes, so equivalent URIs render
 * the same.
 */
export function canonicalUri(uri: string): string {
	const escaped = uri.replace(/%[0-9a-fA-F]{2}/g, (e) => e.toUpperCase());
	const m = /^([a-zA-Z][a-zA-Z0-9+.-]*:)(\/\/[^/?#]*)?(.*)$/s.exec(escaped);
	if (!m) {
		return escaped;
	}
	const authority = m[2] ?? "";
	const at = authority.lastIndexOf("@");
	const host = at >= 0 ? authority.slice(0, at + 1) + authority.slice(at + 1).toLowerCase() : authority.toLowerCase();
	return m[1].toLowerCase() + host + m[3];
}

const NAME_START = "A-Z_a-z\\u00C0-\\u00D6\\u00D8-\\u00F6\\u00F8-\\u02FF\\u0370-\\u037D\\u037F-\\u1FFF\\u200C-\\u200D\\u2070-\\u218F\\u2C00-\\u2FEF\\u3001-\\uD7FF\\uF900-\\uFDCF\\uFDF0-\\uFFFD";
const NAME_CHAR = `${NAME_START}\\-.0-9\\u00B7\\u0300-\\u036F\\u203F-\\u2040`;

const STRING_BASETYPES = {
	string: stringType("string"),
	anyURI: stringType("anyURI", { example: "http://example.com", canonical: canonicalUri }),
	NMTOKEN: stringType("NMTOKEN", { lexical: /^[\w.:-]*$/ }),
	normalizedString: stringType("normalizedString", { normalize: normalizeSpace }),
	token: stringType("token", { normalize: (text) => normalizeSpace(text).replace(/ {2,}/g, " ") }),
	language: stringType("language", { example: "en", lexical: /^[a-zA-Z]{1,8}(?:-[a-zA-Z0-9]{1,8})*$/ }),
	Name: stringType("Name", { lexical: new RegExp(`^[:${NAME_START}][:${NAME_CHAR}]*$`) }),
	NCName: stringType("NCName", { lexical: new RegExp(`^[${NAME_START}][${NAME_CHAR}]*$`) }),
	QName: stringType("QName"),
	gDay: stringType("gDay"),
	gMonth: stringType("gMonth"),
	gMonthDay: stringType("gMonthDay"),
	gYear: stringType("gYear"),
	gYearMonth: stringType("gYearMonth"),
	xml: stringType("xml"),
	html: stringType("html"),
} satisfies Partial<Record<BasetypeName, Basetype>>;

const anyType: Basetype = {
	name: "any",
	family: "any",
	example: "x",
	ordered: false,
	derive(): Codec {
		return {
			parse: (text) => text,
			format: (value) => describeValue(value),
		};
	},
};

// === boolean ===

function booleanTokens(format: DatatypeFormat | undefined): { true: readonly string[]; false: readonly string[] } {
	const pattern = patternOf("boolean", format);
	if (pattern === undefined) {
		return { true: ["true", "1"], false: ["false", "0"] };
	}
	const parts = pattern.split("|");
	if (parts.length !== 2 || !parts[0] || !parts[1]) {
		throw new InvalidDescriptionError(`Invalid boolean format ${JSON.stringify(pattern)}: expected "true|false"`);
	}
	return { true: [parts[0]], false: [parts[1]] };
}

const booleanType: Basetype = {
	name: "boolean",
	family: "boolean",
	example: "false",
	ordered: false,
	derive(format): Codec {
		const tokens = booleanTokens(format);
		return {
			parse(text) {
				if (tokens.true.includes(text)) {
					return true;
				}
				if (tokens.false.includes(text)) {
					return false;
				}
				throw invalid("boolean", text);
			},
			format(value) {
				if (typeof value !== "boolean") {
					throw invalid("boolean", describeValue(value), "not a boolean");
				}
				return value ? tokens.true[0] : tokens.false[0];
			},
		};
	},
};

// === binary ===

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const HEX = /^(?:[0-9a-fA-F]{2})*$/;

function asBytes(name: BasetypeName, value: CellValue): Uint8Array {
	if (!(value instanceof Uint8Array)) {
		throw invalid(name, describeValue(value), "not binary data");
	}
	return value;
}

function binaryType(name: BasetypeName, encoding: "base64" | "hex"): Basetype {
	const lexical = encoding === "base64" ? BASE64 : HEX;
	return {
		name,
		family: "binary",
		example: encoding === "base64" ? "YWJj" : "AB",
		ordered: false,
		derive(format): Codec {
			const regex = compileFormatRegex(name, format);
			return {
				parse(text) {
					if (!lexical.test(text)) {
						throw invalid(name, text.slice(0, 10), `invalid ${encoding} encoding`);
					}
					if (regex && !regex.test(text)) {
						throw invalid(name, text, `does not match ${regex.source}`);
					}
					return new Uint8Array(Buffer.from(text, encoding));
				},
				format(value) {
					const text = Buffer.from(asBytes(name, value)).toString(encoding);
					return encoding === "hex" ? text.toUpperCase() : text;
				},
				length: (value) => asBytes(name, value).length,
			};
		},
	};
}

// === json ===

const ajv = new Ajv({ strict: false, allErrors: true });
addFormats(ajv);

/**
 * A json `format` that is itself a JSON object is a JSON Schema the values must satisfy;
 * any other format is a regex over the raw text, as for strings.
 */
function jsonValidator(format: DatatypeFormat | undefined): ((value: JsonValue) => string | undefined) | undefined {
	const pattern = patternOf("json", format);
	if (pattern === undefined) {
		return undefined;
	}
	let schema: unknown;
	try {
		schema = JSON.parse(pattern);
	} catch {
		// regex format
		return undefined;
	}
	if (typeof schema !== "object" || schema === null || Array.isArray(schema)) {
		return undefined;
	}
	let validate: ValidateFunction;
	try {
		validate = ajv.compile(schema);
	} catch (e) {
		throw new InvalidDescriptionError(`Invalid JSON schema as json format: ${e instanceof Error ? e.message : String(e)}`);
	}
	return (value) => (validate(value) ? undefined : ajv.errorsText(validate.errors));
}

const jsonType: Basetype = {
	name: "json",
	family: "json",
	example: '{"a":[1,2]}',
	ordered: false,
	derive(format): Codec {
		const validate = jsonValidator(format);
		const regex = validate ? undefined : compileFormatRegex("json", format);
		return {
			parse(text) {
				if (regex && !regex.test(text)) {
					throw invalid("json", text, `does not match ${regex.source}`);
				}
				let value: JsonValue;
				try {
					value = JSON.parse(text);
				} catch (e) {
					throw invalid("json", text, e instanceof Error ? e.message : undefined);
				}
				const problem = validate?.(value);
				if (problem !== undefined) {
					throw invalid("json", text, problem);
				}
				return value;
			},
			format: (value) => JSON.stringify(value),
		};
	},
};

// === registry ===

export const BASETYPES: Readonly<Record<BasetypeName, Basetype>> = {
	any: anyType,
	...STRING_BASETYPES,
	json: jsonType,
	boolean: booleanType,
	base64Binary: binaryType("base64Binary", "base64"),
	binary: binaryType("binary", "base64"),
	hexBinary: binaryType("hexBinary", "hex"),
	...NUMERIC_BASETYPES,
	...TEMPORAL_BASETYPES,
};

export function getBasetype(name: BasetypeName): Basetype {
	return BASETYPES[name];
}
