import * as fs from "fs";
import Papa from "papaparse";
import type { JsonValue } from "./codec";
import {
	type Mapping,
	isMapping,
	optionalBoolean,
	optionalInteger,
	optionalStringList,
	partitionProperties,
} from "./description";
import { InvalidDescriptionError } from "./errors";
import { createComponentLogger } from "./logger";

const log = createComponentLogger("dialect");

export type TrimMode = "true" | "false" | "start" | "end";

const TRIM_MODES: readonly string[] = ["true", "false", "start", "end"];

export interface DialectOptions {
	readonly encoding?: string;
	readonly lineTerminators?: readonly string[];
	/** `null` turns quoting off. */
	readonly quoteChar?: string | null;
	readonly doubleQuote?: boolean;
	readonly skipRows?: number;
	/** `null` turns comment detection off. */
	readonly commentPrefix?: string | null;
	readonly header?: boolean;
	readonly headerRowCount?: number;
	readonly delimiter?: string;
	readonly skipColumns?: number;
	readonly skipBlankRows?: boolean;
	readonly skipInitialSpace?: boolean;
	readonly trim?: TrimMode;
}

const DEFAULTS: Required<DialectOptions> = {
	encoding: "utf-8",
	lineTerminators: ["\r\n", "\n"],
	quoteChar: '"',
	doubleQuote: true,
	skipRows: 0,
	commentPrefix: "#",
	header: true,
	headerRowCount: 1,
	delimiter: ",",
	skipColumns: 0,
	skipBlankRows: false,
	skipInitialSpace: false,
	trim: "false",
};

const DIALECT_FIELDS: ReadonlySet<string> = new Set(Object.keys(DEFAULTS));

/**
 * How a delimited text file is laid out.
 */
export class Dialect implements Required<DialectOptions> {
	readonly encoding: string;
	readonly lineTerminators: readonly string[];
	readonly quoteChar: string | null;
	readonly doubleQuote: boolean;
	readonly skipRows: number;
	readonly commentPrefix: string | null;
	readonly header: boolean;
	readonly headerRowCount: number;
	readonly delimiter: string;
	readonly skipColumns: number;
	readonly skipBlankRows: boolean;
	readonly skipInitialSpace: boolean;
	readonly trim: TrimMode;

	constructor(options: DialectOptions = {}) {
		const o = { ...DEFAULTS, ...options };
		this.encoding = o.encoding;
		this.lineTerminators = o.lineTerminators;
		this.quoteChar = o.quoteChar;
		this.doubleQuote = o.doubleQuote;
		this.skipRows = o.skipRows;
		this.commentPrefix = o.commentPrefix;
		this.header = o.header;
		this.headerRowCount = o.headerRowCount;
		this.delimiter = o.delimiter;
		this.skipColumns = o.skipColumns;
		this.skipBlankRows = o.skipBlankRows;
		this.skipInitialSpace = o.skipInitialSpace;
		this.trim = o.trim;
		if (this.delimiter === "") {
			throw new InvalidDescriptionError("dialect delimiter must not be empty");
		}
	}

	static fromValue(value: JsonValue | Dialect | undefined): Dialect {
		if (value === undefined) {
			return new Dialect();
		}
		if (value instanceof Dialect) {
			return value;
		}
		if (!isMapping(value)) {
			throw new InvalidDescriptionError(`Invalid dialect description: ${JSON.stringify(value)}`);
		}
		const { known } = partitionProperties(value, DIALECT_FIELDS, "dialect");
		return new Dialect({
			encoding: nullableString(known, "encoding") ?? undefined,
			lineTerminators: optionalStringList(known, "lineTerminators", "dialect"),
			quoteChar: nullableString(known, "quoteChar"),
			doubleQuote: optionalBoolean(known, "doubleQuote", "dialect"),
			skipRows: optionalInteger(known, "skipRows", "dialect"),
			commentPrefix: nullableString(known, "commentPrefix"),
			header: optionalBoolean(known, "header", "dialect"),
			headerRowCount: optionalInteger(known, "headerRowCount", "dialect"),
			delimiter: nullableString(known, "delimiter") ?? undefined,
			skipColumns: optionalInteger(known, "skipColumns", "dialect"),
			skipBlankRows: optionalBoolean(known, "skipBlankRows", "dialect"),
			skipInitialSpace: optionalBoolean(known, "skipInitialSpace", "dialect"),
			trim: trimMode(known.trim),
		});
	}

	/** The Node encoding to decode files with. Unknown names fall back to utf-8. */
	get bufferEncoding(): BufferEncoding {
		const name = this.encoding === "UTF-8-BOM" ? "utf-8" : this.encoding;
		if (Buffer.isEncoding(name)) {
			return name;
		}
		log.warn(`Unknown encoding ${name}, reading as utf-8`);
		return "utf-8";
	}

	trimCell(cell: string): string {
		switch (this.trim) {
			case "true":
				return cell.trim();
			case "start":
				return cell.trimStart();
			case "end":
				return cell.trimEnd();
			case "false":
				return cell;
		}
	}

	/** Only the properties that differ from the defaults. */
	toJSON(): Mapping {
		const result: Record<string, JsonValue> = {};
		const set = (key: keyof DialectOptions, value: JsonValue, fallback: JsonValue) => {
			if (JSON.stringify(value) !== JSON.stringify(fallback)) {
				result[key] = value;
			}
		};
		set("encoding", this.encoding, DEFAULTS.encoding);
		set("lineTerminators", [...this.lineTerminators], [...DEFAULTS.lineTerminators]);
		set("quoteChar", this.quoteChar, DEFAULTS.quoteChar);
		set("doubleQuote", this.doubleQuote, DEFAULTS.doubleQuote);
		set("skipRows", this.skipRows, DEFAULTS.skipRows);
		set("commentPrefix", this.commentPrefix, DEFAULTS.commentPrefix);
		set("header", this.header, DEFAULTS.header);
		set("headerRowCount", this.headerRowCount, DEFAULTS.headerRowCount);
		set("delimiter", this.delimiter, DEFAULTS.delimiter);
		set("skipColumns", this.skipColumns, DEFAULTS.skipColumns);
		set("skipBlankRows", this.skipBlankRows, DEFAULTS.skipBlankRows);
		set("skipInitialSpace", this.skipInitialSpace, DEFAULTS.skipInitialSpace);
		set("trim", this.trim, DEFAULTS.trim);
		return result;
	}
}

function nullableString(known: Mapping, key: string): string | null | undefined {
	const value = known[key];
	if (value === undefined || value === null || typeof value === "string") {
		return value;
	}
	throw new InvalidDescriptionError(`dialect property ${key} must be a string, got ${JSON.stringify(value)}`);
}

function trimMode(value: JsonValue | undefined): TrimMode | undefined {
	if (value === undefined) {
		return undefined;
	}
	const mode = typeof value === "boolean" ? String(value) : value;
	if (typeof mode !== "string" || !isTrimMode(mode)) {
		throw new InvalidDescriptionError(`dialect trim must be one of ${TRIM_MODES.join(", ")}, got ${JSON.stringify(value)}`);
	}
	return mode;
}

function isTrimMode(value: string): value is TrimMode {
	return TRIM_MODES.includes(value);
}

// === Raw rows ===

export interface RawRow {
	/** 1-based record number in the source, counting skipped and header records. */
	readonly line: number;
	readonly cells: readonly string[];
}

export interface Comment {
	readonly line: number;
	readonly text: string;
}

export interface RawRowStream {
	readonly header: readonly string[] | undefined;
	readonly rows: Iterable<RawRow>;
	readonly comments: readonly Comment[];
}

/**
 * Where a table's cells come from. Each call to `open` starts from the beginning.
 */
export interface RowSource {
	readonly name: string;
	open(dialect: Dialect): RawRowStream;
}

function splitRecords(text: string, dialect: Dialect): string[][] {
	const terminators = dialect.lineTerminators;
	let body = text.startsWith("\uFEFF") ? text.slice(1) : text;
	const trailing = terminators.find((t) => body.endsWith(t));
	if (trailing) {
		body = body.slice(0, -trailing.length);
	}
	if (body === "") {
		return [];
	}

	if (dialect.quoteChar === null) {
		const lines = terminators.length === 1 ? body.split(terminators[0]) : body.split(/\r?\n/);
		return lines.map((line) => line.split(dialect.delimiter));
	}

	const result = Papa.parse<string[]>(body, {
		delimiter: dialect.delimiter,
		quoteChar: dialect.quoteChar,
		escapeChar: dialect.doubleQuote ? dialect.quoteChar : "\\",
		newline: terminators.length === 1 ? terminators[0] : undefined,
		header: false,
		skipEmptyLines: false,
	});
	for (const error of result.errors) {
		log.warn(`${error.message} (record ${typeof error.row === "number" ? error.row + 1 : "?"})`);
	}
	return result.data;
}

/**
 * Applies the dialect's record-level rules (skipped rows, comments, blank rows, trimming,
 * skipped columns and header rows) to parsed records.
 */
export function applyDialect(records: readonly string[][], dialect: Dialect): RawRowStream {
	const comments: Comment[] = [];
	const rows: RawRow[] = [];
	const prefix = dialect.commentPrefix;
	for (const [index, record] of records.entries()) {
		const isComment = prefix !== null && prefix !== "" && record.length > 0 && record[0].startsWith(prefix);
		if (isComment) {
			comments.push({ line: index + 1, text: record.join(dialect.delimiter).slice(prefix.length).trim() });
			continue;
		}
		const blank = record.every((cell) => cell === "");
		if (index < dialect.skipRows || (blank && dialect.skipBlankRows)) {
			continue;
		}
		const cells = record
			.map((cell) => (dialect.skipInitialSpace ? cell.replace(/^ +/, "") : cell))
			.map((cell) => dialect.trimCell(cell))
			.slice(dialect.skipColumns);
		rows.push({ line: index + 1, cells });
	}

	const headerRows = dialect.header ? Math.max(dialect.headerRowCount, 1) : 0;
	return {
		header: headerRows > 0 ? rows[0]?.cells : undefined,
		rows: rows.slice(headerRows),
		comments,
	};
}

export function textSource(name: string, text: string): RowSource {
	return {
		name,
		open: (dialect) => applyDialect(splitRecords(text, dialect), dialect),
	};
}

export function fileSource(path: string): RowSource {
	return {
		name: path,
		open(dialect) {
			const text = fs.readFileSync(path).toString(dialect.bufferEncoding);
			return applyDialect(splitRecords(text, dialect), dialect);
		},
	};
}

/**
 * Renders rows of already formatted cells as delimited text.
 */
export function formatRecords(rows: readonly (readonly string[])[], dialect: Dialect): string {
	if (rows.length === 0) {
		return "";
	}
	const newline = dialect.lineTerminators[0] ?? "\r\n";
	const text = Papa.unparse(
		rows.map((row) => [...row]),
		{
			delimiter: dialect.delimiter,
			quoteChar: dialect.quoteChar ?? '"',
			escapeChar: dialect.doubleQuote ? (dialect.quoteChar ?? '"') : "\\",
			newline,
		}
	);
	return text + newline;
}
