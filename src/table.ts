import { type JsonValue, describeValue } from "./codec";
import type { Column, ColumnValue } from "./column";
import { Dialect, type RowSource, fileSource, formatRecords } from "./dialect";
import {
	Link,
	type Mapping,
	type TemplateValues,
	type UriTemplate,
	isMapping,
	optionalBoolean,
	optionalList,
	optionalString,
	partitionProperties,
} from "./description";
import {
	CellError,
	InvalidDescriptionError,
	MissingRequiredColumnError,
	MissingRequiredValueError,
	PrimaryKeyViolationError,
	logOrRaise,
} from "./errors";
import {
	type DescriptionExtras,
	INHERITED_FIELDS,
	InheritableDescription,
	type InheritedProperties,
	readInheritedProperties,
} from "./inheritance";
import { type LogSink, createComponentLogger, silentLog } from "./logger";
import { Schema } from "./schema";

const log = createComponentLogger("table");

/** A decoded row, keyed by column header. Cells without a column keep their raw text. */
export type Row = Record<string, ColumnValue>;

export interface RowWithMetadata {
	readonly source: string;
	readonly line: number;
	readonly row: Row;
}

export interface ReadOptions {
	/** Report row violations here and skip the row instead of throwing. */
	readonly log?: LogSink;
}

export type TableDirection = "rtl" | "ltr" | "auto";

const TABLE_DIRECTIONS: readonly string[] = ["rtl", "ltr", "auto"];

/**
 * What a table needs from the group it belongs to.
 */
export interface TableContainer extends InheritableDescription {
	readonly dialect: Dialect | undefined;
	sourceFor(url: Link): RowSource;
}

export const TABLE_FIELDS: ReadonlySet<string> = new Set([
	"url",
	"tableSchema",
	"dialect",
	"notes",
	"suppressOutput",
	"tableDirection",
	...INHERITED_FIELDS,
]);

export interface TableInit extends DescriptionExtras {
	readonly url: Link;
	readonly tableSchema?: JsonValue;
	readonly dialect?: Dialect;
	readonly notes?: readonly JsonValue[];
	readonly suppressOutput?: boolean;
	readonly tableDirection?: TableDirection;
	readonly inherited?: Partial<InheritedProperties>;
	/** Overrides where the rows are read from. */
	readonly source?: RowSource;
}

export function readTableDirection(known: Mapping, entity: string): TableDirection | undefined {
	const value = optionalString(known, "tableDirection", entity);
	if (value !== undefined && !isTableDirection(value)) {
		throw new InvalidDescriptionError(`${entity} tableDirection must be one of ${TABLE_DIRECTIONS.join(", ")}`);
	}
	return value;
}

function isTableDirection(value: string): value is TableDirection {
	return TABLE_DIRECTIONS.includes(value);
}

/**
 * Identity of a key tuple, for set membership. Values that print the same are the same key;
 * null never equals a string and non-finite floats get their own form.
 */
export function rowKey(values: readonly (ColumnValue | undefined)[]): string {
	return JSON.stringify(values.map(keyPart));
}

function keyPart(value: ColumnValue | undefined): string | null | [string] {
	if (value === null || value === undefined) {
		return null;
	}
	if (typeof value === "number" && !Number.isFinite(value)) {
		return [String(value)];
	}
	return describeValue(value);
}

/** A key tuple the way error messages show it. */
export function displayKey(values: readonly (ColumnValue | undefined)[]): string {
	const parts = values.map((value) => describeValue(value));
	return parts.length === 1 ? parts[0] : `(${parts.join(", ")})`;
}

function templateValues(row: Row): TemplateValues {
	const values: Record<string, string | string[] | undefined> = {};
	for (const [key, value] of Object.entries(row)) {
		if (value === null) {
			values[key] = undefined;
		} else if (Array.isArray(value)) {
			values[key] = value.filter((item) => item !== null).map((item) => describeValue(item));
		} else {
			values[key] = describeValue(value);
		}
	}
	return values;
}

interface HeaderCell {
	readonly index: number;
	readonly key: string;
	readonly column: Column | undefined;
}

export class Table extends InheritableDescription {
	readonly url: Link;
	readonly tableSchema: Schema;
	readonly notes: readonly JsonValue[];
	readonly suppressOutput: boolean;
	readonly tableDirection: TableDirection;
	private readonly ownDialect: Dialect | undefined;
	private readonly ownSource: RowSource | undefined;

	constructor(
		private readonly group: TableContainer | undefined,
		init: TableInit
	) {
		super(group, init.inherited ?? {}, init);
		this.url = init.url;
		this.ownDialect = init.dialect;
		this.ownSource = init.source;
		this.notes = init.notes ?? [];
		this.suppressOutput = init.suppressOutput ?? false;
		this.tableDirection = init.tableDirection ?? "auto";
		this.tableSchema = Schema.fromValue(init.tableSchema, this);
	}

	static fromValue(value: JsonValue, group?: TableContainer, source?: RowSource): Table {
		if (!isMapping(value)) {
			throw new InvalidDescriptionError(`Invalid table description: ${JSON.stringify(value)}`);
		}
		const { known, commonProps, atProps } = partitionProperties(value, TABLE_FIELDS, "table");
		const url = optionalString(known, "url", "table");
		if (url === undefined) {
			throw new InvalidDescriptionError("table needs a url");
		}
		return new Table(group, {
			url: new Link(url),
			tableSchema: known.tableSchema,
			dialect: known.dialect === undefined ? undefined : Dialect.fromValue(known.dialect),
			notes: optionalList(known, "notes", "table"),
			suppressOutput: optionalBoolean(known, "suppressOutput", "table"),
			tableDirection: readTableDirection(known, "table"),
			inherited: readInheritedProperties(known, "table"),
			commonProps,
			atProps,
			source,
		});
	}

	/** The table's own dialect, else the group's, else the default one. */
	get dialect(): Dialect {
		return this.ownDialect ?? this.group?.dialect ?? new Dialect();
	}

	get source(): RowSource {
		return this.ownSource ?? this.group?.sourceFor(this.url) ?? fileSource(this.url.resolve(undefined));
	}

	*[Symbol.iterator](): Generator<Row> {
		yield* this.iterRows();
	}

	*iterRows(options: ReadOptions = {}): Generator<Row> {
		for (const { row } of this.iterRowsWithMetadata(options)) {
			yield row;
		}
	}

	/**
	 * Decodes the table's rows. The source is opened anew on every call.
	 *
	 * Without `options.log` the first violation throws. With it, violations are reported and
	 * the offending rows are left out.
	 */
	*iterRowsWithMetadata(options: ReadOptions = {}): Generator<RowWithMetadata> {
		const sink = options.log;
		const dialect = this.dialect;
		const source = this.source;
		const columns = this.tableSchema.columns;

		const names: string[] = [];
		const virtuals: [string, UriTemplate][] = [];
		const required = new Set<string>();
		for (const column of columns) {
			if (column.virtual) {
				const valueUrl = column.inherit("valueUrl");
				if (valueUrl) {
					virtuals.push([column.header, valueUrl]);
				}
			} else {
				names.push(column.header);
				if (column.required) {
					required.add(column.header);
				}
			}
		}

		log.debug(`Reading ${source.name}`);
		const stream = source.open(dialect);
		if (dialect.header && stream.header === undefined) {
			return;
		}
		const header = stream.header ?? names;

		// Data laid out as described is matched by position, anything else by name.
		const positional = header.length === names.length && header.every((key, i) => key === names[i]);
		const cells: HeaderCell[] = header.map((key, index) => ({
			index,
			key,
			column: positional ? columns[index] : this.tableSchema.getColumn(key),
		}));
		const missing = [...required].filter((name) => !cells.some((cell) => cell.column?.header === name));
		if (missing.length > 0) {
			throw new MissingRequiredColumnError(source.name, missing);
		}

		for (const { line, cells: raw } of stream.rows) {
			const row: Row = {};
			let error = false;
			const pending = new Map<string, number>();
			for (const cell of cells) {
				if (cell.column?.required) {
					pending.set(cell.key, cell.index);
				}
			}

			for (const { index, key, column } of cells.slice(0, raw.length)) {
				const text = raw[index];
				if (!column) {
					row[key] = text;
					continue;
				}
				pending.delete(key);
				const result = column.tryRead(text);
				if (result.ok) {
					row[column.header] = result.value;
				} else {
					logOrRaise(new CellError(source.name, line, index + 1, key, result.error), sink);
					error = true;
				}
			}

			for (const [key, index] of pending) {
				if (!(key in row)) {
					logOrRaise(new CellError(source.name, line, index + 1, key, new MissingRequiredValueError()), sink);
					error = true;
				}
			}

			for (const [key, valueUrl] of virtuals) {
				row[key] = valueUrl.expand(templateValues(row));
			}

			if (!error) {
				yield { source: source.name, line, row };
			}
		}
	}

	/**
	 * Checks that no two rows share a primary key. Rows that fail to decode are skipped.
	 */
	checkPrimaryKey(sink?: LogSink): boolean {
		const primaryKey = this.tableSchema.primaryKey;
		if (!primaryKey || primaryKey.length === 0) {
			return true;
		}
		let success = true;
		const seen = new Set<string>();
		for (const { source, line, row } of this.iterRowsWithMetadata({ log: silentLog })) {
			const values = primaryKey.map((name) => row[name]);
			const key = rowKey(values);
			if (seen.has(key)) {
				logOrRaise(new PrimaryKeyViolationError(source, line, displayKey(values)), sink);
				success = false;
			} else {
				seen.add(key);
			}
		}
		return success;
	}

	/**
	 * Renders rows as delimited text in the table's dialect. Rows are either keyed by column
	 * header or positional over the non-virtual columns.
	 */
	write(rows: Iterable<Row | ColumnValue[]>): string {
		const columns = this.tableSchema.columns.filter((column) => !column.virtual);
		const records: string[][] = [];
		if (this.dialect.header) {
			records.push(columns.map((column) => column.header));
		}
		for (const item of rows) {
			if (Array.isArray(item)) {
				records.push(columns.map((column, i) => column.write(item[i])));
			} else {
				records.push(columns.map((column) => column.write(item[column.header])));
			}
		}
		return formatRecords(records, this.dialect);
	}

	toJSON(): Mapping {
		const result: Record<string, JsonValue> = this.descriptionToJSON();
		result.url = this.url.toJSON();
		const schema = this.tableSchema.toJSON();
		if (Object.keys(schema).length > 0) {
			result.tableSchema = schema;
		}
		if (this.ownDialect) {
			result.dialect = this.ownDialect.toJSON();
		}
		if (this.notes.length > 0) {
			result.notes = [...this.notes];
		}
		if (this.suppressOutput) {
			result.suppressOutput = true;
		}
		if (this.tableDirection !== "auto") {
			result.tableDirection = this.tableDirection;
		}
		return result;
	}
}
