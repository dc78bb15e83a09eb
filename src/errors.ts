import type { LogSink } from "./logger";

/**
 * Base class of every error raised by this package.
 */
export class CsvwError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/**
 * A description (datatype, format pattern, column, schema, dialect or table group) is
 * malformed. Raised while building the model, before any data is read.
 */
export class InvalidDescriptionError extends CsvwError {}

/**
 * A cell's text is not in the lexical space of its datatype, or the parsed value breaks
 * one of the datatype's constraints.
 */
export class InvalidLexicalValueError extends CsvwError {
	constructor(
		readonly datatype: string,
		readonly text: string,
		reason?: string
	) {
		super(
			reason
				? `invalid lexical value for ${datatype}: ${text} (${reason})`
				: `invalid lexical value for ${datatype}: ${text}`
		);
	}
}

export class MissingRequiredValueError extends CsvwError {
	constructor() {
		super("required column value is missing");
	}
}

/**
 * A required column does not appear in the header of the data. Structural: reading the
 * table cannot continue.
 */
export class MissingRequiredColumnError extends CsvwError {
	constructor(
		readonly source: string,
		readonly columns: readonly string[]
	) {
		super(`${source} is missing required columns ${columns.join(", ")}`);
	}
}

/**
 * Foreign keys don't fit the tables they connect: wrong arity, unknown columns, an
 * unresolvable target or incompatible datatypes.
 */
export class SchemaShapeError extends CsvwError {}

export class ReferentialIntegrityError extends CsvwError {
	constructor(
		readonly source: string,
		readonly line: number,
		readonly key: string,
		readonly table: string
	) {
		super(`${source}:${line} Key ${key} not found in table ${table}`);
	}
}

export class PrimaryKeyViolationError extends CsvwError {
	constructor(
		readonly source: string,
		readonly line: number,
		readonly key: string
	) {
		super(`${source}:${line} duplicate primary key: ${key}`);
	}
}

/**
 * Wraps a cell-level error with its position in the data.
 */
export class CellError extends CsvwError {
	constructor(
		readonly source: string,
		readonly line: number,
		readonly column: number,
		readonly header: string,
		readonly violation: CsvwError
	) {
		super(`${source}:${line}:${column} ${header}: ${violation.message}`);
	}
}

/**
 * Outcome of a cell-level operation that may fail without aborting the caller.
 */
export type ReadResult<T> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: CsvwError };

/**
 * Run `fn`, turning cell-level failures into a failed result. Anything that is not a
 * cell-level condition keeps propagating.
 */
export function attempt<T>(fn: () => T): ReadResult<T> {
	try {
		return { ok: true, value: fn() };
	} catch (e) {
		if (e instanceof InvalidLexicalValueError || e instanceof MissingRequiredValueError) {
			return { ok: false, error: e };
		}
		throw e;
	}
}

export function unwrap<T>(result: ReadResult<T>): T {
	if (!result.ok) {
		throw result.error;
	}
	return result.value;
}

/**
 * Report `error` to `log` when one is given, otherwise throw it.
 */
export function logOrRaise(error: CsvwError, log?: LogSink): void {
	if (log) {
		log.warn(error.message);
		return;
	}
	throw error;
}
