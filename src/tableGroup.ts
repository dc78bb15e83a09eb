import Ajv, { type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import * as fs from "fs";
import * as path from "path";
import { type JsonValue, isJsonValue } from "./codec";
import type { Column } from "./column";
import { Dialect, type RowSource, fileSource } from "./dialect";
import {
	type Link,
	type Mapping,
	isMapping,
	optionalList,
	partitionProperties,
} from "./description";
import { InvalidDescriptionError, ReferentialIntegrityError, SchemaShapeError, logOrRaise } from "./errors";
import {
	type DescriptionExtras,
	INHERITED_FIELDS,
	InheritableDescription,
	type InheritedProperties,
	readInheritedProperties,
} from "./inheritance";
import { type LogSink, createComponentLogger } from "./logger";
import type { Reference } from "./schema";
import {
	type Row,
	Table,
	type TableContainer,
	type TableDirection,
	displayKey,
	readTableDirection,
	rowKey,
} from "./table";

const log = createComponentLogger("tableGroup");

const TABLE_GROUP_FIELDS: ReadonlySet<string> = new Set([
	"tables",
	"dialect",
	"notes",
	"tableDirection",
	...INHERITED_FIELDS,
]);

const ajv = new Ajv({ strict: false, allErrors: true });
addFormats(ajv);

let validateMetadata: ValidateFunction | undefined;

function compileMetadataSchema(): ValidateFunction {
	const schema: unknown = JSON.parse(fs.readFileSync(new URL("./metadata.schema.json", import.meta.url), "utf-8"));
	if (typeof schema !== "object" || schema === null) {
		throw new Error("metadata.schema.json is not a JSON object");
	}
	return ajv.compile(schema);
}

/**
 * Checks a parsed metadata document against the bundled JSON Schema.
 */
export function validateMetadataDocument(document: unknown): Mapping {
	validateMetadata ??= compileMetadataSchema();
	if (!validateMetadata(document)) {
		throw new InvalidDescriptionError(`Invalid metadata: ${ajv.errorsText(validateMetadata.errors)}`);
	}
	if (!isJsonValue(document) || !isMapping(document)) {
		throw new InvalidDescriptionError("Invalid metadata: not a JSON object");
	}
	return document;
}

export interface TableGroupOptions {
	/** Directory or URL that relative table urls resolve against. */
	readonly base?: string;
	/** Opens the data behind a resolved table url. Defaults to reading files. */
	readonly openSource?: (url: string) => RowSource;
}

export interface TableGroupInit extends DescriptionExtras {
	readonly tables?: readonly JsonValue[];
	readonly dialect?: Dialect;
	readonly notes?: readonly JsonValue[];
	readonly tableDirection?: TableDirection;
	readonly inherited?: Partial<InheritedProperties>;
}

/**
 * One foreign key, resolved to the columns whose values it compares.
 */
export interface ForeignKeyEdge {
	readonly target: Table;
	/** Headers of the referenced columns. */
	readonly targetColumns: readonly string[];
	readonly child: Table;
	/** Headers of the referencing columns. */
	readonly childColumns: readonly string[];
}

function baseOf(column: Column): string {
	return column.inherit("datatype")?.base ?? "string";
}

/**
 * A set of tables described together, and the foreign keys between them.
 */
export class TableGroup extends InheritableDescription implements TableContainer {
	readonly tables: readonly Table[];
	readonly dialect: Dialect | undefined;
	readonly notes: readonly JsonValue[];
	readonly tableDirection: TableDirection;
	readonly base: string | undefined;
	private readonly openSource: ((url: string) => RowSource) | undefined;

	constructor(init: TableGroupInit = {}, options: TableGroupOptions = {}) {
		super(undefined, init.inherited ?? {}, init);
		this.dialect = init.dialect;
		this.notes = init.notes ?? [];
		this.tableDirection = init.tableDirection ?? "auto";
		this.base = options.base;
		this.openSource = options.openSource;
		this.tables = (init.tables ?? []).map((value) => Table.fromValue(value, this));
	}

	static fromValue(value: JsonValue, options: TableGroupOptions = {}): TableGroup {
		if (!isMapping(value)) {
			throw new InvalidDescriptionError(`Invalid table group description: ${JSON.stringify(value)}`);
		}
		const { known, commonProps, atProps } = partitionProperties(value, TABLE_GROUP_FIELDS, "tableGroup");
		return new TableGroup(
			{
				tables: optionalList(known, "tables", "tableGroup"),
				dialect: known.dialect === undefined ? undefined : Dialect.fromValue(known.dialect),
				notes: optionalList(known, "notes", "tableGroup"),
				tableDirection: readTableDirection(known, "tableGroup"),
				inherited: readInheritedProperties(known, "tableGroup"),
				commonProps,
				atProps,
			},
			options
		);
	}

	/**
	 * Loads a metadata file. Table urls resolve against the file's directory unless
	 * `options.base` says otherwise.
	 */
	static fromFile(file: string, options: TableGroupOptions = {}): TableGroup {
		const document: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
		log.debug(`Loaded metadata from ${file}`);
		return TableGroup.fromValue(validateMetadataDocument(document), {
			...options,
			base: options.base ?? path.dirname(path.resolve(file)),
		});
	}

	sourceFor(url: Link): RowSource {
		const resolved = url.resolve(this.base);
		return this.openSource ? this.openSource(resolved) : fileSource(resolved);
	}

	/** Tables keyed by their url as written. */
	get tableDict(): ReadonlyMap<string, Table> {
		return new Map(this.tables.map((table) => [table.url.href, table]));
	}

	/** Every row of every table, keyed by table url. Violations throw. */
	read(): Record<string, Row[]> {
		const result: Record<string, Row[]> = {};
		for (const [url, table] of this.tableDict) {
			result[url] = [...table.iterRows()];
		}
		return result;
	}

	private resolveReference(table: Table, reference: Reference): Table {
		if (reference.resource) {
			const target = this.tableDict.get(reference.resource.href);
			if (!target) {
				throw new SchemaShapeError(`${table.url} references unknown table ${reference.resource.href}`);
			}
			return target;
		}
		const id = reference.schemaReference?.href;
		const target = this.tables.find((candidate) => candidate.tableSchema.id === id);
		if (!target) {
			throw new SchemaShapeError(`${table.url} references unknown schema ${id}`);
		}
		return target;
	}

	private resolveColumn(table: Table, name: string): Column {
		const column = table.tableSchema.getColumn(name);
		if (!column) {
			throw new SchemaShapeError(`foreign key column ${name} not found in table ${table.url}`);
		}
		return column;
	}

	/**
	 * Resolves every foreign key of every table. Fails on the first key whose arity,
	 * columns, target or datatypes don't fit.
	 */
	validateForeignKeys(): ForeignKeyEdge[] {
		const edges: ForeignKeyEdge[] = [];
		for (const child of this.tables) {
			for (const fk of child.tableSchema.foreignKeys) {
				const target = this.resolveReference(child, fk.reference);
				const refs = fk.reference.columnReference;
				if (fk.columnReference.length !== refs.length) {
					throw new SchemaShapeError(
						`foreign key of ${child.url} has ${fk.columnReference.length} columns but references ${refs.length}`
					);
				}
				const childColumns = fk.columnReference.map((name) => this.resolveColumn(child, name));
				const targetColumns = refs.map((name) => this.resolveColumn(target, name));
				childColumns.forEach((column, i) => {
					const referenced = targetColumns[i];
					if (baseOf(column) !== baseOf(referenced)) {
						throw new SchemaShapeError(
							`${child.url} column ${column.header} (${baseOf(column)}) cannot reference ` +
								`${target.url} column ${referenced.header} (${baseOf(referenced)})`
						);
					}
				});
				edges.push({
					target,
					targetColumns: targetColumns.map((column) => column.header),
					child,
					childColumns: childColumns.map((column) => column.header),
				});
			}
		}
		return edges;
	}

	/**
	 * Checks that every foreign key value has a matching row in the referenced table.
	 *
	 * Keys with a null part are not checked. A single-column key whose value is a list is
	 * checked element by element.
	 */
	checkReferentialIntegrity(sink?: LogSink): boolean {
		const edges = this.validateForeignKeys().sort(
			(a, b) =>
				a.target.url.href.localeCompare(b.target.url.href) ||
				rowKey(a.targetColumns).localeCompare(rowKey(b.targetColumns)) ||
				a.child.url.href.localeCompare(b.child.url.href)
		);

		const byTarget = new Map<Table, Map<string, ForeignKeyEdge[]>>();
		for (const edge of edges) {
			const shapes = byTarget.get(edge.target) ?? new Map<string, ForeignKeyEdge[]>();
			byTarget.set(edge.target, shapes);
			const shape = rowKey(edge.targetColumns);
			shapes.set(shape, [...(shapes.get(shape) ?? []), edge]);
		}

		let success = true;
		for (const [target, shapes] of byTarget) {
			log.debug(`Checking ${shapes.size} key shape(s) referencing ${target.url}`);
			const seen = new Map([...shapes.keys()].map((shape) => [shape, new Set<string>()]));
			for (const row of target.iterRows({ log: sink })) {
				for (const [shape, group] of shapes) {
					seen.get(shape)?.add(rowKey(group[0].targetColumns.map((name) => row[name])));
				}
			}

			for (const [shape, group] of shapes) {
				const keys = seen.get(shape) ?? new Set<string>();
				const singleColumn = group[0].targetColumns.length === 1;
				for (const { child, childColumns } of group) {
					for (const { source, line, row } of child.iterRowsWithMetadata({ log: sink })) {
						const values = childColumns.map((name) => row[name]);
						const candidates: (typeof values)[] = [];
						const [single] = values;
						if (singleColumn) {
							if (single === null || single === undefined) {
								continue;
							}
							if (Array.isArray(single)) {
								for (const item of single) {
									if (item !== null) {
										candidates.push([item]);
									}
								}
							} else {
								candidates.push(values);
							}
						} else if (values.every((value) => value !== null && value !== undefined)) {
							candidates.push(values);
						}

						for (const candidate of candidates) {
							if (!keys.has(rowKey(candidate))) {
								logOrRaise(
									new ReferentialIntegrityError(source, line, displayKey(candidate), target.url.href),
									sink
								);
								success = false;
							}
						}
					}
				}
			}
		}
		return success;
	}

	toJSON(): Mapping {
		const result: Record<string, JsonValue> = this.descriptionToJSON();
		if (this.dialect) {
			result.dialect = this.dialect.toJSON();
		}
		if (this.notes.length > 0) {
			result.notes = [...this.notes];
		}
		if (this.tableDirection !== "auto") {
			result.tableDirection = this.tableDirection;
		}
		result.tables = this.tables.map((table) => table.toJSON());
		return result;
	}

	/** Writes the description as indented JSON. */
	toFile(file: string): void {
		fs.writeFileSync(file, JSON.stringify(this.toJSON(), null, 4) + "\n", "utf-8");
	}
}
