import type { JsonValue } from "./codec";
import { Column } from "./column";
import {
	Link,
	type Mapping,
	isMapping,
	optionalList,
	optionalString,
	optionalStringList,
	partitionProperties,
} from "./description";
import { InvalidDescriptionError } from "./errors";
import {
	type DescriptionExtras,
	INHERITED_FIELDS,
	InheritableDescription,
	type InheritedProperties,
	readInheritedProperties,
} from "./inheritance";

const REFERENCE_FIELDS: ReadonlySet<string> = new Set(["resource", "schemaReference", "columnReference"]);
const FOREIGN_KEY_FIELDS: ReadonlySet<string> = new Set(["columnReference", "reference"]);
const SCHEMA_FIELDS: ReadonlySet<string> = new Set([
	"columns",
	"foreignKeys",
	"primaryKey",
	"rowTitles",
	...INHERITED_FIELDS,
]);

function columnReference(known: Mapping, entity: string): string[] {
	const columns = optionalStringList(known, "columnReference", entity);
	if (!columns || columns.length === 0) {
		throw new InvalidDescriptionError(`${entity} needs a columnReference`);
	}
	return columns;
}

/**
 * The target of a foreign key: a table by url, or a table by the `@id` of its schema.
 */
export class Reference {
	constructor(
		readonly columnReference: readonly string[],
		readonly resource: Link | undefined,
		readonly schemaReference: Link | undefined
	) {
		if ((resource === undefined) === (schemaReference === undefined)) {
			throw new InvalidDescriptionError("foreign key reference needs exactly one of resource and schemaReference");
		}
	}

	static fromValue(value: JsonValue): Reference {
		if (!isMapping(value)) {
			throw new InvalidDescriptionError(`Invalid foreign key reference: ${JSON.stringify(value)}`);
		}
		const { known } = partitionProperties(value, REFERENCE_FIELDS, "reference");
		const resource = optionalString(known, "resource", "reference");
		const schemaReference = optionalString(known, "schemaReference", "reference");
		return new Reference(
			columnReference(known, "reference"),
			resource === undefined ? undefined : new Link(resource),
			schemaReference === undefined ? undefined : new Link(schemaReference)
		);
	}

	toJSON(): Mapping {
		const result: Record<string, JsonValue> = {};
		if (this.resource) {
			result.resource = this.resource.toJSON();
		}
		if (this.schemaReference) {
			result.schemaReference = this.schemaReference.toJSON();
		}
		result.columnReference = this.columnReference.length === 1 ? this.columnReference[0] : [...this.columnReference];
		return result;
	}
}

export class ForeignKey {
	constructor(
		readonly columnReference: readonly string[],
		readonly reference: Reference
	) {}

	static fromValue(value: JsonValue): ForeignKey {
		if (!isMapping(value)) {
			throw new InvalidDescriptionError(`Invalid foreign key: ${JSON.stringify(value)}`);
		}
		const { known } = partitionProperties(value, FOREIGN_KEY_FIELDS, "foreignKey");
		if (known.reference === undefined) {
			throw new InvalidDescriptionError("foreign key needs a reference");
		}
		return new ForeignKey(columnReference(known, "foreignKey"), Reference.fromValue(known.reference));
	}

	toJSON(): Mapping {
		return {
			columnReference: this.columnReference.length === 1 ? this.columnReference[0] : [...this.columnReference],
			reference: this.reference.toJSON(),
		};
	}
}

export interface SchemaInit extends DescriptionExtras {
	/** Column descriptions, in order. */
	readonly columns?: readonly JsonValue[];
	readonly foreignKeys?: readonly ForeignKey[];
	readonly primaryKey?: readonly string[];
	readonly rowTitles?: readonly string[];
	readonly inherited?: Partial<InheritedProperties>;
}

/**
 * The columns of a table plus its keys.
 */
export class Schema extends InheritableDescription {
	readonly columns: readonly Column[];
	readonly foreignKeys: readonly ForeignKey[];
	readonly primaryKey: readonly string[] | undefined;
	readonly rowTitles: readonly string[];

	constructor(parent: InheritableDescription | undefined, init: SchemaInit = {}) {
		super(parent, init.inherited ?? {}, init);
		this.columns = (init.columns ?? []).map((value, i) => Column.fromValue(value, this, i + 1));
		this.foreignKeys = init.foreignKeys ?? [];
		this.primaryKey = init.primaryKey;
		this.rowTitles = init.rowTitles ?? [];

		let virtual = false;
		for (const column of this.columns) {
			if (column.virtual) {
				virtual = true;
			} else if (virtual) {
				throw new InvalidDescriptionError(
					`no non-virtual column allowed after virtual columns (column ${column.number}: ${column.header})`
				);
			}
		}
	}

	static fromValue(value: JsonValue | undefined, parent: InheritableDescription | undefined): Schema {
		if (value === undefined) {
			return new Schema(parent);
		}
		if (!isMapping(value)) {
			throw new InvalidDescriptionError(`Invalid table schema: ${JSON.stringify(value)}`);
		}
		const { known, commonProps, atProps } = partitionProperties(value, SCHEMA_FIELDS, "schema");
		return new Schema(parent, {
			columns: optionalList(known, "columns", "schema"),
			foreignKeys:
				known.foreignKeys === null
					? []
					: optionalList(known, "foreignKeys", "schema")?.map((fk) => ForeignKey.fromValue(fk)),
			primaryKey: optionalStringList(known, "primaryKey", "schema"),
			rowTitles: optionalStringList(known, "rowTitles", "schema"),
			inherited: readInheritedProperties(known, "schema"),
			commonProps,
			atProps,
		});
	}

	/** The schema's `@id`, which `schemaReference` links point at. */
	get id(): string | undefined {
		const id = this.atProps.id;
		return typeof id === "string" ? id : undefined;
	}

	get columnDict(): ReadonlyMap<string, Column> {
		return new Map(this.columns.map((column) => [column.header, column]));
	}

	/**
	 * Looks a column up by header, then by first title, then by propertyUrl template.
	 */
	getColumn(key: string): Column | undefined {
		return (
			this.columnDict.get(key) ??
			this.columns.find((column) => column.firstTitle === key || column.own.propertyUrl?.template === key)
		);
	}

	toJSON(): Mapping {
		const result: Record<string, JsonValue> = this.descriptionToJSON();
		if (this.columns.length > 0) {
			result.columns = this.columns.map((column) => column.toJSON());
		}
		if (this.foreignKeys.length > 0) {
			result.foreignKeys = this.foreignKeys.map((fk) => fk.toJSON());
		}
		if (this.primaryKey) {
			result.primaryKey = this.primaryKey.length === 1 ? this.primaryKey[0] : [...this.primaryKey];
		}
		if (this.rowTitles.length > 0) {
			result.rowTitles = [...this.rowTitles];
		}
		return result;
	}
}
