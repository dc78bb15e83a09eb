import { type CellValue, type JsonValue, asJsonList, describeValue } from "./codec";
import {
	type Mapping,
	NaturalLanguage,
	isMapping,
	optionalBoolean,
	optionalString,
	partitionProperties,
} from "./description";
import { InvalidDescriptionError, MissingRequiredValueError, type ReadResult, attempt, unwrap } from "./errors";
import {
	type DescriptionExtras,
	INHERITED_FIELDS,
	InheritableDescription,
	type InheritedProperties,
	readInheritedProperties,
} from "./inheritance";

/** A decoded cell: a value, null, or a list of them for columns with a separator. */
export type ColumnValue = CellValue | null | (CellValue | null)[];

const COLUMN_FIELDS: ReadonlySet<string> = new Set(["name", "suppressOutput", "titles", "virtual", ...INHERITED_FIELDS]);

// RFC 6570 level 1 variable names, so a column name can be used in URI templates.
const VARNAME = /^(?:[a-zA-Z0-9_]|%[a-fA-F0-9]{2})(?:\.?(?:[a-zA-Z0-9_]|%[a-fA-F0-9]{2}))*$/;

export interface ColumnInit extends DescriptionExtras {
	readonly name?: string;
	readonly titles?: NaturalLanguage;
	readonly virtual?: boolean;
	readonly suppressOutput?: boolean;
	readonly inherited?: Partial<InheritedProperties>;
}

export class Column extends InheritableDescription {
	readonly name: string | undefined;
	readonly titles: NaturalLanguage | undefined;
	readonly virtual: boolean;
	readonly suppressOutput: boolean;

	/**
	 * @param number 1-based position of the column in its schema.
	 */
	constructor(
		parent: InheritableDescription | undefined,
		readonly number: number,
		init: ColumnInit = {}
	) {
		super(parent, init.inherited ?? {}, init);
		if (init.name !== undefined && !VARNAME.test(init.name)) {
			throw new InvalidDescriptionError(`Invalid column name ${JSON.stringify(init.name)}`);
		}
		this.name = init.name;
		this.titles = init.titles;
		this.virtual = init.virtual ?? false;
		this.suppressOutput = init.suppressOutput ?? false;
	}

	static fromValue(value: JsonValue, parent: InheritableDescription | undefined, number: number): Column {
		if (typeof value === "string") {
			return new Column(parent, number, { name: value });
		}
		if (!isMapping(value)) {
			throw new InvalidDescriptionError(`Invalid column description: ${JSON.stringify(value)}`);
		}
		const { known, commonProps, atProps } = partitionProperties(value, COLUMN_FIELDS, "column");
		return new Column(parent, number, {
			name: optionalString(known, "name", "column"),
			titles: known.titles === undefined ? undefined : NaturalLanguage.fromValue(known.titles),
			virtual: optionalBoolean(known, "virtual", "column"),
			suppressOutput: optionalBoolean(known, "suppressOutput", "column"),
			inherited: readInheritedProperties(known, "column"),
			commonProps,
			atProps,
		});
	}

	get firstTitle(): string | undefined {
		return this.titles?.getFirst() ?? this.titles?.all[0];
	}

	/** Name, else first title, else `_col.N`. */
	get header(): string {
		return this.name ?? this.firstTitle ?? `_col.${this.number}`;
	}

	get required(): boolean {
		return this.inherit("required");
	}

	/**
	 * Decodes one raw cell. Cell-level problems come back as a failed result; anything
	 * else throws.
	 */
	tryRead(text: string): ReadResult<ColumnValue> {
		return attempt(() => this.decode(text));
	}

	read(text: string): ColumnValue {
		return unwrap(this.tryRead(text));
	}

	private decode(text: string): ColumnValue {
		const nulls = this.inherit("null");
		const fallback = this.inherit("default");
		const separator = this.inherit("separator");
		const datatype = this.inherit("datatype");

		const value = text === "" ? fallback : text;
		if (separator && value === "") {
			return [];
		}
		if (this.inherit("required") && nulls.includes(value)) {
			throw new MissingRequiredValueError();
		}
		const decodeOne = (item: string): CellValue => (datatype ? datatype.read(item) : item);

		if (separator) {
			if (nulls.includes(value)) {
				return null;
			}
			return value
				.split(separator)
				.map((item) => (item === "" ? fallback : item))
				.map((item) => (nulls.includes(item) ? null : decodeOne(item)));
		}
		return nulls.includes(value) ? null : decodeOne(value);
	}

	/**
	 * Renders a value the way {@link read} would accept it: null as the first null token,
	 * lists joined on the separator.
	 */
	write(value: ColumnValue | undefined): string {
		const separator = this.inherit("separator");
		const nulls = this.inherit("null");
		const datatype = this.inherit("datatype");

		const encodeOne = (item: CellValue | null | undefined): string => {
			if (item === null || item === undefined) {
				return nulls[0] ?? "";
			}
			return datatype ? datatype.formatted(item) : describeValue(item);
		};

		if (separator) {
			if (value === null || value === undefined) {
				return nulls[0] ?? "";
			}
			const items: readonly (CellValue | null)[] = Array.isArray(value) ? value : [value];
			return items.map(encodeOne).join(separator);
		}
		if (Array.isArray(value)) {
			// Only json values are lists without a separator.
			const json = asJsonList(value);
			if (!json) {
				throw new InvalidDescriptionError(`column ${this.header} has no separator, cannot write a list`);
			}
			return encodeOne(json);
		}
		return encodeOne(value);
	}

	toJSON(): Mapping {
		const result = this.descriptionToJSON();
		if (this.name !== undefined) {
			result.name = this.name;
		}
		if (this.titles) {
			result.titles = this.titles.toJSON();
		}
		if (this.virtual) {
			result.virtual = true;
		}
		if (this.suppressOutput) {
			result.suppressOutput = true;
		}
		return result;
	}
}
