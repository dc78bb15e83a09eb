import { getBasetype } from "./basetypes";
import {
	type Basetype,
	type BasetypeName,
	type CellValue,
	type Codec,
	type DatatypeFormat,
	type FormatObject,
	type JsonValue,
	describeValue,
	invalid,
	isBasetypeName,
} from "./codec";
import {
	type Mapping,
	extraPropertiesToJSON,
	isMapping,
	optionalInteger,
	optionalMapping,
	optionalString,
	partitionProperties,
} from "./description";
import { InvalidDescriptionError } from "./errors";

const DATATYPE_FIELDS: ReadonlySet<string> = new Set([
	"base",
	"format",
	"length",
	"minLength",
	"maxLength",
	"minimum",
	"maximum",
	"minInclusive",
	"maxInclusive",
	"minExclusive",
	"maxExclusive",
]);

const BOUND_FIELDS = ["minInclusive", "maxInclusive", "minExclusive", "maxExclusive"] as const;

type BoundField = (typeof BOUND_FIELDS)[number];

/** A bound as written in the description. */
export type BoundLiteral = string | number;

export interface DatatypeDescription {
	readonly base?: BasetypeName;
	readonly format?: DatatypeFormat;
	readonly length?: number;
	readonly minLength?: number;
	readonly maxLength?: number;
	readonly minInclusive?: BoundLiteral;
	readonly maxInclusive?: BoundLiteral;
	readonly minExclusive?: BoundLiteral;
	readonly maxExclusive?: BoundLiteral;
	readonly commonProps?: Mapping;
	readonly atProps?: Mapping;
}

interface Bound {
	readonly value: CellValue;
	readonly inclusive: boolean;
}

/**
 * A basetype plus the constraints a column puts on its values.
 *
 * Everything that can be checked without data is checked here, so a Datatype that was
 * constructed is consistent.
 */
export class Datatype {
	readonly base: BasetypeName;
	readonly basetype: Basetype;
	readonly format: DatatypeFormat | undefined;
	readonly length: number | undefined;
	readonly minLength: number | undefined;
	readonly maxLength: number | undefined;
	readonly minInclusive: BoundLiteral | undefined;
	readonly maxInclusive: BoundLiteral | undefined;
	readonly minExclusive: BoundLiteral | undefined;
	readonly maxExclusive: BoundLiteral | undefined;
	readonly commonProps: Mapping;
	readonly atProps: Mapping;

	private readonly codec: Codec;
	private readonly min: Bound | undefined;
	private readonly max: Bound | undefined;

	constructor(description: DatatypeDescription = {}) {
		this.base = description.base ?? "string";
		this.basetype = getBasetype(this.base);
		this.format = description.format;
		this.length = description.length;
		this.minLength = description.minLength;
		this.maxLength = description.maxLength;
		this.minInclusive = description.minInclusive;
		this.maxInclusive = description.maxInclusive;
		this.minExclusive = description.minExclusive;
		this.maxExclusive = description.maxExclusive;
		this.commonProps = description.commonProps ?? {};
		this.atProps = description.atProps ?? {};

		this.checkLengths();
		this.codec = this.basetype.derive(this.format);
		const [min, max] = this.parseBounds();
		this.min = min;
		this.max = max;
	}

	static fromValue(value: JsonValue | Datatype): Datatype {
		if (value instanceof Datatype) {
			return value;
		}
		if (typeof value === "string") {
			return new Datatype({ base: baseName(value) });
		}
		if (!isMapping(value)) {
			throw new InvalidDescriptionError(`Invalid datatype description: ${JSON.stringify(value)}`);
		}

		const { known, commonProps, atProps } = partitionProperties(value, DATATYPE_FIELDS, "datatype");
		const base = optionalString(known, "base", "datatype");
		const minimum = bound(known, "minimum");
		const maximum = bound(known, "maximum");
		const minInclusive = bound(known, "minInclusive");
		const maxInclusive = bound(known, "maxInclusive");
		if (minimum !== undefined && minInclusive !== undefined) {
			throw new InvalidDescriptionError("datatype sets both minimum and minInclusive");
		}
		if (maximum !== undefined && maxInclusive !== undefined) {
			throw new InvalidDescriptionError("datatype sets both maximum and maxInclusive");
		}

		return new Datatype({
			base: base === undefined ? undefined : baseName(base),
			format: formatOf(known),
			length: optionalInteger(known, "length", "datatype"),
			minLength: optionalInteger(known, "minLength", "datatype"),
			maxLength: optionalInteger(known, "maxLength", "datatype"),
			minInclusive: minInclusive ?? minimum,
			maxInclusive: maxInclusive ?? maximum,
			minExclusive: bound(known, "minExclusive"),
			maxExclusive: bound(known, "maxExclusive"),
			commonProps,
			atProps,
		});
	}

	private hasLengthConstraint(): boolean {
		return this.length !== undefined || this.minLength !== undefined || this.maxLength !== undefined;
	}

	private checkLengths(): void {
		if (this.hasLengthConstraint() && this.basetype.family !== "string" && this.basetype.family !== "binary") {
			throw new InvalidDescriptionError(`length constraints are not allowed on ${this.base}`);
		}
		if (this.length !== undefined) {
			if (this.minLength !== undefined && this.length < this.minLength) {
				throw new InvalidDescriptionError(`length ${this.length} is smaller than minLength ${this.minLength}`);
			}
			if (this.maxLength !== undefined && this.length > this.maxLength) {
				throw new InvalidDescriptionError(`length ${this.length} is larger than maxLength ${this.maxLength}`);
			}
		}
		if (this.minLength !== undefined && this.maxLength !== undefined && this.minLength > this.maxLength) {
			throw new InvalidDescriptionError(`minLength ${this.minLength} is larger than maxLength ${this.maxLength}`);
		}
	}

	/**
	 * Bound literals are read in the basetype's canonical lexical form, not through the
	 * datatype's format.
	 */
	private parseBounds(): [Bound | undefined, Bound | undefined] {
		const given = BOUND_FIELDS.filter((field) => this[field] !== undefined);
		if (given.length === 0) {
			return [undefined, undefined];
		}
		if (!this.basetype.ordered) {
			throw new InvalidDescriptionError(`${given.join(", ")} not allowed on ${this.base}`);
		}
		if (this.minInclusive !== undefined && this.minExclusive !== undefined) {
			throw new InvalidDescriptionError("datatype sets both minInclusive and minExclusive");
		}
		if (this.maxInclusive !== undefined && this.maxExclusive !== undefined) {
			throw new InvalidDescriptionError("datatype sets both maxInclusive and maxExclusive");
		}

		const canonical = this.basetype.derive(undefined);
		const parseBound = (field: BoundField): CellValue | undefined => {
			const literal = this[field];
			if (literal === undefined) {
				return undefined;
			}
			try {
				return canonical.parse(String(literal));
			} catch (e) {
				throw new InvalidDescriptionError(
					`${field} ${JSON.stringify(literal)} is not a valid ${this.base}: ${e instanceof Error ? e.message : String(e)}`
				);
			}
		};
		const minInclusive = parseBound("minInclusive");
		const minExclusive = parseBound("minExclusive");
		const maxInclusive = parseBound("maxInclusive");
		const maxExclusive = parseBound("maxExclusive");

		const min =
			minInclusive !== undefined
				? { value: minInclusive, inclusive: true }
				: minExclusive !== undefined
					? { value: minExclusive, inclusive: false }
					: undefined;
		const max =
			maxInclusive !== undefined
				? { value: maxInclusive, inclusive: true }
				: maxExclusive !== undefined
					? { value: maxExclusive, inclusive: false }
					: undefined;

		if (min && max) {
			const order = this.compare(min.value, max.value);
			if (order > 0 || (order === 0 && !(min.inclusive && max.inclusive))) {
				throw new InvalidDescriptionError(`lower bound of ${this.base} datatype is above its upper bound`);
			}
		}
		return [min, max];
	}

	private compare(a: CellValue, b: CellValue): number {
		if (!this.codec.compare) {
			throw new InvalidDescriptionError(`${this.base} values have no order`);
		}
		return this.codec.compare(a, b);
	}

	parse(text: string): CellValue {
		return this.codec.parse(text);
	}

	/**
	 * Checks an already parsed value against the length and bound constraints.
	 */
	validate(value: CellValue): CellValue {
		const length = this.codec.length?.(value);
		if (length !== undefined) {
			const fail = (reason: string) => invalid(this.base, describeValue(value), reason);
			if (this.length !== undefined && length !== this.length) {
				throw fail(`length must be ${this.length}`);
			}
			if (this.minLength !== undefined && length < this.minLength) {
				throw fail(`length must be at least ${this.minLength}`);
			}
			if (this.maxLength !== undefined && length > this.maxLength) {
				throw fail(`length must be at most ${this.maxLength}`);
			}
		}
		if (this.min) {
			const order = this.compare(value, this.min.value);
			if (order < 0 || (order === 0 && !this.min.inclusive) || Number.isNaN(order)) {
				throw invalid(this.base, describeValue(value), `must be ${this.min.inclusive ? ">=" : ">"} ${this.minInclusive ?? this.minExclusive}`);
			}
		}
		if (this.max) {
			const order = this.compare(value, this.max.value);
			if (order > 0 || (order === 0 && !this.max.inclusive) || Number.isNaN(order)) {
				throw invalid(this.base, describeValue(value), `must be ${this.max.inclusive ? "<=" : "<"} ${this.maxInclusive ?? this.maxExclusive}`);
			}
		}
		return value;
	}

	read(text: string): CellValue {
		return this.validate(this.parse(text));
	}

	formatted(value: CellValue): string {
		return this.codec.format(value);
	}

	/** Collapses to the bare base name when nothing else is set. */
	toJSON(): JsonValue {
		const result: Record<string, JsonValue> = extraPropertiesToJSON(this.commonProps, this.atProps);
		result.base = this.base;
		if (this.format !== undefined) {
			result.format = typeof this.format === "string" ? this.format : formatToJSON(this.format);
		}
		for (const key of ["length", "minLength", "maxLength", ...BOUND_FIELDS] as const) {
			const value = this[key];
			if (value !== undefined) {
				result[key] = value;
			}
		}
		const keys = Object.keys(result);
		return keys.length === 1 ? this.base : result;
	}
}

function baseName(name: string): BasetypeName {
	if (!isBasetypeName(name)) {
		throw new InvalidDescriptionError(`Unknown datatype base ${JSON.stringify(name)}`);
	}
	return name;
}

function bound(known: Mapping, key: string): BoundLiteral | undefined {
	const value = known[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string" && typeof value !== "number") {
		throw new InvalidDescriptionError(`datatype ${key} must be a string or a number, got ${JSON.stringify(value)}`);
	}
	return value;
}

function formatToJSON(format: FormatObject): Record<string, JsonValue> {
	const result: Record<string, JsonValue> = {};
	for (const key of ["pattern", "decimalChar", "groupChar"] as const) {
		const value = format[key];
		if (value !== undefined) {
			result[key] = value;
		}
	}
	return result;
}

function formatOf(known: Mapping): DatatypeFormat | undefined {
	const value = known.format;
	if (value === undefined || typeof value === "string") {
		return value;
	}
	const spec = optionalMapping(known, "format", "datatype");
	if (!spec) {
		throw new InvalidDescriptionError(`datatype format must be a string or an object, got ${JSON.stringify(value)}`);
	}
	return {
		pattern: optionalString(spec, "pattern", "format"),
		decimalChar: optionalString(spec, "decimalChar", "format"),
		groupChar: optionalString(spec, "groupChar", "format"),
	};
}
