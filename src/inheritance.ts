import type { JsonValue } from "./codec";
import { Datatype } from "./datatype";
import {
	type Mapping,
	UriTemplate,
	extraPropertiesToJSON,
	optionalBoolean,
	optionalString,
	optionalStringList,
} from "./description";
import { InvalidDescriptionError } from "./errors";

export type TextDirection = "ltr" | "rtl" | "auto" | "inherit";

const TEXT_DIRECTIONS: readonly string[] = ["ltr", "rtl", "auto", "inherit"];

/**
 * Properties a Column takes from its Schema, Table and TableGroup when it does not set
 * them itself.
 */
export interface InheritedProperties {
	readonly aboutUrl: UriTemplate | undefined;
	readonly datatype: Datatype | undefined;
	readonly default: string;
	readonly lang: string;
	readonly null: readonly string[];
	readonly ordered: boolean;
	readonly propertyUrl: UriTemplate | undefined;
	readonly required: boolean;
	readonly separator: string | undefined;
	readonly textDirection: TextDirection;
	readonly valueUrl: UriTemplate | undefined;
}

export const INHERITED_DEFAULTS: InheritedProperties = {
	aboutUrl: undefined,
	datatype: undefined,
	default: "",
	lang: "und",
	null: [""],
	ordered: false,
	propertyUrl: undefined,
	required: false,
	separator: undefined,
	textDirection: "inherit",
	valueUrl: undefined,
};

export const INHERITED_FIELDS: readonly (keyof InheritedProperties)[] = [
	"aboutUrl",
	"datatype",
	"default",
	"lang",
	"null",
	"ordered",
	"propertyUrl",
	"required",
	"separator",
	"textDirection",
	"valueUrl",
];

/**
 * Reads the inherited properties a description sets explicitly. `"null": null` means no
 * null tokens at all, which is different from leaving `null` out.
 */
export function readInheritedProperties(known: Mapping, entity: string): Partial<InheritedProperties> {
	const template = (key: string): UriTemplate | undefined => {
		const value = optionalString(known, key, entity);
		return value === undefined ? undefined : new UriTemplate(value);
	};
	const textDirection = optionalString(known, "textDirection", entity);
	if (textDirection !== undefined && !isTextDirection(textDirection)) {
		throw new InvalidDescriptionError(`${entity} textDirection must be one of ${TEXT_DIRECTIONS.join(", ")}`);
	}
	const datatype = known.datatype;

	return {
		aboutUrl: template("aboutUrl"),
		datatype: datatype === undefined ? undefined : Datatype.fromValue(datatype),
		default: optionalString(known, "default", entity),
		lang: optionalString(known, "lang", entity),
		null: known.null === null ? [] : optionalStringList(known, "null", entity),
		ordered: optionalBoolean(known, "ordered", entity),
		propertyUrl: template("propertyUrl"),
		required: optionalBoolean(known, "required", entity),
		separator: optionalString(known, "separator", entity),
		textDirection,
		valueUrl: template("valueUrl"),
	};
}

function isTextDirection(value: string): value is TextDirection {
	return TEXT_DIRECTIONS.includes(value);
}

export interface DescriptionExtras {
	readonly commonProps?: Mapping;
	readonly atProps?: Mapping;
}

/**
 * Base of every entity on the inheritance chain Column → Schema → Table → TableGroup.
 */
export abstract class InheritableDescription {
	readonly commonProps: Mapping;
	readonly atProps: Mapping;

	protected constructor(
		readonly parent: InheritableDescription | undefined,
		readonly own: Partial<InheritedProperties>,
		extras: DescriptionExtras
	) {
		this.commonProps = extras.commonProps ?? {};
		this.atProps = extras.atProps ?? {};
	}

	/**
	 * The node's own value when set, otherwise the nearest ancestor's, otherwise the
	 * default.
	 */
	inherit<K extends keyof InheritedProperties>(key: K): InheritedProperties[K] {
		const own: InheritedProperties[K] | undefined = this.own[key];
		if (own !== undefined) {
			return own;
		}
		return this.parent ? this.parent.inherit(key) : INHERITED_DEFAULTS[key];
	}

	/** `@`/common properties followed by the inherited properties set on this node. */
	protected descriptionToJSON(): Record<string, JsonValue> {
		const result = extraPropertiesToJSON(this.commonProps, this.atProps);
		for (const key of INHERITED_FIELDS) {
			const value = this.own[key];
			if (value === undefined) {
				continue;
			}
			if (value instanceof UriTemplate || value instanceof Datatype) {
				result[key] = value.toJSON();
			} else if (Array.isArray(value)) {
				result[key] = value.length === 1 ? value[0] : [...value];
			} else if (typeof value === "string" || typeof value === "boolean") {
				result[key] = value;
			}
		}
		return result;
	}
}
