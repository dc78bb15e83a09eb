import * as path from "path";
import { parseTemplate } from "url-template";
import type { JsonValue } from "./codec";
import { InvalidDescriptionError } from "./errors";
import { createComponentLogger } from "./logger";

const log = createComponentLogger("description");

/** A parsed JSON description object. */
export type Mapping = { readonly [key: string]: JsonValue };

export function isMapping(value: JsonValue | undefined): value is Mapping {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

// === Partitioning ===

export interface PartitionedProperties {
	/** Fields the entity understands, keyed by name. */
	readonly known: Mapping;
	/** `prefix:name` properties, kept verbatim. */
	readonly commonProps: Mapping;
	/** `@`-properties, keyed without the `@`. */
	readonly atProps: Mapping;
	readonly ignored: readonly string[];
}

/**
 * Splits a description object into the fields the entity knows, common properties
 * (`dc:title`), `@`-properties and everything else, which is ignored with a warning.
 */
export function partitionProperties(
	mapping: Mapping,
	knownFields: ReadonlySet<string>,
	entity: string
): PartitionedProperties {
	const known: Record<string, JsonValue> = {};
	const commonProps: Record<string, JsonValue> = {};
	const atProps: Record<string, JsonValue> = {};
	const ignored: string[] = [];
	for (const [key, value] of Object.entries(mapping)) {
		if (key.startsWith("@")) {
			atProps[key.slice(1)] = value;
		} else if (key.includes(":")) {
			commonProps[key] = value;
		} else if (knownFields.has(key)) {
			known[key] = value;
		} else {
			ignored.push(key);
		}
	}
	if (ignored.length > 0) {
		log.warn(`Ignoring unknown ${entity} properties: ${ignored.join(", ")}`);
	}
	return { known, commonProps, atProps, ignored };
}

/**
 * Renders common and `@`-properties back into description form, sorted by key, ahead of the
 * entity's own fields.
 */
export function extraPropertiesToJSON(commonProps: Mapping, atProps: Mapping): Record<string, JsonValue> {
	const result: Record<string, JsonValue> = {};
	for (const key of Object.keys(atProps).sort()) {
		result["@" + key] = atProps[key];
	}
	for (const key of Object.keys(commonProps).sort()) {
		result[key] = commonProps[key];
	}
	return result;
}

// === Field readers ===

function wrongType(entity: string, key: string, expected: string, value: JsonValue): InvalidDescriptionError {
	return new InvalidDescriptionError(`${entity} property ${key} must be ${expected}, got ${JSON.stringify(value)}`);
}

export function optionalString(props: Mapping, key: string, entity: string): string | undefined {
	const value = props[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string") {
		throw wrongType(entity, key, "a string", value);
	}
	return value;
}

export function optionalBoolean(props: Mapping, key: string, entity: string): boolean | undefined {
	const value = props[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "boolean") {
		throw wrongType(entity, key, "a boolean", value);
	}
	return value;
}

export function optionalInteger(props: Mapping, key: string, entity: string): number | undefined {
	const value = props[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
		throw wrongType(entity, key, "a non-negative integer", value);
	}
	return value;
}

/** A single string or a list of strings, always returned as a list. */
export function optionalStringList(props: Mapping, key: string, entity: string): string[] | undefined {
	const value = props[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value === "string") {
		return [value];
	}
	if (Array.isArray(value)) {
		const strings: string[] = [];
		for (const item of value) {
			if (typeof item !== "string") {
				throw wrongType(entity, key, "a string or a list of strings", value);
			}
			strings.push(item);
		}
		return strings;
	}
	throw wrongType(entity, key, "a string or a list of strings", value);
}

export function optionalList(props: Mapping, key: string, entity: string): readonly JsonValue[] | undefined {
	const value = props[key];
	if (value === undefined) {
		return undefined;
	}
	if (!Array.isArray(value)) {
		throw wrongType(entity, key, "a list", value);
	}
	return value;
}

export function optionalMapping(props: Mapping, key: string, entity: string): Mapping | undefined {
	const value = props[key];
	if (value === undefined) {
		return undefined;
	}
	if (!isMapping(value)) {
		throw wrongType(entity, key, "an object", value);
	}
	return value;
}

// === Natural language properties ===

/**
 * Text with optional language tags, as used by `titles`. Untagged values are stored under
 * `undefined`.
 */
export class NaturalLanguage {
	constructor(private readonly values: ReadonlyMap<string | undefined, readonly string[]>) {}

	static fromValue(value: JsonValue): NaturalLanguage {
		const values = new Map<string | undefined, string[]>();
		const untagged = stringsOf(value);
		if (untagged) {
			values.set(undefined, untagged);
		} else if (isMapping(value)) {
			for (const [lang, texts] of Object.entries(value)) {
				const list = stringsOf(texts);
				if (!list || list.length === 0) {
					throw new InvalidDescriptionError(`Invalid natural language value for ${lang}: ${JSON.stringify(texts)}`);
				}
				values.set(lang === "und" ? undefined : lang, list);
			}
		} else {
			throw new InvalidDescriptionError(`Invalid natural language value: ${JSON.stringify(value)}`);
		}
		return new NaturalLanguage(values);
	}

	getFirst(lang?: string): string | undefined {
		return this.values.get(lang)?.[0];
	}

	/** Every text, in insertion order, regardless of language. */
	get all(): string[] {
		return [...this.values.values()].flat();
	}

	/** Returns a copy with `text` appended under `lang`. */
	add(text: string, lang?: string): NaturalLanguage {
		const values = new Map(this.values);
		values.set(lang, [...(values.get(lang) ?? []), text]);
		return new NaturalLanguage(values);
	}

	toString(): string {
		return this.getFirst() ?? this.all[0] ?? "";
	}

	toJSON(): JsonValue {
		const untagged = this.values.get(undefined);
		if (this.values.size === 1 && untagged) {
			return untagged.length === 1 ? untagged[0] : [...untagged];
		}
		const result: Record<string, JsonValue> = {};
		for (const [lang, texts] of this.values) {
			result[lang ?? "und"] = texts.length === 1 ? texts[0] : [...texts];
		}
		return result;
	}
}

function stringsOf(value: JsonValue): string[] | undefined {
	if (typeof value === "string") {
		return [value];
	}
	if (!Array.isArray(value)) {
		return undefined;
	}
	const strings: string[] = [];
	for (const item of value) {
		if (typeof item !== "string") {
			return undefined;
		}
		strings.push(item);
	}
	return strings;
}

// === Link properties ===

const ABSOLUTE_URL = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//;

/**
 * A reference to another resource: a URL, or a file path relative to the description.
 */
export class Link {
	constructor(readonly href: string) {}

	isUrl(): boolean {
		return ABSOLUTE_URL.test(this.href);
	}

	/**
	 * Resolves against a base URL or directory. Without a base the link is returned as is.
	 */
	resolve(base: string | undefined): string {
		if (base === undefined || this.isUrl()) {
			return this.href;
		}
		if (ABSOLUTE_URL.test(base)) {
			return new URL(this.href, base).href;
		}
		return path.isAbsolute(this.href) ? this.href : path.resolve(base, this.href);
	}

	equals(other: Link): boolean {
		return this.href === other.href;
	}

	toString(): string {
		return this.href;
	}

	toJSON(): string {
		return this.href;
	}
}

// === URI template properties ===

export type TemplateValues = Readonly<Record<string, string | readonly string[] | undefined>>;

/**
 * An RFC 6570 URI template such as `http://example.org/{id}`.
 */
export class UriTemplate {
	private readonly compiled: ReturnType<typeof parseTemplate>;

	constructor(readonly template: string) {
		try {
			this.compiled = parseTemplate(template);
		} catch (e) {
			throw new InvalidDescriptionError(
				`Invalid URI template ${JSON.stringify(template)}: ${e instanceof Error ? e.message : String(e)}`
			);
		}
	}

	/** Expands the template; undefined variables are left out. */
	expand(values: TemplateValues): string {
		const context: Record<string, string | string[]> = {};
		for (const [key, value] of Object.entries(values)) {
			if (value !== undefined) {
				context[key] = typeof value === "string" ? value : [...value];
			}
		}
		return this.compiled.expand(context);
	}

	/** Variable names the template refers to. */
	get variables(): string[] {
		const names: string[] = [];
		for (const [, expression] of this.template.matchAll(/\{([^}]*)\}/g)) {
			for (const spec of expression.replace(/^[+#./;?&]/, "").split(",")) {
				names.push(spec.replace(/(?::[0-9]+|\*)$/, ""));
			}
		}
		return names;
	}

	toString(): string {
		return this.template;
	}

	toJSON(): string {
		return this.template;
	}
}
