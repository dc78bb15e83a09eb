import { DateTimeValue, checkFields, isoOffset, pad, parseOffset, type TemporalKind } from "./dateTimeValue";
import { InvalidDescriptionError } from "./errors";

/**
 * Compiles the CLDR date/time pattern subset used in `format` annotations into an anchored
 * regex for reading and a template for writing.
 *
 * Supported: yyyy, MM, M, dd, d, HH, mm, ss, a `.S+` fractional-seconds suffix and a
 * trailing zone marker (x, xx, xxx, X, XX or XXX, optionally after one space).
 */

const TIMEZONE_MARKERS = ["x", "xx", "xxx", "X", "XX", "XXX"] as const;

export type TimezoneMarker = (typeof TIMEZONE_MARKERS)[number];

type Field = "year" | "month" | "day" | "hour" | "minute" | "second";

export type TemplatePart =
	| { readonly kind: "literal"; readonly text: string }
	| { readonly kind: "field"; readonly field: Field; readonly width: number }
	| { readonly kind: "fraction"; readonly width: number }
	| { readonly kind: "timezone"; readonly separator: string; readonly marker: TimezoneMarker | undefined };

export interface DateTimePattern {
	readonly pattern: string;
	readonly regex: RegExp;
	readonly template: readonly TemplatePart[];
	readonly tzMarker: TimezoneMarker | undefined;
	readonly hasDate: boolean;
	readonly hasTime: boolean;
}

const TOKENS: Readonly<Record<string, { readonly field: Field; readonly width: number; readonly regex: string }>> = {
	yyyy: { field: "year", width: 4, regex: "[0-9]{4}" },
	MM: { field: "month", width: 2, regex: "[0-9]{2}" },
	M: { field: "month", width: 1, regex: "[0-9]{1,2}" },
	dd: { field: "day", width: 2, regex: "[0-9]{2}" },
	d: { field: "day", width: 1, regex: "[0-9]{1,2}" },
	HH: { field: "hour", width: 2, regex: "[0-9]{2}" },
	mm: { field: "minute", width: 2, regex: "[0-9]{2}" },
	ss: { field: "second", width: 2, regex: "[0-9]{2}" },
};

const DATE_PATTERNS: ReadonlySet<string> = new Set(
	["yyyy-MM-dd", "yyyyMMdd", "dd-MM-yyyy", "d-M-yyyy", "MM-dd-yyyy", "M-d-yyyy"].flatMap((p) =>
		p.includes("-") ? ["-", "/", "."].map((sep) => p.replaceAll("-", sep)) : [p]
	)
);

const TIME_PATTERNS: ReadonlySet<string> = new Set(["HH:mm:ss", "HHmmss", "HH:mm", "HHmm"]);

const MARKERS: readonly string[] = TIMEZONE_MARKERS;

function isTimezoneMarker(s: string): s is TimezoneMarker {
	return MARKERS.includes(s);
}

function escapeRegex(s: string): string {
	return s.replace(/[.*+?^${}()|[\]\\/-]/g, "\\$&");
}

function tokenize(part: string): string[] {
	return part.match(/([a-zA-Z])\1*|[^a-zA-Z]/g) ?? [];
}

function invalidPattern(pattern: string, reason: string): InvalidDescriptionError {
	return new InvalidDescriptionError(`Invalid date/time format pattern ${JSON.stringify(pattern)}: ${reason}`);
}

export function compileDateTimePattern(pattern: string): DateTimePattern {
	let rest = pattern;
	let tzMarker: TimezoneMarker | undefined;
	let tzSeparator = "";

	const tz = /( ?)([xX]{1,3})$/.exec(rest);
	if (tz) {
		const marker = tz[2];
		if (!isTimezoneMarker(marker)) {
			throw invalidPattern(pattern, "mixed x and X in timezone marker");
		}
		tzMarker = marker;
		tzSeparator = tz[1];
		rest = rest.slice(0, tz.index);
	}

	let datePart: string | undefined;
	let timePart: string | undefined;
	const joiner = rest.includes("T") ? "T" : rest.includes(" ") ? " " : undefined;
	if (joiner !== undefined) {
		const parts = rest.split(joiner);
		if (parts.length !== 2) {
			throw invalidPattern(pattern, `more than one ${JSON.stringify(joiner)} between date and time`);
		}
		[datePart, timePart] = parts;
	} else if (DATE_PATTERNS.has(rest)) {
		datePart = rest;
	} else {
		timePart = rest;
	}

	let fractionWidth = 0;
	if (timePart !== undefined) {
		const dot = timePart.indexOf(".");
		if (dot >= 0) {
			const fraction = timePart.slice(dot + 1);
			if (!/^S+$/.test(fraction)) {
				throw invalidPattern(pattern, "fractional seconds must be written as S characters");
			}
			fractionWidth = fraction.length;
			timePart = timePart.slice(0, dot);
		}
		if (!TIME_PATTERNS.has(timePart)) {
			throw invalidPattern(pattern, `unsupported time pattern ${JSON.stringify(timePart)}`);
		}
	}
	if (datePart !== undefined && !DATE_PATTERNS.has(datePart)) {
		throw invalidPattern(pattern, `unsupported date pattern ${JSON.stringify(datePart)}`);
	}

	const template: TemplatePart[] = [];
	let regex = "";
	const addTokens = (part: string): void => {
		for (const token of tokenize(part)) {
			const spec = TOKENS[token];
			if (spec) {
				template.push({ kind: "field", field: spec.field, width: spec.width });
				regex += `(?<${spec.field}>${spec.regex})`;
			} else {
				template.push({ kind: "literal", text: token });
				regex += escapeRegex(token);
			}
		}
	};

	if (datePart !== undefined) {
		addTokens(datePart);
	}
	if (joiner !== undefined) {
		template.push({ kind: "literal", text: joiner });
		regex += escapeRegex(joiner);
	}
	if (timePart !== undefined) {
		addTokens(timePart);
		if (fractionWidth > 0) {
			template.push({ kind: "fraction", width: fractionWidth });
			regex += `(?:\\.(?<fraction>[0-9]{1,${fractionWidth}})(?<excess>[0-9]*))?`;
		}
	}
	template.push({ kind: "timezone", separator: tzSeparator, marker: tzMarker });
	regex +=
		tzMarker === undefined
			? "(?<tz>Z|[+-][0-9]{2}:[0-9]{2})?"
			: `(?:${escapeRegex(tzSeparator)}(?<tz>Z|[+-][0-9]{2}(?::?[0-9]{2})?))?`;

	return {
		pattern,
		regex: new RegExp(`^${regex}$`),
		template,
		tzMarker,
		hasDate: datePart !== undefined,
		hasTime: timePart !== undefined,
	};
}

export type PatternMatch = { readonly ok: true; readonly value: DateTimeValue } | { readonly ok: false; readonly reason: string };

export function parseWithPattern(pattern: DateTimePattern, text: string, kind: TemporalKind): PatternMatch {
	const match = pattern.regex.exec(text);
	if (!match) {
		return { ok: false, reason: `does not match ${pattern.pattern}` };
	}
	const groups = match.groups ?? {};
	if (groups.excess) {
		return { ok: false, reason: `more fractional digits than ${pattern.pattern} allows` };
	}
	const num = (name: Field, fallback: number): number => (groups[name] === undefined ? fallback : Number(groups[name]));
	const fields = {
		year: num("year", 1970),
		month: num("month", 1),
		day: num("day", 1),
		hour: num("hour", 0),
		minute: num("minute", 0),
		second: num("second", 0),
		fraction: groups.fraction ?? "",
		offset: groups.tz === undefined ? undefined : parseOffset(groups.tz),
	};
	const problem = checkFields(fields);
	if (problem) {
		return { ok: false, reason: problem };
	}
	return { ok: true, value: new DateTimeValue(kind, fields) };
}

export function formatWithPattern(pattern: DateTimePattern, value: DateTimeValue): string {
	let out = "";
	for (const part of pattern.template) {
		switch (part.kind) {
			case "literal":
				out += part.text;
				break;
			case "field":
				out += pad(value[part.field], part.width);
				break;
			case "fraction":
				out += "." + value.fraction.padEnd(part.width, "0").slice(0, part.width);
				break;
			case "timezone":
				if (value.offset !== undefined) {
					out += part.marker === undefined ? isoOffset(value.offset) : part.separator + formatOffset(part.marker, value.offset);
				}
				break;
		}
	}
	return out;
}

/**
 * Renders an offset at the width the marker asks for. Uppercase markers write UTC as `Z`.
 */
export function formatOffset(marker: TimezoneMarker, offset: number): string {
	if (offset === 0 && marker.startsWith("X")) {
		return "Z";
	}
	const sign = offset < 0 ? "-" : "+";
	const abs = Math.abs(offset);
	const hours = pad(Math.floor(abs / 60), 2);
	const minutes = pad(abs % 60, 2);
	switch (marker.length) {
		case 1:
			return abs % 60 === 0 ? sign + hours : sign + hours + minutes;
		case 2:
			return sign + hours + minutes;
		default:
			return `${sign}${hours}:${minutes}`;
	}
}
