import {
	type Basetype,
	type BasetypeName,
	type CellValue,
	type Codec,
	compileFormatRegex,
	describeValue,
	invalid,
	patternOf,
} from "./codec";
import { compileDateTimePattern, formatWithPattern, parseWithPattern } from "./dateTimePattern";
import { DateTimeValue, checkFields, parseOffset, type TemporalKind } from "./dateTimeValue";
import { Duration, type DurationComponent } from "./duration";
import { InvalidDescriptionError } from "./errors";

// === Date and time ===

const ISO_DATETIME =
	/^(-?[0-9]{4,})-([0-9]{2})-([0-9]{2})T([0-9]{2}):([0-9]{2}):([0-9]{2})(?:\.([0-9]+))?(Z|[+-][0-9]{2}:[0-9]{2})?$/;

interface TemporalOptions {
	readonly kind: TemporalKind;
	readonly example: string;
	/** Pattern used when the datatype declares none; ISO 8601 date-time when absent. */
	readonly defaultPattern?: string;
	readonly requireTimezone?: boolean;
}

function asDateTime(name: BasetypeName, value: CellValue): DateTimeValue {
	if (!(value instanceof DateTimeValue)) {
		throw invalid(name, describeValue(value), "not a date/time value");
	}
	return value;
}

function parseIsoDateTime(name: BasetypeName, text: string): DateTimeValue {
	const m = ISO_DATETIME.exec(text);
	if (!m) {
		throw invalid(name, text);
	}
	const fields = {
		year: Number(m[1]),
		month: Number(m[2]),
		day: Number(m[3]),
		hour: Number(m[4]),
		minute: Number(m[5]),
		second: Number(m[6]),
		fraction: m[7] ?? "",
		offset: m[8] === undefined ? undefined : parseOffset(m[8]),
	};
	const problem = checkFields(fields);
	if (problem) {
		throw invalid(name, text, problem);
	}
	return new DateTimeValue("datetime", fields);
}

function temporal(name: BasetypeName, options: TemporalOptions): Basetype {
	const compare = (a: CellValue, b: CellValue): number => asDateTime(name, a).compareTo(asDateTime(name, b));
	const requireZone = (text: string, value: DateTimeValue): DateTimeValue => {
		if (options.requireTimezone && value.offset === undefined) {
			throw invalid(name, text, "timezone required");
		}
		return value;
	};

	return {
		name,
		family: "temporal",
		example: options.example,
		ordered: true,
		derive(format): Codec {
			const patternText = patternOf(name, format) ?? options.defaultPattern;
			if (patternText === undefined) {
				return {
					parse: (text) => requireZone(text, parseIsoDateTime(name, text)),
					format: (value) => asDateTime(name, value).toString(),
					compare,
				};
			}

			const pattern = compileDateTimePattern(patternText);
			if (options.kind === "date" && (pattern.hasTime || !pattern.hasDate)) {
				throw new InvalidDescriptionError(`${name} format must be a date pattern: ${patternText}`);
			}
			if (options.kind === "time" && pattern.hasDate) {
				throw new InvalidDescriptionError(`${name} format must be a time pattern: ${patternText}`);
			}
			if (options.kind === "datetime" && !pattern.hasDate) {
				throw new InvalidDescriptionError(`${name} format must contain a date: ${patternText}`);
			}
			if (options.requireTimezone && pattern.tzMarker === undefined) {
				throw new InvalidDescriptionError(`${name} format must end in a timezone marker: ${patternText}`);
			}

			return {
				parse(text) {
					const result = parseWithPattern(pattern, text, options.kind);
					if (!result.ok) {
						throw invalid(name, text, result.reason);
					}
					return requireZone(text, result.value);
				},
				format: (value) => formatWithPattern(pattern, asDateTime(name, value)),
				compare,
			};
		},
	};
}

// === Durations ===

function asDuration(name: BasetypeName, value: CellValue): Duration {
	if (!(value instanceof Duration)) {
		throw invalid(name, describeValue(value), "not a duration");
	}
	return value;
}

function duration(name: BasetypeName, example: string, allowed?: readonly DurationComponent[]): Basetype {
	return {
		name,
		family: "duration",
		example,
		ordered: true,
		derive(format): Codec {
			const regex = compileFormatRegex(name, format);
			return {
				parse(text) {
					if (regex && !regex.test(text)) {
						throw invalid(name, text, `does not match ${regex.source}`);
					}
					const value = Duration.parse(text);
					if (!value) {
						throw invalid(name, text);
					}
					const extra = value.components.filter((c) => allowed && !allowed.includes(c));
					if (extra.length > 0) {
						throw invalid(name, text, `${extra.join(", ")} not allowed`);
					}
					return value;
				},
				format: (value) => asDuration(name, value).toString(),
				compare: (a, b) => asDuration(name, a).compareTo(asDuration(name, b)),
			};
		},
	};
}

export const TEMPORAL_BASETYPES = {
	date: temporal("date", { kind: "date", example: "2012-12-01", defaultPattern: "yyyy-MM-dd" }),
	datetime: temporal("datetime", { kind: "datetime", example: "2012-12-01T12:30:00" }),
	dateTime: temporal("dateTime", { kind: "datetime", example: "2012-12-01T12:30:00" }),
	dateTimeStamp: temporal("dateTimeStamp", {
		kind: "datetime",
		example: "2012-12-01T12:30:00Z",
		requireTimezone: true,
	}),
	time: temporal("time", { kind: "time", example: "12:30:00", defaultPattern: "HH:mm:ss" }),
	duration: duration("duration", "P3Y6M4DT12H30M5S"),
	dayTimeDuration: duration("dayTimeDuration", "P1DT2H", ["days", "hours", "minutes", "seconds"]),
	yearMonthDuration: duration("yearMonthDuration", "P1Y2M", ["years", "months"]),
} satisfies Partial<Record<BasetypeName, Basetype>>;
