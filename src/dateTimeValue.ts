export type TemporalKind = "date" | "time" | "datetime";

export interface DateTimeFields {
	readonly year: number;
	readonly month: number;
	readonly day: number;
	readonly hour: number;
	readonly minute: number;
	readonly second: number;
	/** Fractional-second digits exactly as read, without the leading dot. */
	readonly fraction: string;
	/** Offset from UTC in minutes; undefined for floating (zone-less) values. */
	readonly offset: number | undefined;
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
	return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
	return month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
}

/**
 * Returns a description of what is wrong with `fields`, or undefined when they name a
 * real calendar date and wall-clock time.
 */
export function checkFields(fields: DateTimeFields): string | undefined {
	if (fields.month < 1 || fields.month > 12) {
		return `month ${fields.month} out of range`;
	}
	if (fields.day < 1 || fields.day > daysInMonth(fields.year, fields.month)) {
		return `day ${fields.day} out of range`;
	}
	if (fields.hour > 23) {
		return `hour ${fields.hour} out of range`;
	}
	if (fields.minute > 59) {
		return `minute ${fields.minute} out of range`;
	}
	if (fields.second > 59) {
		return `second ${fields.second} out of range`;
	}
	if (fields.offset !== undefined && Math.abs(fields.offset) > 14 * 60) {
		return `timezone offset out of range`;
	}
	return undefined;
}

/**
 * A decoded date, time or date-time cell.
 *
 * Keeps the fractional seconds as the digits that were read, so values of any precision
 * survive a round trip. Values compare by instant; floating values are treated as UTC.
 */
export class DateTimeValue implements DateTimeFields {
	readonly year: number;
	readonly month: number;
	readonly day: number;
	readonly hour: number;
	readonly minute: number;
	readonly second: number;
	readonly fraction: string;
	readonly offset: number | undefined;

	constructor(
		readonly kind: TemporalKind,
		fields: DateTimeFields
	) {
		this.year = fields.year;
		this.month = fields.month;
		this.day = fields.day;
		this.hour = fields.hour;
		this.minute = fields.minute;
		this.second = fields.second;
		this.fraction = fields.fraction;
		this.offset = fields.offset;
	}

	/** Milliseconds since the epoch, ignoring the fractional seconds. */
	private wholeSecondMillis(): number {
		const d = new Date(0);
		d.setUTCFullYear(this.year, this.month - 1, this.day);
		d.setUTCHours(this.hour, this.minute, this.second, 0);
		return d.getTime() - (this.offset ?? 0) * 60_000;
	}

	compareTo(other: DateTimeValue): number {
		const diff = this.wholeSecondMillis() - other.wholeSecondMillis();
		if (diff !== 0) {
			return Math.sign(diff);
		}
		const width = Math.max(this.fraction.length, other.fraction.length);
		const a = this.fraction.padEnd(width, "0");
		const b = other.fraction.padEnd(width, "0");
		return a < b ? -1 : a > b ? 1 : 0;
	}

	equals(other: DateTimeValue): boolean {
		return this.kind === other.kind && this.compareTo(other) === 0;
	}

	/** ISO 8601 / XSD rendering, used when no pattern is declared. */
	toString(): string {
		const date = `${formatYear(this.year)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
		const time =
			`${pad(this.hour, 2)}:${pad(this.minute, 2)}:${pad(this.second, 2)}` +
			(this.fraction ? `.${this.fraction}` : "");
		const zone = this.offset === undefined ? "" : isoOffset(this.offset);
		switch (this.kind) {
			case "date":
				return date + zone;
			case "time":
				return time + zone;
			case "datetime":
				return `${date}T${time}${zone}`;
		}
	}

	toJSON(): string {
		return this.toString();
	}
}

export function pad(n: number, width: number): string {
	return String(n).padStart(width, "0");
}

function formatYear(year: number): string {
	return year < 0 ? `-${pad(-year, 4)}` : pad(year, 4);
}

/** `Z` for UTC, otherwise `+hh:mm`. */
export function isoOffset(offset: number): string {
	if (offset === 0) {
		return "Z";
	}
	const sign = offset < 0 ? "-" : "+";
	const abs = Math.abs(offset);
	return `${sign}${pad(Math.floor(abs / 60), 2)}:${pad(abs % 60, 2)}`;
}

/**
 * Reads `Z`, `+hh`, `+hhmm` or `+hh:mm` into minutes east of UTC.
 */
export function parseOffset(text: string): number {
	if (text === "Z") {
		return 0;
	}
	const sign = text.startsWith("-") ? -1 : 1;
	const digits = text.slice(1).replace(":", "");
	const hours = Number(digits.slice(0, 2));
	const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
	return sign * (hours * 60 + minutes);
}
