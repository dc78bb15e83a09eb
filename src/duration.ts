import Decimal from "decimal.js";

const DURATION = /^(-)?P(?!$)(?:([0-9]+)Y)?(?:([0-9]+)M)?(?:([0-9]+)D)?(?:T(?!$)(?:([0-9]+)H)?(?:([0-9]+)M)?(?:([0-9]+(?:\.[0-9]+)?)S)?)?$/;

export type DurationComponent = "years" | "months" | "days" | "hours" | "minutes" | "seconds";

/**
 * An ISO 8601 duration such as `P3Y6M4DT12H30M5S`.
 *
 * Components that were not written stay absent, so `P1M` and `PT1M` keep apart and a value
 * renders back the way it was read.
 */
export class Duration {
	constructor(
		readonly negative: boolean,
		readonly years: number | undefined,
		readonly months: number | undefined,
		readonly days: number | undefined,
		readonly hours: number | undefined,
		readonly minutes: number | undefined,
		readonly seconds: Decimal | undefined
	) {}

	static parse(text: string): Duration | undefined {
		const m = DURATION.exec(text);
		if (!m) {
			return undefined;
		}
		const int = (s: string | undefined): number | undefined => (s === undefined ? undefined : Number(s));
		return new Duration(
			m[1] === "-",
			int(m[2]),
			int(m[3]),
			int(m[4]),
			int(m[5]),
			int(m[6]),
			m[7] === undefined ? undefined : new Decimal(m[7])
		);
	}

	/** The components that were given, in order. */
	get components(): DurationComponent[] {
		const all: [DurationComponent, unknown][] = [
			["years", this.years],
			["months", this.months],
			["days", this.days],
			["hours", this.hours],
			["minutes", this.minutes],
			["seconds", this.seconds],
		];
		return all.filter(([, v]) => v !== undefined).map(([k]) => k);
	}

	/**
	 * Approximate length in seconds, with 365.2425-day years and 30.436875-day months.
	 * Only used to order durations against each other.
	 */
	totalSeconds(): Decimal {
		const total = new Decimal(this.years ?? 0)
			.times(365.2425)
			.plus(new Decimal(this.months ?? 0).times(30.436875))
			.plus(this.days ?? 0)
			.times(86400)
			.plus((this.hours ?? 0) * 3600 + (this.minutes ?? 0) * 60)
			.plus(this.seconds ?? 0);
		return this.negative ? total.negated() : total;
	}

	compareTo(other: Duration): number {
		return this.totalSeconds().comparedTo(other.totalSeconds());
	}

	toString(): string {
		let date = "";
		if (this.years !== undefined) date += `${this.years}Y`;
		if (this.months !== undefined) date += `${this.months}M`;
		if (this.days !== undefined) date += `${this.days}D`;
		let time = "";
		if (this.hours !== undefined) time += `${this.hours}H`;
		if (this.minutes !== undefined) time += `${this.minutes}M`;
		if (this.seconds !== undefined) time += `${this.seconds.toFixed()}S`;
		const body = date + (time ? "T" + time : "");
		return `${this.negative ? "-" : ""}P${body || "0D"}`;
	}

	toJSON(): string {
		return this.toString();
	}
}
