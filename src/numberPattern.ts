import Decimal from "decimal.js";
import { InvalidDescriptionError } from "./errors";

/**
 * A CLDR decimal format pattern, such as `#,##0.00` or `0.###E0`, with an optional `;`
 * negative sub-pattern.
 *
 * Patterns always use `,` for grouping and `.` for the decimal point; callers translate a
 * datatype's groupChar/decimalChar before asking {@link NumberPattern.isValid}.
 */
export class NumberPattern {
	readonly positive: string;
	readonly negative: string;
	private readonly explicitNegative: boolean;

	/** Width of the group nearest the decimal point, when the pattern groups at all. */
	readonly primaryGroupingSize: number | undefined;
	readonly secondaryGroupingSize: number | undefined;
	readonly minDigitsBeforeDecimalPoint: number | undefined;
	readonly decimalDigits: number;
	readonly significantDecimalDigits: number;
	readonly exponentDigits: number;

	constructor(readonly pattern: string) {
		const parts = pattern.split(";");
		if (parts.length > 2) {
			throw new InvalidDescriptionError(`Invalid number pattern ${JSON.stringify(pattern)}: more than one ";"`);
		}
		if (!/[0#]/.test(parts[0])) {
			throw new InvalidDescriptionError(`Invalid number pattern ${JSON.stringify(pattern)}: no digit placeholder`);
		}
		this.positive = parts[0];
		this.explicitNegative = Boolean(parts[1]);
		this.negative = parts[1] || "-" + this.positive.replaceAll("+", "");

		const integral = this.positive.split(".")[0];
		const groups = integral.split(",");
		this.primaryGroupingSize = groups.length > 1 ? countPlaceholders(groups[groups.length - 1]) : undefined;
		this.secondaryGroupingSize = groups.length > 2 ? countPlaceholders(groups[1]) : this.primaryGroupingSize;
		const zeros = /(0+)$/.exec(integral);
		this.minDigitsBeforeDecimalPoint = zeros ? zeros[1].length : undefined;

		const decimalPart = this.positive.includes(".") ? this.positive.slice(this.positive.indexOf(".") + 1) : "";
		let decimalDigits = 0;
		for (const c of decimalPart) {
			if (c === "E") {
				break;
			}
			if (c === "#" || c === "0") {
				decimalDigits++;
			}
		}
		this.decimalDigits = decimalDigits;

		let significant = 0;
		for (const c of decimalPart) {
			if (c === "E" || c === "#") {
				break;
			}
			if (c === "0") {
				significant++;
			}
		}
		this.significantDecimalDigits = significant;

		const lower = this.positive.toLowerCase();
		const exponent = lower.includes("e") ? lower.slice(lower.indexOf("e") + 1) : "";
		let exponentDigits = 0;
		for (const c of exponent) {
			if (c === "0" || c === "#") {
				exponentDigits++;
			} else if (c !== ",") {
				break;
			}
		}
		this.exponentDigits = exponentDigits;
	}

	/**
	 * Whether `s`, already normalized to `,` grouping and `.` decimal point, has the shape
	 * the pattern describes.
	 */
	isValid(s: string): boolean {
		const dot = s.indexOf(".");
		const integralPart = dot >= 0 ? s.slice(0, dot) : s;
		const rest = dot >= 0 ? s.slice(dot + 1).toLowerCase() : "";
		const decimalPart = rest.includes("e") ? rest.slice(0, rest.indexOf("e")) : rest;
		const groups = integralPart.split(",");

		const significant: string[] = [];
		let leadingZero = false;
		let skip = true;
		for (const c of groups.join("")) {
			if (c === "+" || c === "-" || c === "%") {
				continue;
			}
			if (c === "0" && skip) {
				leadingZero = true;
				continue;
			}
			if (c !== "0") {
				skip = false;
			}
			significant.push(c);
		}
		if (significant.length === 0 && leadingZero) {
			significant.push("0");
		}

		if (this.minDigitsBeforeDecimalPoint && significant.length < this.minDigitsBeforeDecimalPoint) {
			return false;
		}
		if (this.primaryGroupingSize) {
			const last = digitCount(groups[groups.length - 1]);
			if (last > this.primaryGroupingSize) {
				return false;
			}
			if (groups.length > 1 && last < this.primaryGroupingSize) {
				return false;
			}
		}
		if (this.secondaryGroupingSize && groups.length > 1) {
			for (const [i, group] of groups.slice(0, -1).entries()) {
				const n = digitCount(group);
				if (i === 0 ? n > this.secondaryGroupingSize : n !== this.secondaryGroupingSize) {
					return false;
				}
			}
		}
		if (decimalPart && digitCount(decimalPart) > this.decimalDigits) {
			return false;
		}
		if (this.significantDecimalDigits) {
			if (!decimalPart || digitCount(decimalPart) < this.significantDecimalDigits) {
				return false;
			}
		}
		const lower = s.toLowerCase();
		if (this.exponentDigits && lower.includes("e")) {
			const exponent = lower.split("e");
			if (digitCount(exponent[exponent.length - 1]) > this.exponentDigits) {
				return false;
			}
		}
		return true;
	}

	/**
	 * Renders a finite decimal in the shape of the pattern, using `,` and `.`.
	 */
	format(value: Decimal): string {
		const negative = value.isNegative() && !value.isZero();
		let abs = value.abs();
		if (this.positive.includes("%")) {
			abs = abs.times(100);
		} else if (this.positive.includes("‰")) {
			abs = abs.times(1000);
		}

		const minInt = this.minDigitsBeforeDecimalPoint ?? 0;
		let exponentText = "";
		if (this.exponentDigits > 0) {
			let exp = 0;
			if (!abs.isZero()) {
				exp = Number(abs.toExponential().split("e")[1]) - (Math.max(minInt, 1) - 1);
				abs = abs.div(new Decimal(10).pow(exp));
			}
			const sign = exp < 0 ? "-" : this.positive.includes("E+") ? "+" : "";
			exponentText = "E" + sign + String(Math.abs(exp)).padStart(this.exponentDigits, "0");
		}

		const fixed = abs.toFixed(this.decimalDigits, Decimal.ROUND_HALF_EVEN);
		let [integerDigits, fractionDigits = ""] = fixed.split(".");
		while (fractionDigits.length > this.significantDecimalDigits && fractionDigits.endsWith("0")) {
			fractionDigits = fractionDigits.slice(0, -1);
		}
		if (integerDigits === "0" && minInt === 0 && fractionDigits) {
			integerDigits = "";
		}
		integerDigits = integerDigits.padStart(minInt, "0");

		const number =
			group(integerDigits, this.primaryGroupingSize, this.secondaryGroupingSize) +
			(fractionDigits ? "." + fractionDigits : "") +
			exponentText;
		const body = number === "" ? "0" : number;

		if (!negative) {
			return affixes(this.positive).prefix + body + affixes(this.positive).suffix;
		}
		if (this.explicitNegative) {
			return affixes(this.negative).prefix + body + affixes(this.negative).suffix;
		}
		return "-" + affixes(this.positive).prefix + body + affixes(this.positive).suffix;
	}
}

function countPlaceholders(s: string): number {
	return [...s].filter((c) => c === "#" || c === "0").length;
}

function digitCount(s: string): number {
	return [...s].filter((c) => !".,E+-%‰".includes(c)).length;
}

function affixes(subPattern: string): { prefix: string; suffix: string } {
	const prefix = /^[^0#,.]*/.exec(subPattern)?.[0] ?? "";
	const suffix = /[^0#,.E+]*$/.exec(subPattern)?.[0] ?? "";
	return { prefix: prefix.replaceAll("+", ""), suffix };
}

function group(digits: string, primary: number | undefined, secondary: number | undefined): string {
	if (!primary || digits.length <= primary) {
		return digits;
	}
	const size = secondary || primary;
	const parts = [digits.slice(-primary)];
	let rest = digits.slice(0, -primary);
	while (rest.length > size) {
		parts.unshift(rest.slice(-size));
		rest = rest.slice(0, -size);
	}
	if (rest) {
		parts.unshift(rest);
	}
	return parts.join(",");
}
