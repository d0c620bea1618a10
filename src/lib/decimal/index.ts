/**
 * LibDecimal — domain-agnostic wrapper around decimal.js-light.
 *
 * Strikes, premiums, exposures and losses are summed and compared here so
 * that limit checks never drift on IEEE 754 rounding. Domain code reaches
 * it through the shared/decimal facade, never importing decimal.js-light
 * directly.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40 });

export class LibDecimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * Creates a LibDecimal from a string or number.
	 * @throws Error if value is not finite (for numbers) or empty (for strings)
	 * @example LibDecimal.from("435.5")
	 */
	static from(value: string | number): LibDecimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("LibDecimal.from: empty string");
		}
		return new LibDecimal(new DecimalLight(trimmed));
	}

	static zero(): LibDecimal {
		return new LibDecimal(new DecimalLight(0));
	}

	/** Sums a list of values; the empty list sums to zero. */
	static sum(values: readonly LibDecimal[]): LibDecimal {
		return values.reduce((acc, v) => acc.add(v), LibDecimal.zero());
	}

	static min(a: LibDecimal, b: LibDecimal): LibDecimal {
		return a.lte(b) ? a : b;
	}

	static max(a: LibDecimal, b: LibDecimal): LibDecimal {
		return a.gte(b) ? a : b;
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.plus(other.raw));
	}

	sub(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.minus(other.raw));
	}

	mul(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.times(other.raw));
	}

	/**
	 * Divides this value by another LibDecimal (immutable).
	 * @throws Error if dividing by zero
	 */
	div(other: LibDecimal): LibDecimal {
		if (other.raw.isZero()) {
			throw new Error("LibDecimal.div: division by zero");
		}
		return new LibDecimal(this.raw.dividedBy(other.raw));
	}

	abs(): LibDecimal {
		return new LibDecimal(this.raw.absoluteValue());
	}

	// ── Comparison ─────────────────────────────────────────────────

	eq(other: LibDecimal): boolean {
		return this.raw.equals(other.raw);
	}

	gt(other: LibDecimal): boolean {
		return this.raw.greaterThan(other.raw);
	}

	gte(other: LibDecimal): boolean {
		return this.raw.greaterThanOrEqualTo(other.raw);
	}

	lt(other: LibDecimal): boolean {
		return this.raw.lessThan(other.raw);
	}

	lte(other: LibDecimal): boolean {
		return this.raw.lessThanOrEqualTo(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	isNegative(): boolean {
		return this.raw.lessThan(0);
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Converts to a string without trailing zeros.
	 * @example LibDecimal.from("440.50").toString() // "440.5"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	/** Converts to a JavaScript number. Lossy; use for scores and ratios, not money. */
	toNumber(): number {
		return this.raw.toNumber();
	}

	/** Audit journals and events serialize decimals as plain strings. */
	toJSON(): string {
		return this.toString();
	}
}
