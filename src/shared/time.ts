/**
 * Time utilities — injectable clock and trade-date bucketing.
 *
 * All staging code uses Clock.now() instead of Date.now() directly,
 * enabling time manipulation in tests without monkey-patching globals.
 */

/** Injectable time source -- all staging code depends on this instead of `Date.now()`. */
export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing -- advance time manually with `advance()`. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

// ── Trade dates ──────────────────────────────────────────────────────

/** Calendar date of a trading session, formatted `YYYY-MM-DD`. */
export type TradeDate = string;

/** Exchange time zone used when no other is configured. */
export const DEFAULT_TRADING_TIME_ZONE = "America/New_York";

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
	const cached = formatters.get(timeZone);
	if (cached) return cached;
	// en-CA formats dates as YYYY-MM-DD
	const created = new Intl.DateTimeFormat("en-CA", {
		timeZone,
		year: "numeric",
		month: "2-digit",
		day: "2-digit",
	});
	formatters.set(timeZone, created);
	return created;
}

/**
 * Trade date of an instant in the given IANA time zone.
 * @throws RangeError if the time zone is unknown
 * @example tradeDateOf(Date.UTC(2024, 0, 16, 3, 0), "America/New_York") // "2024-01-15"
 */
export function tradeDateOf(epochMs: number, timeZone: string = DEFAULT_TRADING_TIME_ZONE): TradeDate {
	return formatterFor(timeZone).format(new Date(epochMs));
}

/** True when the time zone is known to the runtime's Intl data. */
export function isValidTimeZone(timeZone: string): boolean {
	try {
		formatterFor(timeZone);
		return true;
	} catch {
		return false;
	}
}
