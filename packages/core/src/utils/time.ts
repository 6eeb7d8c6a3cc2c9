// =============================================================================
// UTC CALENDAR HELPERS
// =============================================================================
// Archive partitions are monthly windows in UTC; every month computation goes
// through these helpers so boundaries never depend on the host timezone.

const DAY_MS = 86_400_000;

export interface YearMonth {
	year: number;
	/** 1-12 */
	month: number;
}

export function startOfUtcMonth(date: Date): Date {
	return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1));
}

/** First instant of the UTC month `offset` months after (or before) `date`'s month. */
export function addUtcMonths(date: Date, offset: number): Date {
	return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + offset, 1));
}

export function monthOf(date: Date): YearMonth {
	return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1 };
}

export function monthStart({ year, month }: YearMonth): Date {
	return new Date(Date.UTC(year, month - 1, 1));
}

export function subtractDays(date: Date, days: number): Date {
	return new Date(date.getTime() - days * DAY_MS);
}

/** Whole days elapsed between two instants, rounded down. */
export function daysBetween(earlier: Date, later: Date): number {
	return Math.floor((later.getTime() - earlier.getTime()) / DAY_MS);
}
