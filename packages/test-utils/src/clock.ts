// =============================================================================
// FIXED CLOCK
// =============================================================================
// A settable clock for `StrataOptions.now`, so archival ages and partition
// months are deterministic in tests.

const DAY_MS = 86_400_000;

export interface TestClock {
	now: () => Date;
	set: (date: Date | string) => void;
	advance: (ms: number) => void;
	advanceDays: (days: number) => void;
}

export function createFixedClock(start: Date | string = "2025-09-15T12:00:00.000Z"): TestClock {
	let current = new Date(start);
	return {
		now: () => new Date(current.getTime()),
		set: (date) => {
			current = new Date(date);
		},
		advance: (ms) => {
			current = new Date(current.getTime() + ms);
		},
		advanceDays: (days) => {
			current = new Date(current.getTime() + days * DAY_MS);
		},
	};
}
