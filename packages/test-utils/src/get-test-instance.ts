import type { StrataLogger, StrataOptions } from "@strata/core";
import { memoryAdapter } from "@strata/memory-adapter";
import { createStrata, type Strata } from "strata";
import { createFixedClock, type TestClock } from "./clock.js";
import { createRecordingAdapter, type RecordingAdapter } from "./recording-adapter.js";

export interface TestInstanceOptions extends Partial<Omit<StrataOptions, "database" | "now">> {
	/** Start time of the fixed clock. Default: 2025-09-15T12:00:00Z */
	now?: Date | string;
}

export interface TestInstance {
	/** The strata instance */
	strata: Strata;
	/** Memory adapter wrapped to record every model it touches */
	adapter: RecordingAdapter;
	clock: TestClock;
	/** Cleanup function -- call in afterEach/afterAll */
	cleanup: () => Promise<void>;
}

export const silentLogger: StrataLogger = {
	info: () => {},
	warn: () => {},
	error: () => {},
	debug: () => {},
};

/** A Strata instance over an in-memory database with a fixed clock. */
export async function getTestInstance(options: TestInstanceOptions = {}): Promise<TestInstance> {
	const { now, ...rest } = options;
	const clock = createFixedClock(now);
	const adapter = createRecordingAdapter(memoryAdapter({ now: clock.now }));

	const strata = createStrata({
		logger: silentLogger,
		...rest,
		database: adapter,
		now: clock.now,
	});

	// Wait for initialization
	await strata.$context;
	adapter.reset();

	return {
		strata,
		adapter,
		clock,
		cleanup: async () => {
			await strata.workers.stop();
		},
	};
}
