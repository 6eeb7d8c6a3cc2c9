export {
	activeRowCounts,
	assertCompletedAtInvariant,
	assertCrossStoreUniqueness,
} from "./assertions.js";
export { createFixedClock, type TestClock } from "./clock.js";
export {
	buildLegacyRows,
	type LegacyRowOptions,
	seedLegacyRows,
	TENANT_A,
	TENANT_B,
} from "./fixtures.js";
export {
	getTestInstance,
	silentLogger,
	type TestInstance,
	type TestInstanceOptions,
} from "./get-test-instance.js";
export {
	createRecordingAdapter,
	type RecordedCall,
	type RecordingAdapter,
} from "./recording-adapter.js";
