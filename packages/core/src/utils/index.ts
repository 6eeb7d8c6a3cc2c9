export { chunk, IN_LIST_CHUNK_SIZE } from "./array.js";
export { generateId } from "./id.js";
export {
	HASH_PARTITION_SEED,
	hashBytesExtended,
	isUuid,
	partitionFor,
	partitionKeyBytes,
	partitionRowHash,
} from "./partition-hash.js";
export {
	addUtcMonths,
	daysBetween,
	monthOf,
	monthStart,
	startOfUtcMonth,
	subtractDays,
	type YearMonth,
} from "./time.js";
export {
	requireIntegerInRange,
	requireNonNegativeInteger,
	requirePositiveInteger,
	requireRatio,
	requireTenantKey,
	requireText,
	requireValidDate,
	resolveLimit,
	resolveOffset,
} from "./validate.js";
