import type { MaintenanceWorkerOptions, ResolvedStrataOptions, StrataOptions } from "@strata/core";
import { StrataError } from "@strata/core";

// =============================================================================
// DEFAULT CONFIG VALUES
// =============================================================================

export const DEFAULT_OPTIONS: Omit<ResolvedStrataOptions, "workers"> = {
	activePartitionCount: 16,
	interactionPartitionCount: 8,
	archiveRetentionMonths: null,
	archivalAgeThresholdDays: 30,
	migrationBatchSize: 1000,
	archiveBatchSize: 1000,
	archivePartitionsAhead: 3,
	maxDepth: 10,
	statsStaleAfterDays: 7,
	deadRowRatioThreshold: 0.2,
	schema: "public",
};

const INTERVAL_PATTERN = /^\d+(?:\.\d+)?\s*[smhd]$/;

function requirePositiveInteger(name: string, value: number | undefined): void {
	if (value === undefined) return;
	if (!Number.isInteger(value) || value <= 0) {
		throw StrataError.invalidArgument(`Strata config: '${name}' must be a positive integer, got ${value}`);
	}
}

function requireNonNegativeInteger(name: string, value: number | undefined): void {
	if (value === undefined) return;
	if (!Number.isInteger(value) || value < 0) {
		throw StrataError.invalidArgument(
			`Strata config: '${name}' must be a non-negative integer, got ${value}`,
		);
	}
}

function validateWorker(name: string, value: MaintenanceWorkerOptions["daily"]): void {
	if (typeof value !== "object" || value.interval === undefined) return;
	if (!INTERVAL_PATTERN.test(value.interval)) {
		throw StrataError.invalidArgument(
			`Strata config: 'workers.${name}.interval' must look like "30m", "12h" or "1d", got "${value.interval}"`,
		);
	}
}

/**
 * Validate Strata configuration options at runtime.
 * Throws StrataError with clear messages on invalid configuration.
 */
export function validateConfig(options: StrataOptions): void {
	if (!options.database) {
		throw StrataError.invalidArgument("Strata config: 'database' adapter is required");
	}

	requirePositiveInteger("activePartitionCount", options.activePartitionCount);
	requirePositiveInteger("interactionPartitionCount", options.interactionPartitionCount);
	requirePositiveInteger("archivalAgeThresholdDays", options.archivalAgeThresholdDays);
	requirePositiveInteger("migrationBatchSize", options.migrationBatchSize);
	requirePositiveInteger("archiveBatchSize", options.archiveBatchSize);
	requireNonNegativeInteger("archivePartitionsAhead", options.archivePartitionsAhead);
	requirePositiveInteger("maxDepth", options.maxDepth);

	if (options.archiveRetentionMonths !== undefined && options.archiveRetentionMonths !== null) {
		requirePositiveInteger("archiveRetentionMonths", options.archiveRetentionMonths);
	}

	const health = options.health;
	if (health) {
		requirePositiveInteger("health.statsStaleAfterDays", health.statsStaleAfterDays);
		const ratio = health.deadRowRatioThreshold;
		if (ratio !== undefined && (!Number.isFinite(ratio) || ratio <= 0 || ratio >= 1)) {
			throw StrataError.invalidArgument(
				"Strata config: 'health.deadRowRatioThreshold' must be between 0 and 1 (exclusive)",
			);
		}
	}

	if (options.schema !== undefined) {
		if (typeof options.schema !== "string" || options.schema.length === 0) {
			throw StrataError.invalidArgument("Strata config: 'schema' must be a non-empty string");
		}
		if (!/^[a-z_][a-z0-9_]*$/.test(options.schema)) {
			throw StrataError.invalidArgument(
				`Strata config: 'schema' must contain only lower-case letters, digits and underscores, got "${options.schema}"`,
			);
		}
	}

	if (options.workers) {
		validateWorker("daily", options.workers.daily);
		validateWorker("weekly", options.workers.weekly);
	}
}

/** Merge user options over the defaults. Call after `validateConfig`. */
export function resolveOptions(options: StrataOptions): ResolvedStrataOptions {
	return {
		activePartitionCount: options.activePartitionCount ?? DEFAULT_OPTIONS.activePartitionCount,
		interactionPartitionCount:
			options.interactionPartitionCount ?? DEFAULT_OPTIONS.interactionPartitionCount,
		archiveRetentionMonths: options.archiveRetentionMonths ?? DEFAULT_OPTIONS.archiveRetentionMonths,
		archivalAgeThresholdDays:
			options.archivalAgeThresholdDays ?? DEFAULT_OPTIONS.archivalAgeThresholdDays,
		migrationBatchSize: options.migrationBatchSize ?? DEFAULT_OPTIONS.migrationBatchSize,
		archiveBatchSize: options.archiveBatchSize ?? DEFAULT_OPTIONS.archiveBatchSize,
		archivePartitionsAhead: options.archivePartitionsAhead ?? DEFAULT_OPTIONS.archivePartitionsAhead,
		maxDepth: options.maxDepth ?? DEFAULT_OPTIONS.maxDepth,
		statsStaleAfterDays: options.health?.statsStaleAfterDays ?? DEFAULT_OPTIONS.statsStaleAfterDays,
		deadRowRatioThreshold:
			options.health?.deadRowRatioThreshold ?? DEFAULT_OPTIONS.deadRowRatioThreshold,
		schema: options.schema ?? DEFAULT_OPTIONS.schema,
		workers: options.workers ?? {},
	};
}

/**
 * Identity function for defining Strata configuration with autocomplete support.
 * Validates configuration at runtime before returning.
 *
 * @example
 * ```ts
 * import { defineStrataConfig } from "strata/config";
 *
 * export default defineStrataConfig({
 *   database: drizzleAdapter(db),
 *   archiveRetentionMonths: 24,
 * });
 * ```
 */
export function defineStrataConfig(options: StrataOptions): StrataOptions {
	validateConfig(options);
	return options;
}
