import type { StrataAdapter, StrataLogger } from "@strata/core";
import { memoryAdapter } from "@strata/memory-adapter";
import { describe, expect, it, vi } from "vitest";
import { buildContext } from "../context/context.js";

// =============================================================================
// HELPERS
// =============================================================================

function createMockLogger(): StrataLogger {
	return {
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	};
}

/** A memory adapter that reports itself as a SQL dialect, so the context sets its schema. */
function createSqlLikeAdapter(): StrataAdapter {
	return { ...memoryAdapter(), options: { dialectName: "postgres" } };
}

// =============================================================================
// CONTEXT TESTS
// =============================================================================

describe("buildContext", () => {
	it("uses the provided adapter directly when it is an adapter instance", () => {
		const adapter = memoryAdapter();
		const ctx = buildContext({ database: adapter });

		expect(ctx.adapter).toBe(adapter);
		expect(ctx.adapter.id).toBe("memory");
	});

	it("calls the factory function when database is a function", () => {
		const adapter = memoryAdapter();
		const factory = vi.fn(() => adapter);
		const ctx = buildContext({ database: factory });

		expect(factory).toHaveBeenCalledOnce();
		expect(ctx.adapter).toBe(adapter);
	});

	it("rejects invalid configuration before touching the adapter", () => {
		const factory = vi.fn(() => memoryAdapter());
		expect(() => buildContext({ database: factory, activePartitionCount: 0 })).toThrow(
			"Strata config: 'activePartitionCount' must be a positive integer, got 0",
		);
		expect(factory).not.toHaveBeenCalled();
	});

	// =========================================================================
	// LOGGER
	// =========================================================================

	describe("logger", () => {
		it("creates a default logger when not provided", () => {
			const ctx = buildContext({ database: memoryAdapter() });

			expect(typeof ctx.logger.info).toBe("function");
			expect(() => ctx.logger.debug("test", { key: "value" })).not.toThrow();
		});

		it("uses custom logger when provided", () => {
			const customLogger = createMockLogger();
			const ctx = buildContext({ database: memoryAdapter(), logger: customLogger });

			expect(ctx.logger).toBe(customLogger);
		});

		it("notes disabled archive retention", () => {
			const customLogger = createMockLogger();
			buildContext({ database: memoryAdapter(), logger: customLogger });

			expect(customLogger.debug).toHaveBeenCalledWith(
				"Archive retention is disabled; archive partitions are never dropped",
			);
		});

		it("stays quiet about retention when it is configured", () => {
			const customLogger = createMockLogger();
			buildContext({ database: memoryAdapter(), logger: customLogger, archiveRetentionMonths: 24 });

			expect(customLogger.debug).not.toHaveBeenCalled();
		});
	});

	// =========================================================================
	// OPTIONS
	// =========================================================================

	describe("options", () => {
		it("has the documented defaults", () => {
			const ctx = buildContext({ database: memoryAdapter() });

			expect(ctx.options).toEqual({
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
				workers: {},
			});
		});

		it("flattens health thresholds", () => {
			const ctx = buildContext({
				database: memoryAdapter(),
				health: { statsStaleAfterDays: 3, deadRowRatioThreshold: 0.4 },
			});

			expect(ctx.options.statsStaleAfterDays).toBe(3);
			expect(ctx.options.deadRowRatioThreshold).toBe(0.4);
		});

		it("passes the schema to SQL adapters", () => {
			const adapter = createSqlLikeAdapter();
			buildContext({ database: adapter, schema: "todo_store" });

			expect(adapter.options?.schema).toBe("todo_store");
		});
	});

	// =========================================================================
	// CLOCK
	// =========================================================================

	describe("clock", () => {
		it("uses the configured clock", () => {
			const fixed = new Date("2025-09-15T12:00:00.000Z");
			const ctx = buildContext({ database: memoryAdapter(), now: () => fixed });

			expect(ctx.now()).toBe(fixed);
		});

		it("defaults to the wall clock", () => {
			const before = Date.now();
			const ctx = buildContext({ database: memoryAdapter() });

			expect(ctx.now().getTime()).toBeGreaterThanOrEqual(before);
		});
	});
});
