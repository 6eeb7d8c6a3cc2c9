import { describe, expect, it } from "vitest";
import { StrataError } from "../error/index.js";
import { chunk } from "../utils/array.js";
import { addUtcMonths, daysBetween, monthOf, startOfUtcMonth, subtractDays } from "../utils/time.js";
import {
	requireIntegerInRange,
	requirePositiveInteger,
	requireTenantKey,
	requireText,
	resolveLimit,
	resolveOffset,
} from "../utils/validate.js";

describe("time helpers", () => {
	it("computes UTC month boundaries", () => {
		const date = new Date("2025-03-31T23:30:00Z");
		expect(startOfUtcMonth(date).toISOString()).toBe("2025-03-01T00:00:00.000Z");
		expect(addUtcMonths(date, 1).toISOString()).toBe("2025-04-01T00:00:00.000Z");
		expect(addUtcMonths(date, -3).toISOString()).toBe("2024-12-01T00:00:00.000Z");
		expect(addUtcMonths(date, 10).toISOString()).toBe("2026-01-01T00:00:00.000Z");
		expect(monthOf(date)).toEqual({ year: 2025, month: 3 });
	});

	it("subtracts and counts days", () => {
		const now = new Date("2025-03-15T12:00:00Z");
		expect(subtractDays(now, 30).toISOString()).toBe("2025-02-13T12:00:00.000Z");
		expect(daysBetween(new Date("2025-03-01T12:00:00Z"), now)).toBe(14);
	});
});

describe("validators", () => {
	it("accepts valid values", () => {
		expect(requirePositiveInteger("batchSize", 10)).toBe(10);
		expect(requireIntegerInRange("priority", 5, 1, 5)).toBe(5);
		expect(requireText("title", "  Buy milk  ", 500)).toBe("Buy milk");
		expect(requireTenantKey("tenantKey", "tenant-1")).toBe("tenant-1");
	});

	it("raises INVALID_ARGUMENT for bad values", () => {
		expect(() => requirePositiveInteger("batchSize", 0)).toThrow("batchSize must be a positive integer, got 0");
		expect(() => requireIntegerInRange("priority", 6, 1, 5)).toThrow(StrataError);
		expect(() => requireText("title", "   ")).toThrow("title must not be empty");
		expect(() => requireTenantKey("userId", "")).toThrow("userId must not be empty");
		expect(() => requireTenantKey("userId", "tenant-1\n")).toThrow(
			"userId must not have leading or trailing whitespace",
		);
		expect(() => requireText("title", "x".repeat(501), 500)).toThrow(
			"title must be at most 500 characters",
		);
	});

	it("resolves page sizes", () => {
		expect(resolveLimit(undefined, 50, 500)).toBe(50);
		expect(resolveLimit(1000, 50, 500)).toBe(500);
		expect(resolveOffset(undefined)).toBe(0);
		expect(() => resolveOffset(-1)).toThrow(StrataError);
	});
});

describe("chunk", () => {
	it("splits values into bounded slices in order", () => {
		expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
		expect(chunk([], 2)).toEqual([]);
		expect(chunk(Array.from({ length: 2_500 }, (_, i) => i)).map((slice) => slice.length)).toEqual([
			1_000, 1_000, 500,
		]);
	});

	it("rejects a size below one", () => {
		expect(() => chunk([1], 0)).toThrow("chunk size must be a positive integer, got 0");
	});
});
