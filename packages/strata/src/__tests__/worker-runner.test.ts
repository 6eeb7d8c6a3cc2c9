import type { StrataContext, StrataLogger, StrataWorkerDefinition } from "@strata/core";
import { memoryAdapter } from "@strata/memory-adapter";
import { createFixedClock, type TestClock } from "@strata/test-utils";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildContext } from "../context/context.js";
import { MaintenanceScheduler } from "../infrastructure/maintenance-scheduler.js";
import {
	buildMaintenanceWorkers,
	parseInterval,
	StrataWorkerRunner,
} from "../infrastructure/worker-runner.js";

// ---------------------------------------------------------------------------
// parseInterval
// ---------------------------------------------------------------------------

describe("parseInterval", () => {
	it('parses "5s" to 5000 ms', () => {
		expect(parseInterval("5s")).toBe(5_000);
	});

	it('parses "1m" to 60000 ms', () => {
		expect(parseInterval("1m")).toBe(60_000);
	});

	it('parses "1d" to 86400000 ms', () => {
		expect(parseInterval("1d")).toBe(86_400_000);
	});

	it('parses "0.5h" to 1800000 ms', () => {
		expect(parseInterval("0.5h")).toBe(1_800_000);
	});

	it("throws on invalid input (no unit)", () => {
		expect(() => parseInterval("100")).toThrow(/Invalid interval/);
	});

	it("throws on invalid input (unknown unit)", () => {
		expect(() => parseInterval("5x")).toThrow(/Invalid interval/);
	});

	it("throws on invalid input (negative value)", () => {
		expect(() => parseInterval("-5s")).toThrow(/Invalid interval/);
	});

	it("throws on a zero interval", () => {
		expect(() => parseInterval("0s")).toThrow("Interval value must be positive, got 0");
	});
});

// ---------------------------------------------------------------------------
// helpers
// ---------------------------------------------------------------------------

function createMockLogger(): StrataLogger {
	return {
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	};
}

function createContext(clock: TestClock, logger: StrataLogger = createMockLogger()): StrataContext {
	return buildContext({ database: memoryAdapter({ now: clock.now }), logger, now: clock.now });
}

// ---------------------------------------------------------------------------
// buildMaintenanceWorkers
// ---------------------------------------------------------------------------

describe("buildMaintenanceWorkers", () => {
	const ctx = createContext(createFixedClock());
	const scheduler = new MaintenanceScheduler(ctx);

	it("registers both jobs with their default intervals", () => {
		const workers = buildMaintenanceWorkers({}, scheduler);
		expect(workers.map((w) => [w.id, w.interval, w.leaseRequired])).toEqual([
			["maintenance-daily", "1d", true],
			["maintenance-weekly", "7d", true],
		]);
	});

	it("honors disabled jobs and custom intervals", () => {
		const workers = buildMaintenanceWorkers({ daily: { interval: "12h" }, weekly: false }, scheduler);
		expect(workers.map((w) => [w.id, w.interval])).toEqual([["maintenance-daily", "12h"]]);
	});

	it("runs the scheduler job from the handler", async () => {
		const [daily] = buildMaintenanceWorkers({ weekly: false }, scheduler);
		if (!daily) throw new Error("daily worker missing");
		await daily.handler(ctx);

		const [run] = await ctx.adapter.findMany<{ jobName: string; status: string }>({
			model: "maintenance_run",
		});
		expect(run).toMatchObject({ jobName: "daily", status: "completed" });
	});
});

// ---------------------------------------------------------------------------
// StrataWorkerRunner
// ---------------------------------------------------------------------------

describe("StrataWorkerRunner", () => {
	let clock: TestClock;
	let logger: StrataLogger;
	let ctx: StrataContext;

	beforeEach(() => {
		clock = createFixedClock();
		logger = createMockLogger();
		ctx = createContext(clock, logger);
	});

	afterEach(() => {
		vi.useRealTimers();
		vi.restoreAllMocks();
	});

	function worker(id: string, interval: string, leaseRequired = false): StrataWorkerDefinition {
		return { id, interval, leaseRequired, handler: vi.fn().mockResolvedValue(undefined) };
	}

	it("logs the registered workers on start", async () => {
		const runner = new StrataWorkerRunner(ctx, [worker("a", "5s"), worker("b", "1m")]);
		runner.start();

		expect(logger.info).toHaveBeenCalledWith(
			"Starting worker runner",
			expect.objectContaining({ workerCount: 2, workers: ["a", "b"] }),
		);
		await runner.stop();
	});

	it("logs a message when no workers are registered", () => {
		const runner = new StrataWorkerRunner(ctx, []);
		runner.start();

		expect(logger.info).toHaveBeenCalledWith("No workers registered");
	});

	it("throws if started twice", () => {
		const runner = new StrataWorkerRunner(ctx, []);
		runner.start();

		expect(() => runner.start()).toThrow("StrataWorkerRunner is already started");
	});

	it("stop is idempotent", async () => {
		const runner = new StrataWorkerRunner(ctx, [worker("a", "1m")]);
		runner.start();

		await runner.stop();
		await runner.stop();
		expect(vi.mocked(logger.info).mock.calls.filter(([message]) => message === "Stopping worker runner")).toHaveLength(1);
	});

	it("runs a worker once its interval elapses", async () => {
		vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
		vi.spyOn(Math, "random").mockReturnValue(0.5);
		const definition = worker("tick", "1m", true);
		const runner = new StrataWorkerRunner(ctx, [definition]);
		runner.start();

		await vi.advanceTimersByTimeAsync(59_999);
		expect(definition.handler).not.toHaveBeenCalled();

		await vi.advanceTimersByTimeAsync(1);
		expect(definition.handler).toHaveBeenCalledTimes(1);
		expect(definition.handler).toHaveBeenCalledWith(ctx);

		await vi.advanceTimersByTimeAsync(60_000);
		expect(definition.handler).toHaveBeenCalledTimes(2);
		await runner.stop();
	});

	it("waits out intervals longer than the timer limit", async () => {
		vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
		vi.spyOn(Math, "random").mockReturnValue(0.5);
		const definition = worker("monthly", "30d");
		const runner = new StrataWorkerRunner(ctx, [definition]);
		runner.start();

		await vi.advanceTimersByTimeAsync(2_147_483_647);
		expect(definition.handler).not.toHaveBeenCalled();

		await vi.advanceTimersByTimeAsync(2_592_000_000 - 2_147_483_647 - 1);
		expect(definition.handler).not.toHaveBeenCalled();

		await vi.advanceTimersByTimeAsync(1);
		expect(definition.handler).toHaveBeenCalledTimes(1);
		await runner.stop();
	});

	it("logs a failing handler and keeps scheduling", async () => {
		vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
		vi.spyOn(Math, "random").mockReturnValue(0.5);
		const definition: StrataWorkerDefinition = {
			id: "flaky",
			interval: "1m",
			handler: vi.fn().mockRejectedValue(new Error("boom")),
		};
		const runner = new StrataWorkerRunner(ctx, [definition]);
		runner.start();

		await vi.advanceTimersByTimeAsync(120_000);
		expect(definition.handler).toHaveBeenCalledTimes(2);
		expect(logger.error).toHaveBeenCalledWith("Worker execution failed", {
			workerId: "flaky",
			error: "boom",
		});
		await runner.stop();
	});

	// -------------------------------------------------------------------------
	// leases
	// -------------------------------------------------------------------------

	describe("leases", () => {
		it("grants a lease to one runner until it expires", async () => {
			const first = new StrataWorkerRunner(ctx, []);
			const second = new StrataWorkerRunner(ctx, []);

			expect(await first.acquireLease("maintenance-daily", 60_000)).toBe(true);
			expect(await second.acquireLease("maintenance-daily", 60_000)).toBe(false);
			expect(await first.acquireLease("maintenance-daily", 60_000)).toBe(true);

			clock.advance(120_001);
			expect(await second.acquireLease("maintenance-daily", 60_000)).toBe(true);
			expect(await first.acquireLease("maintenance-daily", 60_000)).toBe(false);
		});

		it("keeps leases per worker", async () => {
			const first = new StrataWorkerRunner(ctx, []);
			const second = new StrataWorkerRunner(ctx, []);

			expect(await first.acquireLease("maintenance-daily", 60_000)).toBe(true);
			expect(await second.acquireLease("maintenance-weekly", 60_000)).toBe(true);
		});

		it("releases its leases on stop", async () => {
			const first = new StrataWorkerRunner(ctx, []);
			const second = new StrataWorkerRunner(ctx, []);
			first.start();

			expect(await first.acquireLease("maintenance-daily", 60_000)).toBe(true);
			await first.stop();
			expect(await second.acquireLease("maintenance-daily", 60_000)).toBe(true);
		});

		it("skips a lease-required worker held elsewhere", async () => {
			vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
			vi.spyOn(Math, "random").mockReturnValue(0.5);
			const holder = new StrataWorkerRunner(ctx, []);
			expect(await holder.acquireLease("tick", 600_000)).toBe(true);

			const definition = worker("tick", "1m", true);
			const runner = new StrataWorkerRunner(ctx, [definition]);
			runner.start();
			await vi.advanceTimersByTimeAsync(60_000);

			expect(definition.handler).not.toHaveBeenCalled();
			expect(logger.info).toHaveBeenCalledWith("Worker lease not acquired, skipping", { workerId: "tick" });
			await runner.stop();
		});
	});
});
