// =============================================================================
// WORKER RUNNER -- Background maintenance workers
// =============================================================================
// Runs the daily and weekly maintenance jobs on a polling loop. Lease-required
// workers take a row in `worker_lease` first so only one process in a
// cluster runs them.

import { randomUUID } from "node:crypto";
import type {
	MaintenanceWorkerOptions,
	StrataContext,
	StrataWorkerDefinition,
} from "@strata/core";
import { StrataError } from "@strata/core";
import { WORKER_LEASE_TABLE } from "../db/schema.js";
import { tryAcquireLease } from "./lease.js";
import type { MaintenanceScheduler } from "./maintenance-scheduler.js";

// =============================================================================
// INTERVAL PARSING
// =============================================================================

const INTERVAL_UNITS: Record<string, number> = {
	s: 1_000,
	m: 60_000,
	h: 3_600_000,
	d: 86_400_000,
};

/**
 * Parse a human-friendly interval string into milliseconds.
 *
 * Supported formats: "5s", "1m", "30m", "1h", "1d"
 */
export function parseInterval(interval: string): number {
	const match = interval.match(/^(\d+(?:\.\d+)?)\s*(s|m|h|d)$/);
	const unitMs = match?.[2] === undefined ? undefined : INTERVAL_UNITS[match[2]];
	if (!match || unitMs === undefined) {
		throw StrataError.invalidArgument(
			`Invalid interval "${interval}". Expected format: <number><s|m|h|d> (e.g. "5s", "1m", "1h", "1d")`,
		);
	}

	const value = Number(match[1]);
	if (value <= 0) {
		throw StrataError.invalidArgument(`Interval value must be positive, got ${value}`);
	}

	return value * unitMs;
}

// =============================================================================
// JITTER
// =============================================================================

/** Largest delay `setTimeout` accepts (2^31 - 1 ms). */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

/** Apply ±25% jitter to an interval to prevent thundering herd. */
function withJitter(ms: number): number {
	const jitterFactor = 0.75 + Math.random() * 0.5; // [0.75, 1.25]
	return Math.round(ms * jitterFactor);
}

// =============================================================================
// MAINTENANCE WORKERS
// =============================================================================

function workerInterval(option: boolean | { interval?: string } | undefined, fallback: string): string | null {
	if (option === false) return null;
	return typeof option === "object" ? (option.interval ?? fallback) : fallback;
}

/** Worker definitions for the enabled maintenance jobs. */
export function buildMaintenanceWorkers(
	options: MaintenanceWorkerOptions,
	scheduler: MaintenanceScheduler,
): StrataWorkerDefinition[] {
	const workers: StrataWorkerDefinition[] = [];

	const daily = workerInterval(options.daily, "1d");
	if (daily !== null) {
		workers.push({
			id: "maintenance-daily",
			description: "Reconcile, provision archive partitions, archive aged items, analyze",
			interval: daily,
			leaseRequired: true,
			handler: async () => {
				await scheduler.runDaily();
			},
		});
	}

	const weekly = workerInterval(options.weekly, "7d");
	if (weekly !== null) {
		workers.push({
			id: "maintenance-weekly",
			description: "Vacuum partitions, record health, apply archive retention",
			interval: weekly,
			leaseRequired: true,
			handler: async () => {
				await scheduler.runWeekly();
			},
		});
	}

	return workers;
}

// =============================================================================
// WORKER RUNNER CLASS
// =============================================================================

interface RunningWorker {
	definition: StrataWorkerDefinition;
	intervalMs: number;
	timer: ReturnType<typeof setTimeout> | null;
	running: boolean;
}

export class StrataWorkerRunner {
	private readonly ctx: StrataContext;
	private readonly definitions: StrataWorkerDefinition[];
	private readonly leaseHolder: string;
	private readonly workers: RunningWorker[] = [];
	private started = false;
	private stopped = false;

	constructor(ctx: StrataContext, definitions: StrataWorkerDefinition[]) {
		this.ctx = ctx;
		this.definitions = definitions;
		this.leaseHolder = randomUUID();
	}

	// ---------------------------------------------------------------------------
	// START
	// ---------------------------------------------------------------------------

	start(): void {
		if (this.started) {
			throw StrataError.conflict("StrataWorkerRunner is already started");
		}
		this.started = true;

		if (this.definitions.length === 0) {
			this.ctx.logger.info("No workers registered");
			return;
		}

		this.ctx.logger.info("Starting worker runner", {
			workerCount: this.definitions.length,
			leaseHolder: this.leaseHolder,
			workers: this.definitions.map((w) => w.id),
		});

		for (const definition of this.definitions) {
			const runningWorker: RunningWorker = {
				definition,
				intervalMs: parseInterval(definition.interval),
				timer: null,
				running: false,
			};
			this.workers.push(runningWorker);
			this.scheduleNext(runningWorker);
		}
	}

	// ---------------------------------------------------------------------------
	// STOP
	// ---------------------------------------------------------------------------

	async stop(): Promise<void> {
		if (this.stopped) return;
		this.stopped = true;

		this.ctx.logger.info("Stopping worker runner", {
			leaseHolder: this.leaseHolder,
		});

		for (const worker of this.workers) {
			if (worker.timer !== null) {
				clearTimeout(worker.timer);
				worker.timer = null;
			}
		}

		// Wait for currently running workers to finish (with timeout)
		const SHUTDOWN_TIMEOUT_MS = 10_000;
		const runningWorkers = this.workers.filter((w) => w.running);
		if (runningWorkers.length > 0) {
			this.ctx.logger.info("Waiting for running workers to finish", {
				count: runningWorkers.length,
				workers: runningWorkers.map((w) => w.definition.id),
			});

			let timeout: ReturnType<typeof setTimeout> | undefined;
			await Promise.race([
				Promise.all(
					runningWorkers.map(
						(w) =>
							new Promise<void>((resolve) => {
								const check = () => {
									if (!w.running) return resolve();
									setTimeout(check, 50);
								};
								check();
							}),
					),
				),
				new Promise<void>((resolve) => {
					timeout = setTimeout(() => {
						this.ctx.logger.warn("Worker shutdown timed out, proceeding", {
							stillRunning: runningWorkers.filter((w) => w.running).map((w) => w.definition.id),
						});
						resolve();
					}, SHUTDOWN_TIMEOUT_MS);
				}),
			]);
			clearTimeout(timeout);
		}

		await this.releaseAllLeases();
	}

	// ---------------------------------------------------------------------------
	// SCHEDULING
	// ---------------------------------------------------------------------------

	/** Delays beyond the timer limit are waited out in steps. */
	private scheduleNext(worker: RunningWorker, delay = withJitter(worker.intervalMs)): void {
		if (this.stopped) return;

		const step = Math.min(delay, MAX_TIMER_DELAY_MS);
		worker.timer = setTimeout(() => {
			if (delay > step) {
				this.scheduleNext(worker, delay - step);
				return;
			}
			void this.executeWorker(worker);
		}, step);
	}

	// ---------------------------------------------------------------------------
	// EXECUTION
	// ---------------------------------------------------------------------------

	private async executeWorker(worker: RunningWorker): Promise<void> {
		if (this.stopped || worker.running) return;

		worker.running = true;
		const { definition } = worker;

		try {
			if (definition.leaseRequired) {
				const acquired = await this.acquireLease(definition.id, worker.intervalMs);
				if (!acquired) {
					this.ctx.logger.info("Worker lease not acquired, skipping", {
						workerId: definition.id,
					});
					return;
				}
			}

			await definition.handler(this.ctx);
		} catch (error) {
			this.ctx.logger.error("Worker execution failed", {
				workerId: definition.id,
				error: error instanceof Error ? error.message : String(error),
			});
		} finally {
			worker.running = false;
			this.scheduleNext(worker);
		}
	}

	// ---------------------------------------------------------------------------
	// LEASE MANAGEMENT
	// ---------------------------------------------------------------------------

	/**
	 * Attempt to acquire a distributed lease for a worker. Lease duration is
	 * 2x the worker interval so it expires naturally if the owning process dies.
	 */
	async acquireLease(workerId: string, intervalMs: number): Promise<boolean> {
		const leaseUntil = new Date(this.ctx.now().getTime() + intervalMs * 2);

		try {
			return await tryAcquireLease(this.ctx, workerId, this.leaseHolder, leaseUntil);
		} catch (error) {
			this.ctx.logger.error("Failed to acquire worker lease", {
				workerId,
				error: error instanceof Error ? error.message : String(error),
			});
			return false;
		}
	}

	/** Release all leases held by this runner instance. */
	private async releaseAllLeases(): Promise<void> {
		try {
			await this.ctx.adapter.delete({
				model: WORKER_LEASE_TABLE,
				where: [{ field: "leaseHolder", operator: "eq", value: this.leaseHolder }],
			});
		} catch (error) {
			this.ctx.logger.error("Failed to release worker leases", {
				leaseHolder: this.leaseHolder,
				error: error instanceof Error ? error.message : String(error),
			});
		}
	}
}
