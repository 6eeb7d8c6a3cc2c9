import type { Item, Where } from "@strata/core";
import {
	assertCrossStoreUniqueness,
	getTestInstance,
	TENANT_A,
	type TestInstance,
} from "@strata/test-utils";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { insertArchived } from "../managers/archive-store.js";

let t: TestInstance;

beforeEach(async () => {
	t = await getTestInstance();
});

afterEach(async () => {
	vi.restoreAllMocks();
	await t.cleanup();
});

// =============================================================================
// DAILY
// =============================================================================

describe("maintenance.runDaily", () => {
	it("provisions the archive months ahead on a fresh database", async () => {
		const { run, error } = await t.strata.maintenance.runDaily();

		expect(error).toBeNull();
		expect(run).toMatchObject({
			jobName: "daily",
			status: "completed",
			failedStep: null,
			details: "reconciled 0 duplicates; created 4 partitions; archived 0 items; analyzed 4 partitions",
			startedAt: new Date("2025-09-15T12:00:00.000Z"),
			completedAt: new Date("2025-09-15T12:00:00.000Z"),
		});
		expect((await t.strata.archive.listPartitions()).map((p) => p.name)).toEqual([
			"todo_archived_y2025m09",
			"todo_archived_y2025m10",
			"todo_archived_y2025m11",
			"todo_archived_y2025m12",
		]);
	});

	it("archives done items once they reach the age threshold", async () => {
		const done = await t.strata.items.create({ userId: TENANT_A, title: "Closed", status: "done" });
		const open = await t.strata.items.create({ userId: TENANT_A, title: "Open" });

		t.clock.advanceDays(29);
		expect((await t.strata.maintenance.runDaily()).run.details).toContain("archived 0 items");

		t.clock.set("2025-10-15T12:00:00.000Z");
		const { run } = await t.strata.maintenance.runDaily();
		expect(run.details).toBe(
			"reconciled 0 duplicates; created 0 partitions; archived 1 item; analyzed 2 partitions",
		);

		expect(await t.strata.items.get(done.id, TENANT_A)).toBeNull();
		expect(await t.strata.items.get(open.id, TENANT_A)).not.toBeNull();
		const archived = await t.strata.archive.get(done.id, TENANT_A);
		expect(archived?.archivedAt).toEqual(new Date("2025-10-15T12:00:00.000Z"));
		expect(archived?.completedAt).toEqual(new Date("2025-09-15T12:00:00.000Z"));
		await assertCrossStoreUniqueness(t.strata);
	});

	it("provisions and archives in the same run", async () => {
		await t.strata.items.create({ userId: TENANT_A, title: "Closed", status: "done" });
		t.clock.advanceDays(30);

		const { run } = await t.strata.maintenance.runDaily();
		expect(run.details).toBe(
			"reconciled 0 duplicates; created 4 partitions; archived 1 item; analyzed 5 partitions",
		);
	});

	it("moves eligible items in batches", async () => {
		const batched = await getTestInstance({ archiveBatchSize: 2 });
		for (let i = 0; i < 5; i++) {
			await batched.strata.items.create({ userId: TENANT_A, title: `Done ${i}`, status: "done" });
		}
		batched.clock.advanceDays(31);

		const { run } = await batched.strata.maintenance.runDaily();
		expect(run.details).toContain("archived 5 items");
		expect(await batched.strata.archive.query({ tenantKey: TENANT_A })).toMatchObject({ total: 5 });
		await batched.cleanup();
	});

	it("removes the Active copy of an id that is also archived", async () => {
		const ctx = await t.strata.$context;
		await t.strata.archive.provisionAhead(0);
		const item = await t.strata.items.create({ userId: TENANT_A, title: "Copied", status: "done" });
		await insertArchived(ctx, item, ctx.now());

		const { run } = await t.strata.maintenance.runDaily();
		expect(run.details).toBe(
			"reconciled 1 duplicate; created 3 partitions; archived 0 items; analyzed 4 partitions",
		);
		expect(await t.strata.items.get(item.id, TENANT_A)).toBeNull();
		expect((await t.strata.items.find(item.id, TENANT_A))?.location).toBe("archive");
	});

	it("reconciles a large partition in bounded id lists", async () => {
		const ctx = await t.strata.$context;
		await t.strata.archive.provisionAhead(0);
		const completedAt = ctx.now();
		const items: Item[] = Array.from({ length: 2_500 }, (_, i) => ({
			id: `00000000-0000-4000-8000-${String(i + 1).padStart(12, "0")}`,
			userId: TENANT_A,
			parentId: null,
			projectId: null,
			title: `Done ${i + 1}`,
			description: null,
			status: "done",
			priority: 3,
			dueDate: null,
			completedAt,
			aiGenerated: false,
			depth: 0,
			createdAt: completedAt,
			updatedAt: completedAt,
		}));
		await ctx.adapter.createMany({ model: "todo_active_p9", data: items.map((item) => ({ ...item })) });
		for (const index of [5, 2_400]) {
			const item = items[index];
			if (!item) throw new Error("fixture too short");
			await insertArchived(ctx, item, completedAt);
		}
		const distinct = vi.spyOn(ctx.adapter, "distinct");
		const remove = vi.spyOn(ctx.adapter, "delete");
		const inListSizes = (calls: { where?: Where[] }[]) =>
			calls
				.flatMap((data) => data.where ?? [])
				.flatMap((w) => (w.operator === "in" && Array.isArray(w.value) ? [w.value.length] : []));

		const { run } = await t.strata.maintenance.runDaily();

		expect(run.details).toBe(
			"reconciled 2 duplicates; created 3 partitions; archived 0 items; analyzed 4 partitions",
		);
		expect(inListSizes(distinct.mock.calls.map(([data]) => data))).toEqual([1_000, 1_000, 500]);
		expect(inListSizes(remove.mock.calls.map(([data]) => data))).toEqual([1, 1]);
		expect(await t.strata.items.query({ tenantKey: TENANT_A, limit: 1 })).toMatchObject({ total: 2_498 });
	});

	it("records the failed step and the progress before it", async () => {
		const ctx = await t.strata.$context;
		vi.spyOn(ctx.adapter.catalog, "analyze").mockRejectedValue(new Error("disk full"));

		const { run, error } = await t.strata.maintenance.runDaily();

		expect(run).toMatchObject({
			status: "failed",
			failedStep: "analyze",
			details: "reconciled 0 duplicates; created 4 partitions; archived 0 items",
		});
		expect(error).toMatchObject({
			code: "MAINTENANCE_JOB_FAILED",
			details: { jobName: "daily", step: "analyze" },
		});
		expect(await t.strata.maintenance.state("daily")).toBe("idle");

		const issues = await t.strata.health.healthCheck();
		expect(issues.filter((i) => i.issueType === "maintenance_failed")).toEqual([
			{
				issueType: "maintenance_failed",
				partitionName: "daily",
				description: 'Last daily run failed at step "analyze"',
				severity: "warning",
			},
		]);
	});

	it("rejects a second run of the same job while one is running", async () => {
		const first = t.strata.maintenance.runDaily();
		const second = t.strata.maintenance.runDaily();

		await expect(second).rejects.toMatchObject({ code: "CONFLICT", details: { jobName: "daily" } });
		expect((await first).error).toBeNull();
		expect(await t.strata.maintenance.state("daily")).toBe("idle");
	});
});

describe("maintenance job lease", () => {
	it("refuses to start while another process holds the job", async () => {
		await t.adapter.create({
			model: "worker_lease",
			data: {
				id: "maintenance:daily",
				leaseHolder: "other-process",
				leaseUntil: new Date("2025-09-15T13:00:00.000Z"),
			},
		});

		await expect(t.strata.maintenance.runDaily()).rejects.toMatchObject({
			code: "CONFLICT",
			message: 'Maintenance job "daily" is already running in another process',
			details: { jobName: "daily" },
		});
		expect(await t.strata.maintenance.history()).toEqual([]);
		expect(await t.strata.maintenance.state("daily")).toBe("idle");
		expect((await t.strata.archive.listPartitions()).map((p) => p.name)).toEqual([]);
	});

	it("takes over an expired lease and releases it when done", async () => {
		await t.adapter.create({
			model: "worker_lease",
			data: {
				id: "maintenance:daily",
				leaseHolder: "crashed-process",
				leaseUntil: new Date("2025-09-15T11:00:00.000Z"),
			},
		});

		const { error } = await t.strata.maintenance.runDaily();

		expect(error).toBeNull();
		expect(await t.adapter.findMany({ model: "worker_lease" })).toEqual([]);
	});

	it("does not block the other job", async () => {
		await t.adapter.create({
			model: "worker_lease",
			data: {
				id: "maintenance:daily",
				leaseHolder: "other-process",
				leaseUntil: new Date("2025-09-15T13:00:00.000Z"),
			},
		});

		expect((await t.strata.maintenance.runWeekly()).error).toBeNull();
	});
});

// =============================================================================
// WEEKLY
// =============================================================================

describe("maintenance.runWeekly", () => {
	it("vacuums every partition and reports health", async () => {
		const { run, error } = await t.strata.maintenance.runWeekly();

		expect(error).toBeNull();
		expect(run.details).toBe(
			"vacuumed 24 partitions; found 25 health issues (1 critical, 24 warning); retention disabled",
		);
	});

	it("drops archive months past the retention window", async () => {
		const retained = await getTestInstance({ archiveRetentionMonths: 3 });
		for (let month = 4; month <= 9; month++) {
			await retained.strata.archive.createPartitionForMonth(2025, month);
		}

		const { run } = await retained.strata.maintenance.runWeekly();
		expect(run.details).toBe(
			"vacuumed 30 partitions; found 31 health issues (1 critical, 30 warning); dropped 2 partitions",
		);
		expect((await retained.strata.archive.listPartitions()).map((p) => p.month)).toEqual([6, 7, 8, 9]);
		await retained.cleanup();
	});

	it("clears dead rows", async () => {
		const item = await t.strata.items.create({ userId: TENANT_A, title: "Churn" });
		await t.strata.items.update(item.id, TENANT_A, { priority: 4 });

		const before = await t.strata.health.partitionStatistics();
		expect(before.find((s) => s.partitionName === "todo_active_p9")?.deadRowCount).toBe(1);

		await t.strata.maintenance.runWeekly();
		const after = await t.strata.health.partitionStatistics();
		expect(after.find((s) => s.partitionName === "todo_active_p9")).toMatchObject({
			deadRowCount: 0,
			lastVacuum: new Date("2025-09-15T12:00:00.000Z"),
		});
	});
});

// =============================================================================
// HISTORY
// =============================================================================

describe("maintenance.history", () => {
	it("lists runs newest first and filters by job", async () => {
		const daily = await t.strata.maintenance.runDaily();
		t.clock.advance(60_000);
		const weekly = await t.strata.maintenance.runWeekly();

		expect((await t.strata.maintenance.history()).map((r) => r.id)).toEqual([weekly.run.id, daily.run.id]);
		expect((await t.strata.maintenance.history({ jobName: "daily" })).map((r) => r.id)).toEqual([
			daily.run.id,
		]);
		expect((await t.strata.health.maintenanceHistory(1)).map((r) => r.id)).toEqual([weekly.run.id]);
	});
});
