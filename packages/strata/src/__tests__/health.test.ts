import { getTestInstance, TENANT_A, type TestInstance } from "@strata/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

let t: TestInstance;

beforeEach(async () => {
	t = await getTestInstance();
});

afterEach(async () => {
	await t.cleanup();
});

describe("health.partitionStatistics", () => {
	it("lists every partition grouped by parent in numeric order", async () => {
		const stats = await t.strata.health.partitionStatistics();

		expect(stats.map((s) => s.partitionName)).toEqual([
			...Array.from({ length: 8 }, (_, i) => `ai_todo_interaction_p${i}`),
			...Array.from({ length: 16 }, (_, i) => `todo_active_p${i}`),
		]);
		expect(stats[0]).toEqual({
			partitionName: "ai_todo_interaction_p0",
			parentTable: "ai_todo_interaction",
			rowCount: 0,
			deadRowCount: 0,
			sizeBytes: 8192,
			lastVacuum: null,
			lastAnalyze: null,
		});
	});

	it("counts live rows per partition", async () => {
		await t.strata.archive.provisionAhead(0);
		await t.strata.items.create({ userId: TENANT_A, title: "One" });
		await t.strata.items.create({ userId: TENANT_A, title: "Two" });

		const stats = await t.strata.health.partitionStatistics();
		const p9 = stats.find((s) => s.partitionName === "todo_active_p9");
		expect(p9).toMatchObject({ parentTable: "todo_active", rowCount: 2, sizeBytes: 8192 + 2 * 256 });
		expect(stats.map((s) => s.parentTable)).toContain("todo_archived");
	});
});

describe("health.healthCheck", () => {
	it("flags unanalyzed partitions and the missing next month", async () => {
		const issues = await t.strata.health.healthCheck();

		expect(issues).toHaveLength(25);
		expect(issues[0]).toEqual({
			issueType: "stale_statistics",
			partitionName: "ai_todo_interaction_p0",
			description: "Partition has never been analyzed",
			severity: "warning",
		});
		expect(issues.filter((i) => i.severity === "critical")).toEqual([
			{
				issueType: "missing_future_partition",
				partitionName: "todo_archived_y2025m10",
				description: "Next month's archive partition is not provisioned",
				severity: "critical",
			},
		]);
	});

	it("reports statistics as stale after the configured number of days", async () => {
		await t.strata.maintenance.runDaily();
		const ctx = await t.strata.$context;
		for (const stat of await t.strata.health.partitionStatistics()) {
			await ctx.adapter.catalog.analyze(stat.partitionName);
		}
		expect(await t.strata.health.healthCheck()).toEqual([]);

		t.clock.advanceDays(8);
		const issues = await t.strata.health.healthCheck();
		expect(issues.find((i) => i.partitionName === "todo_active_p0")).toEqual({
			issueType: "stale_statistics",
			partitionName: "todo_active_p0",
			description: "Last analyzed 2025-09-15T12:00:00.000Z, more than 7 days ago",
			severity: "warning",
		});
	});

	it("grades dead-row ratios", async () => {
		const items = [];
		for (const title of ["A", "B", "C"]) {
			items.push(await t.strata.items.create({ userId: TENANT_A, title }));
		}
		for (const item of items.slice(0, 2)) {
			await t.strata.items.delete(item.id, TENANT_A);
		}

		const issues = await t.strata.health.healthCheck();
		expect(issues.filter((i) => i.issueType === "dead_rows")).toEqual([
			{
				issueType: "dead_rows",
				partitionName: "todo_active_p9",
				description: "2 dead rows (66.7% of 3)",
				severity: "critical",
			},
		]);
	});

	it("reports a moderate dead-row ratio as a warning", async () => {
		const items = [];
		for (const title of ["A", "B", "C", "D"]) {
			items.push(await t.strata.items.create({ userId: TENANT_A, title }));
		}
		const [first] = items;
		if (!first) throw new Error("no items");
		await t.strata.items.delete(first.id, TENANT_A);

		const issues = await t.strata.health.healthCheck();
		expect(issues.filter((i) => i.issueType === "dead_rows")).toEqual([
			{
				issueType: "dead_rows",
				partitionName: "todo_active_p9",
				description: "1 dead rows (25.0% of 4)",
				severity: "warning",
			},
		]);
	});

	it("is clean after a daily run and a full analyze", async () => {
		const healthy = await getTestInstance({ health: { statsStaleAfterDays: 1 } });
		await healthy.strata.maintenance.runDaily();
		await healthy.strata.maintenance.runWeekly();
		const ctx = await healthy.strata.$context;
		for (const stat of await healthy.strata.health.partitionStatistics()) {
			await ctx.adapter.catalog.analyze(stat.partitionName);
		}

		expect(await healthy.strata.health.healthCheck()).toEqual([]);
		await healthy.cleanup();
	});
});
