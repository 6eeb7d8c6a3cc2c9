import type { StrataOptions } from "@strata/core";
import {
	buildLegacyRows,
	getTestInstance,
	seedLegacyRows,
	silentLogger,
	type TestInstance,
} from "@strata/test-utils";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseJobName } from "../commands/maintenance.js";
import { createProgram, sanitizeErrorMessage } from "../program.js";

const state = vi.hoisted(() => {
	const lines: string[] = [];
	const config: { options: StrataOptions | null } = { options: null };
	return { lines, config };
});

vi.mock("../utils/get-config.js", () => ({
	getConfig: vi.fn(async () =>
		state.config.options ? { options: state.config.options, configFile: "/project/strata.config.ts" } : null,
	),
	findConfigFile: vi.fn(() => null),
}));

vi.mock("@clack/prompts", () => {
	const record = (message: string) => {
		state.lines.push(message);
	};
	return {
		intro: vi.fn(record),
		outro: vi.fn(record),
		note: vi.fn(record),
		cancel: vi.fn(record),
		confirm: vi.fn(async () => true),
		isCancel: vi.fn(() => false),
		spinner: () => ({ start: vi.fn(), stop: vi.fn(record), message: vi.fn() }),
		log: {
			info: vi.fn(record),
			success: vi.fn(record),
			error: vi.fn(record),
			warn: vi.fn(record),
			warning: vi.fn(record),
			step: vi.fn(record),
			message: vi.fn(record),
		},
	};
});

// biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI colour codes
const ANSI = /\u001b\[[0-9;]*m/g;

function output(): string[] {
	return state.lines.map((line) => line.replace(ANSI, ""));
}

async function run(...args: string[]): Promise<void> {
	await createProgram("0.0.0-test").parseAsync(args, { from: "user" });
}

let t: TestInstance;

beforeEach(async () => {
	t = await getTestInstance();
	state.lines.length = 0;
	state.config.options = { database: t.adapter, logger: silentLogger, now: t.clock.now };
});

afterEach(async () => {
	process.exitCode = undefined;
	await t.cleanup();
});

describe("strata maintenance", () => {
	it("runs the daily job and prints its summary", async () => {
		await run("maintenance", "daily");

		expect(output()).toContain("reconciled 0 duplicates; created 4 partitions; archived 0 items; analyzed 4 partitions");
		expect(output()).toContain("daily maintenance completed");
		expect(process.exitCode).toBeUndefined();
	});

	it("lists history for one job", async () => {
		await t.strata.maintenance.runDaily();
		await run("maintenance", "history", "--job", "daily");

		expect(output()).toContain(
			"2025-09-15T12:00:00.000Z  daily  completed  reconciled 0 duplicates; created 4 partitions; archived 0 items; analyzed 4 partitions",
		);
		expect(output()).toContain("1 run(s)");
	});

	it("validates job names", () => {
		expect(parseJobName("weekly")).toBe("weekly");
		expect(() => parseJobName("monthly")).toThrow("Expected one of: daily, weekly.");
	});
});

describe("strata migrate", () => {
	it("copies every legacy row with --all and then validates", async () => {
		await seedLegacyRows(t.adapter, buildLegacyRows(17));

		await run("migrate", "run", "--all", "--batch-size", "5");
		expect(output()).toContain("migrated 17 rows, skipped 0 in 4 batches; done");

		state.lines.length = 0;
		await run("migrate", "validate");
		expect(output().filter((line) => line.startsWith("pass  "))).toHaveLength(7);
		expect(output()).toContain("All checks passed.");
		expect(process.exitCode).toBeUndefined();
	});

	it("blocks cutover while rows are missing", async () => {
		await seedLegacyRows(t.adapter, buildLegacyRows(5));
		await t.strata.migration.migrateBatch({ batchSize: 2 });

		await run("migrate", "cutover");

		expect(output()).toContain(
			"Migration validation failed: total_rows, status_todo, status_in_progress, status_done, id_coverage",
		);
		expect(output()).toContain("Cutover blocked.");
		expect(process.exitCode).toBe(1);
	});

	it("reports progress", async () => {
		await seedLegacyRows(t.adapter, buildLegacyRows(17));
		await t.strata.migration.migrateBatch({ batchSize: 5 });

		await run("migrate", "progress");

		expect(output()).toContain("offset 5 of 17 legacy rows (29.4%)");
		expect(output()).toContain("1 completed batches, 0 failed");
		expect(output()).toContain("last batch at offset 0 completed");
	});
});

describe("strata partition", () => {
	it("provisions archive partitions and lists them", async () => {
		await run("partition", "provision", "--months-ahead", "1");
		expect(output()).toContain("Created todo_archived_y2025m09");
		expect(output()).toContain("Created todo_archived_y2025m10");

		state.lines.length = 0;
		await run("partition", "list");
		expect(output()).toContain(
			[
				"partition               from                      to",
				"todo_archived_y2025m09  2025-09-01T00:00:00.000Z  2025-10-01T00:00:00.000Z",
				"todo_archived_y2025m10  2025-10-01T00:00:00.000Z  2025-11-01T00:00:00.000Z",
			].join("\n"),
		);
	});

	it("prints the DDL without a config", async () => {
		state.config.options = null;
		const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

		await run("partition", "generate", "--stdout", "--months-ahead", "0");

		const sql = String(write.mock.calls[0]?.[0]);
		write.mockRestore();
		expect(sql).toContain("-- Archive months ahead: 0 (range on archived_at)");
		expect(sql).toContain('PARTITION OF "todo_active" FOR VALUES WITH (MODULUS 16, REMAINDER 15);');
	});
});

describe("strata status", () => {
	it("summarizes tables and flags the missing next-month partition", async () => {
		await run("status");

		expect(output()).toContain(
			[
				"table                partitions  rows  dead  size",
				"ai_todo_interaction  8           0     0     64.0 KB",
				"todo_active          16          0     0     128.0 KB",
			].join("\n"),
		);
		expect(output()).toContain(
			"  [critical] todo_archived_y2025m10: Next month's archive partition is not provisioned",
		);
		expect(output()).toContain("strata status complete: 1 critical, 24 warning");
		expect(process.exitCode).toBe(1);
	});
});

describe("missing config", () => {
	it("fails with a hint", async () => {
		state.config.options = null;

		await run("migrate", "progress");

		expect(output()).toContain("No strata config found. Run strata init or pass --config <path>.");
		expect(process.exitCode).toBe(1);
	});
});

describe("sanitizeErrorMessage", () => {
	it("masks connection strings and secrets", () => {
		expect(sanitizeErrorMessage("connect postgres://app:test-secret@db:5432/todos failed")).toBe(
			"connect postgres://*** failed",
		);
		expect(sanitizeErrorMessage("password=test-secret")).toBe("password=***");
	});
});
