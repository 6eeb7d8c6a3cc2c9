import type { StrataAdapter } from "@strata/core";
import { memoryAdapter } from "@strata/memory-adapter";
import { silentLogger, TENANT_A } from "@strata/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createStrata } from "../strata/base.js";

/** A memory adapter whose partition DDL fails, as when the database is unreachable. */
function createUnreachableAdapter(): StrataAdapter {
	const base = memoryAdapter();
	return {
		...base,
		catalog: {
			...base.catalog,
			createPartition: async () => {
				throw new Error("database unreachable");
			},
		},
	};
}

describe("createStrata", () => {
	const rejections: unknown[] = [];
	const onRejection = (reason: unknown) => {
		rejections.push(reason);
	};

	beforeEach(() => {
		rejections.length = 0;
		process.on("unhandledRejection", onRejection);
	});

	afterEach(() => {
		process.off("unhandledRejection", onRejection);
	});

	it("hands a failed setup to the caller and nowhere else", async () => {
		const strata = createStrata({ database: createUnreachableAdapter(), logger: silentLogger });

		await expect(strata.items.get("missing", TENANT_A)).rejects.toThrow("database unreachable");
		await new Promise((resolve) => setTimeout(resolve, 10));

		expect(rejections).toEqual([]);
	});

	it("fails maintenance calls with the setup error", async () => {
		const strata = createStrata({ database: createUnreachableAdapter(), logger: silentLogger });

		await expect(strata.maintenance.runDaily()).rejects.toThrow("database unreachable");
		await expect(strata.maintenance.state("weekly")).rejects.toThrow("database unreachable");
		await new Promise((resolve) => setTimeout(resolve, 10));

		expect(rejections).toEqual([]);
	});

	it("reuses one scheduler across maintenance calls", async () => {
		const strata = createStrata({ database: memoryAdapter(), logger: silentLogger });

		await strata.maintenance.runDaily();

		expect(await strata.maintenance.state("daily")).toMatchObject({ jobName: "daily", status: "idle" });
	});
});
