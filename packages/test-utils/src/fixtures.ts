// =============================================================================
// LEGACY FIXTURES
// =============================================================================
// Rows of the monolithic `todos` table, written straight through the adapter
// the way the pre-partitioning application left them.

import type { ItemStatus, LegacyItem, StrataAdapter } from "@strata/core";
import { LEGACY_TABLE } from "strata/db";

export const TENANT_A = "40e142fd-1038-48e6-93ae-15edba5c5c43";
export const TENANT_B = "0b6c7f9e-2d1a-4c3b-9e8f-7a6d5c4b3a21";

const STATUS_CYCLE: ItemStatus[] = ["todo", "in_progress", "done"];

export interface LegacyRowOptions {
	/** Tenant keys assigned round-robin. Default: [TENANT_A, TENANT_B] */
	tenants?: string[];
	/** Creation time of the first row; later rows are one minute apart. */
	createdFrom?: Date;
	/** Time given to done rows as `completedAt`. Default: `createdAt` + 1h */
	completedAt?: Date;
}

function legacyId(index: number): string {
	return `00000000-0000-4000-8000-${String(index).padStart(12, "0")}`;
}

function nearestOfTenant(rows: LegacyItem[], userId: string): string | null {
	for (let i = rows.length - 1; i >= 0; i--) {
		const row = rows[i];
		if (row?.userId === userId) return row.id;
	}
	return null;
}

/**
 * `count` legacy rows with statuses cycling todo, in_progress, done. Every
 * fourth row is a child of the latest earlier row of its tenant.
 */
export function buildLegacyRows(count: number, options: LegacyRowOptions = {}): LegacyItem[] {
	const tenants = options.tenants ?? [TENANT_A, TENANT_B];
	const start = options.createdFrom ?? new Date("2025-01-01T00:00:00.000Z");
	const rows: LegacyItem[] = [];

	for (let i = 0; i < count; i++) {
		const createdAt = new Date(start.getTime() + i * 60_000);
		const status = STATUS_CYCLE[i % STATUS_CYCLE.length] ?? "todo";
		const userId = tenants[i % tenants.length] ?? TENANT_A;
		const parentId = i % 4 === 3 ? nearestOfTenant(rows, userId) : null;

		rows.push({
			id: legacyId(i + 1),
			userId,
			parentId,
			projectId: null,
			title: `Legacy item ${i + 1}`,
			description: null,
			status,
			priority: (i % 5) + 1,
			dueDate: null,
			completedAt:
				status === "done" ? (options.completedAt ?? new Date(createdAt.getTime() + 3_600_000)) : null,
			aiGenerated: false,
			createdAt,
			updatedAt: createdAt,
		});
	}
	return rows;
}

export async function seedLegacyRows(adapter: StrataAdapter, rows: LegacyItem[]): Promise<void> {
	await adapter.createMany({ model: LEGACY_TABLE, data: rows.map((row) => ({ ...row })) });
}
