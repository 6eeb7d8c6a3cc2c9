// =============================================================================
// STRATA -- Main entry point
// =============================================================================
// Creates the Strata instance: item, interaction, archive, migration,
// maintenance and health operations over one partitioned database.

import type {
	AppendInteractionInput,
	ArchivedItem,
	ArchiveQuery,
	CreateItemInput,
	HealthIssue,
	Interaction,
	InteractionQuery,
	Item,
	ItemPage,
	ItemQuery,
	ItemStats,
	LocatedItem,
	MaintenanceHistoryQuery,
	MaintenanceJobName,
	MaintenanceJobState,
	MaintenanceRun,
	MigrateBatchOptions,
	MigrateBatchResult,
	MigrationProgress,
	PartitionStatistics,
	StrataContext,
	StrataOptions,
	UpdateItemInput,
	ValidationReport,
} from "@strata/core";
import { buildContext } from "../context/context.js";
import { ensureHashPartitions } from "../db/partitioning.js";
import * as health from "../infrastructure/health-monitor.js";
import { MaintenanceScheduler, type MaintenanceResult } from "../infrastructure/maintenance-scheduler.js";
import * as migration from "../infrastructure/migration-engine.js";
import { buildMaintenanceWorkers, StrataWorkerRunner } from "../infrastructure/worker-runner.js";
import * as active from "../managers/active-store.js";
import * as archive from "../managers/archive-store.js";
import type { ArchivePartition } from "../managers/archive-store.js";
import * as interactions from "../managers/interaction-store.js";
import * as view from "../managers/item-view.js";

// =============================================================================
// STRATA INTERFACE
// =============================================================================

export interface Strata {
	items: {
		create: (input: CreateItemInput) => Promise<Item>;
		get: (id: string, tenantKey: string) => Promise<Item | null>;
		/** Administrative lookup across every Active partition. */
		getAnyTenant: (id: string) => Promise<Item | null>;
		update: (id: string, tenantKey: string, fields: UpdateItemInput) => Promise<Item>;
		/** Deletes the item and its descendants; returns the number of rows removed. */
		delete: (id: string, tenantKey: string) => Promise<number>;
		query: (query?: ItemQuery) => Promise<ItemPage<Item>>;
		subtasks: (id: string, tenantKey: string) => Promise<Item[]>;
		toggle: (id: string, tenantKey: string) => Promise<Item>;
		stats: (tenantKey: string) => Promise<ItemStats>;
		/** Active first, then Archive. */
		find: (id: string, tenantKey: string) => Promise<LocatedItem | null>;
		assertExists: (id: string, tenantKey: string) => Promise<LocatedItem>;
	};
	interactions: {
		append: (input: AppendInteractionInput) => Promise<Interaction>;
		query: (query: InteractionQuery) => Promise<ItemPage<Interaction>>;
		get: (id: string, tenantKey: string) => Promise<Interaction | null>;
	};
	archive: {
		get: (id: string, tenantKey?: string) => Promise<ArchivedItem | null>;
		query: (query?: ArchiveQuery) => Promise<ItemPage<ArchivedItem>>;
		createPartitionForMonth: (year: number, month: number) => Promise<{ name: string; created: boolean }>;
		dropPartitionsOlderThan: (retentionMonths: number) => Promise<string[]>;
		listPartitions: () => Promise<ArchivePartition[]>;
		provisionAhead: (monthsAhead?: number) => Promise<string[]>;
	};
	migration: {
		migrateBatch: (options?: MigrateBatchOptions) => Promise<MigrateBatchResult>;
		validate: () => Promise<ValidationReport>;
		/** Throws VALIDATION_FAILED unless every check passes. */
		cutover: () => Promise<ValidationReport>;
		progress: () => Promise<MigrationProgress>;
	};
	maintenance: {
		runDaily: () => Promise<MaintenanceResult>;
		runWeekly: () => Promise<MaintenanceResult>;
		history: (query?: MaintenanceHistoryQuery) => Promise<MaintenanceRun[]>;
		state: (jobName: MaintenanceJobName) => Promise<MaintenanceJobState>;
	};
	health: {
		partitionStatistics: () => Promise<PartitionStatistics[]>;
		healthCheck: () => Promise<HealthIssue[]>;
		maintenanceHistory: (limit?: number) => Promise<MaintenanceRun[]>;
	};
	workers: {
		/** Start the maintenance workers */
		start: () => Promise<void>;
		/** Stop the maintenance workers and release leases */
		stop: () => Promise<void>;
	};
	$context: Promise<StrataContext>;
	$options: StrataOptions;
}

// =============================================================================
// CREATE STRATA
// =============================================================================

export function createStrata(options: StrataOptions): Strata {
	let workerRunner: StrataWorkerRunner | null = null;

	const ctxPromise = (async () => {
		const ctx = buildContext(options);
		await ensureHashPartitions(ctx);
		return ctx;
	})();

	const getCtx = () => ctxPromise;

	let scheduler: MaintenanceScheduler | null = null;
	const getScheduler = async () => {
		const ctx = await getCtx();
		if (!scheduler) scheduler = new MaintenanceScheduler(ctx);
		return scheduler;
	};

	return {
		items: {
			create: async (input) => {
				const ctx = await getCtx();
				return active.createItem(ctx, input);
			},
			get: async (id, tenantKey) => {
				const ctx = await getCtx();
				return active.getItem(ctx, id, tenantKey);
			},
			getAnyTenant: async (id) => {
				const ctx = await getCtx();
				return active.getItemAnyTenant(ctx, id);
			},
			update: async (id, tenantKey, fields) => {
				const ctx = await getCtx();
				return active.updateItem(ctx, id, tenantKey, fields);
			},
			delete: async (id, tenantKey) => {
				const ctx = await getCtx();
				return active.deleteItem(ctx, id, tenantKey);
			},
			query: async (query) => {
				const ctx = await getCtx();
				return active.queryItems(ctx, query);
			},
			subtasks: async (id, tenantKey) => {
				const ctx = await getCtx();
				return active.listSubtasks(ctx, id, tenantKey);
			},
			toggle: async (id, tenantKey) => {
				const ctx = await getCtx();
				return active.toggleItem(ctx, id, tenantKey);
			},
			stats: async (tenantKey) => {
				const ctx = await getCtx();
				return view.itemStats(ctx, tenantKey);
			},
			find: async (id, tenantKey) => {
				const ctx = await getCtx();
				return view.findItem(ctx, id, tenantKey);
			},
			assertExists: async (id, tenantKey) => {
				const ctx = await getCtx();
				return view.assertItemExists(ctx, id, tenantKey);
			},
		},
		interactions: {
			append: async (input) => {
				const ctx = await getCtx();
				return interactions.appendInteraction(ctx, input);
			},
			query: async (query) => {
				const ctx = await getCtx();
				return interactions.queryInteractions(ctx, query);
			},
			get: async (id, tenantKey) => {
				const ctx = await getCtx();
				return interactions.getInteraction(ctx, id, tenantKey);
			},
		},
		archive: {
			get: async (id, tenantKey) => {
				const ctx = await getCtx();
				return archive.getArchivedItem(ctx, id, tenantKey);
			},
			query: async (query) => {
				const ctx = await getCtx();
				return archive.queryArchive(ctx, query);
			},
			createPartitionForMonth: async (year, month) => {
				const ctx = await getCtx();
				return archive.createPartitionForMonth(ctx, year, month);
			},
			dropPartitionsOlderThan: async (retentionMonths) => {
				const ctx = await getCtx();
				return archive.dropPartitionsOlderThan(ctx, retentionMonths);
			},
			listPartitions: async () => {
				const ctx = await getCtx();
				return archive.listArchivePartitions(ctx);
			},
			provisionAhead: async (monthsAhead) => {
				const ctx = await getCtx();
				return archive.provisionAhead(ctx, monthsAhead);
			},
		},
		migration: {
			migrateBatch: async (batchOptions) => {
				const ctx = await getCtx();
				return migration.migrateBatch(ctx, batchOptions);
			},
			validate: async () => {
				const ctx = await getCtx();
				return migration.validateMigration(ctx);
			},
			cutover: async () => {
				const ctx = await getCtx();
				return migration.cutover(ctx);
			},
			progress: async () => {
				const ctx = await getCtx();
				return migration.migrationProgress(ctx);
			},
		},
		maintenance: {
			runDaily: async () => {
				return (await getScheduler()).runDaily();
			},
			runWeekly: async () => {
				return (await getScheduler()).runWeekly();
			},
			history: async (query) => {
				const ctx = await getCtx();
				return health.maintenanceHistory(ctx, query);
			},
			state: async (jobName) => {
				return (await getScheduler()).state(jobName);
			},
		},
		health: {
			partitionStatistics: async () => {
				const ctx = await getCtx();
				return health.partitionStatistics(ctx);
			},
			healthCheck: async () => {
				const ctx = await getCtx();
				return health.healthCheck(ctx);
			},
			maintenanceHistory: async (limit) => {
				const ctx = await getCtx();
				return health.maintenanceHistory(ctx, { limit });
			},
		},
		workers: {
			start: async () => {
				if (workerRunner) return;
				const ctx = await getCtx();
				workerRunner = new StrataWorkerRunner(ctx, buildMaintenanceWorkers(ctx.options.workers, await getScheduler()));
				workerRunner.start();
			},
			stop: async () => {
				if (workerRunner) {
					await workerRunner.stop();
					workerRunner = null;
				}
			},
		},
		$context: ctxPromise,
		$options: options,
	};
}
