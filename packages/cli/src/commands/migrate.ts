// =============================================================================
// MIGRATE COMMAND -- legacy `todos` table to the partitioned layout
// =============================================================================

import * as p from "@clack/prompts";
import { StrataError, type ValidationReport } from "@strata/core";
import { Command } from "commander";
import pc from "picocolors";
import { formatBatchResult, formatCheck, formatProgress } from "../utils/format.js";
import { loadStrata } from "../utils/load-strata.js";
import { parsePositiveInt } from "../utils/parse-options.js";

export function migrateCommand(): Command {
	return new Command("migrate")
		.description("Migrate the legacy todos table into the partitioned tables")
		.addCommand(runSubCommand())
		.addCommand(validateSubCommand())
		.addCommand(cutoverSubCommand())
		.addCommand(progressSubCommand());
}

function logReport(report: ValidationReport): void {
	for (const check of report.checks) {
		const line = formatCheck(check);
		if (check.pass) p.log.success(line);
		else p.log.error(pc.red(line));
	}
}

// =============================================================================
// RUN
// =============================================================================

interface RunFlags {
	batchSize?: number;
	maxBatches: number;
	all?: boolean;
}

function runSubCommand(): Command {
	return new Command("run")
		.description("Copy legacy rows in batches, resuming where the last run stopped")
		.option("--batch-size <n>", "Rows per batch (default: migrationBatchSize)", parsePositiveInt)
		.option("--max-batches <n>", "Batches to run", parsePositiveInt, 1)
		.option("--all", "Run batches until the legacy table is exhausted")
		.action(async (flags: RunFlags, command: Command) => {
			p.intro(pc.bgCyan(pc.black(" strata migrate run ")));
			const strata = await loadStrata(command);
			if (!strata) return;

			const controller = new AbortController();
			const onInterrupt = () => {
				p.log.warn("Interrupted, stopping after the current batch...");
				controller.abort();
			};
			process.once("SIGINT", onInterrupt);

			const s = p.spinner();
			s.start("Migrating...");
			try {
				const result = await strata.migration.migrateBatch({
					batchSize: flags.batchSize,
					maxBatches: flags.all ? Number.MAX_SAFE_INTEGER : flags.maxBatches,
					signal: controller.signal,
				});
				s.stop(formatBatchResult(result));
				if (result.done) {
					p.outro(`${pc.green("Legacy table exhausted.")} Run ${pc.cyan("strata migrate validate")} next.`);
				} else {
					p.outro(pc.dim("Run again to continue."));
				}
			} catch (error) {
				s.stop(pc.red("Batch failed"));
				throw error;
			} finally {
				process.removeListener("SIGINT", onInterrupt);
			}
		});
}

// =============================================================================
// VALIDATE / CUTOVER
// =============================================================================

function validateSubCommand(): Command {
	return new Command("validate")
		.description("Compare row counts between the legacy and partitioned tables")
		.action(async (_flags: object, command: Command) => {
			p.intro(pc.bgCyan(pc.black(" strata migrate validate ")));
			const strata = await loadStrata(command);
			if (!strata) return;

			const report = await strata.migration.validate();
			logReport(report);
			if (report.passed) {
				p.outro(pc.green("All checks passed."));
			} else {
				process.exitCode = 1;
				p.outro(pc.red("Validation failed."));
			}
		});
}

function cutoverSubCommand(): Command {
	return new Command("cutover")
		.description("Validate and approve switching reads to the partitioned tables")
		.action(async (_flags: object, command: Command) => {
			p.intro(pc.bgCyan(pc.black(" strata migrate cutover ")));
			const strata = await loadStrata(command);
			if (!strata) return;

			try {
				const report = await strata.migration.cutover();
				logReport(report);
				p.outro(pc.green("Cutover approved. Point reads and writes at the partitioned tables."));
			} catch (error) {
				if (!StrataError.is(error, "VALIDATION_FAILED")) throw error;
				p.log.error(error.message);
				process.exitCode = 1;
				p.outro(pc.red("Cutover blocked."));
			}
		});
}

// =============================================================================
// PROGRESS
// =============================================================================

function progressSubCommand(): Command {
	return new Command("progress")
		.description("Show how far the migration has come")
		.action(async (_flags: object, command: Command) => {
			p.intro(pc.bgCyan(pc.black(" strata migrate progress ")));
			const strata = await loadStrata(command);
			if (!strata) return;

			const progress = await strata.migration.progress();
			for (const line of formatProgress(progress)) p.log.info(line);
			p.outro(pc.dim("Done."));
		});
}
