import * as p from "@clack/prompts";
import { Command } from "commander";
import pc from "picocolors";
import { createStrata } from "strata";
import {
	formatIssue,
	formatRun,
	issueSummary,
	parentSummaryTable,
	statisticsTable,
} from "../utils/format.js";
import { requireConfig } from "../utils/load-strata.js";
import { parsePositiveInt } from "../utils/parse-options.js";

export function statusCommand(): Command {
	return new Command("status")
		.description("Show partition statistics, health issues and recent maintenance runs")
		.option("--partitions", "List every partition instead of one line per table")
		.option("--runs <n>", "Recent maintenance runs to show", parsePositiveInt, 5)
		.action(async (flags: { partitions?: boolean; runs: number }, command: Command) => {
			p.intro(pc.bgCyan(pc.black(" strata status ")));

			const loaded = await requireConfig(command);
			if (!loaded) return;
			const strata = createStrata(loaded.options);
			const ctx = await strata.$context;

			// ---- Configuration ----
			p.log.step(pc.bold("Configuration"));
			const { options } = ctx;
			p.log.info(`  Adapter:       ${pc.cyan(ctx.adapter.id)}`);
			p.log.info(`  Schema:        ${pc.cyan(options.schema)}`);
			p.log.info(
				`  Partitions:    ${options.activePartitionCount} active, ${options.interactionPartitionCount} interaction, ${options.archivePartitionsAhead} months ahead`,
			);
			p.log.info(`  Archive after: ${options.archivalAgeThresholdDays} days`);
			p.log.info(
				`  Retention:     ${options.archiveRetentionMonths === null ? pc.dim("disabled") : `${options.archiveRetentionMonths} months`}`,
			);

			// ---- Partitions ----
			p.log.step(pc.bold("Partitions"));
			const stats = await strata.health.partitionStatistics();
			const table = flags.partitions ? statisticsTable(stats) : parentSummaryTable(stats);
			p.log.message(table.join("\n"));

			// ---- Health ----
			p.log.step(pc.bold("Health"));
			const issues = await strata.health.healthCheck();
			if (issues.length === 0) {
				p.log.success(`  ${pc.green("healthy")}`);
			}
			for (const issue of issues) {
				const line = `  ${formatIssue(issue)}`;
				if (issue.severity === "critical") p.log.error(pc.red(line));
				else p.log.warning(pc.yellow(line));
			}

			// ---- Maintenance ----
			p.log.step(pc.bold("Maintenance"));
			const runs = await strata.health.maintenanceHistory(flags.runs);
			if (runs.length === 0) {
				p.log.warning(`  ${pc.yellow("never run")} ${pc.dim("run strata maintenance daily")}`);
			}
			for (const run of runs) {
				p.log.info(`  ${formatRun(run)}`);
			}

			if (issues.some((i) => i.severity === "critical")) process.exitCode = 1;
			p.outro(pc.dim(`strata status complete: ${issueSummary(issues)}`));
		});
}
