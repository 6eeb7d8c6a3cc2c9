// =============================================================================
// MAINTENANCE COMMAND -- run the daily/weekly jobs once, show history
// =============================================================================

import * as p from "@clack/prompts";
import { MAINTENANCE_JOBS, type MaintenanceJobName } from "@strata/core";
import { Command, InvalidArgumentError } from "commander";
import pc from "picocolors";
import type { Strata } from "strata";
import { formatRun } from "../utils/format.js";
import { loadStrata } from "../utils/load-strata.js";
import { parsePositiveInt } from "../utils/parse-options.js";

export function parseJobName(value: string): MaintenanceJobName {
	const job = MAINTENANCE_JOBS.find((name) => name === value);
	if (!job) throw new InvalidArgumentError(`Expected one of: ${MAINTENANCE_JOBS.join(", ")}.`);
	return job;
}

export function maintenanceCommand(): Command {
	return new Command("maintenance")
		.description("Run maintenance jobs and inspect their history")
		.addCommand(jobSubCommand("daily", "Reconcile, provision partitions, archive done items, analyze"))
		.addCommand(jobSubCommand("weekly", "Vacuum partitions, run the health check, apply retention"))
		.addCommand(historySubCommand());
}

function runJob(strata: Strata, job: MaintenanceJobName) {
	return job === "daily" ? strata.maintenance.runDaily() : strata.maintenance.runWeekly();
}

function jobSubCommand(job: MaintenanceJobName, description: string): Command {
	return new Command(job).description(description).action(async (_flags: object, command: Command) => {
		p.intro(pc.bgCyan(pc.black(` strata maintenance ${job} `)));
		const strata = await loadStrata(command);
		if (!strata) return;

		const s = p.spinner();
		s.start(`Running ${job} maintenance...`);
		const { run, error } = await runJob(strata, job);

		if (error) {
			s.stop(pc.red(`${job} maintenance failed at ${run.failedStep ?? "an unknown step"}`));
			p.log.error(error.message);
			if (run.details) p.log.info(pc.dim(`Completed before the failure: ${run.details}`));
			process.exitCode = 1;
			p.outro(pc.red("Failed."));
			return;
		}

		s.stop(`${pc.green(job)} maintenance completed`);
		p.log.info(run.details);
		p.outro(pc.green("Done."));
	});
}

function historySubCommand(): Command {
	return new Command("history")
		.description("List recent maintenance runs, newest first")
		.option("--job <name>", "Only runs of this job (daily|weekly)", parseJobName)
		.option("--limit <n>", "Runs to show", parsePositiveInt, 20)
		.action(async (flags: { job?: MaintenanceJobName; limit: number }, command: Command) => {
			p.intro(pc.bgCyan(pc.black(" strata maintenance history ")));
			const strata = await loadStrata(command);
			if (!strata) return;

			const runs = await strata.maintenance.history({ jobName: flags.job, limit: flags.limit });
			if (runs.length === 0) {
				p.log.info("No maintenance runs recorded.");
			}
			for (const run of runs) {
				const line = formatRun(run);
				if (run.status === "failed") p.log.error(pc.red(line));
				else p.log.info(line);
			}
			p.outro(pc.dim(`${runs.length} run(s)`));
		});
}
