// =============================================================================
// PARTITION COMMAND -- DDL generation and archive partition management
// =============================================================================
// `generate` writes the DDL for the partitioned layout to a file for manual
// review. It never executes anything. The other subcommands act on the
// database through the configured adapter.

import { writeFileSync } from "node:fs";
import { resolve } from "node:path";
import * as p from "@clack/prompts";
import type { StrataOptions } from "@strata/core";
import { Command } from "commander";
import pc from "picocolors";
import { generatePartitionDDL, type PartitionDDLOptions } from "strata/db";
import { formatTable } from "../utils/format.js";
import { getConfig } from "../utils/get-config.js";
import { globalOptions, loadStrata } from "../utils/load-strata.js";
import { parseNonNegativeInt, parsePositiveInt } from "../utils/parse-options.js";

// =============================================================================
// SQL FILE
// =============================================================================

/** DDL options from the config file, overridden by command-line flags. */
export function ddlOptionsFrom(
	config: StrataOptions | null,
	flags: { monthsAhead?: number; schema?: string; includeLegacy?: boolean },
	now: Date,
): PartitionDDLOptions {
	return {
		schema: flags.schema ?? config?.schema ?? "public",
		activePartitionCount: config?.activePartitionCount ?? 16,
		interactionPartitionCount: config?.interactionPartitionCount ?? 8,
		monthsAhead: flags.monthsAhead ?? config?.archivePartitionsAhead ?? 3,
		includeLegacy: flags.includeLegacy ?? false,
		now,
	};
}

export function buildPartitionSql(options: PartitionDDLOptions, generatedAt: Date): string {
	const rule = "-- =============================================================================";
	const lines = [
		rule,
		"-- STRATA PARTITIONED LAYOUT",
		`-- Schema: ${options.schema ?? "public"}`,
		`-- Active partitions: ${options.activePartitionCount ?? 16} (hash on user_id)`,
		`-- Interaction partitions: ${options.interactionPartitionCount ?? 8} (hash on user_id)`,
		`-- Archive months ahead: ${options.monthsAhead ?? 3} (range on archived_at)`,
		`-- Generated: ${generatedAt.toISOString()}`,
		rule,
		"-- Every statement is idempotent. Review before running.",
		rule,
		"",
		...generatePartitionDDL(options).flatMap((statement) => [statement, ""]),
	];
	return lines.join("\n");
}

// =============================================================================
// PARTITION COMMAND
// =============================================================================

export function partitionCommand(): Command {
	return new Command("partition")
		.description("Generate partition DDL and manage archive partitions")
		.addCommand(generateSubCommand())
		.addCommand(listSubCommand())
		.addCommand(provisionSubCommand())
		.addCommand(dropSubCommand());
}

interface GenerateFlags {
	monthsAhead?: number;
	schema?: string;
	includeLegacy?: boolean;
	output?: string;
	stdout?: boolean;
}

function generateSubCommand(): Command {
	return new Command("generate")
		.description("Write the DDL for the partitioned tables to a SQL file")
		.option("--months-ahead <n>", "Archive partitions after the current month", parseNonNegativeInt)
		.option("--schema <schema>", "PostgreSQL schema name")
		.option("--include-legacy", "Also create the legacy todos table")
		.option("-o, --output <path>", "Output file path (default: auto-generated)")
		.option("--stdout", "Print the SQL instead of writing a file")
		.action(async (flags: GenerateFlags, command: Command) => {
			const { cwd, config } = globalOptions(command);
			const now = new Date();
			const loaded = await getConfig({ cwd, configPath: config });
			const sql = buildPartitionSql(ddlOptionsFrom(loaded?.options ?? null, flags, now), now);

			if (flags.stdout) {
				process.stdout.write(`${sql}\n`);
				return;
			}

			p.intro(pc.bgCyan(pc.black(" strata partition generate ")));
			if (!loaded) p.log.info(pc.dim("No config found, using default partition counts."));

			const timestamp = now.toISOString().replace(/[:.]/g, "-").slice(0, 19);
			const outputPath = resolve(cwd, flags.output ?? `strata_partitions_${timestamp}.sql`);
			writeFileSync(outputPath, sql, "utf-8");

			p.log.info(`SQL written to: ${pc.cyan(outputPath)}`);
			p.log.warn(`${pc.yellow("Not executed.")} Review the SQL, then run it against your database.`);
			p.outro(pc.green("Done."));
		});
}

function listSubCommand(): Command {
	return new Command("list")
		.description("List the provisioned archive partitions")
		.action(async (_flags: object, command: Command) => {
			p.intro(pc.bgCyan(pc.black(" strata partition list ")));
			const strata = await loadStrata(command);
			if (!strata) return;

			const partitions = await strata.archive.listPartitions();
			if (partitions.length === 0) {
				p.log.warn("No archive partitions provisioned.");
			} else {
				const table = formatTable(
					["partition", "from", "to"],
					partitions.map((part) => [part.name, part.from.toISOString(), part.to.toISOString()]),
				);
				p.log.message(table.join("\n"));
			}
			p.outro(pc.dim(`${partitions.length} archive partition(s)`));
		});
}

function provisionSubCommand(): Command {
	return new Command("provision")
		.description("Create archive partitions for the current month and the months ahead")
		.option("--months-ahead <n>", "Months after the current one", parseNonNegativeInt)
		.action(async (flags: { monthsAhead?: number }, command: Command) => {
			p.intro(pc.bgCyan(pc.black(" strata partition provision ")));
			const strata = await loadStrata(command);
			if (!strata) return;

			const created = await strata.archive.provisionAhead(flags.monthsAhead);
			if (created.length === 0) {
				p.log.info("Every partition already exists.");
			} else {
				for (const name of created) p.log.success(`Created ${pc.cyan(name)}`);
			}
			p.outro(pc.green("Done."));
		});
}

function dropSubCommand(): Command {
	return new Command("drop")
		.description("Drop archive partitions older than a retention window")
		.requiredOption("--older-than <months>", "Retention window in months", parsePositiveInt)
		.option("-y, --yes", "Skip the confirmation prompt")
		.action(async (flags: { olderThan: number; yes?: boolean }, command: Command) => {
			p.intro(pc.bgCyan(pc.black(" strata partition drop ")));

			if (!flags.yes) {
				const confirmed = await p.confirm({
					message: `Drop archive partitions older than ${flags.olderThan} months? Their rows are deleted.`,
					initialValue: false,
				});
				if (p.isCancel(confirmed) || !confirmed) {
					p.cancel("Nothing dropped.");
					return;
				}
			}

			const strata = await loadStrata(command);
			if (!strata) return;

			const dropped = await strata.archive.dropPartitionsOlderThan(flags.olderThan);
			for (const name of dropped) p.log.success(`Dropped ${pc.cyan(name)}`);
			p.outro(pc.dim(`${dropped.length} partition(s) dropped`));
		});
}
