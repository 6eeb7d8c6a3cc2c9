import { writeFileSync } from "node:fs";
import { resolve } from "node:path";
import * as p from "@clack/prompts";
import { Command } from "commander";
import pc from "picocolors";
import { findConfigFile } from "../utils/get-config.js";
import { globalOptions } from "../utils/load-strata.js";

const CONFIG_FILENAME = "strata.config.ts";

// =============================================================================
// ADAPTER DEFINITIONS
// =============================================================================

export type AdapterKey = "postgres" | "memory";

interface AdapterChoice {
	value: AdapterKey;
	label: string;
	hint: string;
	packages: string[];
}

const adapters: AdapterChoice[] = [
	{
		value: "postgres",
		label: "PostgreSQL",
		hint: "drizzle-orm + pg",
		packages: ["@strata/drizzle-adapter", "drizzle-orm", "pg"],
	},
	{
		value: "memory",
		label: "In-Memory",
		hint: "testing only",
		packages: ["@strata/memory-adapter"],
	},
];

// =============================================================================
// CONFIG TEMPLATE GENERATOR
// =============================================================================

export interface ConfigTemplateOptions {
	adapter: AdapterKey;
	/** null disables archive retention */
	archiveRetentionMonths: number | null;
}

export function generateConfigTemplate(opts: ConfigTemplateOptions): string {
	const lines: string[] = ['import { createStrata } from "strata";'];

	if (opts.adapter === "postgres") {
		lines.push('import { createPostgresAdapter } from "@strata/drizzle-adapter";');
		lines.push("");
		lines.push("const { adapter } = createPostgresAdapter({ connectionString: process.env.DATABASE_URL });");
	} else {
		lines.push('import { memoryAdapter } from "@strata/memory-adapter";');
	}

	lines.push("");
	lines.push("export const strata = createStrata({");
	lines.push(`  database: ${opts.adapter === "postgres" ? "adapter" : "memoryAdapter()"},`);
	lines.push(`  archiveRetentionMonths: ${opts.archiveRetentionMonths ?? "null"},`);
	lines.push("  archivalAgeThresholdDays: 30,");
	lines.push("  archivePartitionsAhead: 3,");
	lines.push("});");
	lines.push("");

	return lines.join("\n");
}

// =============================================================================
// INIT COMMAND
// =============================================================================

export function initCommand(): Command {
	return new Command("init")
		.description("Create a strata.config.ts in the working directory")
		.option("-f, --force", "Overwrite existing config file")
		.option("-y, --yes", "Skip prompts and use defaults (postgres, no retention)")
		.action(async (options: { force?: boolean; yes?: boolean }, command: Command) => {
			const { cwd } = globalOptions(command);
			const existing = findConfigFile(cwd);
			const configPath = resolve(cwd, CONFIG_FILENAME);

			if (existing && !options.force) {
				p.log.warning(
					`Config already exists at ${pc.dim(existing)}. Use ${pc.bold("--force")} to overwrite.`,
				);
				process.exitCode = 1;
				return;
			}

			p.intro(pc.bgCyan(pc.black(" strata init ")));

			let adapterKey: AdapterKey = "postgres";
			let archiveRetentionMonths: number | null = null;

			if (!options.yes) {
				p.log.step(pc.bold("1. Database Adapter"));
				const adapterResult = await p.select({
					message: "Which database adapter?",
					options: adapters.map((a) => ({ value: a.value, label: a.label, hint: a.hint })),
					initialValue: adapterKey,
				});
				if (p.isCancel(adapterResult)) {
					p.cancel("Setup cancelled.");
					return;
				}
				adapterKey = adapterResult;

				p.log.step(pc.bold("2. Archive Retention"));
				const retentionResult = await p.text({
					message: "Months of archive to keep? (empty keeps everything)",
					placeholder: "24",
					defaultValue: "",
					validate: (v) => {
						if (v && !/^[1-9]\d*$/.test(v)) return "Enter a positive whole number of months";
					},
				});
				if (p.isCancel(retentionResult)) {
					p.cancel("Setup cancelled.");
					return;
				}
				archiveRetentionMonths = retentionResult ? Number(retentionResult) : null;
			}

			const adapter = adapters.find((a) => a.value === adapterKey);
			if (!adapter) {
				p.log.error("Unknown adapter selected.");
				process.exitCode = 1;
				return;
			}

			writeFileSync(configPath, generateConfigTemplate({ adapter: adapterKey, archiveRetentionMonths }), "utf-8");
			p.log.success(`Created ${pc.bold(CONFIG_FILENAME)}`);

			const nextSteps: string[] = [
				`${pc.bold("1.")} Install dependencies:`,
				`   ${pc.cyan(`npm install strata ${adapter.packages.join(" ")}`)}`,
			];
			if (adapterKey === "postgres") {
				nextSteps.push(
					"",
					`${pc.bold("2.")} Set ${pc.cyan("DATABASE_URL")} in your environment or .env file`,
					"",
					`${pc.bold("3.")} Generate and review the DDL:`,
					`   ${pc.cyan("npx strata partition generate")}`,
				);
			} else {
				nextSteps.push("", `${pc.bold("2.")} The in-memory adapter needs no DDL`);
			}

			p.note(nextSteps.join("\n"), "Next steps");
			p.outro(pc.green("You're all set!"));
		});
}
