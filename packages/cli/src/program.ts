import { Command } from "commander";
import pc from "picocolors";
import { initCommand } from "./commands/init.js";
import { maintenanceCommand } from "./commands/maintenance.js";
import { migrateCommand } from "./commands/migrate.js";
import { partitionCommand } from "./commands/partition.js";
import { statusCommand } from "./commands/status.js";

export function createProgram(version: string): Command {
	const banner = `
  ${pc.bold(pc.cyan("strata"))} ${pc.dim(`v${version}`)}
  ${pc.dim("Partitioned storage for hierarchical todo items")}
`;

	const program = new Command()
		.name("strata")
		.description("CLI for strata: partition DDL, legacy migration, maintenance and health")
		.version(version, "-v, --version")
		.option("--cwd <dir>", "Working directory", process.cwd())
		.option("-c, --config <path>", "Path to strata config file")
		.action(() => {
			console.log(banner);
			program.help();
		});

	program.addCommand(initCommand());
	program.addCommand(partitionCommand());
	program.addCommand(migrateCommand());
	program.addCommand(maintenanceCommand());
	program.addCommand(statusCommand());

	return program;
}

/** Mask connection strings and credentials before printing an error. */
export function sanitizeErrorMessage(message: string): string {
	return message
		.replace(/postgres(ql)?:\/\/[^\s]+/gi, "postgres://***")
		.replace(/(password|token|secret|key)[=:]\s*\S+/gi, "$1=***");
}
