import * as p from "@clack/prompts";
import type { Command } from "commander";
import pc from "picocolors";
import { createStrata, type Strata } from "strata";
import { getConfig, type ResolvedStrataConfig } from "./get-config.js";

export interface GlobalOptions {
	cwd: string;
	config?: string;
}

/** The root program's `--cwd` and `--config`, seen from any subcommand. */
export function globalOptions(command: Command): GlobalOptions {
	const opts = command.optsWithGlobals<{ cwd?: string; config?: string }>();
	return { cwd: opts.cwd ?? process.cwd(), config: opts.config };
}

/**
 * Load the config and report a missing one. Sets a failing exit code and
 * returns null when no usable config was found.
 */
export async function requireConfig(command: Command): Promise<ResolvedStrataConfig | null> {
	const { cwd, config } = globalOptions(command);
	const loaded = await getConfig({ cwd, configPath: config });
	if (!loaded) {
		p.log.error(
			`${pc.red("No strata config found.")} ${pc.dim("Run strata init or pass --config <path>.")}`,
		);
		process.exitCode = 1;
		return null;
	}
	p.log.info(pc.dim(`Using ${loaded.configFile}`));
	return loaded;
}

export async function loadStrata(command: Command): Promise<Strata | null> {
	const loaded = await requireConfig(command);
	return loaded ? createStrata(loaded.options) : null;
}
