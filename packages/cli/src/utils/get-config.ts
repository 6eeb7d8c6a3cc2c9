// =============================================================================
// Config loader -- c12 (UnJS) + jiti for runtime TS transpilation
// =============================================================================
// Discovers and loads the user's strata config file (e.g. strata.config.ts).
// Accepts a named export `strata`, a default export, a Strata instance or a
// plain options object.

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { StrataOptions } from "@strata/core";
import { loadConfig } from "c12";
import { createJiti } from "jiti";
import { possibleConfigPaths } from "./config-paths.js";

export interface ResolvedStrataConfig {
	/** The StrataOptions found in the config file */
	options: StrataOptions;
	/** Absolute path of the config file that was loaded */
	configFile: string;
}

/**
 * Load and resolve the strata config file.
 *
 * Resolution order:
 * 1. If `configPath` is provided (--config flag), use it directly.
 * 2. Otherwise, scan `possibleConfigPaths` from the working directory.
 */
export async function getConfig({
	cwd,
	configPath,
}: {
	cwd: string;
	configPath?: string;
}): Promise<ResolvedStrataConfig | null> {
	const configFile = findConfigFile(cwd, configPath);
	if (!configFile) return null;
	return tryLoadConfig(configFile, cwd);
}

/**
 * Find the config file path without loading it.
 */
export function findConfigFile(cwd: string, configPath?: string): string | null {
	if (configPath) {
		const resolved = existsSync(configPath) ? resolve(configPath) : resolve(cwd, configPath);
		return existsSync(resolved) ? resolved : null;
	}

	for (const candidate of possibleConfigPaths) {
		const fullPath = resolve(cwd, candidate);
		if (existsSync(fullPath)) return fullPath;
	}

	return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null;
}

/**
 * Read tsconfig.json and extract path aliases for jiti.
 */
export function parsePathAliases(raw: string, cwd: string): Record<string, string> | null {
	// Strip comments for JSON.parse (single-line and multi-line)
	const stripped = raw.replace(/\/\*[\s\S]*?\*\//g, "").replace(/^\s*\/\/.*$/gm, "");
	const tsconfig: unknown = JSON.parse(stripped);
	if (!isRecord(tsconfig) || !isRecord(tsconfig.compilerOptions)) return null;

	const { paths, baseUrl } = tsconfig.compilerOptions;
	if (!isRecord(paths)) return null;

	const baseDir = resolve(cwd, typeof baseUrl === "string" ? baseUrl : ".");
	const aliases: Record<string, string> = {};

	for (const [alias, targets] of Object.entries(paths)) {
		if (!Array.isArray(targets)) continue;
		const target: unknown = targets[0];
		if (typeof target !== "string") continue;
		aliases[alias.replace(/\/\*$/, "")] = resolve(baseDir, target.replace(/\/\*$/, ""));
	}

	return Object.keys(aliases).length > 0 ? aliases : null;
}

function getPathAliases(cwd: string): Record<string, string> | null {
	const tsconfigPath = resolve(cwd, "tsconfig.json");
	if (!existsSync(tsconfigPath)) return null;

	try {
		return parsePathAliases(readFileSync(tsconfigPath, "utf-8"), cwd);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		process.stderr.write(`strata: ignoring path aliases in ${tsconfigPath}: ${message}\n`);
		return null;
	}
}

async function tryLoadConfig(configFile: string, cwd: string): Promise<ResolvedStrataConfig | null> {
	try {
		const aliases = getPathAliases(cwd);
		const jitiInstance = aliases ? createJiti(cwd, { alias: aliases }) : undefined;

		const { config } = await loadConfig({
			configFile,
			cwd,
			dotenv: true,
			rcFile: false,
			packageJson: false,
			globalRc: false,
			...(jitiInstance ? { jiti: jitiInstance } : {}),
		});

		if (!isRecord(config)) return null;

		const options = extractOptions(config);
		if (!options) return null;

		return { options, configFile };
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		process.stderr.write(`strata: failed to load config from ${configFile}: ${message}\n`);
		return null;
	}
}

// =============================================================================
// OPTIONS EXTRACTION
// =============================================================================

function isStrataOptions(value: unknown): value is StrataOptions {
	return isRecord(value) && (typeof value.database === "function" || isRecord(value.database));
}

function optionsOf(value: unknown): StrataOptions | null {
	if (!isRecord(value)) return null;
	// Strata instance
	if (isStrataOptions(value.$options)) return value.$options;
	if (isStrataOptions(value)) return value;
	return null;
}

/**
 * Extract StrataOptions from the loaded module.
 *
 * c12 spreads `export default X` onto the config object and keeps named
 * exports under their names, so the lookup order is:
 *   1. named export `strata` (instance or options)
 *   2. `default` key (instance or options)
 *   3. the config object itself (instance or options)
 */
export function extractOptions(config: Record<string, unknown>): StrataOptions | null {
	return optionsOf(config.strata) ?? optionsOf(config.default) ?? optionsOf(config);
}
