#!/usr/bin/env node
import "dotenv/config";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { StrataError } from "@strata/core";
import { type Command, CommanderError } from "commander";
import pc from "picocolors";
import { createProgram, sanitizeErrorMessage } from "./program.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
	try {
		const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, "../package.json"), "utf-8"));
		if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
			return pkg.version;
		}
	} catch (error) {
		process.stderr.write(`strata: could not read package version: ${String(error)}\n`);
	}
	return "0.1.0";
}

function overrideExits(command: Command): void {
	command.exitOverride();
	for (const sub of command.commands) overrideExits(sub);
}

const program = createProgram(readVersion());
overrideExits(program);

try {
	await program.parseAsync();
	// Pooled adapters keep the event loop alive.
	process.exit(process.exitCode ?? 0);
} catch (error) {
	if (error instanceof CommanderError) {
		process.exit(error.exitCode);
	}
	const message = error instanceof Error ? error.message : String(error);
	const code = StrataError.is(error) ? `${error.code}: ` : "";
	console.error(pc.red(sanitizeErrorMessage(`${code}${message}`)));
	process.exit(1);
}
