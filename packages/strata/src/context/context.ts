// =============================================================================
// CONTEXT BUILDER
// =============================================================================
// Builds StrataContext from StrataOptions. Resolves adapter, logger, clock and
// merges config defaults.

import type { StrataAdapter, StrataContext, StrataOptions } from "@strata/core";
import { createConsoleLogger } from "@strata/core/logger";
import { resolveOptions, validateConfig } from "../config/index.js";

export function buildContext(options: StrataOptions): StrataContext {
	validateConfig(options);

	const adapter: StrataAdapter =
		typeof options.database === "function" ? options.database() : options.database;

	const logger = options.logger ?? createConsoleLogger();
	const resolvedOptions = resolveOptions(options);

	// SQL adapters qualify table names with this schema
	if (adapter.options) {
		adapter.options.schema = resolvedOptions.schema;
	}

	if (resolvedOptions.archiveRetentionMonths === null) {
		logger.debug("Archive retention is disabled; archive partitions are never dropped");
	}

	return {
		adapter,
		options: resolvedOptions,
		logger,
		now: options.now ?? (() => new Date()),
	};
}
