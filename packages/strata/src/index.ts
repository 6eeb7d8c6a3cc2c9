export { createStrata, type Strata } from "./strata/base.js";
export { defineStrataConfig } from "./config/index.js";
export type { MaintenanceResult } from "./infrastructure/maintenance-scheduler.js";
export { parseInterval } from "./infrastructure/worker-runner.js";
export type { ArchivePartition } from "./managers/archive-store.js";
export { activePartitionFor, interactionPartitionFor } from "./managers/partition-router.js";
export type { RoutedPartition } from "./managers/partition-router.js";

export * from "@strata/core";
