// =============================================================================
// PARTITION ROUTER
// =============================================================================
// Maps a tenant key to the physical hash partition holding its rows. The
// partition counts are fixed for the lifetime of a deployment.

import type { StrataContext } from "@strata/core";
import { partitionFor, requireTenantKey } from "@strata/core/utils";
import { activePartitionName, interactionPartitionName } from "../db/partitioning.js";

export interface RoutedPartition {
	index: number;
	name: string;
}

export function activePartitionFor(ctx: StrataContext, tenantKey: string): RoutedPartition {
	const index = partitionFor(requireTenantKey("tenantKey", tenantKey), ctx.options.activePartitionCount);
	return { index, name: activePartitionName(index) };
}

export function interactionPartitionFor(ctx: StrataContext, tenantKey: string): RoutedPartition {
	const index = partitionFor(requireTenantKey("tenantKey", tenantKey), ctx.options.interactionPartitionCount);
	return { index, name: interactionPartitionName(index) };
}

/** Every Active partition, for administrative scans. */
export function allActivePartitions(ctx: StrataContext): string[] {
	return Array.from({ length: ctx.options.activePartitionCount }, (_, i) => activePartitionName(i));
}

export function allInteractionPartitions(ctx: StrataContext): string[] {
	return Array.from({ length: ctx.options.interactionPartitionCount }, (_, i) =>
		interactionPartitionName(i),
	);
}
