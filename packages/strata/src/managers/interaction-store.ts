// =============================================================================
// INTERACTION LOG STORE
// =============================================================================
// Append-only log of AI interactions, hash-partitioned by tenant with its own
// partition count. There is no update or delete path.

import type {
	AppendInteractionInput,
	Interaction,
	InteractionQuery,
	ItemPage,
	StrataContext,
	Where,
} from "@strata/core";
import {
	generateId,
	requireNonNegativeInteger,
	requireTenantKey,
	requireText,
	resolveLimit,
	resolveOffset,
} from "@strata/core/utils";
import { DEFAULT_QUERY_LIMIT, MAX_QUERY_LIMIT, toDate } from "./item-helpers.js";
import { interactionPartitionFor } from "./partition-router.js";
import type { RawInteractionRow } from "./raw-types.js";

function rawRowToInteraction(row: RawInteractionRow): Interaction {
	return {
		id: row.id,
		userId: row.userId,
		todoId: row.todoId ?? null,
		interactionType: row.interactionType,
		prompt: row.prompt,
		response: row.response ?? null,
		subtasksGenerated: Number(row.subtasksGenerated ?? 0),
		modelUsed: row.modelUsed ?? null,
		createdAt: toDate(row.createdAt),
	};
}

export async function appendInteraction(
	ctx: StrataContext,
	input: AppendInteractionInput,
): Promise<Interaction> {
	const userId = requireTenantKey("userId", input.userId);
	const subtasksGenerated = requireNonNegativeInteger("subtasksGenerated", input.subtasksGenerated ?? 0);
	const interaction: Interaction = {
		id: generateId(),
		userId,
		todoId: input.todoId ?? null,
		interactionType: requireText("interactionType", input.interactionType, 50),
		prompt: requireText("prompt", input.prompt),
		response: input.response ?? null,
		subtasksGenerated,
		modelUsed: input.modelUsed ?? null,
		createdAt: ctx.now(),
	};

	const { name } = interactionPartitionFor(ctx, userId);
	await ctx.adapter.create({ model: name, data: { ...interaction } });
	ctx.logger.debug("Interaction appended", { interactionId: interaction.id, partition: name });
	return interaction;
}

/** A tenant's interactions, newest first. */
export async function queryInteractions(
	ctx: StrataContext,
	query: InteractionQuery,
): Promise<ItemPage<Interaction>> {
	const tenantKey = requireTenantKey("tenantKey", query.tenantKey);
	const limit = resolveLimit(query.limit, DEFAULT_QUERY_LIMIT, MAX_QUERY_LIMIT);
	const offset = resolveOffset(query.offset);
	const { name } = interactionPartitionFor(ctx, tenantKey);

	const where: Where[] = [{ field: "userId", operator: "eq", value: tenantKey }];
	if (query.itemId !== undefined) {
		where.push({ field: "todoId", operator: "eq", value: query.itemId });
	}
	if (query.interactionType !== undefined) {
		where.push({ field: "interactionType", operator: "eq", value: query.interactionType });
	}

	const [rows, total] = await Promise.all([
		ctx.adapter.findMany<RawInteractionRow>({
			model: name,
			where,
			sortBy: [
				{ field: "createdAt", direction: "desc" },
				{ field: "id", direction: "asc" },
			],
			limit,
			offset,
		}),
		ctx.adapter.count({ model: name, where }),
	]);
	const items = rows.map(rawRowToInteraction);
	return { items, total, hasMore: offset + items.length < total };
}

export async function getInteraction(
	ctx: StrataContext,
	id: string,
	tenantKey: string,
): Promise<Interaction | null> {
	const { name } = interactionPartitionFor(ctx, tenantKey);
	const row = await ctx.adapter.findOne<RawInteractionRow>({
		model: name,
		where: [
			{ field: "id", operator: "eq", value: id },
			{ field: "userId", operator: "eq", value: tenantKey },
		],
	});
	return row ? rawRowToInteraction(row) : null;
}
