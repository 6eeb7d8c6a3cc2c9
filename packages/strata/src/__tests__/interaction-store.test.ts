import { getTestInstance, TENANT_A, TENANT_B, type TestInstance } from "@strata/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

let t: TestInstance;

beforeEach(async () => {
	t = await getTestInstance();
});

afterEach(async () => {
	await t.cleanup();
});

describe("interactions.append", () => {
	it("writes to the tenant's interaction partition", async () => {
		const interaction = await t.strata.interactions.append({
			userId: TENANT_A,
			interactionType: "breakdown",
			prompt: "Split 'plan trip' into steps",
			response: "1. Book flights\n2. Reserve hotel",
			subtasksGenerated: 2,
			modelUsed: "test-model",
		});

		expect(interaction).toMatchObject({
			userId: TENANT_A,
			todoId: null,
			interactionType: "breakdown",
			subtasksGenerated: 2,
			createdAt: new Date("2025-09-15T12:00:00.000Z"),
		});
		expect(t.adapter.touchedModels()).toEqual(["ai_todo_interaction_p1"]);
		expect(await t.strata.interactions.get(interaction.id, TENANT_A)).toEqual(interaction);
	});

	it("routes each tenant independently of the active partition count", async () => {
		await t.strata.interactions.append({ userId: TENANT_B, interactionType: "chat", prompt: "Hi" });
		expect(t.adapter.touchedModels()).toEqual(["ai_todo_interaction_p7"]);
	});

	it("does not check the item reference", async () => {
		const interaction = await t.strata.interactions.append({
			userId: TENANT_A,
			todoId: "00000000-0000-4000-8000-000000000404",
			interactionType: "chat",
			prompt: "About a deleted item",
		});
		expect(interaction.todoId).toBe("00000000-0000-4000-8000-000000000404");
	});

	it("validates its fields", async () => {
		const base = { userId: TENANT_A, interactionType: "chat", prompt: "Hello" };

		await expect(t.strata.interactions.append({ ...base, prompt: "  " })).rejects.toMatchObject({
			code: "INVALID_ARGUMENT",
		});
		await expect(
			t.strata.interactions.append({ ...base, interactionType: "x".repeat(51) }),
		).rejects.toMatchObject({ code: "INVALID_ARGUMENT" });
		await expect(
			t.strata.interactions.append({ ...base, subtasksGenerated: -1 }),
		).rejects.toMatchObject({ code: "INVALID_ARGUMENT" });
		expect(t.adapter.calls).toEqual([]);
	});
});

describe("interactions.query", () => {
	it("returns a tenant's log newest first with filters", async () => {
		const ids: string[] = [];
		for (const [type, todoId] of [
			["chat", null],
			["breakdown", "00000000-0000-4000-8000-000000000001"],
			["chat", "00000000-0000-4000-8000-000000000001"],
		] as const) {
			const interaction = await t.strata.interactions.append({
				userId: TENANT_A,
				interactionType: type,
				todoId,
				prompt: `${type} prompt`,
			});
			ids.push(interaction.id);
			t.clock.advance(1_000);
		}
		await t.strata.interactions.append({ userId: TENANT_B, interactionType: "chat", prompt: "Other" });

		const all = await t.strata.interactions.query({ tenantKey: TENANT_A });
		expect(all.items.map((i) => i.id)).toEqual([ids[2], ids[1], ids[0]]);
		expect(all.total).toBe(3);
		expect(all.hasMore).toBe(false);

		const chats = await t.strata.interactions.query({ tenantKey: TENANT_A, interactionType: "chat" });
		expect(chats.items.map((i) => i.id)).toEqual([ids[2], ids[0]]);

		const forItem = await t.strata.interactions.query({
			tenantKey: TENANT_A,
			itemId: "00000000-0000-4000-8000-000000000001",
			limit: 1,
		});
		expect(forItem.items.map((i) => i.id)).toEqual([ids[2]]);
		expect(forItem.total).toBe(2);
		expect(forItem.hasMore).toBe(true);
	});

	it("requires a tenant key", async () => {
		await expect(t.strata.interactions.query({ tenantKey: "" })).rejects.toMatchObject({
			code: "INVALID_ARGUMENT",
		});
	});

	it("hides other tenants' entries from get", async () => {
		const interaction = await t.strata.interactions.append({
			userId: TENANT_A,
			interactionType: "chat",
			prompt: "Mine",
		});
		expect(await t.strata.interactions.get(interaction.id, TENANT_B)).toBeNull();
	});
});
