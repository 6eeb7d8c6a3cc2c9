import { describe, expect, it } from "vitest";
import { generateId } from "../utils/id.js";

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe("generateId", () => {
	it("produces lower-case v4 UUIDs, the format of item and interaction ids", () => {
		expect(generateId()).toMatch(UUID_V4);
	});

	it("never repeats within a migration-sized batch", () => {
		const ids = new Set(Array.from({ length: 1000 }, () => generateId()));
		expect(ids.size).toBe(1000);
	});
});
