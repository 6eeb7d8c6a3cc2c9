import { randomUUID } from "node:crypto";
import { describe, expect, it } from "vitest";
import { StrataError } from "../error/index.js";
import {
	hashBytesExtended,
	partitionFor,
	partitionKeyBytes,
	partitionRowHash,
} from "../utils/partition-hash.js";

describe("partitionFor", () => {
	it("routes the reference uuid to partition 9 of 16", () => {
		expect(partitionFor("40e142fd-1038-48e6-93ae-15edba5c5c43", 16)).toBe(9);
	});

	it("matches PostgreSQL placement for other moduli", () => {
		expect(partitionFor("40e142fd-1038-48e6-93ae-15edba5c5c43", 8)).toBe(1);
		expect(partitionFor("00000000-0000-0000-0000-000000000001", 16)).toBe(13);
		expect(partitionFor("00000000-0000-0000-0000-000000000001", 8)).toBe(5);
		expect(partitionFor("11111111-2222-4333-8444-555555555555", 16)).toBe(3);
		expect(partitionFor("aaaaaaaa-bbbb-4ccc-8ddd-eeeeeeeeeeee", 16)).toBe(15);
		expect(partitionFor("aaaaaaaa-bbbb-4ccc-8ddd-eeeeeeeeeeee", 8)).toBe(7);
	});

	it("hashes text keys as UTF-8", () => {
		expect(partitionFor("tenant-a", 16)).toBe(4);
		expect(partitionFor("user-1", 16)).toBe(5);
		expect(partitionFor("hello world!", 16)).toBe(12);
		expect(partitionFor("hello world!", 8)).toBe(4);
		expect(partitionFor("Ünïcödé", 16)).toBe(7);
	});

	it("treats uuid case the same way the uuid type does", () => {
		expect(partitionFor("40E142FD-1038-48E6-93AE-15EDBA5C5C43", 16)).toBe(9);
	});

	it("is deterministic", () => {
		const key = randomUUID();
		const first = partitionFor(key, 16);
		for (let i = 0; i < 10; i++) {
			expect(partitionFor(key, 16)).toBe(first);
		}
	});

	it("always returns an index in range", () => {
		for (let i = 0; i < 500; i++) {
			const index = partitionFor(randomUUID(), 7);
			expect(index).toBeGreaterThanOrEqual(0);
			expect(index).toBeLessThan(7);
		}
	});

	it("spreads random keys evenly", () => {
		const counts = new Array<number>(16).fill(0);
		for (let i = 0; i < 10_000; i++) {
			counts[partitionFor(randomUUID(), 16)]++;
		}
		const expected = 10_000 / 16;
		expect(Math.max(...counts)).toBeLessThan(expected * 3);
		expect(Math.min(...counts)).toBeGreaterThan(0);
	});

	it.each([0, -1, 1.5, Number.NaN])("rejects partition count %s", (count) => {
		expect(() => partitionFor("tenant-a", count)).toThrow(StrataError);
		try {
			partitionFor("tenant-a", count);
		} catch (error) {
			expect(StrataError.is(error, "INVALID_ARGUMENT")).toBe(true);
		}
	});
});

describe("hashBytesExtended", () => {
	it("reproduces hash_bytes_extended for a uuid key", () => {
		const bytes = partitionKeyBytes("40e142fd-1038-48e6-93ae-15edba5c5c43");
		expect(hashBytesExtended(bytes, 0x7a5b22367996dcfdn)).toBe(1559860343345353222n);
	});

	it("handles the empty key with and without a seed", () => {
		expect(hashBytesExtended(new Uint8Array(), 0n)).toBe(11507180170145056365n);
		expect(hashBytesExtended(new Uint8Array(), 0x7a5b22367996dcfdn)).toBe(12746098489256034243n);
	});

	it("handles a one-byte key", () => {
		expect(hashBytesExtended(new TextEncoder().encode("a"), 0n)).toBe(3591986179850072241n);
	});
});

describe("partitionRowHash", () => {
	it("adds the combine constant modulo 2^64", () => {
		expect(partitionRowHash("40e142fd-1038-48e6-93ae-15edba5c5c43")).toBe(6865369934780119785n);
		expect(partitionRowHash("aaaaaaaa-bbbb-4ccc-8ddd-eeeeeeeeeeee")).toBe(16834479597065070303n);
	});
});

describe("partitionKeyBytes", () => {
	it("decodes uuids to 16 raw bytes", () => {
		const bytes = partitionKeyBytes("00000000-0000-0000-0000-0000000000ff");
		expect(bytes).toHaveLength(16);
		expect(bytes[15]).toBe(255);
		expect(bytes[0]).toBe(0);
	});

	it("encodes other keys as UTF-8", () => {
		expect(Array.from(partitionKeyBytes("Ü"))).toEqual([0xc3, 0x9c]);
	});
});
