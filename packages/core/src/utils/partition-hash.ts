// =============================================================================
// POSTGRESQL HASH PARTITION ROUTING
// =============================================================================
// Reproduces how PostgreSQL places a row in a `PARTITION BY HASH` table with a
// single key column, so the library and the database agree on placement:
//
//   h     = hash_bytes_extended(key bytes, HASH_PARTITION_SEED)
//   row   = hash_combine64(0, h)            -- h + 0x49a0f4dd15e5a8e3 (mod 2^64)
//   index = row mod modulus
//
// hash_bytes_extended is Bob Jenkins' lookup3 (hashlittle2), returning the
// b and c words as one 64-bit value. uuid keys hash their 16 raw bytes,
// text keys their UTF-8 bytes.

import { StrataError } from "../error/index.js";

export const HASH_PARTITION_SEED = 0x7a5b22367996dcfdn;

const HASH_COMBINE_CONSTANT = 0x49a0f4dd15e5a8e3n;
const UINT64_MASK = 0xffffffffffffffffn;
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const encoder = new TextEncoder();

function rot(x: number, k: number): number {
	return ((x << k) | (x >>> (32 - k))) >>> 0;
}

function mix(s: [number, number, number]): void {
	let [a, b, c] = s;
	a = (a - c) >>> 0; a = (a ^ rot(c, 4)) >>> 0; c = (c + b) >>> 0;
	b = (b - a) >>> 0; b = (b ^ rot(a, 6)) >>> 0; a = (a + c) >>> 0;
	c = (c - b) >>> 0; c = (c ^ rot(b, 8)) >>> 0; b = (b + a) >>> 0;
	a = (a - c) >>> 0; a = (a ^ rot(c, 16)) >>> 0; c = (c + b) >>> 0;
	b = (b - a) >>> 0; b = (b ^ rot(a, 19)) >>> 0; a = (a + c) >>> 0;
	c = (c - b) >>> 0; c = (c ^ rot(b, 4)) >>> 0; b = (b + a) >>> 0;
	s[0] = a;
	s[1] = b;
	s[2] = c;
}

function final(s: [number, number, number]): void {
	let [a, b, c] = s;
	c = (c ^ b) >>> 0; c = (c - rot(b, 14)) >>> 0;
	a = (a ^ c) >>> 0; a = (a - rot(c, 11)) >>> 0;
	b = (b ^ a) >>> 0; b = (b - rot(a, 25)) >>> 0;
	c = (c ^ b) >>> 0; c = (c - rot(b, 16)) >>> 0;
	a = (a ^ c) >>> 0; a = (a - rot(c, 4)) >>> 0;
	b = (b ^ a) >>> 0; b = (b - rot(a, 14)) >>> 0;
	c = (c ^ b) >>> 0; c = (c - rot(b, 24)) >>> 0;
	s[0] = a;
	s[1] = b;
	s[2] = c;
}

function word(k: Uint8Array, i: number): number {
	return (k[i] | (k[i + 1] << 8) | (k[i + 2] << 16) | (k[i + 3] << 24)) >>> 0;
}

/** PostgreSQL's `hash_bytes_extended`: 64-bit lookup3 hash of `key`. */
export function hashBytesExtended(key: Uint8Array, seed: bigint): bigint {
	let len = key.length;
	const init = (0x9e3779b9 + len + 3923095) >>> 0;
	const s: [number, number, number] = [init, init, init];

	if (seed !== 0n) {
		s[0] = (s[0] + Number((seed >> 32n) & 0xffffffffn)) >>> 0;
		s[1] = (s[1] + Number(seed & 0xffffffffn)) >>> 0;
		mix(s);
	}

	let i = 0;
	while (len >= 12) {
		s[0] = (s[0] + word(key, i)) >>> 0;
		s[1] = (s[1] + word(key, i + 4)) >>> 0;
		s[2] = (s[2] + word(key, i + 8)) >>> 0;
		mix(s);
		i += 12;
		len -= 12;
	}

	// Tail: the low byte of c is reserved for the length.
	if (len >= 9) {
		if (len >= 11) s[2] = (s[2] + (key[i + 10] << 24)) >>> 0;
		if (len >= 10) s[2] = (s[2] + (key[i + 9] << 16)) >>> 0;
		s[2] = (s[2] + (key[i + 8] << 8)) >>> 0;
		s[1] = (s[1] + word(key, i + 4)) >>> 0;
		s[0] = (s[0] + word(key, i)) >>> 0;
	} else if (len === 8) {
		s[1] = (s[1] + word(key, i + 4)) >>> 0;
		s[0] = (s[0] + word(key, i)) >>> 0;
	} else if (len >= 4) {
		if (len >= 7) s[1] = (s[1] + (key[i + 6] << 16)) >>> 0;
		if (len >= 6) s[1] = (s[1] + (key[i + 5] << 8)) >>> 0;
		if (len >= 5) s[1] = (s[1] + key[i + 4]) >>> 0;
		s[0] = (s[0] + word(key, i)) >>> 0;
	} else {
		if (len >= 3) s[0] = (s[0] + (key[i + 2] << 16)) >>> 0;
		if (len >= 2) s[0] = (s[0] + (key[i + 1] << 8)) >>> 0;
		if (len >= 1) s[0] = (s[0] + key[i]) >>> 0;
	}

	final(s);
	return (BigInt(s[1]) << 32n) | BigInt(s[2]);
}

/** Bytes PostgreSQL hashes for a key: raw uuid bytes, else UTF-8 text. */
export function partitionKeyBytes(tenantKey: string): Uint8Array {
	if (UUID_PATTERN.test(tenantKey)) {
		const hex = tenantKey.replace(/-/g, "");
		const bytes = new Uint8Array(16);
		for (let i = 0; i < 16; i++) {
			bytes[i] = Number.parseInt(hex.slice(i * 2, i * 2 + 2), 16);
		}
		return bytes;
	}
	return encoder.encode(tenantKey);
}

/** The combined row hash PostgreSQL reduces modulo the partition count. */
export function partitionRowHash(tenantKey: string): bigint {
	const h = hashBytesExtended(partitionKeyBytes(tenantKey), HASH_PARTITION_SEED);
	return (h + HASH_COMBINE_CONSTANT) & UINT64_MASK;
}

/**
 * Index in `[0, partitionCount)` of the hash partition holding `tenantKey`.
 *
 * @example
 * ```ts
 * partitionFor("40e142fd-1038-48e6-93ae-15edba5c5c43", 16); // 9
 * ```
 */
export function partitionFor(tenantKey: string, partitionCount: number): number {
	if (!Number.isInteger(partitionCount) || partitionCount <= 0) {
		throw StrataError.invalidArgument(
			`Partition count must be a positive integer, got ${partitionCount}`,
			{ partitionCount },
		);
	}
	return Number(partitionRowHash(tenantKey) % BigInt(partitionCount));
}

export function isUuid(value: string): boolean {
	return UUID_PATTERN.test(value);
}
