import { InvalidArgumentError } from "commander";

export function parseNonNegativeInt(value: string): number {
	const parsed = Number(value);
	if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
		throw new InvalidArgumentError("Expected a non-negative integer.");
	}
	return parsed;
}

export function parsePositiveInt(value: string): number {
	const parsed = parseNonNegativeInt(value);
	if (parsed === 0) throw new InvalidArgumentError("Expected a positive integer.");
	return parsed;
}
