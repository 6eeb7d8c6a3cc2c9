import { randomUUID } from "node:crypto";

/** Generate a new item, interaction or record id (UUID v4). */
export function generateId(): string {
	return randomUUID();
}
