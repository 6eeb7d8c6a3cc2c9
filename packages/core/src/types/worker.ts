import type { StrataContext } from "./context.js";

export interface StrataWorkerDefinition {
	/** Unique worker ID (e.g., "maintenance-daily") */
	id: string;

	/** Human-readable description */
	description?: string;

	/** Worker handler function */
	handler: (ctx: StrataContext) => Promise<void>;

	/** Polling interval (e.g., "30s", "1h", "1d") */
	interval: string;

	/** Whether this worker requires a distributed lease (prevents duplicate runs) */
	leaseRequired?: boolean;
}
