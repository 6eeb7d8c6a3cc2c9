export type MaintenanceJobName = "daily" | "weekly";

export const MAINTENANCE_JOBS = ["daily", "weekly"] as const satisfies readonly MaintenanceJobName[];

export type MaintenanceRunStatus = "running" | "completed" | "failed";

/** Per-job state machine: idle → running → completed | failed → idle. */
export type MaintenanceJobState = "idle" | "running" | "completed" | "failed";

export interface MaintenanceRun {
	id: string;
	jobName: MaintenanceJobName;
	startedAt: Date;
	completedAt: Date | null;
	status: MaintenanceRunStatus;
	/** Human-readable summary, e.g. `archived 0 items; created 4 partitions`. */
	details: string;
	failedStep: string | null;
}

export interface MaintenanceHistoryQuery {
	jobName?: MaintenanceJobName;
	/** Default: 20 */
	limit?: number;
}
