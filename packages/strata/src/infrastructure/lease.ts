// =============================================================================
// LEASES
// =============================================================================
// Rows in `worker_lease` that give one holder exclusive use of a named job
// until they expire or are released.

import type { StrataAdapter, StrataContext } from "@strata/core";
import { WORKER_LEASE_TABLE } from "../db/schema.js";
import { toDate } from "../managers/item-helpers.js";
import type { RawWorkerLeaseRow } from "../managers/raw-types.js";

/**
 * Take or renew the lease `id` for `holder` until `leaseUntil`.
 *
 * The row is read under a row lock and taken over only once it has expired;
 * two processes inserting the first row race on the primary key and the
 * loser gets a constraint violation.
 */
export async function tryAcquireLease(
	ctx: StrataContext,
	id: string,
	holder: string,
	leaseUntil: Date,
): Promise<boolean> {
	const now = ctx.now();
	return ctx.adapter.transaction(async (tx) => {
		const row = await tx.findOne<RawWorkerLeaseRow>({
			model: WORKER_LEASE_TABLE,
			where: [{ field: "id", operator: "eq", value: id }],
			forUpdate: true,
		});

		if (!row) {
			await tx.create({
				model: WORKER_LEASE_TABLE,
				data: { id, leaseHolder: holder, leaseUntil },
			});
			return true;
		}

		if (row.leaseHolder !== holder && toDate(row.leaseUntil).getTime() > now.getTime()) {
			return false;
		}

		await tx.update({
			model: WORKER_LEASE_TABLE,
			where: [{ field: "id", operator: "eq", value: id }],
			update: { leaseHolder: holder, leaseUntil },
		});
		return true;
	});
}

/** Delete the lease `id` if `holder` still owns it. */
export async function releaseLease(adapter: StrataAdapter, id: string, holder: string): Promise<void> {
	await adapter.delete({
		model: WORKER_LEASE_TABLE,
		where: [
			{ field: "id", operator: "eq", value: id },
			{ field: "leaseHolder", operator: "eq", value: holder },
		],
	});
}
