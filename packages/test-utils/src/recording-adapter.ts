// =============================================================================
// RECORDING ADAPTER
// =============================================================================
// Wraps a StrataAdapter and records the model every data call touches,
// including calls made inside transactions. Catalog calls are not recorded.

import type { StrataAdapter, StrataTransactionAdapter } from "@strata/core";

export interface RecordedCall {
	method: string;
	model: string;
}

export interface RecordingAdapter extends StrataAdapter {
	calls: RecordedCall[];
	/** Distinct models touched since the last reset, in first-touch order. */
	touchedModels: () => string[];
	reset: () => void;
}

function recordMethods(
	inner: StrataTransactionAdapter,
	calls: RecordedCall[],
): Omit<StrataTransactionAdapter, "id" | "options"> {
	return {
		create: (data) => {
			calls.push({ method: "create", model: data.model });
			return inner.create(data);
		},
		createMany: (data) => {
			calls.push({ method: "createMany", model: data.model });
			return inner.createMany(data);
		},
		findOne: (data) => {
			calls.push({ method: "findOne", model: data.model });
			return inner.findOne(data);
		},
		findMany: (data) => {
			calls.push({ method: "findMany", model: data.model });
			return inner.findMany(data);
		},
		update: (data) => {
			calls.push({ method: "update", model: data.model });
			return inner.update(data);
		},
		delete: (data) => {
			calls.push({ method: "delete", model: data.model });
			return inner.delete(data);
		},
		count: (data) => {
			calls.push({ method: "count", model: data.model });
			return inner.count(data);
		},
		distinct: (data) => {
			calls.push({ method: "distinct", model: data.model });
			return inner.distinct(data);
		},
	};
}

export function createRecordingAdapter(inner: StrataAdapter): RecordingAdapter {
	const calls: RecordedCall[] = [];

	return {
		id: inner.id,
		get options() {
			return inner.options;
		},
		catalog: inner.catalog,
		...recordMethods(inner, calls),
		transaction: (fn) =>
			inner.transaction((tx) => fn({ id: tx.id, options: tx.options, ...recordMethods(tx, calls) })),
		calls,
		touchedModels: () => [...new Set(calls.map((call) => call.model))],
		reset: () => {
			calls.length = 0;
		},
	};
}
