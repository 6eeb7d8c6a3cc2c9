export type {
	SortBy,
	StrataAdapter,
	StrataAdapterOptions,
	StrataTransactionAdapter,
	Where,
	WhereOperator,
} from "./adapter.js";
export {
	buildOrderByClause,
	buildWhereClause,
	keysToCamel,
	keysToSnake,
	listValue,
	toCamelCase,
	toSnakeCase,
	toSortList,
} from "./adapter-utils.js";
export type {
	HashPartitionSpec,
	PartitionCatalog,
	PartitionSpec,
	PartitionStats,
	RangePartitionSpec,
} from "./catalog.js";
export { createTableResolver, quoteIdentifier } from "./schema-prefix.js";
export { buildSqlAdapterMethods, type SqlExecutor } from "./sql-adapter-methods.js";
