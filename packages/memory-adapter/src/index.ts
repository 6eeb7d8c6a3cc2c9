export { type MemoryAdapterOptions, matchesWhere, memoryAdapter } from "./adapter.js";
