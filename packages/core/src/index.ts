// Storage contract
export * from "./db/index.js";

// Errors
export type { BaseErrorCode, RawErrorCode, StrataErrorCode, StrataErrorOptions } from "./error/index.js";
export { BASE_ERROR_CODES, createErrorCodes, StrataError } from "./error/index.js";

// Type definitions
export * from "./types/index.js";

// Utilities
export * from "./utils/index.js";
