// Errors
export type { BaseErrorCode, NominaErrorCode, RawErrorCode } from "./error/index.js";
export { BASE_ERROR_CODES, createErrorCodes, NominaError } from "./error/index.js";

// Type definitions
export * from "./types/index.js";

// Utilities
export * from "./utils/index.js";
