// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Provides a typed error code registry with status codes and default messages.
// Hosts can extend this by declaring their own error codes via `createErrorCodes`.

export type RawErrorCode = {
	message: string;
	/** HTTP-style status, so CLI and service wrappers can map errors uniformly. */
	status: number;
};

export const BASE_ERROR_CODES = {
	INVALID_ARGUMENT: { message: "Invalid argument", status: 400 },
	NOT_FOUND: { message: "Element not found", status: 404 },
	DUPLICATE: { message: "Duplicate element", status: 409 },
	CONFLICT: { message: "Model conflict", status: 409 },
	// Raised by model validation when two store-object names collide.
	DUPLICATE_NAME: { message: "Duplicate database name", status: 422 },
	INTERNAL: { message: "Internal error", status: 500 },
} as const satisfies Record<string, RawErrorCode>;

export type BaseErrorCode = keyof typeof BASE_ERROR_CODES;

/**
 * Create typed error codes for a host or extension. Returns a frozen object.
 *
 * @example
 * ```ts
 * export const SQLITE_ERROR_CODES = createErrorCodes({
 *   IDENTIFIER_TOO_LONG: { message: "Identifier exceeds 64 characters", status: 422 },
 * });
 * ```
 */
export function createErrorCodes<T extends Record<string, RawErrorCode>>(codes: T): Readonly<T> {
	return Object.freeze(codes);
}
