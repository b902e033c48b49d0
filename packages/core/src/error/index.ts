import { BASE_ERROR_CODES, type BaseErrorCode } from "./codes.js";

export {
	BASE_ERROR_CODES,
	type BaseErrorCode,
	createErrorCodes,
	type RawErrorCode,
} from "./codes.js";

export type NominaErrorCode = BaseErrorCode;

export class NominaError extends Error {
	readonly code: string;
	readonly status: number;
	readonly details?: Record<string, unknown>;

	constructor(
		code: string,
		message: string,
		options?: {
			cause?: unknown;
			status?: number;
			details?: Record<string, unknown>;
		},
	) {
		super(message, { cause: options?.cause });
		this.code = code;
		this.status = options?.status ?? 500;
		this.details = options?.details;
		this.name = "NominaError";
	}

	/**
	 * Create a NominaError from a typed error code.
	 * Uses the default message and status from BASE_ERROR_CODES.
	 */
	static fromCode<C extends NominaErrorCode>(
		code: C,
		options?: { message?: string; cause?: unknown; details?: Record<string, unknown> },
	): NominaError {
		const raw = BASE_ERROR_CODES[code];
		return new NominaError(code, options?.message ?? raw.message, {
			cause: options?.cause,
			status: raw.status,
			details: options?.details,
		});
	}

	static invalidArgument(message = "Invalid argument", details?: Record<string, unknown>) {
		return new NominaError("INVALID_ARGUMENT", message, { status: 400, details });
	}

	static notFound(message = "Element not found", details?: Record<string, unknown>) {
		return new NominaError("NOT_FOUND", message, { status: 404, details });
	}

	static duplicate(message = "Duplicate element", details?: Record<string, unknown>) {
		return new NominaError("DUPLICATE", message, { status: 409, details });
	}

	static conflict(message = "Model conflict", details?: Record<string, unknown>) {
		return new NominaError("CONFLICT", message, { status: 409, details });
	}

	static duplicateName(message = "Duplicate database name", details?: Record<string, unknown>) {
		return new NominaError("DUPLICATE_NAME", message, { status: 422, details });
	}

	static internal(message = "Internal error", cause?: unknown) {
		return new NominaError("INTERNAL", message, { cause, status: 500 });
	}
}
