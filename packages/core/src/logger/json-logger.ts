// =============================================================================
// JSON LOGGER: Structured JSON logging for CI and build pipelines
// =============================================================================

import type { NominaLogger } from "../types/config.js";
import { LEVEL_PRIORITY, type LogLevel } from "./levels.js";

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Service name for structured output. Default: `"nomina"` */
	service?: string;
	/** Sink for each serialized line. Default: console.log / console.warn / console.error */
	write?: (line: string, level: LogLevel) => void;
}

function defaultWrite(line: string, level: LogLevel): void {
	const method = level === "error" ? "error" : level === "warn" ? "warn" : "log";
	console[method](line);
}

/**
 * Create a structured JSON logger implementing `NominaLogger`.
 *
 * Each log line is emitted as a single-line JSON object.
 *
 * @example
 * ```ts
 * import { createJsonLogger } from "@nomina/core/logger";
 *
 * const logger = createJsonLogger({ level: "debug", service: "schema-build" });
 * ```
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): NominaLogger {
	const { level = "info", service = "nomina", write = defaultWrite } = options;
	const minPriority = LEVEL_PRIORITY[level];

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const entry: Record<string, unknown> = {
			timestamp: new Date().toISOString(),
			level: lvl,
			service,
			message,
			...data,
		};

		write(JSON.stringify(entry), lvl);
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
