// =============================================================================
// CONSOLE LOGGER: Built-in NominaLogger backed by console.*
// =============================================================================

import type { NominaLogger } from "../types/config.js";
import { blue, bold, dim, magenta, red, yellow } from "./colors.js";
import { LEVEL_PRIORITY, type LogLevel } from "./levels.js";

const LEVEL_COLOR: Record<LogLevel, (s: string) => string> = {
	debug: magenta,
	info: blue,
	warn: yellow,
	error: red,
};

export interface ConsoleLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Prefix shown before each message. Default: `"Nomina"` */
	prefix?: string;
	/** Whether to include ISO timestamps. Default: `true` */
	timestamps?: boolean;
}

/**
 * Create a console-based logger implementing `NominaLogger`.
 *
 * @example
 * ```ts
 * import { createConsoleLogger } from "@nomina/core/logger";
 *
 * const logger = createConsoleLogger({ level: "debug" });
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): NominaLogger {
	const { level = "info", prefix = "Nomina", timestamps = true } = options;
	const minPriority = LEVEL_PRIORITY[level];

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const parts: string[] = [];
		if (timestamps) {
			parts.push(dim(new Date().toISOString()));
		}
		parts.push(LEVEL_COLOR[lvl](bold(lvl.toUpperCase().padEnd(5))));
		parts.push(`[${prefix}]:`);
		parts.push(message);

		const line = parts.join(" ");
		const method = lvl === "error" ? "error" : lvl === "warn" ? "warn" : "log";

		if (data && Object.keys(data).length > 0) {
			console[method](line, data);
		} else {
			console[method](line);
		}
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
