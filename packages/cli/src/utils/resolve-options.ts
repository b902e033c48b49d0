import type { NamingConvention, NamingOptions } from "@nomina/core";
import { NAMING_CONVENTIONS, NominaError } from "@nomina/core";
import { isNamingConvention, type NominaFileConfig } from "./get-config.js";

export interface NamingFlags {
	convention?: string;
	locale?: string;
}

export interface ResolvedNamingOptions {
	naming: Omit<NamingOptions, "logger">;
	defaultSchema?: string;
	/** Where the rewriter came from, for display */
	origin: "flag" | "env" | "config" | "default";
}

function parseConvention(value: string, origin: string): NamingConvention {
	if (!isNamingConvention(value)) {
		throw NominaError.invalidArgument(
			`Unknown convention "${value}" (from ${origin}). Use one of ${NAMING_CONVENTIONS.join(", ")}.`,
		);
	}
	return value;
}

/**
 * Merge naming options by precedence: command-line flags, then the
 * `NOMINA_CONVENTION` / `NOMINA_LOCALE` environment variables, then the config
 * file. A convention given by flag or environment replaces a custom rewriter
 * from the config file.
 */
export function resolveNamingOptions(
	flags: NamingFlags,
	config: NominaFileConfig | undefined,
	env: NodeJS.ProcessEnv = process.env,
): ResolvedNamingOptions {
	const locale = flags.locale ?? env.NOMINA_LOCALE ?? config?.locale;
	const defaultSchema = config?.defaultSchema;

	if (flags.convention !== undefined) {
		const convention = parseConvention(flags.convention, "--convention");
		return { naming: { convention, locale }, defaultSchema, origin: "flag" };
	}
	if (env.NOMINA_CONVENTION) {
		const convention = parseConvention(env.NOMINA_CONVENTION, "NOMINA_CONVENTION");
		return { naming: { convention, locale }, defaultSchema, origin: "env" };
	}
	if (config?.rewriter) {
		return { naming: { rewriter: config.rewriter, locale }, defaultSchema, origin: "config" };
	}
	if (config?.convention) {
		return { naming: { convention: config.convention, locale }, defaultSchema, origin: "config" };
	}
	return { naming: { convention: "snake_case", locale }, defaultSchema, origin: "default" };
}
