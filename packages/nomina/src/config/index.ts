import type { NamingOptions } from "@nomina/core";
import { NAMING_CONVENTIONS, NominaError } from "@nomina/core";

function isNamingConvention(value: string): value is (typeof NAMING_CONVENTIONS)[number] {
	return NAMING_CONVENTIONS.some((c) => c === value);
}

/**
 * Validate naming options at runtime.
 * Throws NominaError with clear messages on invalid configuration.
 */
export function validateConfig(options: NamingOptions): void {
	if (options.convention !== undefined && options.rewriter !== undefined) {
		throw NominaError.invalidArgument(
			"Nomina config: 'convention' and 'rewriter' are mutually exclusive",
		);
	}

	if (options.convention !== undefined && !isNamingConvention(options.convention)) {
		throw NominaError.invalidArgument(
			`Nomina config: unknown convention "${String(options.convention)}". Use one of ${NAMING_CONVENTIONS.join(", ")}.`,
		);
	}

	if (options.rewriter !== undefined && typeof options.rewriter.rewriteName !== "function") {
		throw NominaError.invalidArgument("Nomina config: 'rewriter' must have a rewriteName(name) method");
	}

	if (options.locale !== undefined) {
		if (typeof options.locale !== "string") {
			throw NominaError.invalidArgument("Nomina config: 'locale' must be a string");
		}
		try {
			Intl.getCanonicalLocales(options.locale);
		} catch (error) {
			throw new NominaError("INVALID_ARGUMENT", `Nomina config: invalid locale "${options.locale}"`, {
				status: 400,
				cause: error,
			});
		}
	}
}
