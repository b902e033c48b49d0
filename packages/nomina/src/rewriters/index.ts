// =============================================================================
// NAME REWRITERS
// =============================================================================

import type { NameRewriter, NamingConvention } from "@nomina/core";
import { snakeCase } from "./snake-case.js";

export { snakeCase } from "./snake-case.js";

export interface RewriterOptions {
	/** BCP 47 tag for case mapping. Default: locale-independent */
	locale?: string;
}

function lower(locale?: string) {
	return (s: string) => (locale ? s.toLocaleLowerCase(locale) : s.toLowerCase());
}

function upper(locale?: string) {
	return (s: string) => (locale ? s.toLocaleUpperCase(locale) : s.toUpperCase());
}

export function lowerCase(locale?: string): NameRewriter {
	const toLower = lower(locale);
	return { rewriteName: (name) => toLower(name) };
}

export function upperCase(locale?: string): NameRewriter {
	const toUpper = upper(locale);
	return { rewriteName: (name) => toUpper(name) };
}

export function upperSnakeCase(locale?: string): NameRewriter {
	const snake = snakeCase(locale);
	const toUpper = upper(locale);
	return { rewriteName: (name) => toUpper(snake.rewriteName(name)) };
}

/** Lower-cases the first character only: `FullName` → `fullName`. */
export function camelCase(locale?: string): NameRewriter {
	const toLower = lower(locale);
	return {
		rewriteName(name) {
			const [first = ""] = Array.from(name);
			return toLower(first) + name.slice(first.length);
		},
	};
}

const REWRITER_FACTORIES: Record<NamingConvention, (locale?: string) => NameRewriter> = {
	snake_case: snakeCase,
	lower_case: lowerCase,
	upper_case: upperCase,
	upper_snake_case: upperSnakeCase,
	camel_case: camelCase,
};

/**
 * Create the rewriter for a built-in naming convention.
 *
 * @example
 * ```ts
 * const rewriter = createNameRewriter("snake_case", { locale: "tr-TR" });
 * rewriter.rewriteName("CustomerId"); // "customer_id"
 * ```
 */
export function createNameRewriter(
	convention: NamingConvention,
	options: RewriterOptions = {},
): NameRewriter {
	return REWRITER_FACTORIES[convention](options.locale);
}
