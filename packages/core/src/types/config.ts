export const NAMING_CONVENTIONS = [
	"snake_case",
	"lower_case",
	"upper_case",
	"upper_snake_case",
	"camel_case",
] as const;

export type NamingConvention = (typeof NAMING_CONVENTIONS)[number];

/** Pure, deterministic identifier transformation. */
export interface NameRewriter {
	rewriteName(name: string): string;
}

export interface NamingOptions {
	/** Built-in rewriter to apply. Default: `"snake_case"` unless `rewriter` is given */
	convention?: NamingConvention;

	/** Custom rewriter. Mutually exclusive with `convention`. */
	rewriter?: NameRewriter;

	/** BCP 47 tag used for case mapping (e.g. `"tr-TR"`). Default: locale-independent */
	locale?: string;

	/** Custom logger */
	logger?: NominaLogger;
}

export interface NominaLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}
