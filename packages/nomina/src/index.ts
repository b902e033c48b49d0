// Naming convention
export {
	NAME_REWRITING_DEPENDENCIES,
	NAME_REWRITING_ID,
	nameRewriting,
} from "./conventions/name-rewriting.js";
export {
	classifyMapping,
	isTablePerTypeHierarchy,
	isTableSplit,
	type MappingKind,
	type MappingMode,
} from "./conventions/classifier.js";

// Rewriters
export {
	camelCase,
	createNameRewriter,
	lowerCase,
	type RewriterOptions,
	snakeCase,
	upperCase,
	upperSnakeCase,
} from "./rewriters/index.js";

// Config
export { validateConfig } from "./config/index.js";

// Re-export core types for convenience
export type {
	ConfigurationSource,
	ModelConvention,
	NameRewriter,
	NamingConvention,
	NamingOptions,
	NominaLogger,
} from "@nomina/core";
export { NAMING_CONVENTIONS, NominaError } from "@nomina/core";
