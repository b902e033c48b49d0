export type {
	NameRewriter,
	NamingConvention,
	NamingOptions,
	NominaLogger,
} from "./config.js";
export { NAMING_CONVENTIONS } from "./config.js";
export type {
	AnnotationChange,
	ConventionHookName,
	ConventionHooks,
	ModelConvention,
} from "./convention.js";
export type {
	ColumnNameWriteOptions,
	ConventionEntityType,
	ConventionForeignKey,
	ConventionIndex,
	ConventionKey,
	ConventionModel,
	ConventionProperty,
} from "./model.js";
export type {
	ConfigurationSource,
	RelationalAnnotation,
	StoreObjectIdentifier,
	StoreObjectType,
} from "./store-object.js";
export { CONFIGURATION_SOURCES, RELATIONAL_ANNOTATIONS, STORE_OBJECT_TYPES } from "./store-object.js";
