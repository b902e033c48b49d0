// =============================================================================
// STORE OBJECTS & RELATIONAL ANNOTATIONS
// =============================================================================

export const STORE_OBJECT_TYPES = ["table", "view", "function", "sql-query"] as const;

export type StoreObjectType = (typeof STORE_OBJECT_TYPES)[number];

/** A physical target an entity type maps to. */
export interface StoreObjectIdentifier {
	readonly type: StoreObjectType;
	readonly name: string;
	/** Always `null` for SQL queries. */
	readonly schema: string | null;
}

export const RELATIONAL_ANNOTATIONS = {
	TABLE_NAME: "TableName",
	SCHEMA: "Schema",
	VIEW_NAME: "ViewName",
	VIEW_SCHEMA: "ViewSchema",
	FUNCTION_NAME: "FunctionName",
	SQL_QUERY: "SqlQuery",
} as const;

export type RelationalAnnotation =
	(typeof RELATIONAL_ANNOTATIONS)[keyof typeof RELATIONAL_ANNOTATIONS];

/**
 * Who fixed a name, in increasing precedence. A write at a lower precedence
 * than the stored source is refused by the host.
 */
export const CONFIGURATION_SOURCES = ["convention", "data-annotation", "explicit"] as const;

export type ConfigurationSource = (typeof CONFIGURATION_SOURCES)[number];
