// =============================================================================
// MAPPING CLASSIFIER
// =============================================================================
// Derives how an entity type currently maps to the database from the live
// model. Nothing is cached: ownership, base types and table names can change
// between two calls, in any order.

import type { ConventionEntityType, ConventionForeignKey } from "@nomina/core";
import { RELATIONAL_ANNOTATIONS } from "@nomina/core";

export type MappingMode =
	| { kind: "standalone-table"; table: string }
	| { kind: "tph-root"; table: string }
	| { kind: "tph-derived"; root: ConventionEntityType; table: string | null }
	| { kind: "tpt-root"; table: string }
	| { kind: "tpt-derived"; root: ConventionEntityType; table: string }
	| { kind: "owned-split"; ownership: ConventionForeignKey; table: string | null }
	| { kind: "owned-separate"; ownership: ConventionForeignKey; table: string }
	| { kind: "alternate-store-object"; objectType: "view" | "function" | "sql-query" }
	| { kind: "unmapped" };

export type MappingKind = MappingMode["kind"];

/**
 * A hierarchy is TPT as soon as one direct derived type resolves to a table
 * other than the root's.
 */
export function isTablePerTypeHierarchy(entityType: ConventionEntityType): boolean {
	const root = entityType.getRootType();
	const rootTable = root.getTableName();
	return root.getDirectlyDerivedTypes().some((derived) => derived.getTableName() !== rootTable);
}

/**
 * Owned through a reference navigation without an explicit table of its own,
 * so the entity shares its owner's row.
 */
export function isTableSplit(entityType: ConventionEntityType): boolean {
	const ownership = entityType.findOwnership();
	if (!ownership?.isUnique) return false;
	return (
		entityType.getAnnotationConfigurationSource(RELATIONAL_ANNOTATIONS.TABLE_NAME) !== "explicit" &&
		entityType.getTableName() === ownership.principalEntityType.getTableName()
	);
}

function alternateObjectType(entityType: ConventionEntityType): "view" | "function" | "sql-query" | null {
	if (entityType.getViewName() !== null) return "view";
	if (entityType.getFunctionName() !== null) return "function";
	if (entityType.getSqlQuery() !== null) return "sql-query";
	return null;
}

export function classifyMapping(entityType: ConventionEntityType): MappingMode {
	const table = entityType.getTableName();

	if (table === null) {
		const objectType = alternateObjectType(entityType);
		if (objectType) return { kind: "alternate-store-object", objectType };
	}

	const baseType = entityType.baseType;
	if (baseType) {
		const root = entityType.getRootType();
		return isTablePerTypeHierarchy(root) && table !== null
			? { kind: "tpt-derived", root, table }
			: { kind: "tph-derived", root, table };
	}

	const ownership = entityType.findOwnership();
	if (ownership) {
		if (isTableSplit(entityType)) return { kind: "owned-split", ownership, table };
		if (table !== null) return { kind: "owned-separate", ownership, table };
	}

	if (table === null) return { kind: "unmapped" };

	if (entityType.getDirectlyDerivedTypes().length > 0) {
		return isTablePerTypeHierarchy(entityType)
			? { kind: "tpt-root", table }
			: { kind: "tph-root", table };
	}

	return { kind: "standalone-table", table };
}
