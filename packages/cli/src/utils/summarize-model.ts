// =============================================================================
// MODEL SUMMARY: the database names of a finalized model, for display
// =============================================================================

import { formatStoreObjectName, STORE_OBJECT_TYPES, type StoreObjectIdentifier } from "@nomina/core";
import type { SchemaModel } from "@nomina/memory-model";
import { classifyMapping, type MappingKind } from "nomina";

export interface ColumnSummary {
	property: string;
	column: string;
}

export interface EntitySummary {
	name: string;
	mapping: MappingKind;
	/** `table: sales.order`, `view: order_view`, ... */
	storeObjects: string[];
	/** Columns at the first store object the entity maps to */
	columns: ColumnSummary[];
	keys: string[];
	foreignKeys: string[];
	indexes: string[];
}

function notNull<T>(value: T | null): value is T {
	return value !== null;
}

export function summarizeModel(model: SchemaModel): EntitySummary[] {
	return model.getEntityTypes().map((entityType) => {
		const storeObjects = STORE_OBJECT_TYPES.map((type) => entityType.getStoreObject(type)).filter(
			(so): so is StoreObjectIdentifier => so !== null,
		);
		const [primary] = storeObjects;

		return {
			name: entityType.name,
			mapping: classifyMapping(entityType).kind,
			storeObjects: storeObjects.map((so) => `${so.type}: ${formatStoreObjectName(so)}`),
			columns: entityType.getProperties().map((property) => ({
				property: property.name,
				column: primary ? property.getColumnName(primary) : property.getColumnBaseName(),
			})),
			keys: entityType.getDeclaredKeys().map((key) => key.getName()).filter(notNull),
			foreignKeys: entityType
				.getDeclaredForeignKeys()
				.map((foreignKey) => foreignKey.getConstraintName())
				.filter(notNull),
			indexes: entityType.getDeclaredIndexes().map((index) => index.getDatabaseName()).filter(notNull),
		};
	});
}

/** Plain-text lines for one entity: a title, then one indented line per populated section. */
export function renderEntity(entity: EntitySummary): { title: string; lines: string[] } {
	const lines = [...entity.storeObjects];
	if (entity.columns.length > 0) {
		lines.push(`columns: ${entity.columns.map((c) => `${c.property} -> ${c.column}`).join(", ")}`);
	}
	if (entity.keys.length > 0) lines.push(`keys: ${entity.keys.join(", ")}`);
	if (entity.foreignKeys.length > 0) lines.push(`foreign keys: ${entity.foreignKeys.join(", ")}`);
	if (entity.indexes.length > 0) lines.push(`indexes: ${entity.indexes.join(", ")}`);
	return { title: `${entity.name} [${entity.mapping}]`, lines };
}
