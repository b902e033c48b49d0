// =============================================================================
// SHARED TABLE COLUMNS: built-in finalization convention
// =============================================================================
// When several entity types map to one table (TPH siblings, table splitting),
// properties of different types may resolve to the same column name. Each
// colliding convention-named column is renamed to `<EntityShortName>_<column>`
// at that table, with a numeric suffix if the result is still taken.
//
// Key properties shared through a row link are one column and never collide.

import type {
	ConventionEntityType,
	ConventionModel,
	ConventionProperty,
	ModelConvention,
	StoreObjectIdentifier,
} from "@nomina/core";
import { storeObjectKey } from "@nomina/core";

export const SHARED_TABLE_COLUMNS_ID = "shared-table-columns";

interface ColumnOwner {
	entityType: ConventionEntityType;
	property: ConventionProperty;
}

/** Entity types grouped by the table they map to. */
export function groupByTable(
	model: ConventionModel,
): Map<string, { table: StoreObjectIdentifier; entityTypes: ConventionEntityType[] }> {
	const groups = new Map<string, { table: StoreObjectIdentifier; entityTypes: ConventionEntityType[] }>();
	for (const entityType of model.getEntityTypes()) {
		const table = entityType.getStoreObject("table");
		if (!table) continue;
		const key = storeObjectKey(table);
		const group = groups.get(key);
		if (group) group.entityTypes.push(entityType);
		else groups.set(key, { table, entityTypes: [entityType] });
	}
	return groups;
}

function canRename(property: ConventionProperty, table: StoreObjectIdentifier): boolean {
	if (property.isPrimaryKey()) return false;
	const source = property.getColumnNameConfigurationSource(table);
	return (
		(source === undefined || source === "convention") &&
		property.canSetColumnName({ source: "convention", storeObject: table })
	);
}

function uniquify(candidate: string, taken: Set<string>): string {
	if (!taken.has(candidate)) return candidate;
	for (let i = 1; ; i++) {
		const next = `${candidate}${i}`;
		if (!taken.has(next)) return next;
	}
}

function disambiguateTable(table: StoreObjectIdentifier, entityTypes: ConventionEntityType[]): void {
	const columns = new Map<string, ColumnOwner[]>();
	for (const entityType of entityTypes) {
		for (const property of entityType.getDeclaredProperties()) {
			const column = property.getColumnName(table);
			const owners = columns.get(column);
			if (owners) owners.push({ entityType, property });
			else columns.set(column, [{ entityType, property }]);
		}
	}

	const taken = new Set(columns.keys());
	for (const [column, owners] of columns) {
		if (owners.length < 2) continue;
		if (owners.every((o) => o.property.isPrimaryKey())) continue;

		for (const { entityType, property } of owners) {
			if (!canRename(property, table)) continue;
			const renamed = uniquify(`${entityType.shortName}_${column}`, taken);
			property.setColumnName(renamed, { source: "convention", storeObject: table });
			taken.add(renamed);
		}
	}
}

export function sharedTableColumns(): ModelConvention {
	return {
		id: SHARED_TABLE_COLUMNS_ID,
		hooks: {
			modelFinalizing(model) {
				for (const { table, entityTypes } of groupByTable(model).values()) {
					if (entityTypes.length < 2) continue;
					disambiguateTable(table, entityTypes);
				}
			},
		},
	};
}
