// =============================================================================
// MODEL VALIDATION: database name collisions
// =============================================================================
// Runs after finalization. Key, foreign-key constraint and index names must be
// unique within a schema across different tables; column names must be
// unique within a table. Several entity types mapped to the same table share
// that table's names.

import type { ConventionEntityType, ConventionKey, ConventionModel, StoreObjectIdentifier } from "@nomina/core";
import { formatStoreObjectName, isSameStoreObject, NominaError } from "@nomina/core";
import { groupByTable } from "./shared-table-columns.js";

export interface NameCollision {
	kind: "column" | "key" | "foreign key" | "index";
	name: string;
	/** Tables (for columns, the table and the colliding members). */
	owners: string[];
}

type NameRegistry = Map<string, Map<string, string>>;

function register(
	registry: NameRegistry,
	collisions: NameCollision[],
	kind: NameCollision["kind"],
	name: string | null,
	table: StoreObjectIdentifier,
): void {
	if (name === null) return;
	const scope = table.schema ?? "";
	let names = registry.get(scope);
	if (!names) {
		names = new Map();
		registry.set(scope, names);
	}
	const tableName = formatStoreObjectName(table);
	const existing = names.get(name);
	if (existing === undefined) {
		names.set(name, tableName);
	} else if (existing !== tableName) {
		collisions.push({ kind, name, owners: [existing, tableName] });
	}
}

/** Keys in effect for an entity type: the hierarchy's primary key and every alternate key up the chain. */
function keysOf(entityType: ConventionEntityType): ConventionKey[] {
	const keys: ConventionKey[] = [];
	const primaryKey = entityType.findPrimaryKey();
	if (primaryKey) keys.push(primaryKey);
	for (let t: ConventionEntityType | undefined = entityType; t; t = t.baseType) {
		for (const key of t.getDeclaredKeys()) {
			if (!key.isPrimaryKey()) keys.push(key);
		}
	}
	return keys;
}

/** Every database name collision in the model, in discovery order. */
export function findNameCollisions(model: ConventionModel): NameCollision[] {
	const collisions: NameCollision[] = [];

	for (const { table, entityTypes } of groupByTable(model).values()) {
		const columns = new Map<string, { member: string; isKey: boolean }[]>();
		for (const entityType of entityTypes) {
			for (const property of entityType.getDeclaredProperties()) {
				const column = property.getColumnName(table);
				const owners = columns.get(column) ?? [];
				owners.push({ member: `${entityType.name}.${property.name}`, isKey: property.isPrimaryKey() });
				columns.set(column, owners);
			}
		}
		for (const [column, owners] of columns) {
			if (owners.length > 1 && !owners.every((o) => o.isKey)) {
				collisions.push({
					kind: "column",
					name: column,
					owners: [formatStoreObjectName(table), ...owners.map((o) => o.member)],
				});
			}
		}
	}

	const keys: NameRegistry = new Map();
	const foreignKeys: NameRegistry = new Map();
	const indexes: NameRegistry = new Map();

	for (const entityType of model.getEntityTypes()) {
		const table = entityType.getStoreObject("table");
		if (!table) continue;

		for (const key of keysOf(entityType)) {
			register(keys, collisions, "key", key.getName(table), table);
		}
		for (const foreignKey of entityType.getDeclaredForeignKeys()) {
			// A row-internal link is not a constraint
			if (isSameStoreObject(foreignKey.principalEntityType.getStoreObject("table"), table)) continue;
			register(foreignKeys, collisions, "foreign key", foreignKey.getConstraintName(), table);
		}
		for (const index of entityType.getDeclaredIndexes()) {
			register(indexes, collisions, "index", index.getDatabaseName(), table);
		}
	}

	return collisions;
}

/** Throws `DUPLICATE_NAME` listing every collision. */
export function validateModel(model: ConventionModel): void {
	const collisions = findNameCollisions(model);
	const [first] = collisions;
	if (!first) return;

	const message =
		first.kind === "column"
			? `Column name "${first.name}" is used more than once in table "${first.owners[0]}"`
			: `Duplicate ${first.kind} name "${first.name}" on tables ${first.owners.map((o) => `"${o}"`).join(" and ")}`;
	throw NominaError.duplicateName(message, { collisions });
}
