// =============================================================================
// MODEL DEFINITION: declarative JSON form of a schema model
// =============================================================================
// A definition is validated up front, then replayed into a SchemaModel in the
// order a model is normally built: entity types, properties, keys, base types,
// relationships and ownership, indexes, explicit mappings, finalization.

import { NominaError, RELATIONAL_ANNOTATIONS } from "@nomina/core";
import { createSchemaModel, type SchemaModel, type SchemaModelOptions } from "./model.js";

export interface PropertyDefinition {
	name: string;
	/** Explicit column name. */
	column?: string;
}

export interface IndexDefinition {
	properties: string[];
	unique?: boolean;
	/** Explicit database name. */
	name?: string;
}

export interface EntityDefinition {
	/** Fully qualified name; the part after the last `.` is the short name. */
	name: string;
	properties?: (string | PropertyDefinition)[];
	/** Primary key properties. Only on a type without `baseType`. */
	key?: string[];
	/** Explicit primary key name. */
	keyName?: string;
	/** Alternate keys. */
	keys?: string[][];
	indexes?: IndexDefinition[];
	baseType?: string;
	table?: string;
	schema?: string;
	view?: string;
	viewSchema?: string;
	function?: string;
	sqlQuery?: string;
}

export interface RelationshipDefinition {
	dependent: string;
	principal: string;
	/** Foreign key properties on the dependent. */
	properties: string[];
	/** Principal key properties. Default: the principal's primary key */
	principalKey?: string[];
	/** The dependent is owned by the principal. Default: `false` */
	ownership?: boolean;
	/** Principal-to-dependent navigation is a collection. Default: `true`, or `false` for ownership */
	collection?: boolean;
	/** Principal-to-dependent navigation name. */
	navigation?: string;
	/** Explicit constraint name. */
	constraintName?: string;
}

export interface ModelDefinition {
	defaultSchema?: string;
	entities: EntityDefinition[];
	relationships?: RelationshipDefinition[];
}

// =============================================================================
// PARSING
// =============================================================================

type UnknownRecord = Record<string, unknown>;

function fail(path: string, message: string): never {
	throw NominaError.invalidArgument(`${path}: ${message}`, { path });
}

function isRecord(value: unknown): value is UnknownRecord {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, path: string): UnknownRecord {
	if (!isRecord(value)) fail(path, "expected an object");
	return value;
}

function expectArray(value: unknown, path: string): unknown[] {
	if (!Array.isArray(value)) fail(path, "expected an array");
	return value;
}

function expectString(value: unknown, path: string): string {
	if (typeof value !== "string" || value.length === 0) fail(path, "expected a non-empty string");
	return value;
}

function optionalString(value: unknown, path: string): string | undefined {
	return value === undefined ? undefined : expectString(value, path);
}

function optionalBoolean(value: unknown, path: string): boolean | undefined {
	if (value === undefined) return undefined;
	if (typeof value !== "boolean") fail(path, "expected a boolean");
	return value;
}

function expectStringList(value: unknown, path: string): string[] {
	const items = expectArray(value, path);
	if (items.length === 0) fail(path, "expected at least one property");
	return items.map((item, i) => expectString(item, `${path}[${i}]`));
}

function parseProperty(value: unknown, path: string): string | PropertyDefinition {
	if (typeof value === "string") return expectString(value, path);
	const raw = expectRecord(value, path);
	return {
		name: expectString(raw.name, `${path}.name`),
		column: optionalString(raw.column, `${path}.column`),
	};
}

function parseIndex(value: unknown, path: string): IndexDefinition {
	const raw = expectRecord(value, path);
	return {
		properties: expectStringList(raw.properties, `${path}.properties`),
		unique: optionalBoolean(raw.unique, `${path}.unique`),
		name: optionalString(raw.name, `${path}.name`),
	};
}

function parseEntity(value: unknown, path: string): EntityDefinition {
	const raw = expectRecord(value, path);
	const entity: EntityDefinition = {
		name: expectString(raw.name, `${path}.name`),
		properties:
			raw.properties === undefined
				? undefined
				: expectArray(raw.properties, `${path}.properties`).map((p, i) =>
						parseProperty(p, `${path}.properties[${i}]`),
					),
		key: raw.key === undefined ? undefined : expectStringList(raw.key, `${path}.key`),
		keyName: optionalString(raw.keyName, `${path}.keyName`),
		keys:
			raw.keys === undefined
				? undefined
				: expectArray(raw.keys, `${path}.keys`).map((k, i) => expectStringList(k, `${path}.keys[${i}]`)),
		indexes:
			raw.indexes === undefined
				? undefined
				: expectArray(raw.indexes, `${path}.indexes`).map((ix, i) => parseIndex(ix, `${path}.indexes[${i}]`)),
		baseType: optionalString(raw.baseType, `${path}.baseType`),
		table: optionalString(raw.table, `${path}.table`),
		schema: optionalString(raw.schema, `${path}.schema`),
		view: optionalString(raw.view, `${path}.view`),
		viewSchema: optionalString(raw.viewSchema, `${path}.viewSchema`),
		function: optionalString(raw.function, `${path}.function`),
		sqlQuery: optionalString(raw.sqlQuery, `${path}.sqlQuery`),
	};
	if (entity.baseType !== undefined && entity.key !== undefined) {
		fail(`${path}.key`, "a derived type inherits the primary key of its root");
	}
	if (entity.keyName !== undefined && entity.key === undefined) {
		fail(`${path}.keyName`, "requires key");
	}
	return entity;
}

function parseRelationship(value: unknown, path: string): RelationshipDefinition {
	const raw = expectRecord(value, path);
	return {
		dependent: expectString(raw.dependent, `${path}.dependent`),
		principal: expectString(raw.principal, `${path}.principal`),
		properties: expectStringList(raw.properties, `${path}.properties`),
		principalKey:
			raw.principalKey === undefined
				? undefined
				: expectStringList(raw.principalKey, `${path}.principalKey`),
		ownership: optionalBoolean(raw.ownership, `${path}.ownership`),
		collection: optionalBoolean(raw.collection, `${path}.collection`),
		navigation: optionalString(raw.navigation, `${path}.navigation`),
		constraintName: optionalString(raw.constraintName, `${path}.constraintName`),
	};
}

/**
 * Validate an untyped value (typically parsed JSON) as a model definition.
 * Throws `INVALID_ARGUMENT` naming the offending path, e.g. `entities[1].key[0]`.
 */
export function parseModelDefinition(input: unknown): ModelDefinition {
	const raw = expectRecord(input, "model");
	const definition: ModelDefinition = {
		defaultSchema: optionalString(raw.defaultSchema, "defaultSchema"),
		entities: expectArray(raw.entities, "entities").map((e, i) => parseEntity(e, `entities[${i}]`)),
		relationships:
			raw.relationships === undefined
				? undefined
				: expectArray(raw.relationships, "relationships").map((r, i) =>
						parseRelationship(r, `relationships[${i}]`),
					),
	};

	const names = new Set<string>();
	definition.entities.forEach((entity, i) => {
		if (names.has(entity.name)) fail(`entities[${i}].name`, `duplicate entity "${entity.name}"`);
		names.add(entity.name);
	});
	definition.entities.forEach((entity, i) => {
		if (entity.baseType !== undefined && !names.has(entity.baseType)) {
			fail(`entities[${i}].baseType`, `unknown entity "${entity.baseType}"`);
		}
	});
	definition.relationships?.forEach((rel, i) => {
		if (!names.has(rel.dependent)) fail(`relationships[${i}].dependent`, `unknown entity "${rel.dependent}"`);
		if (!names.has(rel.principal)) fail(`relationships[${i}].principal`, `unknown entity "${rel.principal}"`);
	});

	return definition;
}

// =============================================================================
// REPLAY
// =============================================================================

function propertyName(property: string | PropertyDefinition): string {
	return typeof property === "string" ? property : property.name;
}

/**
 * Replay a definition into a new model and finalize it.
 * `options.defaultSchema` wins over the definition's own.
 */
export function buildModel(definition: ModelDefinition, options: SchemaModelOptions = {}): SchemaModel {
	const model = createSchemaModel({
		...options,
		defaultSchema: options.defaultSchema ?? definition.defaultSchema ?? null,
	});
	const entities = definition.entities;

	for (const entity of entities) {
		model.addEntityType(entity.name);
	}
	for (const entity of entities) {
		const entityType = model.getEntityType(entity.name);
		for (const property of entity.properties ?? []) {
			entityType.addProperty(propertyName(property));
		}
	}
	for (const entity of entities) {
		const entityType = model.getEntityType(entity.name);
		if (entity.key) entityType.setPrimaryKey(entity.key);
		for (const key of entity.keys ?? []) entityType.addKey(key);
	}
	for (const entity of entities) {
		if (entity.baseType === undefined) continue;
		model.getEntityType(entity.name).setBaseType(model.getEntityType(entity.baseType));
	}
	for (const rel of definition.relationships ?? []) {
		const ownership = rel.ownership ?? false;
		const foreignKey = model
			.getEntityType(rel.dependent)
			.addForeignKey(rel.properties, model.getEntityType(rel.principal), {
				principalKey: rel.principalKey,
				unique: !(rel.collection ?? !ownership),
				navigation: rel.navigation,
				ownership,
			});
		if (rel.constraintName !== undefined) foreignKey.setConstraintName(rel.constraintName);
	}
	for (const entity of entities) {
		const entityType = model.getEntityType(entity.name);
		for (const ix of entity.indexes ?? []) {
			const index = entityType.addIndex(ix.properties, { unique: ix.unique });
			if (ix.name !== undefined) index.setDatabaseName(ix.name);
		}
	}
	for (const entity of entities) {
		const entityType = model.getEntityType(entity.name);
		if (entity.table !== undefined) entityType.toTable(entity.table, entity.schema);
		else if (entity.schema !== undefined) entityType.setAnnotation(RELATIONAL_ANNOTATIONS.SCHEMA, entity.schema);
		if (entity.view !== undefined) entityType.toView(entity.view, entity.viewSchema);
		if (entity.function !== undefined) entityType.toFunction(entity.function);
		if (entity.sqlQuery !== undefined) entityType.toSqlQuery(entity.sqlQuery);

		for (const property of entity.properties ?? []) {
			if (typeof property === "string" || property.column === undefined) continue;
			entityType.getProperty(property.name).setColumnName(property.column);
		}
		if (entity.keyName !== undefined) entityType.findPrimaryKey()?.setName(entity.keyName);
	}

	return model.finalize();
}
