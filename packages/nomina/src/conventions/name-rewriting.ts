// =============================================================================
// NAME REWRITING CONVENTION
// =============================================================================
// Rewrites every database name of the model (tables, views, columns, keys,
// constraints, indexes) while the model is built. Each handler recomputes the
// host's current default for the affected element and writes the rewritten
// name back at "convention" precedence, so names set explicitly or by data
// annotation are never touched and replaying an event changes nothing.
//
// Structural events arrive in any order: an entity is added as a standalone
// table, then joins a hierarchy, becomes owned, gets an explicit table... Each
// transition undoes what an earlier handler wrote when the new mapping makes
// it wrong.

import type {
	AnnotationChange,
	ConventionEntityType,
	ConventionForeignKey,
	ConventionIndex,
	ConventionKey,
	ConventionModel,
	ConventionProperty,
	ModelConvention,
	NamingOptions,
	StoreObjectIdentifier,
} from "@nomina/core";
import {
	isSameStoreObject,
	NominaError,
	RELATIONAL_ANNOTATIONS,
	STORE_OBJECT_TYPES,
} from "@nomina/core";
import { createConsoleLogger } from "@nomina/core/logger";
import { validateConfig } from "../config/index.js";
import { createNameRewriter } from "../rewriters/index.js";
import { isTablePerTypeHierarchy } from "./classifier.js";

export const NAME_REWRITING_ID = "name-rewriting";

/** Must run before the naming convention's finalization pass. */
export const NAME_REWRITING_DEPENDENCIES = ["shared-table-columns"] as const;

const { TABLE_NAME, SCHEMA, VIEW_NAME, VIEW_SCHEMA, FUNCTION_NAME, SQL_QUERY } = RELATIONAL_ANNOTATIONS;

function assertNever(value: never): never {
	throw NominaError.internal(`Unhandled relational annotation: ${String(value)}`);
}

/**
 * Create the naming convention.
 *
 * @example
 * ```ts
 * const model = createSchemaModel({
 *   conventions: [nameRewriting({ convention: "snake_case" })],
 * });
 * ```
 */
export function nameRewriting(options: NamingOptions = {}): ModelConvention {
	validateConfig(options);
	const rewriter =
		options.rewriter ??
		createNameRewriter(options.convention ?? "snake_case", { locale: options.locale });
	const logger = options.logger ?? createConsoleLogger();

	/** Rewrite `from` and hand it to `write`; a `null` default has nothing to rewrite. */
	function apply(element: string, from: string | null, write: (name: string) => boolean): void {
		if (from === null) return;
		const to = rewriter.rewriteName(from);
		if (write(to)) {
			logger.debug("Name rewritten", { element, from, to });
		} else {
			logger.debug("Rewrite refused", { element, from, to });
		}
	}

	// =========================================================================
	// ELEMENT REWRITES
	// =========================================================================

	function rewriteTableName(entityType: ConventionEntityType): void {
		const schema = entityType.getSchema();
		apply(`table of ${entityType.name}`, entityType.getTableName(), (name) => {
			const written = entityType.setAnnotation(TABLE_NAME, name, "convention");
			if (written) entityType.setAnnotation(SCHEMA, schema, "convention");
			return written;
		});
	}

	function rewriteKeyName(key: ConventionKey): void {
		apply(`key of ${key.declaringEntityType.name}`, key.getDefaultName(), (name) =>
			key.setName(name, "convention"),
		);
	}

	function rewriteForeignKeyName(foreignKey: ConventionForeignKey): void {
		apply(
			`foreign key ${foreignKey.declaringEntityType.name} -> ${foreignKey.principalEntityType.name}`,
			foreignKey.getDefaultName(),
			(name) => foreignKey.setConstraintName(name, "convention"),
		);
	}

	function rewriteIndexName(index: ConventionIndex): void {
		apply(`index of ${index.declaringEntityType.name}`, index.getDefaultDatabaseName(), (name) =>
			index.setDatabaseName(name, "convention"),
		);
	}

	/**
	 * Drop the column name we wrote earlier so the default is recomputed from
	 * the entity's current mapping, then write it back rewritten: once as the
	 * base name, and once per store object whose slot is still ours.
	 */
	function rewriteColumnName(property: ConventionProperty): void {
		const entityType = property.declaringEntityType;
		const element = `column ${entityType.name}.${property.name}`;

		property.removeColumnName({ source: "convention" });

		const table = entityType.getStoreObject("table");
		const baseName = table
			? property.getDefaultColumnName(table)
			: property.getDefaultColumnBaseName();
		apply(element, baseName, (name) => property.setColumnName(name, { source: "convention" }));

		for (const type of STORE_OBJECT_TYPES) {
			const storeObject = entityType.getStoreObject(type);
			if (!storeObject) continue;
			if (property.getColumnNameConfigurationSource(storeObject) !== "convention") continue;
			apply(element, property.getDefaultColumnName(storeObject), (name) =>
				property.setColumnName(name, { source: "convention", storeObject }),
			);
		}
	}

	// =========================================================================
	// TABLE NAME CHANGES
	// =========================================================================

	function tableNameChanged(entityType: ConventionEntityType, value: string | null | undefined): void {
		const table = entityType.getStoreObject("table");
		if (!table) return;

		const primaryKey = entityType.findPrimaryKey();
		if (primaryKey) {
			const sharesOwnerRow = entityType.findRowInternalForeignKeys(table).length > 0;
			if (!sharesOwnerRow && !isTablePerTypeHierarchy(entityType)) {
				rewriteKeyName(primaryKey);
			} else {
				// A configured key name applies at every table of the hierarchy;
				// fall back to per-table defaults instead.
				for (const type of entityType.getRootType().getDerivedTypesInclusive()) {
					type.findPrimaryKey()?.removeName("convention");
				}
			}
		}

		const ownership = entityType.findOwnership();
		if (
			typeof value === "string" &&
			ownership &&
			value !== ownership.principalEntityType.getTableName()
		) {
			// The owned entity got a table of its own: table splitting is undone,
			// for the entity and for everything split into it
			for (const type of [entityType, ...referenceOwnedTypes(entityType)]) {
				rewriteNonKeyColumns(type);
			}
		}

		rewriteTableDependents(entityType, table);
	}

	/** Types owned by `owner` through a reference navigation, at any depth. */
	function referenceOwnedTypes(owner: ConventionEntityType): ConventionEntityType[] {
		const owned: ConventionEntityType[] = [];
		const owners = [owner];
		for (let i = 0; i < owners.length; i++) {
			for (const type of owner.model.getEntityTypes()) {
				const ownership = type.findOwnership();
				if (!ownership?.isUnique || ownership.principalEntityType !== owners[i]) continue;
				if (owned.includes(type)) continue;
				owned.push(type);
				owners.push(type);
			}
		}
		return owned;
	}

	function rewriteNonKeyColumns(entityType: ConventionEntityType): void {
		const keyProperties = entityType.findPrimaryKey()?.properties ?? [];
		for (const property of entityType.getProperties()) {
			if (keyProperties.includes(property)) continue;
			if (!property.canSetColumnName({ source: "convention" })) continue;
			rewriteColumnName(property);
		}
	}

	/**
	 * Alternate keys, constraints and indexes embed table and column names.
	 * Derived types without a table of their own follow `entityType`, as do
	 * the types split into its table and the foreign keys pointing at any of
	 * them.
	 */
	function rewriteTableDependents(entityType: ConventionEntityType, table: StoreObjectIdentifier): void {
		const inTable = (type: ConventionEntityType) => isSameStoreObject(type.getStoreObject("table"), table);
		const subtree = entityType.getDerivedTypesInclusive();
		const sharing = subtree.filter(inTable);
		for (const type of [...sharing]) {
			for (const owned of referenceOwnedTypes(type)) {
				if (inTable(owned) && !sharing.includes(owned)) sharing.push(owned);
			}
		}

		for (const type of sharing) {
			for (const key of type.getDeclaredKeys()) {
				if (!key.isPrimaryKey()) rewriteKeyName(key);
			}
			for (const foreignKey of type.getDeclaredForeignKeys()) {
				rewriteForeignKeyName(foreignKey);
			}
			for (const index of type.getDeclaredIndexes()) {
				rewriteIndexName(index);
			}
		}

		const renamed = [...subtree, ...sharing.filter((type) => !subtree.includes(type))];
		for (const other of entityType.model.getEntityTypes()) {
			if (renamed.includes(other)) continue;
			for (const foreignKey of other.getDeclaredForeignKeys()) {
				if (renamed.includes(foreignKey.principalEntityType)) rewriteForeignKeyName(foreignKey);
			}
		}
	}

	// =========================================================================
	// HOOKS
	// =========================================================================

	function entityTypeAdded(entityType: ConventionEntityType): void {
		// A base type is only ever set after the entity type is added
		if (entityType.baseType) return;

		rewriteTableName(entityType);

		if (entityType.getAnnotationConfigurationSource(VIEW_NAME) === "convention") {
			const viewSchema = entityType.getViewSchema();
			apply(`view of ${entityType.name}`, entityType.getViewName(), (name) => {
				const written = entityType.setAnnotation(VIEW_NAME, name, "convention");
				if (written) entityType.setAnnotation(VIEW_SCHEMA, viewSchema, "convention");
				return written;
			});
		}
	}

	function entityTypeBaseTypeChanged(
		entityType: ConventionEntityType,
		newBaseType: ConventionEntityType | undefined,
	): void {
		if (!newBaseType) {
			// Left its hierarchy: map to its own table again
			rewriteTableName(entityType);
			return;
		}
		// Joined a hierarchy. Under TPH it shares the root's table; under TPT
		// the table name is explicit and the removal is refused.
		entityType.removeAnnotation(TABLE_NAME, "convention");
		entityType.removeAnnotation(SCHEMA, "convention");
	}

	function foreignKeyOwnershipChanged(foreignKey: ConventionForeignKey): void {
		const owned = foreignKey.declaringEntityType;
		if (
			!foreignKey.isOwnership ||
			!foreignKey.isUnique ||
			owned.getAnnotationConfigurationSource(TABLE_NAME) === "explicit"
		) {
			return;
		}

		// Owned through a reference: table splitting into the owner's table
		owned.removeAnnotation(TABLE_NAME, "convention");
		owned.removeAnnotation(SCHEMA, "convention");
		owned.findPrimaryKey()?.removeName("convention");

		// Columns named before the ownership need the owner prefix now, and so
		// do those of the types already split into the owned one
		for (const type of [owned, ...referenceOwnedTypes(owned)]) {
			for (const property of type.getProperties()) {
				rewriteColumnName(property);
			}
		}
		const table = owned.getStoreObject("table");
		if (table) rewriteTableDependents(owned, table);
	}

	function entityTypeAnnotationChanged({ entityType, annotation, value }: AnnotationChange): void {
		switch (annotation) {
			case VIEW_NAME:
			case FUNCTION_NAME:
			case SQL_QUERY:
				// We set the table name when the entity was added; it now maps
				// to the alternate object only.
				if (
					value !== null &&
					value !== undefined &&
					entityType.getAnnotationConfigurationSource(TABLE_NAME) === "convention"
				) {
					entityType.setAnnotation(TABLE_NAME, null, "convention");
				}
				return;
			case TABLE_NAME:
				tableNameChanged(entityType, value);
				return;
			case SCHEMA:
			case VIEW_SCHEMA:
				return;
			default:
				assertNever(annotation);
		}
	}

	/**
	 * Columns disambiguated at finalization carry the entity's short name as
	 * written in the model (`Employee_name`); rewrite that prefix too.
	 */
	function modelFinalizing(model: ConventionModel): void {
		for (const entityType of model.getEntityTypes()) {
			const prefix = `${entityType.shortName}_`;
			const rewrittenShortName = rewriter.rewriteName(entityType.shortName);
			const fix = (column: string) =>
				rewrittenShortName + column.slice(entityType.shortName.length);

			for (const property of entityType.getProperties()) {
				const element = `column ${entityType.name}.${property.name}`;
				const baseName = property.getColumnBaseName();
				if (baseName.startsWith(prefix)) {
					const to = fix(baseName);
					if (property.setColumnName(to, { source: "convention" })) {
						logger.debug("Name rewritten", { element, from: baseName, to });
					}
				}

				for (const type of STORE_OBJECT_TYPES) {
					const storeObject = entityType.getStoreObject(type);
					if (!storeObject) continue;
					if (property.getColumnNameConfigurationSource(storeObject) !== "convention") continue;
					const column = property.getColumnName(storeObject);
					if (!column.startsWith(prefix)) continue;
					const to = fix(column);
					if (property.setColumnName(to, { source: "convention", storeObject })) {
						logger.debug("Name rewritten", { element, from: column, to });
					}
				}
			}
		}
	}

	return {
		id: NAME_REWRITING_ID,
		dependencies: [...NAME_REWRITING_DEPENDENCIES],
		hooks: {
			entityTypeAdded,
			entityTypeBaseTypeChanged,
			entityTypeAnnotationChanged,
			propertyAdded: rewriteColumnName,
			keyAdded: rewriteKeyName,
			foreignKeyAdded: rewriteForeignKeyName,
			foreignKeyOwnershipChanged,
			indexAdded: rewriteIndexName,
			modelFinalizing,
		},
	};
}
