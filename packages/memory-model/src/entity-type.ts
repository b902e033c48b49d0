import type {
	ConfigurationSource,
	ConventionEntityType,
	ConventionForeignKey,
	RelationalAnnotation,
	StoreObjectIdentifier,
	StoreObjectType,
} from "@nomina/core";
import { canOverride, isSameStoreObject, NominaError, RELATIONAL_ANNOTATIONS } from "@nomina/core";
import { ForeignKey } from "./foreign-key.js";
import { Key } from "./key.js";
import type { SchemaModel } from "./model.js";
import { Property } from "./property.js";
import { TableIndex } from "./table-index.js";

// =============================================================================
// ENTITY TYPE
// =============================================================================
// A node of the schema model. Structural mutations go through this class and
// raise the matching convention notification once the change is applied.
// Relational names are annotations carrying their configuration source;
// anything not annotated falls back to the default-name rules below.

export interface ForeignKeyOptions {
	/** Principal key property names. Default: the principal's primary key */
	principalKey?: string[];
	/** Principal-to-dependent navigation is a reference. Default: `false` */
	unique?: boolean;
	/** Name of the principal-to-dependent navigation. */
	navigation?: string;
	/** The dependent is owned by the principal. Default: `false` */
	ownership?: boolean;
}

interface AnnotationEntry {
	value: string | null;
	source: ConfigurationSource;
}

export class EntityType implements ConventionEntityType {
	readonly shortName: string;

	private base: EntityType | undefined;
	private readonly derivedTypes: EntityType[] = [];
	private readonly properties = new Map<string, Property>();
	private primaryKey: Key | undefined;
	private readonly keys: Key[] = [];
	private readonly foreignKeys: ForeignKey[] = [];
	private readonly indexes: TableIndex[] = [];
	private readonly annotations = new Map<RelationalAnnotation, AnnotationEntry>();

	constructor(
		readonly name: string,
		readonly model: SchemaModel,
	) {
		const dot = name.lastIndexOf(".");
		this.shortName = dot === -1 ? name : name.slice(dot + 1);
	}

	// =========================================================================
	// HIERARCHY
	// =========================================================================

	get baseType(): EntityType | undefined {
		return this.base;
	}

	getDirectlyDerivedTypes(): readonly EntityType[] {
		return this.derivedTypes;
	}

	getDerivedTypesInclusive(): EntityType[] {
		const result: EntityType[] = [this];
		for (const derived of this.derivedTypes) {
			result.push(...derived.getDerivedTypesInclusive());
		}
		return result;
	}

	getRootType(): EntityType {
		return this.base ? this.base.getRootType() : this;
	}

	/** Join (or, with `undefined`, leave) an inheritance hierarchy. */
	setBaseType(baseType: EntityType | undefined): void {
		this.model.assertMutable();
		const oldBaseType = this.base;
		if (oldBaseType === baseType) return;

		if (baseType) {
			for (let t: EntityType | undefined = baseType; t; t = t.base) {
				if (t === this) {
					throw NominaError.conflict(
						`Setting "${baseType.name}" as base type of "${this.name}" would create an inheritance cycle`,
					);
				}
			}
			for (const inherited of baseType.getProperties()) {
				if (this.properties.has(inherited.name)) {
					throw NominaError.conflict(
						`Property "${inherited.name}" of "${this.name}" clashes with an inherited property`,
					);
				}
			}
		}

		if (oldBaseType) {
			const index = oldBaseType.derivedTypes.indexOf(this);
			if (index !== -1) oldBaseType.derivedTypes.splice(index, 1);
		}
		this.base = baseType;
		if (baseType) {
			baseType.derivedTypes.push(this);
			// The hierarchy's primary key is declared on its root
			this.primaryKey = undefined;
		}

		this.model.dispatcher.entityTypeBaseTypeChanged(this, baseType, oldBaseType);
	}

	// =========================================================================
	// MEMBERS
	// =========================================================================

	addProperty(name: string): Property {
		this.model.assertMutable();
		if (this.findProperty(name)) {
			throw NominaError.duplicate(`Property "${name}" already exists on "${this.name}"`, {
				entityType: this.name,
				property: name,
			});
		}
		const property = new Property(name, this);
		this.properties.set(name, property);
		this.model.dispatcher.propertyAdded(property);
		return property;
	}

	getDeclaredProperties(): readonly Property[] {
		return [...this.properties.values()];
	}

	getProperties(): Property[] {
		const inherited = this.base ? this.base.getProperties() : [];
		return [...inherited, ...this.properties.values()];
	}

	findProperty(name: string): Property | undefined {
		return this.properties.get(name) ?? this.base?.findProperty(name);
	}

	getProperty(name: string): Property {
		const property = this.findProperty(name);
		if (!property) {
			throw NominaError.notFound(`Property "${name}" not found on "${this.name}"`, {
				entityType: this.name,
				property: name,
			});
		}
		return property;
	}

	setPrimaryKey(propertyNames: string[]): Key {
		this.model.assertMutable();
		if (this.base) {
			throw NominaError.conflict(
				`"${this.name}" is a derived type; declare the primary key on "${this.getRootType().name}"`,
			);
		}
		if (this.primaryKey) {
			throw NominaError.duplicate(`"${this.name}" already has a primary key`);
		}
		const key = new Key(this, this.resolveProperties(propertyNames), true);
		this.primaryKey = key;
		this.model.dispatcher.keyAdded(key);
		return key;
	}

	findPrimaryKey(): Key | undefined {
		return this.getRootType().primaryKey;
	}

	/** Declare an alternate (unique) key. */
	addKey(propertyNames: string[]): Key {
		this.model.assertMutable();
		const key = new Key(this, this.resolveProperties(propertyNames), false);
		this.keys.push(key);
		this.model.dispatcher.keyAdded(key);
		return key;
	}

	getDeclaredKeys(): readonly Key[] {
		return this.primaryKey ? [this.primaryKey, ...this.keys] : [...this.keys];
	}

	addForeignKey(
		propertyNames: string[],
		principal: EntityType,
		options: ForeignKeyOptions = {},
	): ForeignKey {
		this.model.assertMutable();
		const properties = this.resolveProperties(propertyNames);
		const principalKey = options.principalKey
			? principal.findKey(options.principalKey)
			: principal.findPrimaryKey();
		if (!principalKey) {
			throw NominaError.notFound(
				options.principalKey
					? `No key (${options.principalKey.join(", ")}) on "${principal.name}"`
					: `"${principal.name}" has no primary key to reference`,
				{ entityType: principal.name },
			);
		}
		if (principalKey.properties.length !== properties.length) {
			throw NominaError.invalidArgument(
				`Foreign key on "${this.name}" has ${properties.length} properties but the principal key has ${principalKey.properties.length}`,
			);
		}

		const foreignKey = new ForeignKey({
			declaringEntityType: this,
			principalEntityType: principal,
			properties,
			principalKey,
			isUnique: options.unique ?? false,
			principalToDependent: options.navigation,
			onOwnershipChanged: (fk) => this.model.dispatcher.foreignKeyOwnershipChanged(fk),
		});
		this.foreignKeys.push(foreignKey);
		this.model.dispatcher.foreignKeyAdded(foreignKey);
		if (options.ownership) foreignKey.setIsOwnership(true);
		return foreignKey;
	}

	getDeclaredForeignKeys(): readonly ForeignKey[] {
		return this.foreignKeys;
	}

	getForeignKeys(): ForeignKey[] {
		const inherited = this.base ? this.base.getForeignKeys() : [];
		return [...inherited, ...this.foreignKeys];
	}

	addIndex(propertyNames: string[], options: { unique?: boolean } = {}): TableIndex {
		this.model.assertMutable();
		const index = new TableIndex(this, this.resolveProperties(propertyNames), options.unique ?? false);
		this.indexes.push(index);
		this.model.dispatcher.indexAdded(index);
		return index;
	}

	getDeclaredIndexes(): readonly TableIndex[] {
		return this.indexes;
	}

	// =========================================================================
	// OWNERSHIP & TABLE SPLITTING
	// =========================================================================

	findOwnership(): ConventionForeignKey | undefined {
		return this.getForeignKeys().find((fk) => fk.isOwnership);
	}

	findRowInternalForeignKeys(storeObject: StoreObjectIdentifier): ConventionForeignKey[] {
		const primaryKey = this.findPrimaryKey();
		if (!primaryKey) return [];
		if (!isSameStoreObject(this.getStoreObject(storeObject.type), storeObject)) return [];

		const root = this.getRootType();
		return this.getForeignKeys().filter(
			(fk) =>
				fk.isUnique &&
				fk.principalEntityType.getRootType() !== root &&
				sameMembers(fk.properties, primaryKey.properties) &&
				isSameStoreObject(fk.principalEntityType.getStoreObject(storeObject.type), storeObject),
		);
	}

	// =========================================================================
	// RELATIONAL NAMES
	// =========================================================================

	getTableName(): string | null {
		const entry = this.annotations.get(RELATIONAL_ANNOTATIONS.TABLE_NAME);
		return entry ? entry.value : this.getDefaultTableName();
	}

	getDefaultTableName(): string | null {
		if (this.base) return this.base.getTableName();

		const ownership = this.findOwnership();
		if (ownership?.isUnique) return ownership.principalEntityType.getTableName();

		if (this.getViewName() !== null || this.getFunctionName() !== null || this.getSqlQuery() !== null) {
			return null;
		}
		return this.shortName;
	}

	getSchema(): string | null {
		const entry = this.annotations.get(RELATIONAL_ANNOTATIONS.SCHEMA);
		if (entry) return entry.value;
		if (this.base) return this.base.getSchema();
		const ownership = this.findOwnership();
		if (ownership?.isUnique && this.getTableName() === ownership.principalEntityType.getTableName()) {
			return ownership.principalEntityType.getSchema();
		}
		return this.model.defaultSchema;
	}

	getViewName(): string | null {
		const entry = this.annotations.get(RELATIONAL_ANNOTATIONS.VIEW_NAME);
		if (entry) return entry.value;
		return this.base ? this.base.getViewName() : null;
	}

	getViewSchema(): string | null {
		const entry = this.annotations.get(RELATIONAL_ANNOTATIONS.VIEW_SCHEMA);
		if (entry) return entry.value;
		return this.base ? this.base.getViewSchema() : this.model.defaultSchema;
	}

	getFunctionName(): string | null {
		const entry = this.annotations.get(RELATIONAL_ANNOTATIONS.FUNCTION_NAME);
		if (entry) return entry.value;
		return this.base ? this.base.getFunctionName() : null;
	}

	getSqlQuery(): string | null {
		const entry = this.annotations.get(RELATIONAL_ANNOTATIONS.SQL_QUERY);
		if (entry) return entry.value;
		return this.base ? this.base.getSqlQuery() : null;
	}

	getStoreObject(type: StoreObjectType): StoreObjectIdentifier | null {
		switch (type) {
			case "table": {
				const name = this.getTableName();
				return name === null ? null : { type, name, schema: this.getSchema() };
			}
			case "view": {
				const name = this.getViewName();
				return name === null ? null : { type, name, schema: this.getViewSchema() };
			}
			case "function": {
				const name = this.getFunctionName();
				return name === null ? null : { type, name, schema: null };
			}
			case "sql-query":
				return this.getSqlQuery() === null
					? null
					: { type, name: `${this.getRootType().shortName}.SqlQuery`, schema: null };
		}
	}

	getAnnotationConfigurationSource(annotation: RelationalAnnotation): ConfigurationSource | undefined {
		return this.annotations.get(annotation)?.source;
	}

	setAnnotation(
		annotation: RelationalAnnotation,
		value: string | null,
		source: ConfigurationSource = "explicit",
	): boolean {
		this.model.assertMutable();
		const existing = this.annotations.get(annotation);
		if (!canOverride(source, existing?.source)) return false;

		this.annotations.set(annotation, { value, source });
		if (existing?.value !== value) {
			this.model.dispatcher.entityTypeAnnotationChanged({
				entityType: this,
				annotation,
				value,
				oldValue: existing?.value,
			});
		}
		return true;
	}

	removeAnnotation(annotation: RelationalAnnotation, source: ConfigurationSource = "explicit"): boolean {
		this.model.assertMutable();
		const existing = this.annotations.get(annotation);
		if (!existing) return true;
		if (!canOverride(source, existing.source)) return false;

		this.annotations.delete(annotation);
		this.model.dispatcher.entityTypeAnnotationChanged({
			entityType: this,
			annotation,
			value: undefined,
			oldValue: existing.value,
		});
		return true;
	}

	/** Store an annotation without raising a notification (initial configuration). */
	initAnnotation(annotation: RelationalAnnotation, value: string | null, source: ConfigurationSource): void {
		this.annotations.set(annotation, { value, source });
	}

	// =========================================================================
	// EXPLICIT MAPPING
	// =========================================================================

	toTable(name: string | null, schema?: string | null): this {
		this.setAnnotation(RELATIONAL_ANNOTATIONS.TABLE_NAME, name);
		if (schema !== undefined) this.setAnnotation(RELATIONAL_ANNOTATIONS.SCHEMA, schema);
		return this;
	}

	toView(name: string | null, schema?: string | null): this {
		this.setAnnotation(RELATIONAL_ANNOTATIONS.VIEW_NAME, name);
		if (schema !== undefined) this.setAnnotation(RELATIONAL_ANNOTATIONS.VIEW_SCHEMA, schema);
		return this;
	}

	toFunction(name: string | null): this {
		this.setAnnotation(RELATIONAL_ANNOTATIONS.FUNCTION_NAME, name);
		return this;
	}

	toSqlQuery(sql: string | null): this {
		this.setAnnotation(RELATIONAL_ANNOTATIONS.SQL_QUERY, sql);
		return this;
	}

	// =========================================================================
	// INTERNAL HELPERS
	// =========================================================================

	private findKey(propertyNames: string[]): Key | undefined {
		const properties = this.resolveProperties(propertyNames);
		const candidates: Key[] = [];
		for (let t: EntityType | undefined = this; t; t = t.base) {
			candidates.push(...t.getDeclaredKeys());
		}
		return candidates.find((k) => sameMembers(k.properties, properties));
	}

	private resolveProperties(propertyNames: string[]): Property[] {
		if (propertyNames.length === 0) {
			throw NominaError.invalidArgument(`At least one property is required on "${this.name}"`);
		}
		return propertyNames.map((name) => this.getProperty(name));
	}
}

function sameMembers<T>(a: readonly T[], b: readonly T[]): boolean {
	return a.length === b.length && a.every((item) => b.includes(item));
}
