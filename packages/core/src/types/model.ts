// =============================================================================
// HOST MODEL SURFACE
// =============================================================================
// What a convention may read from and write to the schema model while it is
// being built. Implemented by `@nomina/memory-model`; any host exposing the
// same surface can run the naming engine.
//
// Every `set*` / `remove*` takes the source of the write (default
// "explicit") and returns `false` when the stored name has a higher
// precedence and the write was refused.

import type {
	ConfigurationSource,
	RelationalAnnotation,
	StoreObjectIdentifier,
	StoreObjectType,
} from "./store-object.js";

export interface ConventionModel {
	/** Schema used when nothing more specific applies. */
	readonly defaultSchema: string | null;
	getEntityTypes(): readonly ConventionEntityType[];
	findEntityType(name: string): ConventionEntityType | undefined;
}

export interface ConventionEntityType {
	/** Fully qualified name, unique in the model. */
	readonly name: string;
	/** Name without namespace; the basis of default table names. */
	readonly shortName: string;
	readonly model: ConventionModel;
	readonly baseType: ConventionEntityType | undefined;

	getDirectlyDerivedTypes(): readonly ConventionEntityType[];
	/** This type followed by every type below it, depth first. */
	getDerivedTypesInclusive(): ConventionEntityType[];
	getRootType(): ConventionEntityType;

	getDeclaredProperties(): readonly ConventionProperty[];
	/** Inherited properties first, then declared ones. */
	getProperties(): ConventionProperty[];
	/** The primary key, declared on the root of the hierarchy. */
	findPrimaryKey(): ConventionKey | undefined;
	getDeclaredKeys(): readonly ConventionKey[];
	getDeclaredForeignKeys(): readonly ConventionForeignKey[];
	getDeclaredIndexes(): readonly ConventionIndex[];

	/** The ownership foreign key this type is the dependent of, if owned. */
	findOwnership(): ConventionForeignKey | undefined;
	/**
	 * Unique foreign keys declared on this type, on its primary key, whose
	 * principal maps to the same `storeObject` (table splitting).
	 */
	findRowInternalForeignKeys(storeObject: StoreObjectIdentifier): ConventionForeignKey[];

	getTableName(): string | null;
	getDefaultTableName(): string | null;
	getSchema(): string | null;
	getViewName(): string | null;
	getViewSchema(): string | null;
	getFunctionName(): string | null;
	getSqlQuery(): string | null;
	/** `null` when the type has no name for that kind of store object. */
	getStoreObject(type: StoreObjectType): StoreObjectIdentifier | null;

	getAnnotationConfigurationSource(annotation: RelationalAnnotation): ConfigurationSource | undefined;
	setAnnotation(
		annotation: RelationalAnnotation,
		value: string | null,
		source?: ConfigurationSource,
	): boolean;
	removeAnnotation(annotation: RelationalAnnotation, source?: ConfigurationSource): boolean;
}

export interface ColumnNameWriteOptions {
	source?: ConfigurationSource;
	/** Target a single store object instead of the base column name. */
	storeObject?: StoreObjectIdentifier;
}

export interface ConventionProperty {
	readonly name: string;
	readonly declaringEntityType: ConventionEntityType;

	isPrimaryKey(): boolean;

	getColumnBaseName(): string;
	getDefaultColumnBaseName(): string;
	getColumnName(storeObject: StoreObjectIdentifier): string;
	getDefaultColumnName(storeObject: StoreObjectIdentifier): string;
	/** Without a store object, the source of the base column name. */
	getColumnNameConfigurationSource(
		storeObject?: StoreObjectIdentifier,
	): ConfigurationSource | undefined;
	canSetColumnName(options?: ColumnNameWriteOptions): boolean;
	setColumnName(name: string, options?: ColumnNameWriteOptions): boolean;
	removeColumnName(options?: ColumnNameWriteOptions): boolean;
}

export interface ConventionKey {
	readonly declaringEntityType: ConventionEntityType;
	readonly properties: readonly ConventionProperty[];

	isPrimaryKey(): boolean;
	/**
	 * The configured name applies at every table the declaring hierarchy maps
	 * to; without a configured name each table resolves to its own default.
	 * `null` for a table the hierarchy does not map to.
	 */
	getName(storeObject?: StoreObjectIdentifier): string | null;
	getDefaultName(storeObject?: StoreObjectIdentifier): string | null;
	getNameConfigurationSource(): ConfigurationSource | undefined;
	setName(name: string, source?: ConfigurationSource): boolean;
	removeName(source?: ConfigurationSource): boolean;
}

export interface ConventionForeignKey {
	readonly declaringEntityType: ConventionEntityType;
	readonly principalEntityType: ConventionEntityType;
	readonly properties: readonly ConventionProperty[];
	readonly principalKey: ConventionKey;
	/** Composition: the dependent's lifetime is bound to the principal. */
	readonly isOwnership: boolean;
	/** The principal-to-dependent navigation is a reference, not a collection. */
	readonly isUnique: boolean;
	readonly principalToDependent: string | undefined;

	getConstraintName(): string | null;
	getDefaultName(): string | null;
	getConstraintNameConfigurationSource(): ConfigurationSource | undefined;
	setConstraintName(name: string, source?: ConfigurationSource): boolean;
	removeConstraintName(source?: ConfigurationSource): boolean;
}

export interface ConventionIndex {
	readonly declaringEntityType: ConventionEntityType;
	readonly properties: readonly ConventionProperty[];
	readonly isUnique: boolean;

	getDatabaseName(): string | null;
	getDefaultDatabaseName(): string | null;
	getDatabaseNameConfigurationSource(): ConfigurationSource | undefined;
	setDatabaseName(name: string, source?: ConfigurationSource): boolean;
	removeDatabaseName(source?: ConfigurationSource): boolean;
}
