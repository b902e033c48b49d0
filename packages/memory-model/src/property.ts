import type {
	ColumnNameWriteOptions,
	ConfigurationSource,
	ConventionEntityType,
	ConventionProperty,
	StoreObjectIdentifier,
} from "@nomina/core";
import { canOverride, isSameStoreObject, storeObjectKey } from "@nomina/core";
import { ConfiguredName } from "./configured-name.js";

// =============================================================================
// PROPERTY
// =============================================================================
// A scalar member of an entity type. The column name lives in two kinds of
// slot: the base name, and per-store-object overrides keyed by
// `storeObjectKey()`. Resolution order at a store object is override, base,
// default; an override written at a lower precedence than the base name is
// shadowed by it.

export class Property implements ConventionProperty {
	private readonly baseColumnName = new ConfiguredName();
	private readonly columnOverrides = new Map<string, ConfiguredName>();

	constructor(
		readonly name: string,
		readonly declaringEntityType: ConventionEntityType,
	) {}

	isPrimaryKey(): boolean {
		return this.declaringEntityType.findPrimaryKey()?.properties.includes(this) ?? false;
	}

	getColumnBaseName(): string {
		return this.baseColumnName.value ?? this.getDefaultColumnBaseName();
	}

	getDefaultColumnBaseName(): string {
		return this.name;
	}

	getColumnName(storeObject: StoreObjectIdentifier): string {
		return (
			this.findOverride(storeObject)?.value ??
			this.baseColumnName.value ??
			this.getDefaultColumnName(storeObject)
		);
	}

	getDefaultColumnName(storeObject: StoreObjectIdentifier): string {
		const linked = this.findLinkedPrincipalProperty(storeObject);
		if (linked) return linked.getColumnName(storeObject);
		return columnPrefix(this.declaringEntityType, storeObject) + this.name;
	}

	getColumnNameConfigurationSource(
		storeObject?: StoreObjectIdentifier,
	): ConfigurationSource | undefined {
		const override = storeObject ? this.findOverride(storeObject) : undefined;
		return override ? override.source : this.baseColumnName.source;
	}

	canSetColumnName(options: ColumnNameWriteOptions = {}): boolean {
		return this.slot(options.storeObject).canSet(options.source ?? "explicit");
	}

	setColumnName(name: string, options: ColumnNameWriteOptions = {}): boolean {
		return this.slot(options.storeObject).set(name, options.source ?? "explicit");
	}

	removeColumnName(options: ColumnNameWriteOptions = {}): boolean {
		return this.slot(options.storeObject).remove(options.source ?? "explicit");
	}

	private findOverride(storeObject: StoreObjectIdentifier): ConfiguredName | undefined {
		const override = this.columnOverrides.get(storeObjectKey(storeObject));
		if (!override?.source) return undefined;
		return canOverride(override.source, this.baseColumnName.source) ? override : undefined;
	}

	private slot(storeObject: StoreObjectIdentifier | undefined): ConfiguredName {
		if (!storeObject) return this.baseColumnName;
		const key = storeObjectKey(storeObject);
		let slot = this.columnOverrides.get(key);
		if (!slot) {
			slot = new ConfiguredName();
			this.columnOverrides.set(key, slot);
		}
		return slot;
	}

	/**
	 * A primary-key property of an entity sharing its owner's row maps to the
	 * owner's key column.
	 */
	private findLinkedPrincipalProperty(
		storeObject: StoreObjectIdentifier,
	): ConventionProperty | undefined {
		if (!this.isPrimaryKey()) return undefined;
		for (const fk of this.declaringEntityType.findRowInternalForeignKeys(storeObject)) {
			const index = fk.properties.indexOf(this);
			const principal = index === -1 ? undefined : fk.principalKey.properties[index];
			if (principal) return principal;
		}
		return undefined;
	}
}

/**
 * `<navigation>_` for every reference owner sharing `storeObject`, outermost
 * first. Empty when the entity has a store object of its own.
 */
export function columnPrefix(
	entityType: ConventionEntityType,
	storeObject: StoreObjectIdentifier,
): string {
	if (!isSameStoreObject(entityType.getStoreObject(storeObject.type), storeObject)) return "";

	let prefix = "";
	let current = entityType;
	for (;;) {
		const ownership = current.findOwnership();
		if (!ownership?.isUnique) break;
		const owner = ownership.principalEntityType;
		if (!isSameStoreObject(owner.getStoreObject(storeObject.type), storeObject)) break;
		prefix = `${ownership.principalToDependent ?? owner.shortName}_${prefix}`;
		current = owner;
	}
	return prefix;
}
