import type {
	ConfigurationSource,
	ConventionEntityType,
	ConventionKey,
	ConventionProperty,
	StoreObjectIdentifier,
} from "@nomina/core";
import { isSameStoreObject } from "@nomina/core";
import { ConfiguredName } from "./configured-name.js";

export class Key implements ConventionKey {
	private readonly configuredName = new ConfiguredName();

	constructor(
		readonly declaringEntityType: ConventionEntityType,
		readonly properties: readonly ConventionProperty[],
		private readonly primary: boolean,
	) {}

	isPrimaryKey(): boolean {
		return this.primary;
	}

	/**
	 * Name of the key at a table. The configured name applies at every table
	 * the declaring hierarchy maps to, so a TPT hierarchy that keeps one ends
	 * up with the same key name on several tables.
	 */
	getName(storeObject?: StoreObjectIdentifier): string | null {
		const table = this.resolveTable(storeObject);
		if (!table) return null;
		return this.configuredName.value ?? this.getDefaultName(table);
	}

	getDefaultName(storeObject?: StoreObjectIdentifier): string | null {
		const table = this.resolveTable(storeObject);
		if (!table) return null;

		if (this.primary) {
			// Sharing the owner's row means sharing its primary key constraint
			const [linking] = this.declaringEntityType.findRowInternalForeignKeys(table);
			if (linking) return linking.principalKey.getName(table);
			return `PK_${table.name}`;
		}

		const columns = this.properties.map((p) => p.getColumnName(table)).join("_");
		return `AK_${table.name}_${columns}`;
	}

	getNameConfigurationSource(): ConfigurationSource | undefined {
		return this.configuredName.source;
	}

	setName(name: string, source: ConfigurationSource = "explicit"): boolean {
		return this.configuredName.set(name, source);
	}

	removeName(source: ConfigurationSource = "explicit"): boolean {
		return this.configuredName.remove(source);
	}

	private resolveTable(storeObject?: StoreObjectIdentifier): StoreObjectIdentifier | null {
		if (!storeObject) return this.declaringEntityType.getStoreObject("table");
		if (storeObject.type !== "table") return null;
		const mapped = this.declaringEntityType
			.getDerivedTypesInclusive()
			.some((t) => isSameStoreObject(t.getStoreObject("table"), storeObject));
		return mapped ? storeObject : null;
	}
}
