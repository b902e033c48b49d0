import type {
	ConfigurationSource,
	ConventionEntityType,
	ConventionIndex,
	ConventionProperty,
} from "@nomina/core";
import { ConfiguredName } from "./configured-name.js";

export class TableIndex implements ConventionIndex {
	private readonly databaseName = new ConfiguredName();

	constructor(
		readonly declaringEntityType: ConventionEntityType,
		readonly properties: readonly ConventionProperty[],
		readonly isUnique: boolean,
	) {}

	getDatabaseName(): string | null {
		return this.databaseName.value ?? this.getDefaultDatabaseName();
	}

	getDefaultDatabaseName(): string | null {
		const table = this.declaringEntityType.getStoreObject("table");
		if (!table) return null;
		const columns = this.properties.map((p) => p.getColumnName(table)).join("_");
		return `IX_${table.name}_${columns}`;
	}

	getDatabaseNameConfigurationSource(): ConfigurationSource | undefined {
		return this.databaseName.source;
	}

	setDatabaseName(name: string, source: ConfigurationSource = "explicit"): boolean {
		return this.databaseName.set(name, source);
	}

	removeDatabaseName(source: ConfigurationSource = "explicit"): boolean {
		return this.databaseName.remove(source);
	}
}
