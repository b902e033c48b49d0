import type {
	ConfigurationSource,
	ConventionEntityType,
	ConventionForeignKey,
	ConventionKey,
	ConventionProperty,
} from "@nomina/core";
import { ConfiguredName } from "./configured-name.js";

export interface ForeignKeyInit {
	declaringEntityType: ConventionEntityType;
	principalEntityType: ConventionEntityType;
	properties: readonly ConventionProperty[];
	principalKey: ConventionKey;
	isUnique: boolean;
	principalToDependent?: string;
	/** Raised when `isOwnership` actually changes. */
	onOwnershipChanged: (foreignKey: ForeignKey) => void;
}

export class ForeignKey implements ConventionForeignKey {
	readonly declaringEntityType: ConventionEntityType;
	readonly principalEntityType: ConventionEntityType;
	readonly properties: readonly ConventionProperty[];
	readonly principalKey: ConventionKey;
	readonly isUnique: boolean;
	readonly principalToDependent: string | undefined;

	private ownership = false;
	private readonly constraintName = new ConfiguredName();
	private readonly onOwnershipChanged: (foreignKey: ForeignKey) => void;

	constructor(init: ForeignKeyInit) {
		this.declaringEntityType = init.declaringEntityType;
		this.principalEntityType = init.principalEntityType;
		this.properties = init.properties;
		this.principalKey = init.principalKey;
		this.isUnique = init.isUnique;
		this.principalToDependent = init.principalToDependent;
		this.onOwnershipChanged = init.onOwnershipChanged;
	}

	get isOwnership(): boolean {
		return this.ownership;
	}

	setIsOwnership(ownership: boolean): void {
		if (this.ownership === ownership) return;
		this.ownership = ownership;
		this.onOwnershipChanged(this);
	}

	getConstraintName(): string | null {
		return this.constraintName.value ?? this.getDefaultName();
	}

	getDefaultName(): string | null {
		const table = this.declaringEntityType.getStoreObject("table");
		const principalTable = this.principalEntityType.getStoreObject("table");
		if (!table || !principalTable) return null;
		const columns = this.properties.map((p) => p.getColumnName(table)).join("_");
		return `FK_${table.name}_${principalTable.name}_${columns}`;
	}

	getConstraintNameConfigurationSource(): ConfigurationSource | undefined {
		return this.constraintName.source;
	}

	setConstraintName(name: string, source: ConfigurationSource = "explicit"): boolean {
		return this.constraintName.set(name, source);
	}

	removeConstraintName(source: ConfigurationSource = "explicit"): boolean {
		return this.constraintName.remove(source);
	}
}
