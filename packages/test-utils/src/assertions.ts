import type {
	ConventionModel,
	NameRewriter,
	StoreObjectIdentifier,
} from "@nomina/core";
import { formatStoreObjectName, RELATIONAL_ANNOTATIONS, STORE_OBJECT_TYPES } from "@nomina/core";

/**
 * Every convention-sourced name whose value is not `rewriter` applied to the
 * element's current default. Meant to run while the model is still being
 * built: finalization disambiguates shared-table columns on purpose.
 */
export function findImpureNames(model: ConventionModel, rewriter: NameRewriter): string[] {
	const problems: string[] = [];
	const check = (element: string, actual: string | null, defaultName: string | null) => {
		if (defaultName === null) return;
		const expected = rewriter.rewriteName(defaultName);
		if (actual !== expected) {
			problems.push(`${element}: expected "${expected}", got "${actual}"`);
		}
	};

	for (const entityType of model.getEntityTypes()) {
		const name = entityType.name;
		if (entityType.getAnnotationConfigurationSource(RELATIONAL_ANNOTATIONS.TABLE_NAME) === "convention") {
			const table = entityType.getTableName();
			if (table !== null) check(`table of ${name}`, table, entityType.getDefaultTableName());
		}

		const table = entityType.getStoreObject("table");
		const storeObjects = STORE_OBJECT_TYPES.map((type) => entityType.getStoreObject(type)).filter(
			(so): so is StoreObjectIdentifier => so !== null,
		);
		for (const property of entityType.getDeclaredProperties()) {
			const element = `column ${name}.${property.name}`;
			if (property.getColumnNameConfigurationSource() === "convention") {
				check(
					element,
					property.getColumnBaseName(),
					table ? property.getDefaultColumnName(table) : property.getDefaultColumnBaseName(),
				);
			}
			for (const storeObject of storeObjects) {
				if (property.getColumnNameConfigurationSource(storeObject) !== "convention") continue;
				check(
					`${element} at ${formatStoreObjectName(storeObject)}`,
					property.getColumnName(storeObject),
					property.getDefaultColumnName(storeObject),
				);
			}
		}

		for (const key of entityType.getDeclaredKeys()) {
			if (key.getNameConfigurationSource() !== "convention") continue;
			check(`key of ${name}`, key.getName(), key.getDefaultName());
		}
		for (const foreignKey of entityType.getDeclaredForeignKeys()) {
			if (foreignKey.getConstraintNameConfigurationSource() !== "convention") continue;
			check(
				`foreign key ${name} -> ${foreignKey.principalEntityType.name}`,
				foreignKey.getConstraintName(),
				foreignKey.getDefaultName(),
			);
		}
		for (const index of entityType.getDeclaredIndexes()) {
			if (index.getDatabaseNameConfigurationSource() !== "convention") continue;
			check(`index of ${name}`, index.getDatabaseName(), index.getDefaultDatabaseName());
		}
	}

	return problems;
}

/**
 * Assert that every name the convention owns is the rewritten current
 * default, never a rewrite of an earlier rewrite.
 */
export function assertNamesDerivedFromDefaults(model: ConventionModel, rewriter: NameRewriter): void {
	const problems = findImpureNames(model, rewriter);
	if (problems.length > 0) {
		throw new Error(`Names not derived from their defaults:\n${problems.join("\n")}`);
	}
}

/**
 * Assert the column names of an entity type at one store object.
 */
export function assertColumnNames(
	model: ConventionModel,
	entityTypeName: string,
	storeObject: StoreObjectIdentifier,
	expected: Record<string, string>,
): void {
	const entityType = model.findEntityType(entityTypeName);
	if (!entityType) {
		throw new Error(`Entity type ${entityTypeName} not found`);
	}
	const actual: Record<string, string> = {};
	for (const property of entityType.getProperties()) {
		actual[property.name] = property.getColumnName(storeObject);
	}
	for (const [property, column] of Object.entries(expected)) {
		if (actual[property] !== column) {
			throw new Error(
				`${entityTypeName}.${property} at ${formatStoreObjectName(storeObject)}: expected column "${column}", got "${actual[property]}"`,
			);
		}
	}
}
