import type { ModelConvention, NamingOptions, NominaLogger } from "@nomina/core";
import { createSchemaModel, type SchemaModel } from "@nomina/memory-model";
import { nameRewriting } from "nomina";

export interface TestModelOptions {
	/** Naming options. Default: snake_case */
	naming?: Omit<NamingOptions, "logger">;
	/** Conventions to run after the naming convention */
	conventions?: ModelConvention[];
	/** Default schema of the model */
	defaultSchema?: string | null;
}

export interface TestModel {
	/** The model, still being built */
	model: SchemaModel;
	/** The naming convention registered on the model, for replaying events */
	naming: ModelConvention;
}

export const silentLogger: NominaLogger = {
	info: () => {},
	warn: () => {},
	error: () => {},
	debug: () => {},
};

export function getTestModel(options: TestModelOptions = {}): TestModel {
	const naming = nameRewriting({ ...options.naming, logger: silentLogger });
	const model = createSchemaModel({
		conventions: [naming, ...(options.conventions ?? [])],
		defaultSchema: options.defaultSchema,
		logger: silentLogger,
	});
	return { model, naming };
}
