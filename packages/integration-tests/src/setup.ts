import { readFileSync } from "node:fs";
import type { NamingOptions, StoreObjectIdentifier } from "@nomina/core";
import { buildModel, type ModelDefinition, parseModelDefinition, type SchemaModel } from "@nomina/memory-model";
import { silentLogger } from "@nomina/test-utils";
import { nameRewriting } from "nomina";

export function loadDefinition(fixture: string): ModelDefinition {
	const raw: unknown = JSON.parse(
		readFileSync(new URL(`./fixtures/${fixture}.json`, import.meta.url), "utf8"),
	);
	return parseModelDefinition(raw);
}

/** Replay a definition with the naming convention and finalize it. */
export function buildNamedModel(
	definition: ModelDefinition,
	naming: Omit<NamingOptions, "logger"> = {},
): SchemaModel {
	return buildModel(definition, {
		conventions: [nameRewriting({ ...naming, logger: silentLogger })],
		logger: silentLogger,
	});
}

export function table(name: string, schema: string | null = null): StoreObjectIdentifier {
	return { type: "table", name, schema };
}
