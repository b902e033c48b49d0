import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { NominaError } from "@nomina/core";
import { type ModelDefinition, parseModelDefinition } from "@nomina/memory-model";

/** Read and validate a JSON model definition, relative to `cwd`. */
export function loadDefinitionFile(file: string, cwd: string): ModelDefinition {
	const path = resolve(cwd, file);
	if (!existsSync(path)) {
		throw NominaError.notFound(`Model definition not found: ${path}`, { path });
	}

	let raw: unknown;
	try {
		raw = JSON.parse(readFileSync(path, "utf-8"));
	} catch (error) {
		throw new NominaError("INVALID_ARGUMENT", `${path}: not valid JSON`, {
			status: 400,
			cause: error,
			details: { path },
		});
	}
	return parseModelDefinition(raw);
}
