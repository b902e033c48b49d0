// =============================================================================
// Config loader: uses c12 (UnJS) + jiti for runtime TS transpilation
// =============================================================================
// Discovers and loads the user's nomina config file (e.g. nomina.config.ts).
// Handles a named export `nomina`, a default export, or a plain JSON object.

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { NameRewriter, NamingConvention } from "@nomina/core";
import { NAMING_CONVENTIONS, NominaError } from "@nomina/core";
import { loadConfig } from "c12";
import { createJiti } from "jiti";
import { possibleConfigPaths } from "./config-paths.js";

export interface NominaFileConfig {
	/** Built-in naming convention */
	convention?: NamingConvention;
	/** Custom rewriter, only expressible in a JS/TS config */
	rewriter?: NameRewriter;
	/** BCP 47 tag for case mapping */
	locale?: string;
	/** Schema of entity types without one */
	defaultSchema?: string;
}

export interface ResolvedNominaConfig {
	/** The options read from the config file */
	options: NominaFileConfig;
	/** Absolute path of the config file that was loaded */
	configFile: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isNamingConvention(value: string): value is NamingConvention {
	return NAMING_CONVENTIONS.some((c) => c === value);
}

/**
 * Load and resolve the nomina config file.
 *
 * Resolution order:
 * 1. If `configPath` is provided (--config flag), use it directly.
 * 2. Otherwise, scan `possibleConfigPaths` from project root.
 *
 * The config file may export the options as:
 *   - `export const nomina = { convention: "snake_case" }`
 *   - `export default { convention: "snake_case" }`
 *   - a JSON object (`nomina.config.json`)
 */
export async function getConfig({
	cwd,
	configPath,
}: {
	cwd: string;
	configPath?: string;
}): Promise<ResolvedNominaConfig | null> {
	// --- Explicit --config path ---
	if (configPath) {
		const resolvedPath = existsSync(configPath) ? resolve(configPath) : resolve(cwd, configPath);
		return tryLoadConfig(resolvedPath, cwd);
	}

	// --- Auto-discovery ---
	for (const candidate of possibleConfigPaths) {
		const fullPath = resolve(cwd, candidate);
		if (!existsSync(fullPath)) continue;

		const result = await tryLoadConfig(fullPath, cwd);
		if (result) return result;
	}

	return null;
}

/**
 * Read tsconfig.json and extract path aliases for jiti.
 * Returns a Record<alias, resolved path> or null if no aliases found.
 */
function getPathAliases(cwd: string): Record<string, string> | null {
	const tsconfigPath = resolve(cwd, "tsconfig.json");
	if (!existsSync(tsconfigPath)) return null;

	let tsconfig: unknown;
	try {
		const raw = readFileSync(tsconfigPath, "utf-8");
		// Strip comments for JSON.parse compatibility (single-line and multi-line)
		const stripped = raw.replace(/\/\*[\s\S]*?\*\//g, "").replace(/\/\/.*$/gm, "");
		tsconfig = JSON.parse(stripped);
	} catch {
		return null;
	}

	const compilerOptions = isRecord(tsconfig) ? tsconfig.compilerOptions : undefined;
	if (!isRecord(compilerOptions) || !isRecord(compilerOptions.paths)) return null;

	const baseUrl = typeof compilerOptions.baseUrl === "string" ? compilerOptions.baseUrl : ".";
	const baseDir = resolve(cwd, baseUrl);
	const aliases: Record<string, string> = {};

	for (const [alias, targets] of Object.entries(compilerOptions.paths)) {
		const target: unknown = Array.isArray(targets) ? targets[0] : undefined;
		if (typeof target !== "string") continue;
		// Strip trailing /* from both alias and target
		const cleanAlias = alias.replace(/\/\*$/, "");
		const cleanTarget = target.replace(/\/\*$/, "");
		aliases[cleanAlias] = resolve(baseDir, cleanTarget);
	}

	return Object.keys(aliases).length > 0 ? aliases : null;
}

async function tryLoadConfig(configFile: string, cwd: string): Promise<ResolvedNominaConfig | null> {
	let config: unknown;
	try {
		const aliases = getPathAliases(cwd);

		// If path aliases exist, create a jiti instance with alias support
		const jitiInstance = aliases ? createJiti(cwd, { alias: aliases }) : undefined;

		const result = await loadConfig({
			configFile,
			cwd,
			dotenv: {
				fileName: [".env", ".env.local"],
			},
			rcFile: false,
			packageJson: false,
			globalRc: false,
			...(jitiInstance ? { jiti: jitiInstance } : {}),
		});
		config = result.config;
	} catch (error) {
		// Surface config parse errors so users can debug, instead of silently failing
		const message = error instanceof Error ? error.message : String(error);
		process.stderr.write(`nomina: failed to load config from ${configFile}: ${message}\n`);
		return null;
	}

	if (!isRecord(config)) return null;
	const options = extractOptions(config, configFile);
	return options ? { options, configFile } : null;
}

/**
 * Extract the naming options from the loaded module's config object.
 *
 * c12 resolves `export default X` → `{ ...X }` and named exports → `{ name: X }`.
 */
export function extractOptions(config: Record<string, unknown>, configFile: string): NominaFileConfig | null {
	const source = isRecord(config.nomina) ? config.nomina : config;
	const fail = (message: string): never => {
		throw NominaError.invalidArgument(`${configFile}: ${message}`, { configFile });
	};

	const options: NominaFileConfig = {};
	let recognized = false;

	if (source.convention !== undefined) {
		const convention = source.convention;
		if (typeof convention !== "string" || !isNamingConvention(convention)) {
			return fail(`unknown convention "${String(convention)}". Use one of ${NAMING_CONVENTIONS.join(", ")}.`);
		}
		options.convention = convention;
		recognized = true;
	}

	if (source.rewriter !== undefined) {
		const rewriter = source.rewriter;
		const rewriteName = isRecord(rewriter) ? rewriter.rewriteName : undefined;
		if (typeof rewriteName !== "function") {
			return fail("'rewriter' must have a rewriteName(name) method");
		}
		options.rewriter = { rewriteName: (name) => String(rewriteName.call(rewriter, name)) };
		recognized = true;
	}

	if (source.locale !== undefined) {
		if (typeof source.locale !== "string") return fail("'locale' must be a string");
		options.locale = source.locale;
		recognized = true;
	}

	if (source.defaultSchema !== undefined) {
		if (typeof source.defaultSchema !== "string") return fail("'defaultSchema' must be a string");
		options.defaultSchema = source.defaultSchema;
		recognized = true;
	}

	return recognized ? options : null;
}

/**
 * Find the config file path without loading it (for display purposes).
 */
export function findConfigFile(cwd: string, configPath?: string): string | null {
	if (configPath) {
		const resolved = existsSync(configPath) ? resolve(configPath) : resolve(cwd, configPath);
		return existsSync(resolved) ? resolved : null;
	}

	for (const candidate of possibleConfigPaths) {
		const fullPath = resolve(cwd, candidate);
		if (existsSync(fullPath)) return fullPath;
	}

	return null;
}
