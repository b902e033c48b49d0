import { arch, platform, release } from "node:os";
import * as p from "@clack/prompts";
import { Command } from "commander";
import pc from "picocolors";
import { findConfigFile, getConfig } from "../utils/get-config.js";
import { resolveNamingOptions } from "../utils/resolve-options.js";

// =============================================================================
// INFO COMMAND
// =============================================================================

export const infoCommand = new Command("info")
	.description("Show environment and configuration information")
	.option("--json", "Output as JSON")
	.action(async (options: { json?: boolean }) => {
		const parent = infoCommand.parent;
		const cwd: string = parent?.opts().cwd ?? process.cwd();
		const configPath: string | undefined = parent?.opts().config;
		const version: string = parent?.version() ?? "unknown";

		const configFile = findConfigFile(cwd, configPath);
		const config = configFile ? await getConfig({ cwd, configPath }) : null;
		const resolved = resolveNamingOptions({}, config?.options);

		const info = {
			system: {
				os: `${platform()} ${arch()}`,
				osVersion: release(),
			},
			node: process.version,
			nomina: {
				version,
				configFile,
				convention: resolved.naming.convention ?? "custom rewriter",
				conventionOrigin: resolved.origin,
				locale: resolved.naming.locale ?? null,
				defaultSchema: resolved.defaultSchema ?? null,
			},
		};

		if (options.json) {
			process.stdout.write(`${JSON.stringify(info, null, 2)}\n`);
			return;
		}

		p.intro(pc.bgCyan(pc.black(" nomina info ")));

		const sysLines = [
			`${pc.bold("OS:")}             ${info.system.os} (${info.system.osVersion})`,
			`${pc.bold("Node:")}           ${info.node}`,
		];
		p.note(sysLines.join("\n"), "System");

		const nominaLines = [
			`${pc.bold("Version:")}        v${info.nomina.version}`,
			`${pc.bold("Config:")}         ${info.nomina.configFile ?? pc.dim("not found")}`,
			`${pc.bold("Convention:")}     ${info.nomina.convention} ${pc.dim(`(${info.nomina.conventionOrigin})`)}`,
			`${pc.bold("Locale:")}         ${info.nomina.locale ?? pc.dim("default")}`,
			`${pc.bold("Schema:")}         ${info.nomina.defaultSchema ?? pc.dim("none")}`,
		];
		p.note(nominaLines.join("\n"), "Nomina");

		p.outro(pc.dim("Run with --json for machine-readable output"));
	});
