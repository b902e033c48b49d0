#!/usr/bin/env -S node --import tsx
import "dotenv/config";
import { readFileSync } from "node:fs";
import { Command } from "commander";
import pc from "picocolors";
import { conventionsCommand } from "./commands/conventions.js";
import { infoCommand } from "./commands/info.js";
import { renameCommand } from "./commands/rename.js";

process.on("SIGINT", () => process.exit(0));
process.on("SIGTERM", () => process.exit(0));

function readVersion(): string {
	const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
	if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
		return pkg.version;
	}
	return "0.0.0";
}

const cliVersion = readVersion();

const BANNER = `
  ${pc.bold(pc.cyan("nomina"))} ${pc.dim(`v${cliVersion}`)}
  ${pc.dim("Database naming conventions for entity models")}
`;

const program = new Command()
	.name("nomina")
	.description("Rewrite table, column, key and index names to a convention")
	.version(cliVersion, "-v, --version")
	.option("--cwd <dir>", "Working directory", process.cwd())
	.option("-c, --config <path>", "Path to nomina config file")
	.action(() => {
		console.log(BANNER);
		program.help();
	});

program.addCommand(renameCommand);
program.addCommand(conventionsCommand);
program.addCommand(infoCommand);

program.exitOverride();

try {
	await program.parseAsync();
} catch (error) {
	if (error instanceof Error && "code" in error && error.code === "commander.helpDisplayed") {
		process.exit(0);
	}
	if (error instanceof Error && "code" in error && error.code === "commander.version") {
		process.exit(0);
	}
	const message = error instanceof Error ? error.message : String(error);
	console.error(pc.red(message));
	process.exit(1);
}
