import * as p from "@clack/prompts";
import { createConsoleLogger } from "@nomina/core/logger";
import { buildModel } from "@nomina/memory-model";
import { Command } from "commander";
import { nameRewriting } from "nomina";
import pc from "picocolors";
import { getConfig } from "../utils/get-config.js";
import { loadDefinitionFile } from "../utils/load-definition.js";
import { resolveNamingOptions } from "../utils/resolve-options.js";
import { renderEntity, summarizeModel } from "../utils/summarize-model.js";

export const renameCommand = new Command("rename")
	.description("Build a model from a JSON definition and print its rewritten database names")
	.argument("<file>", "Path to the model definition (JSON)")
	.option("--convention <name>", "Naming convention (or set NOMINA_CONVENTION)")
	.option("--locale <tag>", "Locale for case mapping (or set NOMINA_LOCALE)")
	.option("--json", "Output as JSON")
	.option("--debug", "Log every rewrite")
	.action(
		async (
			file: string,
			options: { convention?: string; locale?: string; json?: boolean; debug?: boolean },
		) => {
			const parent = renameCommand.parent;
			const cwd: string = parent?.opts().cwd ?? process.cwd();
			const configPath: string | undefined = parent?.opts().config;

			const config = await getConfig({ cwd, configPath });
			const resolved = resolveNamingOptions(options, config?.options);
			const logger = createConsoleLogger({ level: options.debug ? "debug" : "warn" });

			const definition = loadDefinitionFile(file, cwd);
			const model = buildModel(definition, {
				conventions: [nameRewriting({ ...resolved.naming, logger })],
				defaultSchema: resolved.defaultSchema,
				logger,
			});
			const entities = summarizeModel(model);

			if (options.json) {
				process.stdout.write(`${JSON.stringify({ entities }, null, 2)}\n`);
				return;
			}

			const rewriter = resolved.naming.convention ?? "custom rewriter";
			p.intro(pc.bgCyan(pc.black(" nomina rename ")));
			p.log.info(`${pc.bold("Convention:")} ${pc.cyan(rewriter)} ${pc.dim(`(${resolved.origin})`)}`);
			for (const entity of entities) {
				const { title, lines } = renderEntity(entity);
				p.note(lines.join("\n"), title);
			}
			p.outro(pc.dim(`${entities.length} entity types`));
		},
	);
