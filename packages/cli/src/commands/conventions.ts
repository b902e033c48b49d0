import * as p from "@clack/prompts";
import { Command } from "commander";
import { createNameRewriter, NAMING_CONVENTIONS } from "nomina";
import pc from "picocolors";

const DEFAULT_SAMPLE = "HTTPServerId";

export function conventionSamples(sample: string, locale?: string): { convention: string; result: string }[] {
	return NAMING_CONVENTIONS.map((convention) => ({
		convention,
		result: createNameRewriter(convention, { locale }).rewriteName(sample),
	}));
}

export const conventionsCommand = new Command("conventions")
	.description("List the built-in naming conventions")
	.option("--sample <name>", "Identifier to rewrite as an example", DEFAULT_SAMPLE)
	.option("--locale <tag>", "Locale for case mapping")
	.option("--json", "Output as JSON")
	.action((options: { sample: string; locale?: string; json?: boolean }) => {
		const samples = conventionSamples(options.sample, options.locale);

		if (options.json) {
			process.stdout.write(`${JSON.stringify({ sample: options.sample, conventions: samples }, null, 2)}\n`);
			return;
		}

		p.intro(pc.bgCyan(pc.black(" nomina conventions ")));
		const width = Math.max(...samples.map((s) => s.convention.length));
		const lines = samples.map(
			(s) => `${pc.bold(s.convention.padEnd(width))}  ${pc.dim(options.sample)} -> ${pc.cyan(s.result)}`,
		);
		p.note(lines.join("\n"), "Conventions");
		p.outro(pc.dim("Use --convention <name> with nomina rename"));
	});
