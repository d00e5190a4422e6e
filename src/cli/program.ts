import { Command } from "commander";

import pkg from "../../package.json" with { type: "json" };

export function createProgram(): Command {
	const program = new Command();

	program
		.name("memoria")
		.description("Semantic memory and knowledge-query routing")
		.version(pkg.version)
		.option("-v, --verbose", "Enable verbose output")
		.option("-c, --config <path>", "Path to config file");

	return program;
}
