import { registerInitCommand } from "../commands/init.js";
import { registerKnowledgeCommands } from "../commands/knowledge.js";
import { registerMemoryCommands } from "../commands/memory.js";
import { registerQueryCommands } from "../commands/query.js";
import { loadConfig } from "../config/config.js";
import { setConfigPath } from "../config/path.js";
import { setVerbose } from "../globals.js";
import { closeLogger, configureLogging } from "../logging.js";
import { closeDb } from "../storage/db.js";
import { createProgram } from "./program.js";

export async function main(argv: string[] = process.argv): Promise<void> {
	const program = createProgram();

	registerInitCommand(program);
	registerMemoryCommands(program);
	registerQueryCommands(program);
	registerKnowledgeCommands(program);

	// --config and --verbose must be applied before any config loading happens
	program.hook("preAction", (thisCommand) => {
		const opts = thisCommand.opts();
		if (typeof opts.config === "string") {
			setConfigPath(opts.config);
		}
		if (opts.verbose) {
			setVerbose(true);
		}
		configureLogging(loadConfig().logging ?? {});
	});

	try {
		await program.parseAsync(argv);
	} finally {
		// pino destination and SQLite keep handles open.
		closeDb();
		closeLogger();
	}
}
