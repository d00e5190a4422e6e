import chalk from "chalk";
import type { Command } from "commander";

import { createDefaultConfigIfMissing, getConfigPath } from "../config/config.js";
import { reportError } from "./engine.js";

export function registerInitCommand(program: Command): void {
	program
		.command("init")
		.description("Write a default config file if none exists")
		.action(async () => {
			try {
				const created = await createDefaultConfigIfMissing();
				const configPath = getConfigPath();
				console.log(
					created
						? chalk.green(`✓ Wrote ${configPath}`)
						: chalk.gray(`Config already exists at ${configPath}`),
				);
			} catch (err) {
				reportError(err);
			}
		});
}
