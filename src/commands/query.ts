import chalk from "chalk";
import type { Command } from "commander";

import { DEFAULT_OWNER, openEngine, reportError } from "./engine.js";

export function registerQueryCommands(program: Command): void {
	const query = program.command("query").description("Query intent classification");

	query
		.command("classify")
		.description("Classify a query and report fast-path eligibility")
		.argument("<text>", "User query")
		.option("--json", "Print JSON")
		.action((text: string, opts: { json?: boolean }) => {
			try {
				const { intents } = openEngine();
				const result = intents.classify(text);
				const fastPath = intents.shouldUseFastPath(text);
				if (opts.json) {
					console.log(JSON.stringify({ ...result, fastPath }, null, 2));
					return;
				}
				console.log(`${chalk.bold(result.intent)} ${chalk.gray(`(confidence ${result.confidence})`)}`);
				console.log(chalk.gray(`  ${result.reason}`));
				if (result.matchedPattern) console.log(chalk.gray(`  pattern: ${result.matchedPattern}`));
				console.log(fastPath ? chalk.green("  fast path: yes") : chalk.yellow("  fast path: no"));
			} catch (err) {
				reportError(err);
			}
		});

	query
		.command("ask")
		.description("Answer from memory when the intent allows, otherwise report a hand-off")
		.argument("<text>", "User query")
		.option("--owner <id>", "Owner (user or namespace)", process.env.MEMORIA_OWNER ?? DEFAULT_OWNER)
		.option("--json", "Print JSON")
		.action((text: string, opts: { owner: string; json?: boolean }) => {
			try {
				const engine = openEngine();
				const outcome = engine.dispatch(text, opts.owner);
				if (opts.json) {
					console.log(JSON.stringify(outcome, null, 2));
					return;
				}
				switch (outcome.kind) {
					case "memory_list":
						console.log(chalk.bold(`${outcome.entries.length} memories:`));
						outcome.entries.forEach((entry, index) => console.log(`${index + 1}. ${entry.text}`));
						break;
					case "memory_search":
						if (outcome.results.length === 0) {
							console.log(chalk.gray(`No memories found matching '${outcome.searchTerms}'`));
							break;
						}
						console.log(
							chalk.bold(`Found ${outcome.results.length} memories matching '${outcome.searchTerms}':`),
						);
						outcome.results.forEach(({ entry, score }, index) =>
							console.log(`${index + 1}. ${entry.text} ${chalk.gray(`(score: ${score.toFixed(2)})`)}`),
						);
						break;
					case "delegate":
						console.log(chalk.yellow(`Needs the agent: ${outcome.classification.reason}`));
						break;
				}
			} catch (err) {
				reportError(err);
			}
		});
}
