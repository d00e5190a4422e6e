import chalk from "chalk";
import type { Command } from "commander";

import type { MemoryEntry, StorageResult } from "../memory/types.js";
import {
	DEFAULT_OWNER,
	openEngine,
	parsePositiveInt,
	parseUnit,
	reportError,
	splitCsv,
} from "./engine.js";

type OwnerOpts = { owner: string; json?: boolean };

function formatEntry(entry: MemoryEntry): string {
	const proxy = entry.isProxy ? chalk.magenta(` [proxy:${entry.proxyAgent ?? "?"}]`) : "";
	const confidence = entry.confidence < 1 ? chalk.gray(` (confidence ${entry.confidence})`) : "";
	return `${chalk.gray(entry.id)}  ${entry.text}${proxy}${confidence}\n    ${chalk.cyan(entry.topics.join(", "))}`;
}

function printResult(result: StorageResult, json?: boolean): void {
	if (json) {
		const { entry: _entry, ...rest } = result;
		console.log(JSON.stringify(rest, null, 2));
	} else if (result.status === "success") {
		console.log(chalk.green(`✓ ${result.message}`));
		if (result.memoryId) console.log(chalk.gray(`  id: ${result.memoryId}`));
	} else if (result.status === "storage_error") {
		console.log(chalk.red(`✗ ${result.status}: ${result.message}`));
	} else {
		const match = result.duplicateOf ? chalk.gray(` (matches ${result.duplicateOf})`) : "";
		console.log(chalk.yellow(`○ ${result.status}: ${result.message}${match}`));
	}
	if (result.status === "storage_error") {
		process.exitCode = 1;
	}
}

function printEntries(entries: MemoryEntry[], json?: boolean): void {
	if (json) {
		console.log(JSON.stringify(entries, null, 2));
		return;
	}
	if (entries.length === 0) {
		console.log(chalk.gray("No memories."));
		return;
	}
	for (const entry of entries) {
		console.log(formatEntry(entry));
	}
}

export function registerMemoryCommands(program: Command): void {
	const memory = program.command("memory").description("Store, search and manage memories");

	const withOwner = (command: Command) =>
		command
			.option("--owner <id>", "Owner (user or namespace)", process.env.MEMORIA_OWNER ?? DEFAULT_OWNER)
			.option("--json", "Print JSON");

	withOwner(
		memory
			.command("add")
			.description("Store a memory after duplicate checks")
			.argument("<text>", "Memory text (max 500 chars by default)")
			.option("--topics <csv>", "Topics to attach (merged with classified ones)")
			.option("--confidence <n>", "Confidence between 0 and 1", "1")
			.option("--proxy-agent <name>", "Record as written by this delegated agent"),
	).action(
		(
			text: string,
			opts: OwnerOpts & { topics?: string; confidence?: string; proxyAgent?: string },
		) => {
			try {
				const { store } = openEngine();
				const result = store.add(text, opts.owner, {
					topics: splitCsv(opts.topics),
					confidence: parseUnit(opts.confidence, "--confidence"),
					proxyAgent: opts.proxyAgent,
				});
				printResult(result, opts.json);
			} catch (err) {
				reportError(err);
			}
		},
	);

	withOwner(
		memory
			.command("list")
			.description("List memories, newest first")
			.option("--topics <csv>", "Only entries with any of these topics"),
	).action((opts: OwnerOpts & { topics?: string }) => {
		try {
			const { store } = openEngine();
			const topics = splitCsv(opts.topics);
			printEntries(
				topics ? store.listByTopic(opts.owner, topics) : store.listAll(opts.owner),
				opts.json,
			);
		} catch (err) {
			reportError(err);
		}
	});

	withOwner(
		memory
			.command("search")
			.description("Search memories by similarity")
			.argument("<query>", "Search text")
			.option("--limit <n>", "Max results")
			.option("--threshold <n>", "Minimum score between 0 and 1")
			.option("--topic-boost <n>", "Bonus when a query word is one of the entry's topics"),
	).action(
		(
			query: string,
			opts: OwnerOpts & { limit?: string; threshold?: string; topicBoost?: string },
		) => {
			try {
				const { store } = openEngine();
				const topicBoost = opts.topicBoost === undefined ? undefined : Number(opts.topicBoost);
				const results = store.search(query, opts.owner, {
					limit: parsePositiveInt(opts.limit, "--limit"),
					similarityThreshold: parseUnit(opts.threshold, "--threshold"),
					topicBoost: Number.isFinite(topicBoost) ? topicBoost : undefined,
				});
				if (opts.json) {
					console.log(JSON.stringify(results, null, 2));
					return;
				}
				if (results.length === 0) {
					console.log(chalk.gray(`No memories found matching '${query}'`));
					return;
				}
				results.forEach(({ entry, score }, index) => {
					console.log(`${index + 1}. ${entry.text} ${chalk.gray(`(score: ${score.toFixed(2)})`)}`);
				});
			} catch (err) {
				reportError(err);
			}
		},
	);

	withOwner(
		memory.command("delete").description("Delete one memory").argument("<id>", "Memory id"),
	).action((id: string, opts: OwnerOpts) => {
		try {
			const { store } = openEngine();
			const deleted = store.delete(id, opts.owner);
			if (opts.json) {
				console.log(JSON.stringify({ deleted }));
			} else if (deleted) {
				console.log(chalk.green(`✓ Deleted ${id}`));
			} else {
				console.log(chalk.yellow(`○ No memory ${id} for owner ${opts.owner}`));
			}
		} catch (err) {
			reportError(err);
		}
	});

	withOwner(
		memory
			.command("delete-topic")
			.description("Delete every memory tagged with any of the topics")
			.argument("<topics>", "Comma-separated topics"),
	).action((topics: string, opts: OwnerOpts) => {
		try {
			const { store } = openEngine();
			const deleted = store.deleteByTopic(opts.owner, splitCsv(topics) ?? []);
			console.log(opts.json ? JSON.stringify({ deleted }) : chalk.green(`✓ Deleted ${deleted}`));
		} catch (err) {
			reportError(err);
		}
	});

	withOwner(
		memory
			.command("clear")
			.description("Delete all of an owner's memories")
			.option("--yes", "Confirm"),
	).action((opts: OwnerOpts & { yes?: boolean }) => {
		if (!opts.yes) {
			console.error(chalk.yellow("Refusing to clear without --yes"));
			process.exitCode = 1;
			return;
		}
		try {
			const { store } = openEngine();
			const deleted = store.clear(opts.owner);
			console.log(opts.json ? JSON.stringify({ deleted }) : chalk.green(`✓ Cleared ${deleted}`));
		} catch (err) {
			reportError(err);
		}
	});

	withOwner(memory.command("stats").description("Memory statistics")).action(
		(opts: OwnerOpts) => {
			try {
				const { store } = openEngine();
				const stats = store.stats(opts.owner);
				if (opts.json) {
					console.log(JSON.stringify(stats, null, 2));
					return;
				}
				console.log(chalk.bold(`Memories for ${opts.owner}`));
				console.log(`  total:          ${stats.total}`);
				console.log(`  today:          ${stats.recentCount}`);
				console.log(`  average length: ${stats.averageLength.toFixed(1)}`);
				console.log(`  top topic:      ${stats.mostCommonTopic ?? "-"}`);
				for (const [topic, count] of Object.entries(stats.topicDistribution)) {
					console.log(chalk.gray(`    ${topic}: ${count}`));
				}
			} catch (err) {
				reportError(err);
			}
		},
	);

	withOwner(
		memory
			.command("ingest")
			.description("Store the memorable statements found in free text")
			.argument("<text>", "Conversation text"),
	).action((text: string, opts: OwnerOpts) => {
		try {
			const { store } = openEngine();
			const result = store.ingest(text, opts.owner);
			if (opts.json) {
				console.log(JSON.stringify(result, null, 2));
				return;
			}
			for (const added of result.added) {
				console.log(chalk.green(`✓ ${added.text}`) + chalk.gray(` [${added.topics.join(", ")}]`));
			}
			for (const rejected of result.rejected) {
				console.log(chalk.yellow(`○ ${rejected.text} (${rejected.status})`));
			}
			console.log(
				chalk.gray(
					`${result.added.length} stored, ${result.rejected.length} skipped of ${result.totalProcessed}`,
				),
			);
		} catch (err) {
			reportError(err);
		}
	});
}
