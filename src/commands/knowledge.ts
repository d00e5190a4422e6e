import chalk from "chalk";
import type { Command } from "commander";

import { createEngine } from "../api.js";
import { loadConfig } from "../config/config.js";
import { resolveEngineSettings } from "../config/settings.js";
import { renderKnowledgeResult } from "../knowledge/coordinator.js";
import { LightRagClient } from "../knowledge/lightrag-client.js";
import { MemoryKnowledgeIndex } from "../knowledge/local-index.js";
import { DEFAULT_OWNER, openEngine, parsePositiveInt, reportError } from "./engine.js";

export function registerKnowledgeCommands(program: Command): void {
	const knowledge = program
		.command("knowledge")
		.description("Knowledge queries routed between local memory and LightRAG");

	knowledge
		.command("query")
		.description("Answer a question from the local index or the LightRAG graph")
		.argument("<text>", "Question")
		.option("--mode <mode>", "auto, local, global, hybrid, mix, naive or bypass")
		.option("--limit <n>", "Max results / LightRAG top_k")
		.option("--timeout <ms>", "LightRAG timeout in milliseconds")
		.option("--owner <id>", "Owner whose memories form the local index", process.env.MEMORIA_OWNER ?? DEFAULT_OWNER)
		.option("--stats", "Print routing statistics afterwards")
		.option("--json", "Print JSON")
		.action(
			async (
				text: string,
				opts: {
					mode?: string;
					limit?: string;
					timeout?: string;
					owner: string;
					stats?: boolean;
					json?: boolean;
				},
			) => {
				const controller = new AbortController();
				const onSigint = () => controller.abort();
				process.once("SIGINT", onSigint);
				try {
					const engine = openEngine({
						knowledgeIndex: (store) => new MemoryKnowledgeIndex(store, opts.owner),
					});
					const result = await engine.knowledge.query(text, {
						mode: opts.mode,
						limit: parsePositiveInt(opts.limit, "--limit"),
						timeoutMs: parsePositiveInt(opts.timeout, "--timeout"),
						signal: controller.signal,
					});

					if (opts.json) {
						const payload = opts.stats
							? { ...result, stats: engine.knowledge.routingStats() }
							: result;
						console.log(JSON.stringify(payload, null, 2));
					} else {
						const rendered = renderKnowledgeResult(text, result);
						console.log(result.source === "error" ? chalk.red(rendered) : rendered);
						if (result.routing) console.log(chalk.gray(`\n${result.routing.reason}`));
						if (opts.stats) {
							console.log(chalk.gray(JSON.stringify(engine.knowledge.routingStats(), null, 2)));
						}
					}
					if (result.source === "error") process.exitCode = 1;
				} catch (err) {
					reportError(err);
				} finally {
					process.off("SIGINT", onSigint);
				}
			},
		);

	knowledge
		.command("route")
		.description("Show where a question would be routed, without querying")
		.argument("<text>", "Question")
		.option("--mode <mode>", "Routing mode", "auto")
		.action((text: string, opts: { mode: string }) => {
			try {
				const { knowledge: coordinator } = createEngine(loadConfig(), { lightrag: null });
				const routing = coordinator.determineRouting(text, opts.mode);
				const target =
					routing.backend === "lightrag" ? `lightrag (mode: ${routing.mode})` : "local";
				console.log(`${chalk.bold(target)} ${chalk.gray(routing.reason)}`);
			} catch (err) {
				reportError(err);
			}
		});

	knowledge
		.command("health")
		.description("Check that the configured LightRAG server is up")
		.action(async () => {
			try {
				const settings = resolveEngineSettings(loadConfig()).knowledge;
				const client = new LightRagClient({
					baseUrl: settings.lightragUrl,
					apiKey: settings.apiKey,
				});
				const health = await client.health();
				if (health.ok) {
					console.log(chalk.green(`✓ LightRAG reachable at ${client.url} (${health.status})`));
				} else {
					console.log(chalk.red(`✗ LightRAG unavailable at ${client.url}: ${health.error}`));
					process.exitCode = 1;
				}
			} catch (err) {
				reportError(err);
			}
		});
}
