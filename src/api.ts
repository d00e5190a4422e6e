/**
 * Library entry point.
 *
 * createEngine() wires every component from one config object. Components can
 * also be constructed on their own; none of them read files or the
 * environment. Importing this module has no side effects; logs are written
 * only when the config passed in has a `logging` section.
 */

import { type MemoriaConfig, parseConfig } from "./config/config.js";
import { type EngineSettings, resolveEngineSettings } from "./config/settings.js";
import type { FetchLike } from "./infra/timeout.js";
import { KnowledgeCoordinator } from "./knowledge/coordinator.js";
import { LightRagClient } from "./knowledge/lightrag-client.js";
import type { KnowledgeBackend, KnowledgeIndex } from "./knowledge/types.js";
import { configureLogging } from "./logging.js";
import { AsyncMemoryStore } from "./memory/async-store.js";
import { DuplicateDetector } from "./memory/duplicate-detector.js";
import { InMemoryPersistence, type MemoryPersistence } from "./memory/persistence.js";
import { MemoryStore } from "./memory/store.js";
import { TopicClassifier } from "./memory/topic-classifier.js";
import { type DispatchOutcome, dispatchQuery } from "./query/dispatch.js";
import { QueryIntentClassifier } from "./query/intent-classifier.js";

export type EngineOptions = {
	/** Defaults to a process-local store. */
	persistence?: MemoryPersistence;
	/** Local knowledge index, or a factory given the engine's memory store. */
	knowledgeIndex?: KnowledgeIndex | ((store: MemoryStore) => KnowledgeIndex);
	/** Replaces the LightRAG client built from config; null disables the graph backend. */
	lightrag?: KnowledgeBackend | null;
	fetchImpl?: FetchLike;
	now?: () => number;
};

export type Engine = {
	settings: Readonly<EngineSettings>;
	topics: TopicClassifier;
	duplicates: DuplicateDetector;
	store: MemoryStore;
	asyncStore: AsyncMemoryStore;
	intents: QueryIntentClassifier;
	knowledge: KnowledgeCoordinator;
	/** Classify a query and answer it from memory when the intent allows. */
	dispatch(query: string, ownerId: string): DispatchOutcome;
};

function buildLightRag(
	settings: EngineSettings["knowledge"],
	options: EngineOptions,
): KnowledgeBackend | undefined {
	if (options.lightrag !== undefined) {
		return options.lightrag ?? undefined;
	}
	if (!settings.enabled) return undefined;
	return new LightRagClient({
		baseUrl: settings.lightragUrl,
		apiKey: settings.apiKey,
		timeoutMs: settings.timeoutMs,
		responseType: settings.responseType,
		retry: settings.retry,
		fetchImpl: options.fetchImpl,
	});
}

/**
 * @param config parsed config, or raw config input to validate
 */
export function createEngine(config: unknown = {}, options: EngineOptions = {}): Engine {
	const parsed: MemoriaConfig = parseConfig(config);
	const settings = resolveEngineSettings(parsed);
	if (parsed.logging) {
		configureLogging(parsed.logging);
	}

	const topics = new TopicClassifier();
	const duplicates = new DuplicateDetector(settings.memory.duplicates);
	const store = new MemoryStore({
		persistence: options.persistence ?? new InMemoryPersistence(),
		settings: settings.memory,
		classifier: topics,
		detector: duplicates,
		now: options.now,
	});
	const intents = new QueryIntentClassifier(settings.query);

	const local =
		typeof options.knowledgeIndex === "function"
			? options.knowledgeIndex(store)
			: options.knowledgeIndex;
	const knowledge = new KnowledgeCoordinator({
		local,
		lightrag: buildLightRag(settings.knowledge, options),
		defaultMode: settings.knowledge.defaultMode,
		defaultLimit: settings.knowledge.defaultLimit,
		timeoutMs: settings.knowledge.timeoutMs,
	});

	return {
		settings,
		topics,
		duplicates,
		store,
		asyncStore: new AsyncMemoryStore(store),
		intents,
		knowledge,
		dispatch: (query, ownerId) =>
			dispatchQuery(query, ownerId, {
				classifier: intents,
				store,
				searchLimit: settings.memory.search.limit,
			}),
	};
}

export { loadConfig, parseConfig } from "./config/config.js";
export type { MemoriaConfig, MemoriaConfigInput } from "./config/config.js";
export { resolveEngineSettings } from "./config/settings.js";
export type { EngineSettings, KnowledgeSettings } from "./config/settings.js";
export { classifyFailure, type FailureKind } from "./infra/network-errors.js";
export { TimeoutError } from "./infra/timeout.js";
export {
	hasRelationshipCues,
	isSimpleFactQuery,
	KnowledgeCoordinator,
	renderKnowledgeResult,
} from "./knowledge/coordinator.js";
export { LightRagClient, LightRagError } from "./knowledge/lightrag-client.js";
export { DocumentIndex, MemoryKnowledgeIndex } from "./knowledge/local-index.js";
export type * from "./knowledge/types.js";
export { AsyncMemoryStore } from "./memory/async-store.js";
export { DuplicateDetector, type DuplicateVerdict } from "./memory/duplicate-detector.js";
export { deserializeEntry, normalizeTopics, serializeEntry } from "./memory/entry.js";
export { MemoryValidationError, PersistenceError } from "./memory/errors.js";
export { extractMemorableStatements } from "./memory/extraction.js";
export { InMemoryPersistence, type MemoryPersistence } from "./memory/persistence.js";
export { MemoryStore, type MemoryStoreSettings } from "./memory/store.js";
export { TopicClassifier, type TopicRule } from "./memory/topic-classifier.js";
export type * from "./memory/types.js";
export { isRejected, isStored } from "./memory/types.js";
export { type DispatchOutcome, dispatchQuery } from "./query/dispatch.js";
export { type IntentResult, QueryIntentClassifier } from "./query/intent-classifier.js";
export { SqlitePersistence } from "./storage/memory-entries.js";
export { openDatabase } from "./storage/db.js";
