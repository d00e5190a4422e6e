import type { MemoryStoreSettings } from "../memory/store.js";
import type { IntentClassifierSettings } from "../query/intent-classifier.js";
import type { RetryConfig } from "../infra/retry.js";
import type { MemoriaConfig } from "./config.js";

export type KnowledgeSettings = {
	enabled: boolean;
	lightragUrl: string;
	apiKey?: string;
	timeoutMs: number;
	defaultMode: string;
	defaultLimit: number;
	responseType: string;
	retry: Pick<RetryConfig, "maxAttempts" | "baseDelayMs" | "maxDelayMs">;
};

export type EngineSettings = {
	memory: Readonly<MemoryStoreSettings>;
	query: Readonly<IntentClassifierSettings>;
	knowledge: Readonly<KnowledgeSettings>;
};

function deepFreeze<T>(value: T): T {
	if (value !== null && typeof value === "object") {
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
		Object.freeze(value);
	}
	return value;
}

/**
 * Per-component settings from a parsed config file. The result is frozen
 * all the way down; components receive it by injection and never see the
 * file or the environment.
 */
export function resolveEngineSettings(config: MemoriaConfig): Readonly<EngineSettings> {
	const { memory, query, knowledge } = config;

	const settings: EngineSettings = {
		memory: {
			maxContentLength: memory.maxContentLength,
			recentMemoryLimit: memory.recentMemoryLimit,
			topicClassification: memory.topicClassification,
			search: { ...memory.search },
			duplicates: {
				similarityThreshold: memory.similarityThreshold,
				preferenceThreshold: memory.preferenceThreshold,
				exactDedup: memory.exactDedup,
				semanticDedup: memory.semanticDedup,
			},
		},
		query: {
			strictMode: query.strictMode,
			...(query.fastPathThreshold !== undefined
				? { fastPathThreshold: query.fastPathThreshold }
				: {}),
			...(query.patterns
				? {
						patterns: {
							...(query.patterns.memoryList ? { memoryList: [...query.patterns.memoryList] } : {}),
							...(query.patterns.memorySearch
								? { memorySearch: [...query.patterns.memorySearch] }
								: {}),
						},
					}
				: {}),
		},
		knowledge: {
			enabled: knowledge.enabled,
			lightragUrl: knowledge.lightragUrl,
			...(knowledge.apiKey ? { apiKey: knowledge.apiKey } : {}),
			timeoutMs: knowledge.timeoutMs,
			defaultMode: knowledge.defaultMode,
			defaultLimit: knowledge.defaultLimit,
			responseType: knowledge.responseType,
			retry: { ...knowledge.retry },
		},
	};

	return deepFreeze(settings);
}
