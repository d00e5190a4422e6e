import crypto from "node:crypto";

import { getChildLogger } from "../logging.js";
import { DuplicateDetector, type DuplicateSettings } from "./duplicate-detector.js";
import {
	assertConfidence,
	coerceTopicList,
	createMemoryEntry,
	DEFAULT_TOPIC,
	mergeTopics,
} from "./entry.js";
import { describeError, MemoryValidationError, PersistenceError } from "./errors.js";
import { extractMemorableStatements } from "./extraction.js";
import type { MemoryPersistence } from "./persistence.js";
import { expandQuery, scoreEntry } from "./search.js";
import { TopicClassifier } from "./topic-classifier.js";
import type {
	AddMemoryOptions,
	IngestResult,
	MemoryEntry,
	MemoryStats,
	ScoredEntry,
	SearchOptions,
	StorageResult,
	UpdateMemoryPatch,
} from "./types.js";

const logger = getChildLogger({ module: "memory-store" });

export type MemoryStoreSettings = {
	maxContentLength: number;
	/** How many of the owner's newest entries the duplicate check compares against */
	recentMemoryLimit: number;
	topicClassification: boolean;
	search: Required<SearchOptions>;
	duplicates: DuplicateSettings;
};

export const DEFAULT_MEMORY_STORE_SETTINGS: Readonly<MemoryStoreSettings> = Object.freeze({
	maxContentLength: 500,
	recentMemoryLimit: 100,
	topicClassification: true,
	search: Object.freeze({ limit: 10, similarityThreshold: 0.3, topicBoost: 0 }),
	duplicates: Object.freeze({
		similarityThreshold: 0.8,
		preferenceThreshold: 0.65,
		exactDedup: true,
		semanticDedup: true,
	}),
});

export type MemoryStoreOptions = {
	persistence: MemoryPersistence;
	settings?: Readonly<MemoryStoreSettings>;
	classifier?: TopicClassifier;
	detector?: DuplicateDetector;
	now?: () => number;
	generateId?: () => string;
};

type ContentCheck =
	| { ok: true; text: string }
	| { ok: false; result: StorageResult };

function startOfLocalDay(now: number): number {
	const date = new Date(now);
	date.setHours(0, 0, 0, 0);
	return date.getTime();
}

/**
 * Admission, storage and retrieval of memory entries, scoped by owner.
 *
 * Expected conditions (duplicates, bad content, storage failures on writes)
 * come back as a StorageResult; nothing here throws for them.
 */
export class MemoryStore {
	private readonly persistence: MemoryPersistence;
	private readonly settings: Readonly<MemoryStoreSettings>;
	private readonly classifier: TopicClassifier;
	private readonly detector: DuplicateDetector;
	private readonly now: () => number;
	private readonly generateId: () => string;
	private readonly duplicateRejections = new Map<string, number>();

	constructor(options: MemoryStoreOptions) {
		this.persistence = options.persistence;
		this.settings = options.settings ?? DEFAULT_MEMORY_STORE_SETTINGS;
		this.classifier = options.classifier ?? new TopicClassifier();
		this.detector = options.detector ?? new DuplicateDetector(this.settings.duplicates);
		this.now = options.now ?? Date.now;
		this.generateId = options.generateId ?? (() => crypto.randomUUID());
	}

	add(text: string, ownerId: string, options: AddMemoryOptions = {}): StorageResult {
		const content = this.checkContent(text);
		if (!content.ok) return content.result;

		if (!ownerId.trim()) {
			return { status: "validation_error", message: "ownerId is required" };
		}

		const isProxy = options.isProxy ?? options.proxyAgent !== undefined;
		if (isProxy && !options.proxyAgent?.trim()) {
			return {
				status: "validation_error",
				message: "proxy memories need a proxyAgent",
			};
		}

		let existing: MemoryEntry[];
		try {
			existing = this.persistence.readAll(ownerId, this.settings.recentMemoryLimit);
		} catch (err) {
			return this.storageError("read", ownerId, err);
		}

		const duplicate = this.checkDuplicate(content.text, ownerId, existing);
		if (duplicate) return duplicate;

		const topics = this.resolveTopics(content.text, options.topics);
		const timestamp = this.now();

		let entry: MemoryEntry;
		try {
			entry = createMemoryEntry({
				id: this.generateId(),
				ownerId,
				text: content.text,
				topics,
				confidence: options.confidence,
				isProxy,
				proxyAgent: options.proxyAgent,
				input: options.input,
				createdAt: timestamp,
			});
		} catch (err) {
			return this.validationError(err);
		}

		try {
			this.persistence.write(entry);
		} catch (err) {
			return this.storageError("write", ownerId, err);
		}

		logger.info(
			{ ownerId, memoryId: entry.id, topics: entry.topics, isProxy: entry.isProxy },
			"memory stored",
		);
		return {
			status: "success",
			message: `Memory stored with topics: ${entry.topics.join(", ")}`,
			memoryId: entry.id,
			topics: entry.topics,
			entry,
		};
	}

	update(memoryId: string, ownerId: string, patch: UpdateMemoryPatch): StorageResult {
		let current: MemoryEntry | null;
		try {
			current = this.persistence.read(memoryId);
		} catch (err) {
			return this.storageError("read", ownerId, err);
		}
		if (!current || current.ownerId !== ownerId) {
			return { status: "validation_error", message: `memory ${memoryId} not found` };
		}

		let text = current.text;
		if (patch.text !== undefined) {
			const content = this.checkContent(patch.text);
			if (!content.ok) return content.result;
			text = content.text;
		}
		const textChanged = text !== current.text;

		if (textChanged) {
			let others: MemoryEntry[];
			try {
				others = this.persistence
					.readAll(ownerId, this.settings.recentMemoryLimit + 1)
					.filter((entry) => entry.id !== memoryId)
					.slice(0, this.settings.recentMemoryLimit);
			} catch (err) {
				return this.storageError("read", ownerId, err);
			}
			const duplicate = this.checkDuplicate(text, ownerId, others);
			if (duplicate) return duplicate;
		}

		let topics: string[] = current.topics;
		if (patch.topics !== undefined) {
			topics = coerceTopicList(patch.topics);
		} else if (textChanged) {
			topics = this.resolveTopics(text, undefined);
		}

		let updated: MemoryEntry;
		try {
			if (patch.confidence !== undefined) assertConfidence(patch.confidence);
			updated = createMemoryEntry({
				...current,
				text,
				topics,
				confidence: patch.confidence ?? current.confidence,
				updatedAt: Math.max(this.now(), current.updatedAt),
			});
		} catch (err) {
			return this.validationError(err);
		}

		try {
			this.persistence.write(updated);
		} catch (err) {
			return this.storageError("write", ownerId, err);
		}

		logger.info({ ownerId, memoryId, textChanged }, "memory updated");
		return {
			status: "success",
			message: "Memory updated",
			memoryId,
			topics: updated.topics,
			entry: updated,
		};
	}

	/**
	 * Entries scored against `query`, best first. Entries below the threshold
	 * are dropped.
	 */
	search(query: string, ownerId: string, options: SearchOptions = {}): ScoredEntry[] {
		if (!query.trim()) return [];

		const limit = options.limit ?? this.settings.search.limit;
		const threshold = options.similarityThreshold ?? this.settings.search.similarityThreshold;
		const topicBoost = options.topicBoost ?? this.settings.search.topicBoost;

		const queries = expandQuery(query);
		const results: ScoredEntry[] = [];
		for (const entry of this.persistence.readAll(ownerId)) {
			const score = scoreEntry(queries, entry, topicBoost);
			if (score.total >= threshold) {
				results.push({ entry, score: score.total });
			}
		}

		// Stable sort: equal scores keep newest-first order.
		results.sort((a, b) => b.score - a.score);
		logger.debug(
			{ ownerId, variants: queries.length, matches: results.length },
			"memory search",
		);
		return results.slice(0, limit);
	}

	/** Newest first. */
	listAll(ownerId: string): MemoryEntry[] {
		return this.persistence.readAll(ownerId);
	}

	listByTopic(ownerId: string, topics: string[] | string): MemoryEntry[] {
		const wanted = new Set(coerceTopicList(topics));
		if (wanted.size === 0) return this.listAll(ownerId);
		return this.listAll(ownerId).filter((entry) =>
			entry.topics.some((topic) => wanted.has(topic.toLowerCase())),
		);
	}

	/**
	 * False when the id is unknown or belongs to another owner.
	 */
	delete(memoryId: string, ownerId: string): boolean {
		const entry = this.persistence.read(memoryId);
		if (!entry || entry.ownerId !== ownerId) return false;
		const deleted = this.persistence.delete(memoryId);
		if (deleted) logger.info({ ownerId, memoryId }, "memory deleted");
		return deleted;
	}

	deleteByTopic(ownerId: string, topics: string[] | string): number {
		const wanted = coerceTopicList(topics);
		if (wanted.length === 0) return 0;
		const deleted = this.deleteEntries(this.listByTopic(ownerId, wanted));
		logger.info({ ownerId, topics: wanted, deleted }, "memories deleted by topic");
		return deleted;
	}

	clear(ownerId: string): number {
		const deleted = this.deleteEntries(this.listAll(ownerId));
		this.duplicateRejections.delete(ownerId);
		logger.info({ ownerId, deleted }, "memories cleared");
		return deleted;
	}

	stats(ownerId: string): MemoryStats {
		const entries = this.listAll(ownerId);
		const topicDistribution: Record<string, number> = {};
		let totalLength = 0;
		let recentCount = 0;
		const midnight = startOfLocalDay(this.now());

		for (const entry of entries) {
			totalLength += entry.text.length;
			if (entry.updatedAt >= midnight) recentCount++;
			for (const topic of entry.topics) {
				topicDistribution[topic] = (topicDistribution[topic] ?? 0) + 1;
			}
		}

		let mostCommonTopic: string | null = null;
		for (const [topic, count] of Object.entries(topicDistribution)) {
			if (mostCommonTopic === null || count > (topicDistribution[mostCommonTopic] ?? 0)) {
				mostCommonTopic = topic;
			}
		}

		return {
			total: entries.length,
			topicDistribution,
			duplicateRejectionsSeen: this.duplicateRejections.get(ownerId) ?? 0,
			averageLength: entries.length > 0 ? totalLength / entries.length : 0,
			recentCount,
			mostCommonTopic,
		};
	}

	/**
	 * Store every memorable statement found in free text. The raw input is kept
	 * on each stored entry.
	 */
	ingest(input: string, ownerId: string): IngestResult {
		const statements = extractMemorableStatements(input);
		const result: IngestResult = { added: [], rejected: [], totalProcessed: statements.length };

		for (const statement of statements) {
			const outcome = this.add(statement, ownerId, { input });
			if (outcome.status === "success" && outcome.memoryId) {
				result.added.push({
					memoryId: outcome.memoryId,
					text: statement,
					topics: outcome.topics ?? [DEFAULT_TOPIC],
				});
			} else {
				result.rejected.push({ text: statement, status: outcome.status, reason: outcome.message });
			}
		}

		logger.info(
			{ ownerId, added: result.added.length, rejected: result.rejected.length },
			"ingested statements",
		);
		return result;
	}

	private checkContent(raw: string): ContentCheck {
		const text = raw.trim();
		if (!text) {
			return { ok: false, result: { status: "content_empty", message: "Memory content is empty" } };
		}
		if (text.length > this.settings.maxContentLength) {
			return {
				ok: false,
				result: {
					status: "content_too_long",
					message: `Memory content is ${text.length} characters (max ${this.settings.maxContentLength})`,
				},
			};
		}
		return { ok: true, text };
	}

	private checkDuplicate(
		text: string,
		ownerId: string,
		existing: readonly MemoryEntry[],
	): StorageResult | null {
		const verdict = this.detector.check(text, existing);
		if (verdict.kind === "unique") return null;

		this.duplicateRejections.set(ownerId, (this.duplicateRejections.get(ownerId) ?? 0) + 1);

		if (verdict.kind === "exact") {
			logger.info({ ownerId, duplicateOf: verdict.ofId }, "rejected exact duplicate");
			return {
				status: "duplicate_exact",
				message: "Memory already exists",
				duplicateOf: verdict.ofId,
				similarityScore: 1,
			};
		}

		logger.info(
			{ ownerId, duplicateOf: verdict.ofId, score: verdict.score },
			"rejected semantic duplicate",
		);
		return {
			status: "duplicate_semantic",
			message: `Memory is too similar to an existing one (${verdict.score.toFixed(2)})`,
			duplicateOf: verdict.ofId,
			similarityScore: verdict.score,
		};
	}

	private resolveTopics(text: string, callerTopics: AddMemoryOptions["topics"]): string[] {
		const classified = this.settings.topicClassification ? this.classifier.classify(text) : [];
		return mergeTopics(callerTopics, classified);
	}

	private deleteEntries(entries: readonly MemoryEntry[]): number {
		let deleted = 0;
		for (const entry of entries) {
			if (this.persistence.delete(entry.id)) deleted++;
		}
		return deleted;
	}

	private validationError(err: unknown): StorageResult {
		if (err instanceof MemoryValidationError) {
			return { status: "validation_error", message: err.message };
		}
		throw err;
	}

	private storageError(operation: "read" | "write", ownerId: string, err: unknown): StorageResult {
		const wrapped =
			err instanceof PersistenceError
				? err
				: new PersistenceError(`memory ${operation} failed`, operation, { cause: err });
		logger.error({ ownerId, operation, error: describeError(wrapped) }, "memory storage failed");
		return { status: "storage_error", message: describeError(wrapped) };
	}
}
