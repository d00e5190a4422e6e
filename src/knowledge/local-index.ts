import type { MemoryStore } from "../memory/store.js";
import { querySimilarity } from "../memory/similarity.js";
import type { KnowledgeHit, KnowledgeIndex } from "./types.js";

export type KnowledgeDocument = {
	content: string;
	source?: string;
};

const DEFAULT_MIN_SCORE = 0.3;

/**
 * In-process document list scored with the same lexical similarity as memory
 * search. Good for a handful of reference notes; nothing is persisted.
 */
export class DocumentIndex implements KnowledgeIndex {
	private readonly documents: KnowledgeDocument[] = [];

	constructor(
		documents: readonly KnowledgeDocument[] = [],
		private readonly minScore = DEFAULT_MIN_SCORE,
	) {
		for (const document of documents) {
			this.add(document);
		}
	}

	add(document: KnowledgeDocument): void {
		if (!document.content.trim()) return;
		this.documents.push({ ...document });
	}

	get size(): number {
		return this.documents.length;
	}

	search(query: string, limit: number): KnowledgeHit[] {
		if (!query.trim() || limit <= 0) return [];

		const hits: KnowledgeHit[] = [];
		for (const document of this.documents) {
			const score = querySimilarity(query, document.content);
			if (score >= this.minScore) {
				hits.push({ ...document, score });
			}
		}
		return hits.sort((a, b) => (b.score ?? 0) - (a.score ?? 0)).slice(0, limit);
	}
}

/**
 * Answers knowledge queries from one owner's stored memories.
 */
export class MemoryKnowledgeIndex implements KnowledgeIndex {
	constructor(
		private readonly store: MemoryStore,
		private readonly ownerId: string,
	) {}

	search(query: string, limit: number): KnowledgeHit[] {
		return this.store.search(query, this.ownerId, { limit }).map(({ entry, score }) => ({
			content: entry.text,
			source: `memory:${entry.id}`,
			score,
		}));
	}
}
