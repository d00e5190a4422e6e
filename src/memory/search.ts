/**
 * Scoring for free-text memory search.
 *
 * A query is expanded with work / education / personal synonyms and every
 * variant is scored against the entry; the best variant wins. A keyword score
 * (share of query words found in the text) can lift entries the similarity
 * blend misses, and a topic hit adds the configured boost.
 */

import synonymTable from "./data/synonyms.json" with { type: "json" };
import { normalizeForSimilarity, querySimilarity } from "./similarity.js";
import type { MemoryEntry } from "./types.js";

const SYNONYMS: Readonly<Record<string, readonly string[]>> = synonymTable;

// Words this short never count towards the keyword score
const MIN_KEYWORD_LENGTH = 3;

/**
 * The original query followed by its synonym variants, de-duplicated.
 * Each synonym contributes the query with the word swapped and the bare synonym.
 */
export function expandQuery(query: string): string[] {
	const lowered = query.toLowerCase().trim();
	const expanded = [query];
	const push = (variant: string) => {
		if (!expanded.includes(variant)) expanded.push(variant);
	};

	for (const word of lowered.split(/\s+/)) {
		const synonyms = Object.hasOwn(SYNONYMS, word) ? SYNONYMS[word] : undefined;
		if (!synonyms) continue;
		for (const synonym of synonyms) {
			push(lowered.replaceAll(word, synonym));
			push(synonym);
		}
	}

	return expanded;
}

/**
 * Best share, over all variants, of query words (3+ chars) that occur as
 * substrings of the text.
 */
export function keywordScore(queries: readonly string[], text: string): number {
	const haystack = text.toLowerCase();
	let best = 0;
	for (const query of queries) {
		const words = query.toLowerCase().split(/\s+/).filter(Boolean);
		if (words.length === 0) continue;
		const hits = words.filter(
			(word) => word.length >= MIN_KEYWORD_LENGTH && haystack.includes(word),
		).length;
		best = Math.max(best, hits / words.length);
	}
	return best;
}

function topicMatches(queries: readonly string[], topics: readonly string[]): boolean {
	const terms = new Set<string>();
	for (const query of queries) {
		const normalized = normalizeForSimilarity(query);
		if (normalized) terms.add(normalized);
		for (const word of normalized.split(" ")) {
			if (word) terms.add(word);
		}
	}
	return topics.some((topic) => terms.has(topic) || terms.has(topic.replace(/_/g, " ")));
}

export type SearchScore = {
	content: number;
	keyword: number;
	topicHit: boolean;
	total: number;
};

export function scoreEntry(
	queries: readonly string[],
	entry: Pick<MemoryEntry, "text" | "topics">,
	topicBoost: number,
): SearchScore {
	let content = 0;
	for (const query of queries) {
		content = Math.max(content, querySimilarity(query, entry.text));
	}
	const keyword = keywordScore(queries, entry.text);
	const topicHit = topicMatches(queries, entry.topics);
	const total = Math.max(content, keyword) + (topicHit ? topicBoost : 0);
	return { content, keyword, topicHit, total };
}
