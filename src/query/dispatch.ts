import { getChildLogger } from "../logging.js";
import type { MemoryStore } from "../memory/store.js";
import type { MemoryEntry, ScoredEntry } from "../memory/types.js";
import type { IntentResult, QueryIntentClassifier } from "./intent-classifier.js";

const logger = getChildLogger({ module: "query-dispatch" });

// Longest first: "search memories for" must go before "search memories".
const SEARCH_LEAD_INS = [
	"what do you know about",
	"search memories about",
	"search memories for",
	"find memories about",
	"find memories for",
	"do you remember",
	"search memories",
	"find memories",
];

export type DispatchOutcome =
	| { kind: "memory_list"; classification: IntentResult; entries: MemoryEntry[] }
	| {
			kind: "memory_search";
			classification: IntentResult;
			searchTerms: string;
			results: ScoredEntry[];
	  }
	/** Not answerable locally; hand the query to the agent runtime. */
	| { kind: "delegate"; classification: IntentResult };

/**
 * What to search for once the lead-in phrase is gone:
 * "do you remember my dog's name" → "my dog's name".
 */
export function extractSearchTerms(query: string): string {
	let terms = query.toLowerCase();
	for (const phrase of SEARCH_LEAD_INS) {
		terms = terms.replaceAll(phrase, " ");
	}
	terms = terms.replace(/\s+/g, " ").trim();
	return terms || query;
}

/**
 * Answer a query from memory when its intent allows, otherwise say to delegate.
 * List requests below the fast-path threshold are delegated too.
 */
export function dispatchQuery(
	query: string,
	ownerId: string,
	deps: { classifier: QueryIntentClassifier; store: MemoryStore; searchLimit?: number },
): DispatchOutcome {
	const classification = deps.classifier.classify(query);
	logger.debug(
		{ intent: classification.intent, confidence: classification.confidence },
		classification.reason,
	);

	if (
		classification.intent === "memory_list" &&
		classification.confidence >= deps.classifier.threshold
	) {
		return { kind: "memory_list", classification, entries: deps.store.listAll(ownerId) };
	}

	if (classification.intent === "memory_search") {
		const searchTerms = extractSearchTerms(query);
		const results = deps.store.search(searchTerms, ownerId, { limit: deps.searchLimit });
		return { kind: "memory_search", classification, searchTerms, results };
	}

	return { kind: "delegate", classification };
}
