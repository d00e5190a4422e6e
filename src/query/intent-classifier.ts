/**
 * Decides whether a user query can skip the agent and go straight to the
 * memory store (the "fast path").
 *
 * Only unambiguous, single-purpose list requests qualify. Anything that asks
 * for two things at once ("list my memories and check the weather") goes to
 * the agent, whatever else it matches.
 */

export type QueryIntent = "memory_list" | "memory_search" | "general";

export type IntentResult = {
	intent: QueryIntent;
	confidence: number;
	reason: string;
	/** Source of the pattern that matched */
	matchedPattern?: string;
};

export type IntentClassifierSettings = {
	/** strict: fast path at >= 0.9 confidence, otherwise >= 0.85 */
	strictMode: boolean;
	/** Overrides the threshold strictMode would pick */
	fastPathThreshold?: number;
	patterns?: {
		memoryList?: readonly string[];
		memorySearch?: readonly string[];
	};
};

export const DEFAULT_MEMORY_LIST_PATTERNS: readonly string[] = [
	String.raw`^list\s+(all\s+)?memories`,
	String.raw`^list\s+(my\s+)?memories`,
	String.raw`^show\s+(all\s+)?memories`,
	String.raw`^show\s+(my\s+)?memories`,
	String.raw`^what\s+memories`,
	String.raw`^my\s+memories`,
	String.raw`^all\s+my\s+memories`,
	String.raw`^memories\s+list`,
];

export const DEFAULT_MEMORY_SEARCH_PATTERNS: readonly string[] = [
	String.raw`do\s+you\s+remember`,
	String.raw`what\s+do\s+you\s+know\s+about`,
	String.raw`search\s+memories`,
	String.raw`find\s+memories`,
];

const COMPOUND_CONNECTORS = [" and ", " but ", " also ", ", then ", ", also ", " plus "] as const;

const COMPOUND_CONFIDENCE = 0.95;
const LIST_CONFIDENCE = 0.95;
const SEARCH_CONFIDENCE = 0.85;
const GENERAL_CONFIDENCE = 0.5;

const STRICT_THRESHOLD = 0.9;
const LENIENT_THRESHOLD = 0.85;

function compile(patterns: readonly string[]): RegExp[] {
	return patterns.map((source) => new RegExp(source, "i"));
}

export function isCompoundQuery(query: string): boolean {
	const lowered = query.toLowerCase();
	return COMPOUND_CONNECTORS.some((connector) => lowered.includes(connector));
}

export class QueryIntentClassifier {
	readonly threshold: number;
	private readonly listPatterns: readonly RegExp[];
	private readonly searchPatterns: readonly RegExp[];

	constructor(settings: Partial<IntentClassifierSettings> = {}) {
		const strictMode = settings.strictMode ?? true;
		this.threshold =
			settings.fastPathThreshold ?? (strictMode ? STRICT_THRESHOLD : LENIENT_THRESHOLD);
		this.listPatterns = compile(settings.patterns?.memoryList ?? DEFAULT_MEMORY_LIST_PATTERNS);
		this.searchPatterns = compile(
			settings.patterns?.memorySearch ?? DEFAULT_MEMORY_SEARCH_PATTERNS,
		);
	}

	classify(query: string): IntentResult {
		const normalized = query.toLowerCase().trim();

		if (isCompoundQuery(normalized)) {
			return {
				intent: "general",
				confidence: COMPOUND_CONFIDENCE,
				reason: "Compound query detected (multiple topics)",
			};
		}

		const listMatch = this.listPatterns.find((pattern) => pattern.test(normalized));
		if (listMatch) {
			return {
				intent: "memory_list",
				confidence: LIST_CONFIDENCE,
				reason: "Matched memory list pattern",
				matchedPattern: listMatch.source,
			};
		}

		const searchMatch = this.searchPatterns.find((pattern) => pattern.test(normalized));
		if (searchMatch) {
			return {
				intent: "memory_search",
				confidence: SEARCH_CONFIDENCE,
				reason: "Matched memory search pattern",
				matchedPattern: searchMatch.source,
			};
		}

		return {
			intent: "general",
			confidence: GENERAL_CONFIDENCE,
			reason: "No specific pattern matched",
		};
	}

	shouldUseFastPath(query: string): boolean {
		const result = this.classify(query);
		return result.intent === "memory_list" && result.confidence >= this.threshold;
	}
}
