/**
 * Rule-based topic tagging.
 *
 * Each topic has keywords (1 point per hit) and regex patterns (2 points per
 * hit). A topic is assigned at 2 points or more; nothing assigned means
 * "general". No state, no model: the same text always yields the same topics.
 */

import topicTable from "./data/topics.json" with { type: "json" };
import { DEFAULT_TOPIC } from "./entry.js";
import { STOPWORDS } from "./similarity.js";

export type TopicRule = {
	name: string;
	keywords: readonly string[];
	/** Regex sources, matched against the lower-cased text */
	patterns: readonly string[];
};

export const DEFAULT_TOPIC_RULES: readonly TopicRule[] = topicTable;

const KEYWORD_WEIGHT = 1;
const PATTERN_WEIGHT = 2;
const ASSIGN_THRESHOLD = 2;

type CompiledRule = {
	name: string;
	words: ReadonlySet<string>;
	phrases: readonly string[];
	patterns: readonly RegExp[];
};

function expandContractions(text: string): string {
	return text
		.replace(/\bcan't\b/g, "cannot")
		.replace(/\bwon't\b/g, "will not")
		.replace(/n't\b/g, " not")
		.replace(/\bi'm\b/g, "i am")
		.replace(/'re\b/g, " are")
		.replace(/\b(he|she|it)'s\b/g, "$1 is");
}

/**
 * Lower-case, expand contractions, strip punctuation (keeping # and + for
 * "c#" and "c++"), drop stop-words.
 */
export function cleanText(text: string): string {
	const stripped = expandContractions(text.toLowerCase()).replace(/[^a-z0-9#+\s]/g, "");
	return stripped
		.split(/\s+/)
		.filter((token) => token && !STOPWORDS.has(token))
		.join(" ");
}

function compile(rule: TopicRule): CompiledRule {
	const words = new Set<string>();
	const phrases: string[] = [];
	for (const keyword of rule.keywords) {
		const lower = keyword.toLowerCase().trim();
		if (!lower) continue;
		if (lower.includes(" ")) {
			phrases.push(lower);
		} else {
			words.add(lower);
		}
	}
	return {
		name: rule.name,
		words,
		phrases,
		patterns: rule.patterns.map((source) => new RegExp(source)),
	};
}

export class TopicClassifier {
	private readonly rules: readonly CompiledRule[];

	constructor(rules: readonly TopicRule[] = DEFAULT_TOPIC_RULES) {
		this.rules = rules.filter((rule) => rule.name !== DEFAULT_TOPIC).map(compile);
	}

	/**
	 * Raw scores of every topic that reached the threshold, in table order.
	 */
	classifyWithScores(text: string): Record<string, number> {
		const lowered = text.toLowerCase().replace(/\s+/g, " ").trim();
		const cleaned = cleanText(lowered);
		const tokens = new Set(cleaned.split(" "));
		const padded = ` ${cleaned} `;

		const scores: Record<string, number> = {};
		if (!lowered) return scores;

		for (const rule of this.rules) {
			let score = 0;
			for (const word of rule.words) {
				if (tokens.has(word)) score += KEYWORD_WEIGHT;
			}
			for (const phrase of rule.phrases) {
				if (padded.includes(` ${phrase} `)) score += KEYWORD_WEIGHT;
			}
			for (const pattern of rule.patterns) {
				if (pattern.test(lowered)) score += PATTERN_WEIGHT;
			}
			if (score >= ASSIGN_THRESHOLD) {
				scores[rule.name] = score;
			}
		}

		return scores;
	}

	classify(text: string): string[] {
		const assigned = Object.keys(this.classifyWithScores(text));
		return assigned.length > 0 ? assigned : [DEFAULT_TOPIC];
	}
}
