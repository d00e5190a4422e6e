/**
 * Admission control: decides whether a candidate memory repeats one the owner
 * already has.
 *
 * Exact duplicates are equal after case/whitespace folding. Semantic
 * duplicates score at or above a threshold on the blended similarity; the
 * threshold drops for preference statements ("I love ...", "my favorite ...").
 */

import { blendedSimilarity, foldText } from "./similarity.js";
import type { MemoryEntry } from "./types.js";

export type DuplicateVerdict =
	| { kind: "unique" }
	| { kind: "exact"; ofId: string }
	| { kind: "semantic"; ofId: string; score: number };

export type DuplicateSettings = {
	similarityThreshold: number;
	/**
	 * Applied when either side reads as a preference. Still flags preferences
	 * that differ in one word ("My favorite color is blue" / "... green").
	 */
	preferenceThreshold: number;
	exactDedup: boolean;
	semanticDedup: boolean;
};

export const DEFAULT_DUPLICATE_SETTINGS: Readonly<DuplicateSettings> = Object.freeze({
	similarityThreshold: 0.8,
	preferenceThreshold: 0.65,
	exactDedup: true,
	semanticDedup: true,
});

// Substring matches, so "like" also fires on "likely" and "best" on "bestseller".
const PREFERENCE_INDICATORS = [
	"prefer",
	"like",
	"enjoy",
	"love",
	"hate",
	"dislike",
	"favorite",
	"favourite",
	"best",
	"worst",
] as const;

export function isPreferenceStatement(text: string): boolean {
	const folded = foldText(text);
	return PREFERENCE_INDICATORS.some((indicator) => folded.includes(indicator));
}

type Candidate = Pick<MemoryEntry, "id" | "text">;

export class DuplicateDetector {
	private readonly settings: Readonly<DuplicateSettings>;

	constructor(settings: Partial<DuplicateSettings> = {}) {
		this.settings = Object.freeze({ ...DEFAULT_DUPLICATE_SETTINGS, ...settings });
	}

	thresholdFor(a: string, b: string): number {
		return isPreferenceStatement(a) || isPreferenceStatement(b)
			? this.settings.preferenceThreshold
			: this.settings.similarityThreshold;
	}

	/**
	 * Highest blended score against `existing`, or null when the list is empty.
	 * Ignores the thresholds.
	 */
	bestMatch(text: string, existing: readonly Candidate[]): { id: string; score: number } | null {
		let best: { id: string; score: number } | null = null;
		for (const entry of existing) {
			const score = blendedSimilarity(text, entry.text);
			if (!best || score > best.score) {
				best = { id: entry.id, score };
			}
		}
		return best;
	}

	check(text: string, existing: readonly Candidate[]): DuplicateVerdict {
		if (this.settings.exactDedup) {
			const folded = foldText(text);
			const exact = existing.find((entry) => foldText(entry.text) === folded);
			if (exact) {
				return { kind: "exact", ofId: exact.id };
			}
		}

		if (!this.settings.semanticDedup) {
			return { kind: "unique" };
		}

		let best: { id: string; score: number } | null = null;
		for (const entry of existing) {
			const score = blendedSimilarity(text, entry.text);
			if (score < this.thresholdFor(text, entry.text)) continue;
			if (!best || score > best.score) {
				best = { id: entry.id, score };
			}
		}

		return best ? { kind: "semantic", ofId: best.id, score: best.score } : { kind: "unique" };
	}
}
