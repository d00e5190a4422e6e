/**
 * Lexical similarity used by both admission control and search.
 *
 * blendedSimilarity = 0.6 * sequenceRatio + 0.4 * jaccard(keyTerms)
 */

import stopwordList from "./data/stopwords.json" with { type: "json" };

export const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

export const STRING_WEIGHT = 0.6;
export const TERMS_WEIGHT = 0.4;

/**
 * Case and whitespace folding. Two texts with equal folds are exact duplicates.
 */
export function foldText(text: string): string {
	return text.toLowerCase().replace(/\s+/g, " ").trim();
}

/**
 * Fold plus removal of sentence punctuation, for similarity scoring.
 */
export function normalizeForSimilarity(text: string): string {
	return foldText(text)
		.replace(/[.,!?;:]/g, "")
		.replace(/\s+/g, " ")
		.trim();
}

// ----------------------------------------------------------------------------
// Ratcliff/Obershelp
// ----------------------------------------------------------------------------

type Match = { i: number; j: number; size: number };

function indexPositions(b: string): Map<string, number[]> {
	const b2j = new Map<string, number[]>();
	for (let j = 0; j < b.length; j++) {
		const ch = b[j];
		const positions = b2j.get(ch);
		if (positions) {
			positions.push(j);
		} else {
			b2j.set(ch, [j]);
		}
	}
	return b2j;
}

/**
 * Longest common substring of a[alo:ahi] and b[blo:bhi]. Ties go to the
 * earliest position in `a`, then in `b`.
 */
function findLongestMatch(
	a: string,
	b2j: Map<string, number[]>,
	alo: number,
	ahi: number,
	blo: number,
	bhi: number,
): Match {
	let best: Match = { i: alo, j: blo, size: 0 };
	let j2len = new Map<number, number>();

	for (let i = alo; i < ahi; i++) {
		const next = new Map<number, number>();
		for (const j of b2j.get(a[i]) ?? []) {
			if (j < blo) continue;
			if (j >= bhi) break;
			const k = (j2len.get(j - 1) ?? 0) + 1;
			next.set(j, k);
			if (k > best.size) {
				best = { i: i - k + 1, j: j - k + 1, size: k };
			}
		}
		j2len = next;
	}

	return best;
}

function countMatchingCharacters(a: string, b: string): number {
	const b2j = indexPositions(b);
	const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
	let matched = 0;

	while (queue.length > 0) {
		const range = queue.pop();
		if (!range) break;
		const [alo, ahi, blo, bhi] = range;
		const { i, j, size } = findLongestMatch(a, b2j, alo, ahi, blo, bhi);
		if (size === 0) continue;

		matched += size;
		if (alo < i && blo < j) queue.push([alo, i, blo, j]);
		if (i + size < ahi && j + size < bhi) queue.push([i + size, ahi, j + size, bhi]);
	}

	return matched;
}

/**
 * Ratcliff/Obershelp "gestalt" ratio: 2 * matches / total length, in [0, 1].
 * Two empty strings are identical (1.0).
 */
export function sequenceRatio(a: string, b: string): number {
	const total = a.length + b.length;
	if (total === 0) return 1;
	return (2 * countMatchingCharacters(a, b)) / total;
}

// ----------------------------------------------------------------------------
// Key terms
// ----------------------------------------------------------------------------

/**
 * Content words: no stop-words, nothing shorter than three characters.
 */
export function extractKeyTerms(text: string): Set<string> {
	const words = normalizeForSimilarity(text).split(" ");
	return new Set(words.filter((word) => word.length > 2 && !STOPWORDS.has(word)));
}

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
	if (a.size === 0 && b.size === 0) return 1;
	if (a.size === 0 || b.size === 0) return 0;

	let intersection = 0;
	for (const term of a) {
		if (b.has(term)) intersection++;
	}
	const union = a.size + b.size - intersection;
	return union > 0 ? intersection / union : 0;
}

export function blendedSimilarity(a: string, b: string): number {
	const ratio = sequenceRatio(normalizeForSimilarity(a), normalizeForSimilarity(b));
	const terms = jaccard(extractKeyTerms(a), extractKeyTerms(b));
	return STRING_WEIGHT * ratio + TERMS_WEIGHT * terms;
}

function wordSet(text: string): Set<string> {
	return new Set(normalizeForSimilarity(text).match(/\w+/g) ?? []);
}

/**
 * Similarity of a search query against a stored text. Short queries (one to
 * three words) that hit stored words exactly get a floor of
 * 0.6 + 0.4 * (hit words / query words), so "work" finds "I work at a bank".
 */
export function querySimilarity(query: string, text: string): number {
	const blended = blendedSimilarity(query, text);
	const queryWords = wordSet(query);
	if (queryWords.size === 0 || queryWords.size > 3) return blended;

	const textWords = wordSet(text);
	let hits = 0;
	for (const word of queryWords) {
		if (textWords.has(word)) hits++;
	}
	if (hits === 0) return blended;

	const exactWordScore = 0.6 + (hits / queryWords.size) * 0.4;
	return Math.max(exactWordScore, blended);
}
