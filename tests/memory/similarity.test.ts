import { describe, expect, it } from "vitest";

import {
	blendedSimilarity,
	extractKeyTerms,
	foldText,
	jaccard,
	normalizeForSimilarity,
	querySimilarity,
	sequenceRatio,
} from "../../src/memory/similarity.js";

describe("memory/similarity", () => {
	it("folds case and whitespace but keeps punctuation", () => {
		expect(foldText("  Hello,\n  World! ")).toBe("hello, world!");
	});

	it("strips sentence punctuation for scoring", () => {
		expect(normalizeForSimilarity("  Hello,   World! ")).toBe("hello world");
	});

	describe("sequenceRatio", () => {
		it("counts matching blocks", () => {
			expect(sequenceRatio("abcd", "bcde")).toBe(0.75);
		});

		it("treats two empty strings as identical", () => {
			expect(sequenceRatio("", "")).toBe(1);
		});

		it("is zero without common characters", () => {
			expect(sequenceRatio("abc", "xyz")).toBe(0);
		});
	});

	it("extracts content words of three or more characters", () => {
		expect(extractKeyTerms("I love my dog and my cat")).toEqual(new Set(["love", "dog", "cat"]));
	});

	it("computes jaccard overlap", () => {
		expect(jaccard(new Set(["a", "b"]), new Set(["b", "c"]))).toBeCloseTo(1 / 3, 10);
		expect(jaccard(new Set(), new Set())).toBe(1);
		expect(jaccard(new Set(["a"]), new Set())).toBe(0);
	});

	it("scores identical texts as 1", () => {
		expect(blendedSimilarity("I like pizza", "i like pizza.")).toBe(1);
	});

	it("blends string ratio and key-term overlap", () => {
		// ratio 44/51, terms 2/4
		expect(
			blendedSimilarity("My favorite color is blue", "My favorite color is green"),
		).toBeCloseTo(0.6 * (44 / 51) + 0.4 * 0.5, 10);
	});

	it("floors short queries that hit a stored word", () => {
		expect(querySimilarity("work", "I work at a bank")).toBe(1);
	});

	it("uses the blended score for long queries", () => {
		const query = "where does my sister live these days";
		expect(querySimilarity(query, "My sister lives in Berlin")).toBe(
			blendedSimilarity(query, "My sister lives in Berlin"),
		);
	});
});
