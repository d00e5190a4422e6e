import { describe, expect, it } from "vitest";

import { DuplicateDetector, isPreferenceStatement } from "../../src/memory/duplicate-detector.js";

describe("memory/duplicate-detector", () => {
	const detector = new DuplicateDetector();

	it("detects exact duplicates after case and whitespace folding", () => {
		expect(detector.check("I like pizza", [{ id: "a", text: "  i LIKE   pizza " }])).toEqual({
			kind: "exact",
			ofId: "a",
		});
	});

	it("treats punctuation-only differences as semantic duplicates", () => {
		expect(detector.check("I like pizza.", [{ id: "a", text: "I like pizza" }])).toEqual({
			kind: "semantic",
			ofId: "a",
			score: 1,
		});
	});

	it("accepts unrelated statements", () => {
		expect(detector.check("I have a dog", [{ id: "a", text: "My sister lives in Berlin" }])).toEqual({
			kind: "unique",
		});
	});

	it("uses the lower threshold for preference statements", () => {
		expect(detector.thresholdFor("I love halloween", "I own a car")).toBe(0.65);
		expect(detector.thresholdFor("I own a car", "I drive a truck")).toBe(0.8);

		const verdict = detector.check("My favorite color is green", [
			{ id: "blue", text: "My favorite color is blue" },
		]);
		expect(verdict.kind).toBe("semantic");
		if (verdict.kind === "semantic") {
			expect(verdict.ofId).toBe("blue");
			expect(verdict.score).toBeCloseTo(0.6 * (44 / 51) + 0.4 * 0.5, 10);
		}
	});

	it("keeps different preferences that share an opening", () => {
		const existing = [{ id: "ice-cream", text: "I love vanilla ice cream" }];

		// 24 of 40 characters match; key terms share only "love" out of five.
		const best = detector.bestMatch("I love halloween", existing);
		expect(best?.id).toBe("ice-cream");
		expect(best?.score).toBeCloseTo(0.6 * (24 / 40) + 0.4 * (1 / 5), 10);
		expect(detector.thresholdFor("I love halloween", "I love vanilla ice cream")).toBe(0.65);
		expect(detector.check("I love halloween", existing)).toEqual({ kind: "unique" });
	});

	it("keeps the strict threshold for factual statements", () => {
		expect(
			detector.check("I work at Acme Corp", [{ id: "a", text: "I work at Acme Corporation" }]),
		).toEqual({ kind: "unique" });

		const verdict = detector.check("I work at Acme Corporation in Berlin now", [
			{ id: "a", text: "I work at Acme Corporation in Berlin" },
		]);
		expect(verdict).toEqual({ kind: "semantic", ofId: "a", score: 0.6 * (72 / 76) + 0.4 * 0.8 });
	});

	it("matches preference indicators as substrings", () => {
		expect(isPreferenceStatement("That is likely")).toBe(true);
		expect(isPreferenceStatement("I own a car")).toBe(false);
	});

	it("can disable either check", () => {
		const noExact = new DuplicateDetector({ exactDedup: false });
		expect(noExact.check("I like pizza", [{ id: "a", text: "i like pizza" }])).toEqual({
			kind: "semantic",
			ofId: "a",
			score: 1,
		});

		const noSemantic = new DuplicateDetector({ semanticDedup: false });
		expect(
			noSemantic.check("My favorite color is green", [{ id: "a", text: "My favorite color is blue" }]),
		).toEqual({ kind: "unique" });
	});

	it("reports the best match regardless of thresholds", () => {
		expect(detector.bestMatch("anything", [])).toBeNull();
		expect(
			detector.bestMatch("I like pizza", [
				{ id: "far", text: "My sister lives in Berlin" },
				{ id: "near", text: "I like pizza" },
			]),
		).toEqual({ id: "near", score: 1 });
	});
});
