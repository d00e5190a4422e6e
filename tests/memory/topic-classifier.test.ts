import { describe, expect, it } from "vitest";

import { cleanText, TopicClassifier } from "../../src/memory/topic-classifier.js";

describe("memory/topic-classifier", () => {
	const classifier = new TopicClassifier();

	it("cleans text for keyword matching", () => {
		expect(cleanText("I'm allergic to peanuts!")).toBe("allergic to peanuts");
		expect(cleanText("I code in C++")).toBe("code c++");
	});

	it("assigns every topic that reaches the threshold, in table order", () => {
		expect(classifier.classify("My name is Eric and I work as a software engineer.")).toEqual([
			"personal_info",
			"work",
		]);
	});

	it("reports raw scores", () => {
		expect(
			classifier.classifyWithScores("My name is Eric and I work as a software engineer."),
		).toEqual({ personal_info: 3, work: 6 });
		expect(classifier.classifyWithScores("I code in C++ on my laptop")).toEqual({ technology: 7 });
	});

	it("matches contractions through patterns and keywords", () => {
		expect(classifier.classifyWithScores("I'm allergic to peanuts")).toEqual({ health: 3 });
	});

	it("tags pets", () => {
		expect(classifier.classify("I have a dog named Rex")).toEqual(["pets"]);
	});

	it("falls back to general", () => {
		expect(classifier.classify("The weather is nice today")).toEqual(["general"]);
		expect(classifier.classify("")).toEqual(["general"]);
		expect(classifier.classifyWithScores("   ")).toEqual({});
	});

	it("accepts a custom table", () => {
		const custom = new TopicClassifier([
			{ name: "music", keywords: ["guitar", "piano"], patterns: [] },
			{ name: "general", keywords: ["guitar"], patterns: [] },
		]);
		expect(custom.classify("guitar and piano")).toEqual(["music"]);
		expect(custom.classify("guitar")).toEqual(["general"]);
	});

	it("matches multi-word keywords as phrases", () => {
		const custom = new TopicClassifier([
			{ name: "dessert", keywords: ["ice cream", "cake"], patterns: [] },
		]);
		expect(custom.classifyWithScores("Ice cream and cake")).toEqual({ dessert: 2 });
		expect(custom.classify("cream ice cake")).toEqual(["general"]);
	});
});
