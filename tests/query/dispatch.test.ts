import { describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import { InMemoryPersistence } from "../../src/memory/persistence.js";
import { MemoryStore } from "../../src/memory/store.js";
import { dispatchQuery, extractSearchTerms } from "../../src/query/dispatch.js";
import { QueryIntentClassifier } from "../../src/query/intent-classifier.js";

function setup(classifier = new QueryIntentClassifier()) {
	let next = 0;
	const store = new MemoryStore({
		persistence: new InMemoryPersistence(),
		now: () => 1_000,
		generateId: () => `mem-${++next}`,
	});
	store.add("I work at a bank", "user-1");
	store.add("I have a dog named Rex", "user-1");
	return { store, classifier };
}

describe("query/dispatch", () => {
	it("strips search lead-ins", () => {
		expect(extractSearchTerms("Do you remember where I work?")).toBe("where i work?");
		expect(extractSearchTerms("what do you know about   my sister")).toBe("my sister");
		expect(extractSearchTerms("Do you remember")).toBe("Do you remember");
	});

	it("strips every memory search phrasing the classifier accepts", () => {
		expect(extractSearchTerms("find memories about dogs")).toBe("dogs");
		expect(extractSearchTerms("Find memories for my sister")).toBe("my sister");
		expect(extractSearchTerms("search memories for the bank")).toBe("the bank");
		expect(extractSearchTerms("search memories about rex")).toBe("rex");
		expect(extractSearchTerms("search memories hiking")).toBe("hiking");
		expect(extractSearchTerms("find memories")).toBe("find memories");
	});

	it("searches with the terms after a find-memories lead-in", () => {
		const outcome = dispatchQuery("find memories about my dog?", "user-1", setup());

		expect(outcome.kind).toBe("memory_search");
		if (outcome.kind === "memory_search") {
			expect(outcome.searchTerms).toBe("my dog?");
			expect(outcome.results.map((result) => result.entry.id)).toEqual(["mem-2"]);
		}
	});

	it("answers list requests from the store", () => {
		const outcome = dispatchQuery("list all memories", "user-1", setup());

		expect(outcome.kind).toBe("memory_list");
		if (outcome.kind === "memory_list") {
			expect(outcome.entries.map((entry) => entry.id)).toEqual(["mem-2", "mem-1"]);
		}
	});

	it("answers search requests with the extracted terms", () => {
		const outcome = dispatchQuery("Do you remember my dog?", "user-1", setup());

		expect(outcome.kind).toBe("memory_search");
		if (outcome.kind === "memory_search") {
			expect(outcome.searchTerms).toBe("my dog?");
			expect(outcome.results.map((result) => result.entry.id)).toEqual(["mem-2"]);
			expect(outcome.results[0]?.score).toBeCloseTo(0.8, 10);
		}
	});

	it("delegates compound and general queries", () => {
		const deps = setup();
		expect(dispatchQuery("list memories and book a flight", "user-1", deps).kind).toBe("delegate");
		expect(dispatchQuery("tell me a joke", "user-1", deps)).toEqual({
			kind: "delegate",
			classification: {
				intent: "general",
				confidence: 0.5,
				reason: "No specific pattern matched",
			},
		});
	});

	it("delegates list requests below the fast-path threshold", () => {
		const deps = setup(new QueryIntentClassifier({ fastPathThreshold: 0.99 }));
		expect(dispatchQuery("list memories", "user-1", deps).kind).toBe("delegate");
	});
});
