import { describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import { DocumentIndex, MemoryKnowledgeIndex } from "../../src/knowledge/local-index.js";
import { InMemoryPersistence } from "../../src/memory/persistence.js";
import { MemoryStore } from "../../src/memory/store.js";

describe("knowledge/local-index", () => {
	describe("DocumentIndex", () => {
		it("skips blank documents", () => {
			const index = new DocumentIndex([{ content: "  " }, { content: "Rust has no garbage collector" }]);
			expect(index.size).toBe(1);
		});

		it("ranks documents by similarity and applies the limit", () => {
			const index = new DocumentIndex([
				{ content: "Cats sleep most of the day", source: "cats" },
				{ content: "Rust has no garbage collector", source: "rust" },
				{ content: "Rust programs compile to native code", source: "rust-2" },
			]);

			const hits = index.search("rust", 5);
			expect(hits.map((hit) => hit.source)).toEqual(["rust", "rust-2"]);
			expect(hits[0]?.score).toBe(1);

			expect(index.search("rust", 1)).toHaveLength(1);
		});

		it("returns nothing for a blank query or zero limit", () => {
			const index = new DocumentIndex([{ content: "Rust has no garbage collector" }]);
			expect(index.search(" ", 5)).toEqual([]);
			expect(index.search("rust", 0)).toEqual([]);
		});

		it("honours a custom minimum score", () => {
			const strict = new DocumentIndex([{ content: "Rust has no garbage collector" }], 1.1);
			expect(strict.search("rust", 5)).toEqual([]);
		});
	});

	describe("MemoryKnowledgeIndex", () => {
		it("exposes one owner's memories as hits", () => {
			const store = new MemoryStore({
				persistence: new InMemoryPersistence(),
				generateId: () => "mem-1",
			});
			store.add("I have a dog named Rex", "user-1");

			expect(new MemoryKnowledgeIndex(store, "user-1").search("dog", 5)).toEqual([
				{ content: "I have a dog named Rex", source: "memory:mem-1", score: 1 },
			]);
			expect(new MemoryKnowledgeIndex(store, "user-2").search("dog", 5)).toEqual([]);
		});
	});
});
