import type { MemoryEntry } from "./types.js";

/**
 * Storage behind MemoryStore. Implementations are synchronous and throw
 * PersistenceError on failure; the store turns that into a storage_error.
 */
export interface MemoryPersistence {
	/** Owner's entries, newest first. */
	readAll(ownerId: string, limit?: number): MemoryEntry[];
	read(id: string): MemoryEntry | null;
	/** Insert or replace by id. */
	write(entry: MemoryEntry): string;
	delete(id: string): boolean;
}

function copyEntry(entry: MemoryEntry): MemoryEntry {
	return { ...entry, topics: [...entry.topics] };
}

/**
 * Process-local persistence for tests and one-shot runs.
 */
export class InMemoryPersistence implements MemoryPersistence {
	private readonly entries = new Map<string, { entry: MemoryEntry; seq: number }>();
	private seq = 0;

	readAll(ownerId: string, limit?: number): MemoryEntry[] {
		const owned = [...this.entries.values()]
			.filter(({ entry }) => entry.ownerId === ownerId)
			.sort((a, b) => b.entry.createdAt - a.entry.createdAt || b.seq - a.seq)
			.map(({ entry }) => copyEntry(entry));
		return limit === undefined ? owned : owned.slice(0, limit);
	}

	read(id: string): MemoryEntry | null {
		const stored = this.entries.get(id);
		return stored ? copyEntry(stored.entry) : null;
	}

	write(entry: MemoryEntry): string {
		const existing = this.entries.get(entry.id);
		this.entries.set(entry.id, {
			entry: copyEntry(entry),
			seq: existing?.seq ?? ++this.seq,
		});
		return entry.id;
	}

	delete(id: string): boolean {
		return this.entries.delete(id);
	}

	get size(): number {
		return this.entries.size;
	}
}
