import type { MemoryStore } from "./store.js";
import type {
	AddMemoryOptions,
	IngestResult,
	MemoryEntry,
	MemoryStats,
	ScoredEntry,
	SearchOptions,
	StorageResult,
	UpdateMemoryPatch,
} from "./types.js";

// ═══════════════════════════════════════════════════════════════════════════════
// Per-owner Mutex
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Promise-based mutex. Waiters run in arrival order.
 */
export class Mutex {
	private locked = false;
	private queue: Array<() => void> = [];

	get idle(): boolean {
		return !this.locked && this.queue.length === 0;
	}

	async acquire(): Promise<void> {
		if (!this.locked) {
			this.locked = true;
			return;
		}

		return new Promise((resolve) => {
			this.queue.push(resolve);
		});
	}

	release(): void {
		const next = this.queue.shift();
		if (next) {
			next();
		} else {
			this.locked = false;
		}
	}

	async withLock<T>(fn: () => Promise<T> | T): Promise<T> {
		await this.acquire();
		try {
			return await fn();
		} finally {
			this.release();
		}
	}
}

// ═══════════════════════════════════════════════════════════════════════════════
// Adapter
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Promise-returning view of a MemoryStore for event-loop callers.
 *
 * Mutations for one owner run one at a time, so the read-then-write duplicate
 * check cannot interleave with another add for the same owner. Reads are not
 * queued. Different owners never wait on each other.
 */
export class AsyncMemoryStore {
	private readonly locks = new Map<string, Mutex>();

	constructor(private readonly store: MemoryStore) {}

	add(text: string, ownerId: string, options?: AddMemoryOptions): Promise<StorageResult> {
		return this.withOwnerLock(ownerId, () => this.store.add(text, ownerId, options));
	}

	update(memoryId: string, ownerId: string, patch: UpdateMemoryPatch): Promise<StorageResult> {
		return this.withOwnerLock(ownerId, () => this.store.update(memoryId, ownerId, patch));
	}

	delete(memoryId: string, ownerId: string): Promise<boolean> {
		return this.withOwnerLock(ownerId, () => this.store.delete(memoryId, ownerId));
	}

	deleteByTopic(ownerId: string, topics: string[] | string): Promise<number> {
		return this.withOwnerLock(ownerId, () => this.store.deleteByTopic(ownerId, topics));
	}

	clear(ownerId: string): Promise<number> {
		return this.withOwnerLock(ownerId, () => this.store.clear(ownerId));
	}

	ingest(input: string, ownerId: string): Promise<IngestResult> {
		return this.withOwnerLock(ownerId, () => this.store.ingest(input, ownerId));
	}

	async search(query: string, ownerId: string, options?: SearchOptions): Promise<ScoredEntry[]> {
		return this.store.search(query, ownerId, options);
	}

	async listAll(ownerId: string): Promise<MemoryEntry[]> {
		return this.store.listAll(ownerId);
	}

	async listByTopic(ownerId: string, topics: string[] | string): Promise<MemoryEntry[]> {
		return this.store.listByTopic(ownerId, topics);
	}

	async stats(ownerId: string): Promise<MemoryStats> {
		return this.store.stats(ownerId);
	}

	/** Owners with a lock currently held or awaited. */
	get pendingOwners(): number {
		return this.locks.size;
	}

	private async withOwnerLock<T>(ownerId: string, fn: () => T): Promise<T> {
		let mutex = this.locks.get(ownerId);
		if (!mutex) {
			mutex = new Mutex();
			this.locks.set(ownerId, mutex);
		}
		const held = mutex;
		try {
			return await held.withLock(fn);
		} finally {
			if (held.idle && this.locks.get(ownerId) === held) {
				this.locks.delete(ownerId);
			}
		}
	}
}
