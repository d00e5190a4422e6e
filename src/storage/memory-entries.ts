import type Database from "better-sqlite3";

import { getChildLogger } from "../logging.js";
import { deserializeEntry, serializeEntry } from "../memory/entry.js";
import { PersistenceError } from "../memory/errors.js";
import type { MemoryPersistence } from "../memory/persistence.js";
import type { MemoryEntry } from "../memory/types.js";

const logger = getChildLogger({ module: "memory-entries" });

type MemoryRow = {
	id: string;
	owner_id: string;
	text: string;
	topics: string;
	input: string | null;
	confidence: number;
	is_proxy: number;
	proxy_agent: string | null;
	created_at: number;
	updated_at: number;
};

const COLUMNS =
	"id, owner_id, text, topics, input, confidence, is_proxy, proxy_agent, created_at, updated_at";

function rowToEntry(row: MemoryRow): MemoryEntry {
	return deserializeEntry({
		id: row.id,
		owner_id: row.owner_id,
		text: row.text,
		topics: row.topics,
		input: row.input,
		confidence: row.confidence,
		is_proxy: row.is_proxy === 1,
		proxy_agent: row.proxy_agent,
		created_at: row.created_at,
		updated_at: row.updated_at,
	});
}

/**
 * MemoryPersistence over the `memories` table. Every failure, including a
 * row that no longer parses, surfaces as PersistenceError.
 */
export class SqlitePersistence implements MemoryPersistence {
	constructor(private readonly db: Database.Database) {}

	readAll(ownerId: string, limit?: number): MemoryEntry[] {
		return this.run("read", () => {
			const rows =
				limit === undefined
					? this.db
							.prepare<[string], MemoryRow>(
								`SELECT ${COLUMNS} FROM memories WHERE owner_id = ?
								ORDER BY created_at DESC, rowid DESC`,
							)
							.all(ownerId)
					: this.db
							.prepare<[string, number], MemoryRow>(
								`SELECT ${COLUMNS} FROM memories WHERE owner_id = ?
								ORDER BY created_at DESC, rowid DESC LIMIT ?`,
							)
							.all(ownerId, limit);
			return rows.map(rowToEntry);
		});
	}

	read(id: string): MemoryEntry | null {
		return this.run("read", () => {
			const row = this.db
				.prepare<[string], MemoryRow>(`SELECT ${COLUMNS} FROM memories WHERE id = ?`)
				.get(id);
			return row ? rowToEntry(row) : null;
		});
	}

	write(entry: MemoryEntry): string {
		const record = serializeEntry(entry);
		return this.run("write", () => {
			this.db
				.prepare(
					`INSERT INTO memories
						(id, owner_id, text, topics, input, confidence, is_proxy, proxy_agent, created_at, updated_at)
						VALUES (@id, @owner_id, @text, @topics, @input, @confidence, @is_proxy, @proxy_agent, @created_at, @updated_at)
					ON CONFLICT(id) DO UPDATE SET
						owner_id = excluded.owner_id,
						text = excluded.text,
						topics = excluded.topics,
						input = excluded.input,
						confidence = excluded.confidence,
						is_proxy = excluded.is_proxy,
						proxy_agent = excluded.proxy_agent,
						updated_at = excluded.updated_at`,
				)
				.run({
					id: record.id,
					owner_id: record.owner_id,
					text: record.text,
					topics: JSON.stringify(record.topics),
					input: record.input ?? null,
					confidence: record.confidence,
					is_proxy: record.is_proxy ? 1 : 0,
					proxy_agent: record.proxy_agent ?? null,
					created_at: record.created_at,
					updated_at: record.updated_at,
				});
			return entry.id;
		});
	}

	delete(id: string): boolean {
		return this.run("delete", () => {
			const result = this.db.prepare("DELETE FROM memories WHERE id = ?").run(id);
			return result.changes > 0;
		});
	}

	private run<T>(operation: "read" | "write" | "delete", fn: () => T): T {
		try {
			return fn();
		} catch (err) {
			logger.error({ operation, error: String(err) }, "memory persistence failed");
			throw new PersistenceError(`sqlite ${operation} failed`, operation, { cause: err });
		}
	}
}
