import { createEngine, type Engine, type EngineOptions } from "../api.js";
import { loadConfig } from "../config/config.js";
import { getDb } from "../storage/db.js";
import { SqlitePersistence } from "../storage/memory-entries.js";

export const DEFAULT_OWNER = "default";

/**
 * Engine backed by the configured SQLite database, for CLI commands.
 */
export function openEngine(options: Omit<EngineOptions, "persistence"> = {}): Engine {
	const config = loadConfig();
	const db = getDb(config.storage.dbPath);
	return createEngine(config, { ...options, persistence: new SqlitePersistence(db) });
}

export function parsePositiveInt(raw: string | undefined, name: string): number | undefined {
	if (raw === undefined) return undefined;
	const value = Number.parseInt(raw, 10);
	if (!Number.isFinite(value) || value <= 0) {
		throw new Error(`${name} must be a positive integer (got "${raw}")`);
	}
	return value;
}

export function parseUnit(raw: string | undefined, name: string): number | undefined {
	if (raw === undefined) return undefined;
	const value = Number.parseFloat(raw);
	if (!Number.isFinite(value) || value < 0 || value > 1) {
		throw new Error(`${name} must be between 0 and 1 (got "${raw}")`);
	}
	return value;
}

export function splitCsv(raw: string | undefined): string[] | undefined {
	return raw
		?.split(",")
		.map((s) => s.trim())
		.filter(Boolean);
}

export function reportError(err: unknown): void {
	console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
	process.exitCode = 1;
}
