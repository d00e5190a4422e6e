/**
 * SQLite storage layer for memoria.
 *
 * One database file holds every owner's memory entries. WAL mode, schema
 * versioning and forward-only migrations.
 */

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { getChildLogger } from "../logging.js";
import { getDataDir } from "../config/path.js";

const logger = getChildLogger({ module: "storage" });

export const SCHEMA_VERSION = 2;

let db: Database.Database | null = null;
let dbPath: string | null = null;

function defaultDbPath(): string {
	return path.join(getDataDir(), "memoria.db");
}

/**
 * Open a database file and bring its schema up to date.
 *
 * SECURITY: memory text is personal data; directory 0700, file 0600.
 */
export function openDatabase(filePath: string): Database.Database {
	const dbDir = path.dirname(filePath);

	fs.mkdirSync(dbDir, { recursive: true, mode: 0o700 });

	try {
		fs.chmodSync(dbDir, 0o700);
	} catch {
		logger.warn({ path: dbDir }, "could not set directory permissions to 0700");
	}

	const database = new Database(filePath);

	try {
		fs.chmodSync(filePath, 0o600);
	} catch {
		logger.warn({ path: filePath }, "could not set database file permissions to 0600");
	}

	database.pragma("journal_mode = WAL");
	migrate(database);

	logger.info({ path: filePath }, "database initialized");
	return database;
}

/**
 * Shared connection. The first call decides the path; later calls with a
 * different path reopen.
 */
export function getDb(filePath?: string): Database.Database {
	const wanted = filePath ?? dbPath ?? defaultDbPath();
	if (db && dbPath === wanted) return db;

	closeDb();
	db = openDatabase(wanted);
	dbPath = wanted;
	return db;
}

export function closeDb(): void {
	if (db) {
		db.close();
		db = null;
		logger.debug({ path: dbPath }, "database closed");
	}
}

function readSchemaVersion(database: Database.Database): number {
	const row = database
		.prepare<[], { version: number }>("SELECT version FROM schema_version LIMIT 1")
		.get();
	return row?.version ?? 0;
}

/**
 * Apply migrations up to `targetVersion` (the current schema by default).
 */
export function migrate(database: Database.Database, targetVersion = SCHEMA_VERSION): void {
	database.exec(`
		CREATE TABLE IF NOT EXISTS schema_version (
			version INTEGER PRIMARY KEY
		)
	`);

	const currentVersion = readSchemaVersion(database);
	if (currentVersion >= targetVersion) {
		return;
	}

	logger.info({ from: currentVersion, to: targetVersion }, "running migrations");

	const apply = database.transaction(() => {
		// Migration 1: memory entries
		if (currentVersion < 1 && targetVersion >= 1) {
			database.exec(`
				CREATE TABLE IF NOT EXISTS memories (
					id TEXT PRIMARY KEY,
					owner_id TEXT NOT NULL,
					text TEXT NOT NULL,
					topics TEXT NOT NULL DEFAULT '[]',
					input TEXT,
					created_at INTEGER NOT NULL,
					updated_at INTEGER NOT NULL
				);
				CREATE INDEX IF NOT EXISTS idx_memories_owner_created ON memories(owner_id, created_at);
			`);
		}

		// Migration 2: confidence and proxy provenance. Existing rows were written
		// by the user directly.
		if (currentVersion < 2 && targetVersion >= 2) {
			database.exec(`
				ALTER TABLE memories ADD COLUMN confidence REAL NOT NULL DEFAULT 1.0;
				ALTER TABLE memories ADD COLUMN is_proxy INTEGER NOT NULL DEFAULT 0;
				ALTER TABLE memories ADD COLUMN proxy_agent TEXT;
			`);
			logger.info("migration 2: added confidence and proxy columns");
		}

		database.prepare("DELETE FROM schema_version").run();
		database.prepare("INSERT INTO schema_version (version) VALUES (?)").run(targetVersion);
	});
	apply();

	logger.info({ version: targetVersion }, "migrations complete");
}

export function getDbPath(): string {
	return dbPath ?? defaultDbPath();
}

/**
 * Close the shared connection and delete the database files. Tests only.
 */
export function resetDatabase(): void {
	const target = getDbPath();
	closeDb();
	dbPath = null;
	for (const suffix of ["", "-wal", "-shm"]) {
		fs.rmSync(`${target}${suffix}`, { force: true });
	}
}
