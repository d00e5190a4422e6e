import os from "node:os";
import path from "node:path";

let override: string | null = null;

/**
 * Data directory for the config file, logs and the SQLite database.
 * MEMORIA_DATA_DIR wins so tests and containers can relocate everything.
 * Read on each call; nothing consults the environment at import time.
 */
export function getDataDir(): string {
	return process.env.MEMORIA_DATA_DIR ?? path.join(os.homedir(), ".memoria");
}

/**
 * `--config`, else MEMORIA_CONFIG, else memoria.json in the data directory.
 */
export function resolveConfigPath(): string {
	return override ?? (process.env.MEMORIA_CONFIG || path.join(getDataDir(), "memoria.json"));
}

export function setConfigPath(configPath: string | null): void {
	override = configPath;
}
