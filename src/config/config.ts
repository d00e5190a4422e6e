import fs from "node:fs";
import path from "node:path";

import JSON5 from "json5";
import { z } from "zod";

import { resolveConfigPath } from "./path.js";

const unit = z.number().min(0).max(1);

// Free-text search over stored memories
const SearchConfigSchema = z.object({
	limit: z.number().int().positive().default(10),
	similarityThreshold: unit.default(0.3),
	topicBoost: z.number().min(0).default(0),
});

// Admission control and storage limits
const MemoryConfigSchema = z.object({
	similarityThreshold: unit.default(0.8),
	// Lowered threshold for preference statements. Known source of false positives
	// ("My favorite color is blue" vs "... green"); kept for compatibility.
	preferenceThreshold: unit.default(0.65),
	maxContentLength: z.number().int().positive().default(500),
	recentMemoryLimit: z.number().int().positive().default(100),
	exactDedup: z.boolean().default(true),
	semanticDedup: z.boolean().default(true),
	topicClassification: z.boolean().default(true),
	search: SearchConfigSchema.default({}),
});

// Fast-path eligibility
const QueryConfigSchema = z.object({
	// strict: fast path needs >= 0.9 confidence, otherwise >= 0.85
	strictMode: z.boolean().default(true),
	fastPathThreshold: unit.optional(),
	patterns: z
		.object({
			memoryList: z.array(z.string()).optional(),
			memorySearch: z.array(z.string()).optional(),
		})
		.optional(),
});

export const KnowledgeModeSchema = z.enum([
	"auto",
	"local",
	"global",
	"hybrid",
	"mix",
	"naive",
	"bypass",
]);

// External LightRAG retrieval service
const KnowledgeConfigSchema = z.object({
	enabled: z.boolean().default(true),
	lightragUrl: z.string().url().default("http://localhost:9621"),
	apiKey: z.string().optional(),
	timeoutMs: z.number().int().positive().default(120_000),
	defaultMode: KnowledgeModeSchema.default("auto"),
	defaultLimit: z.number().int().positive().default(5),
	responseType: z.string().default("Multiple Paragraphs"),
	retry: z
		.object({
			maxAttempts: z.number().int().positive().default(1),
			baseDelayMs: z.number().int().min(0).default(500),
			maxDelayMs: z.number().int().min(0).default(5_000),
		})
		.default({}),
});

const StorageConfigSchema = z.object({
	// SQLite file; defaults to ~/.memoria/memoria.db
	dbPath: z.string().optional(),
});

const LoggingConfigSchema = z.object({
	level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),
	file: z.string().optional(),
});

export const MemoriaConfigSchema = z.object({
	memory: MemoryConfigSchema.default({}),
	query: QueryConfigSchema.default({}),
	knowledge: KnowledgeConfigSchema.default({}),
	storage: StorageConfigSchema.default({}),
	logging: LoggingConfigSchema.optional(),
});

export type MemoriaConfig = z.infer<typeof MemoriaConfigSchema>;
export type MemoriaConfigInput = z.input<typeof MemoriaConfigSchema>;
export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;
export type QueryConfig = z.infer<typeof QueryConfigSchema>;
export type KnowledgeConfig = z.infer<typeof KnowledgeConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

let cachedConfig: MemoriaConfig | null = null;
let configMtime: number | null = null;
let cachedConfigPath: string | null = null;

/**
 * Parse a config object (already read from disk or built in code) and fill defaults.
 */
export function parseConfig(raw: unknown): MemoriaConfig {
	return MemoriaConfigSchema.parse(raw ?? {});
}

/**
 * Load and parse the configuration file.
 * Uses resolveConfigPath() to determine the config file location.
 */
export function loadConfig(): MemoriaConfig {
	const configPath = resolveConfigPath();

	try {
		const stat = fs.statSync(configPath);
		// Invalidate cache if path changed or mtime changed
		if (cachedConfig && cachedConfigPath === configPath && configMtime === stat.mtimeMs) {
			return cachedConfig;
		}

		const raw = fs.readFileSync(configPath, "utf-8");
		const validated = parseConfig(JSON5.parse(raw));

		cachedConfig = validated;
		configMtime = stat.mtimeMs;
		cachedConfigPath = configPath;

		return validated;
	} catch (err) {
		if (err instanceof Error && "code" in err && err.code === "ENOENT") {
			// No config file - use defaults
			return parseConfig({});
		}
		throw err;
	}
}

export function getConfigPath(): string {
	return resolveConfigPath();
}

/**
 * Reset the config cache (useful for testing).
 */
export function resetConfigCache() {
	cachedConfig = null;
	configMtime = null;
	cachedConfigPath = null;
}

/**
 * Create a default config file if it doesn't exist.
 *
 * SECURITY: Directory 0700, file 0600 (the file may hold a LightRAG API key).
 */
export async function createDefaultConfigIfMissing(): Promise<boolean> {
	const configPath = resolveConfigPath();

	try {
		await fs.promises.access(configPath);
		return false;
	} catch {
		await fs.promises.mkdir(path.dirname(configPath), { recursive: true, mode: 0o700 });
		const defaultConfig = {
			memory: {
				similarityThreshold: 0.8,
				preferenceThreshold: 0.65,
				maxContentLength: 500,
			},
			query: {
				strictMode: true,
			},
			knowledge: {
				lightragUrl: "http://localhost:9621",
				timeoutMs: 120_000,
				defaultMode: "auto",
			},
			logging: {
				level: "info",
			},
		};

		await fs.promises.writeFile(configPath, JSON.stringify(defaultConfig, null, 2), {
			encoding: "utf-8",
			mode: 0o600,
		});
		return true;
	}
}
