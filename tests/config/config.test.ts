import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
	createDefaultConfigIfMissing,
	loadConfig,
	parseConfig,
	resetConfigCache,
} from "../../src/config/config.js";
import { resolveConfigPath, setConfigPath } from "../../src/config/path.js";
import { resolveEngineSettings } from "../../src/config/settings.js";

let tempDir: string;
let configPath: string;

beforeEach(() => {
	tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "memoria-config-"));
	configPath = path.join(tempDir, "nested", "memoria.json");
	setConfigPath(configPath);
});

afterEach(() => {
	resetConfigCache();
	setConfigPath(null);
	fs.rmSync(tempDir, { recursive: true, force: true });
});

describe("config", () => {
	it("fills defaults for an empty config", () => {
		const config = parseConfig({});

		expect(config.memory).toEqual({
			similarityThreshold: 0.8,
			preferenceThreshold: 0.65,
			maxContentLength: 500,
			recentMemoryLimit: 100,
			exactDedup: true,
			semanticDedup: true,
			topicClassification: true,
			search: { limit: 10, similarityThreshold: 0.3, topicBoost: 0 },
		});
		expect(config.query).toEqual({ strictMode: true });
		expect(config.knowledge).toMatchObject({
			enabled: true,
			lightragUrl: "http://localhost:9621",
			timeoutMs: 120_000,
			defaultMode: "auto",
			defaultLimit: 5,
			retry: { maxAttempts: 1, baseDelayMs: 500, maxDelayMs: 5000 },
		});
		expect(parseConfig(undefined)).toEqual(config);
	});

	it("rejects out-of-range values", () => {
		expect(() => parseConfig({ memory: { similarityThreshold: 2 } })).toThrow();
		expect(() => parseConfig({ knowledge: { defaultMode: "turbo" } })).toThrow();
		expect(() => parseConfig({ knowledge: { lightragUrl: "not a url" } })).toThrow();
	});

	it("uses defaults when the file is missing", () => {
		expect(loadConfig().memory.maxContentLength).toBe(500);
	});

	it("reads JSON5 and reloads after the file changes", () => {
		fs.mkdirSync(path.dirname(configPath), { recursive: true });
		fs.writeFileSync(
			configPath,
			`{
				// tighter limits for the test
				memory: { maxContentLength: 200, },
				knowledge: { apiKey: "test-secret" },
			}`,
		);

		const first = loadConfig();
		expect(first.memory.maxContentLength).toBe(200);
		expect(first.knowledge.apiKey).toBe("test-secret");
		expect(loadConfig()).toBe(first);

		fs.writeFileSync(configPath, "{ memory: { maxContentLength: 300 } }");
		const later = new Date(Date.now() + 5_000);
		fs.utimesSync(configPath, later, later);
		expect(loadConfig().memory.maxContentLength).toBe(300);
	});

	it("surfaces parse errors", () => {
		fs.mkdirSync(path.dirname(configPath), { recursive: true });
		fs.writeFileSync(configPath, "{ memory: ");
		expect(() => loadConfig()).toThrow();
	});

	it("writes a default config once, owner-readable only", async () => {
		expect(await createDefaultConfigIfMissing()).toBe(true);
		expect(await createDefaultConfigIfMissing()).toBe(false);

		expect(fs.statSync(configPath).mode & 0o777).toBe(0o600);
		expect(loadConfig().knowledge.lightragUrl).toBe("http://localhost:9621");
	});

	it("prefers the override, then MEMORIA_CONFIG", () => {
		expect(resolveConfigPath()).toBe(configPath);

		setConfigPath(null);
		const previous = process.env.MEMORIA_CONFIG;
		process.env.MEMORIA_CONFIG = path.join(tempDir, "env.json");
		try {
			expect(resolveConfigPath()).toBe(path.join(tempDir, "env.json"));
		} finally {
			if (previous === undefined) {
				delete process.env.MEMORIA_CONFIG;
			} else {
				process.env.MEMORIA_CONFIG = previous;
			}
		}
	});
});

describe("config/settings", () => {
	it("maps config sections onto component settings", () => {
		const settings = resolveEngineSettings(
			parseConfig({
				memory: { similarityThreshold: 0.9, exactDedup: false, search: { topicBoost: 0.2 } },
				query: { strictMode: false, patterns: { memoryList: ["^recall"] } },
				knowledge: { apiKey: "test-secret", retry: { maxAttempts: 3 } },
			}),
		);

		expect(settings.memory.duplicates).toEqual({
			similarityThreshold: 0.9,
			preferenceThreshold: 0.65,
			exactDedup: false,
			semanticDedup: true,
		});
		expect(settings.memory.search).toEqual({ limit: 10, similarityThreshold: 0.3, topicBoost: 0.2 });
		expect(settings.query).toEqual({ strictMode: false, patterns: { memoryList: ["^recall"] } });
		expect(settings.knowledge.apiKey).toBe("test-secret");
		expect(settings.knowledge.retry).toEqual({ maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 5000 });
	});

	it("freezes the result all the way down", () => {
		const settings = resolveEngineSettings(parseConfig({}));
		expect(Object.isFrozen(settings)).toBe(true);
		expect(Object.isFrozen(settings.memory.duplicates)).toBe(true);
		expect(Object.isFrozen(settings.knowledge.retry)).toBe(true);
	});
});
