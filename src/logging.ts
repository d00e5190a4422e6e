import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type LevelWithSilent, type Logger } from "pino";
import type { LoggingConfig } from "./config/config.js";
import { getDataDir } from "./config/path.js";
import { isVerbose } from "./globals.js";

// Censored at any level.
const REDACTED_PATHS = ["apiKey", "*.apiKey"];

type LogMethod = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

/**
 * Per-module logger. Each call goes to the root logger current at that
 * moment, so module-level instances follow later configureLogging() calls.
 */
export type ModuleLogger = Record<LogMethod, (objOrMsg: unknown, msg?: string) => void>;

type Sink = ReturnType<typeof pino.destination>;

type ActiveLogger = {
	level: LevelWithSilent;
	file: string;
	logger: Logger;
	sink: Sink | null;
};

let configured: LoggingConfig | null = null;
let active: ActiveLogger | null = null;

export function defaultLogFile(): string {
	return path.join(getDataDir(), "logs", "memoria.log");
}

/**
 * Turn logging on. Until this is called every logger is silent and nothing
 * touches the filesystem: importing the library has no side effects. The CLI
 * calls it with the config file's `logging` section, createEngine() with an
 * explicit one.
 */
export function configureLogging(settings: LoggingConfig | null): void {
	configured = settings;
}

function wanted(): { level: LevelWithSilent; file: string } {
	if (!configured) return { level: "silent", file: "" };
	return {
		level: isVerbose() ? "debug" : (configured.level ?? "info"),
		file: configured.file ?? defaultLogFile(),
	};
}

/**
 * The log file is created 0600 before pino opens it: queries and memory
 * text end up in log messages.
 */
function ensureLogFile(file: string): void {
	fs.mkdirSync(path.dirname(file), { recursive: true, mode: 0o700 });
	try {
		fs.closeSync(fs.openSync(file, "wx", 0o600));
	} catch (err) {
		if (!(err instanceof Error && "code" in err && err.code === "EEXIST")) {
			throw err;
		}
	}
}

function open(level: LevelWithSilent, file: string): ActiveLogger {
	if (level === "silent") {
		return { level, file, logger: pino({ level }), sink: null };
	}
	ensureLogFile(file);
	const sink = pino.destination({ dest: file, sync: true });
	const logger = pino(
		{
			level,
			base: undefined,
			timestamp: pino.stdTimeFunctions.isoTime,
			redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
		},
		sink,
	);
	return { level, file, logger, sink };
}

function release(sink: Sink): void {
	try {
		sink.flushSync();
	} catch (err) {
		process.stderr.write(`memoria: log flush failed: ${String(err)}\n`);
	}
	sink.end();
}

/**
 * Root logger for the current settings, rebuilt when the level or file
 * changes.
 */
function getLogger(): Logger {
	const next = wanted();
	if (!active || active.level !== next.level || active.file !== next.file) {
		if (active?.sink) release(active.sink);
		active = open(next.level, next.file);
	}
	return active.logger;
}

export function getChildLogger(bindings: Bindings): ModuleLogger {
	let bound: { root: Logger; child: Logger } | null = null;
	const current = (): Logger => {
		const root = getLogger();
		if (!bound || bound.root !== root) {
			bound = { root, child: root.child(bindings) };
		}
		return bound.child;
	};
	const emit =
		(method: LogMethod) =>
		(objOrMsg: unknown, msg?: string): void => {
			const target = current();
			if (msg === undefined) {
				target[method](objOrMsg);
			} else {
				target[method](objOrMsg, msg);
			}
		};
	return {
		fatal: emit("fatal"),
		error: emit("error"),
		warn: emit("warn"),
		info: emit("info"),
		debug: emit("debug"),
		trace: emit("trace"),
	};
}

export function closeLogger(): void {
	if (active?.sink) release(active.sink);
	active = null;
}
