/**
 * Memory entry construction, topic normalization and the persisted record format.
 *
 * Every write path goes through normalizeTopics() so topics are always a list
 * of strings, whatever shape the caller (or an old record) handed us.
 */

import { z } from "zod";

import { MemoryValidationError } from "./errors.js";
import type { MemoryEntry } from "./types.js";

export const DEFAULT_TOPIC = "general";

function cleanTopic(topic: string): string {
	return topic.replace(/\s+/g, " ").trim().toLowerCase();
}

function parseJsonArray(raw: string): unknown[] | null {
	try {
		const parsed: unknown = JSON.parse(raw);
		return Array.isArray(parsed) ? parsed : null;
	} catch {
		// Single-quoted "['a', 'b']" reprs are not JSON; the caller splits them.
		return null;
	}
}

function splitTopicString(raw: string): unknown[] {
	const trimmed = raw.trim();
	const asJson = trimmed.startsWith("[") ? parseJsonArray(trimmed) : null;
	if (asJson) return asJson;
	return trimmed
		.replace(/^\[|\]$/g, "")
		.split(",")
		.map((part) => part.trim().replace(/^["']|["']$/g, ""));
}

/**
 * Coerce any topics value into a clean list, which may be empty.
 * Accepts arrays, JSON-array strings and comma-separated strings.
 * Non-string items are dropped.
 */
export function coerceTopicList(input: unknown): string[] {
	let items: unknown[];
	if (input == null) {
		items = [];
	} else if (Array.isArray(input)) {
		items = input;
	} else if (typeof input === "string") {
		items = splitTopicString(input);
	} else {
		items = [];
	}

	const seen = new Set<string>();
	const topics: string[] = [];
	for (const item of items) {
		if (typeof item !== "string") continue;
		const topic = cleanTopic(item);
		if (!topic || seen.has(topic)) continue;
		seen.add(topic);
		topics.push(topic);
	}
	return topics;
}

/**
 * The single topics normalizer. Never returns an empty list.
 */
export function normalizeTopics(input: unknown): string[] {
	const topics = coerceTopicList(input);
	return topics.length > 0 ? topics : [DEFAULT_TOPIC];
}

/**
 * Caller topics first, then classified ones. The classifier's catch-all is
 * dropped once anything more specific is present.
 */
export function mergeTopics(callerTopics: unknown, classified: readonly string[]): string[] {
	const caller = coerceTopicList(callerTopics);
	const merged = coerceTopicList([...caller, ...classified]);
	const specific = merged.filter(
		(topic) => topic !== DEFAULT_TOPIC || caller.includes(DEFAULT_TOPIC),
	);
	return specific.length > 0 ? specific : [DEFAULT_TOPIC];
}

export type MemoryEntryFields = {
	id: string;
	ownerId: string;
	text: string;
	topics?: unknown;
	confidence?: number;
	isProxy?: boolean;
	proxyAgent?: string | null;
	input?: string | null;
	createdAt: number;
	updatedAt?: number;
};

export function assertConfidence(confidence: number): void {
	if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
		throw new MemoryValidationError(
			`confidence must be between 0.0 and 1.0 (got ${confidence})`,
			"confidence",
		);
	}
}

/**
 * Build a validated entry. Throws MemoryValidationError on broken invariants.
 */
export function createMemoryEntry(fields: MemoryEntryFields): MemoryEntry {
	if (!fields.id) {
		throw new MemoryValidationError("id is required", "id");
	}
	if (!fields.ownerId) {
		throw new MemoryValidationError("ownerId is required", "ownerId");
	}
	if (!fields.text.trim()) {
		throw new MemoryValidationError("text cannot be empty", "text");
	}

	const confidence = fields.confidence ?? 1;
	assertConfidence(confidence);

	const isProxy = fields.isProxy ?? false;
	const entry: MemoryEntry = {
		id: fields.id,
		ownerId: fields.ownerId,
		text: fields.text,
		topics: normalizeTopics(fields.topics),
		confidence,
		isProxy,
		createdAt: fields.createdAt,
		updatedAt: fields.updatedAt ?? fields.createdAt,
	};
	if (isProxy && fields.proxyAgent) {
		entry.proxyAgent = fields.proxyAgent;
	}
	if (fields.input) {
		entry.input = fields.input;
	}
	return entry;
}

// ============================================================================
// Persisted record format
// ============================================================================

export type SerializedMemoryEntry = {
	id: string;
	owner_id: string;
	text: string;
	topics: string[];
	confidence: number;
	is_proxy: boolean;
	proxy_agent?: string;
	input?: string;
	created_at: number;
	updated_at: number;
};

const TimestampSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
	if (typeof value === "number") return value;
	const parsed = Date.parse(value);
	if (Number.isNaN(parsed)) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp: ${value}` });
		return z.NEVER;
	}
	return parsed;
});

// Older records used memory_id / user_id / memory / last_updated and had no
// confidence or proxy fields.
const SerializedEntrySchema = z.object({
	id: z.string().min(1).optional(),
	memory_id: z.string().min(1).optional(),
	owner_id: z.string().min(1).optional(),
	user_id: z.string().min(1).optional(),
	text: z.string().optional(),
	memory: z.string().optional(),
	topics: z.unknown().optional(),
	confidence: z.number().default(1),
	is_proxy: z.boolean().default(false),
	proxy_agent: z.string().nullish(),
	input: z.string().nullish(),
	created_at: TimestampSchema.optional(),
	updated_at: TimestampSchema.optional(),
	last_updated: TimestampSchema.optional(),
});

export function serializeEntry(entry: MemoryEntry): SerializedMemoryEntry {
	return {
		id: entry.id,
		owner_id: entry.ownerId,
		text: entry.text,
		topics: [...entry.topics],
		confidence: entry.confidence,
		is_proxy: entry.isProxy,
		...(entry.proxyAgent ? { proxy_agent: entry.proxyAgent } : {}),
		...(entry.input ? { input: entry.input } : {}),
		created_at: entry.createdAt,
		updated_at: entry.updatedAt,
	};
}

/**
 * Parse a persisted record back into an entry, filling defaults for fields an
 * older schema did not have. `ownerId` is used when the record carries none.
 */
export function deserializeEntry(record: unknown, ownerId?: string): MemoryEntry {
	const parsed = SerializedEntrySchema.safeParse(record);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		throw new MemoryValidationError(
			`invalid memory record: ${issue?.message ?? "unknown issue"}`,
			issue?.path.join(".") ?? "record",
		);
	}

	const r = parsed.data;
	const id = r.id ?? r.memory_id;
	if (!id) {
		throw new MemoryValidationError("invalid memory record: missing id", "id");
	}
	const createdAt = r.created_at ?? r.last_updated ?? r.updated_at ?? 0;

	return createMemoryEntry({
		id,
		ownerId: r.owner_id ?? r.user_id ?? ownerId ?? "",
		text: r.text ?? r.memory ?? "",
		topics: r.topics,
		confidence: r.confidence,
		isProxy: r.is_proxy,
		proxyAgent: r.proxy_agent,
		input: r.input,
		createdAt,
		updatedAt: r.updated_at ?? r.last_updated ?? createdAt,
	});
}
