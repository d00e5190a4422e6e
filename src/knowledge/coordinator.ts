/**
 * Routes knowledge questions between the local index and the LightRAG graph
 * service, with one fallback to the other backend.
 *
 * Auto routing is a keyword heuristic: short or definitional questions stay
 * local, relationship/comparison cues go to the graph, everything else stays
 * local for speed.
 */

import { getChildLogger } from "../logging.js";
import { classifyFailure, formatErrorSafe } from "../infra/network-errors.js";
import { isValidTimeout } from "../infra/timeout.js";
import type {
	BackendFailure,
	BackendName,
	GraphMode,
	KnowledgeBackend,
	KnowledgeHit,
	KnowledgeIndex,
	KnowledgeQueryOptions,
	KnowledgeResult,
	RoutingCounts,
	RoutingDecision,
	RoutingStats,
} from "./types.js";
import { isGraphMode } from "./types.js";

const logger = getChildLogger({ module: "knowledge-coordinator" });

export const DEFAULT_GRAPH_TIMEOUT_MS = 120_000;

export const LOCAL_HEADER = "Local Knowledge Search Results";
export const LIGHTRAG_HEADER = "LightRAG Knowledge Graph Results";
export const FALLBACK_HEADER = "Fallback";
export const ERROR_HEADER = "Knowledge Query Failed";

const FALLBACK_GRAPH_MODE: GraphMode = "hybrid";

const SIMPLE_FACT_PATTERNS: readonly RegExp[] = [
	/^what is\s+\w+/,
	/^who is\s+\w+/,
	/^when did\s+\w+/,
	/^where is\s+\w+/,
	/^how much\s+\w+/,
	/^define\s+\w+/,
	/^\w+\s+definition/,
];

const SHORT_QUERY_WORDS = 3;

// Substring matches against the lower-cased query.
const RELATIONSHIP_KEYWORDS = [
	"relate",
	"relationship",
	"connection",
	"related",
	"linked",
	"associated",
	"compare",
	"contrast",
	"difference",
	"similarity",
	"versus",
	"how does",
	"why does",
	"what causes",
	"impact of",
	"effect of",
	"analyze",
	"analysis",
	"explain",
	"reasoning",
	"because",
	"correlation",
	"influence",
	"affect",
	"consequence",
	"result",
	"pattern",
	"trend",
	"network",
	"graph",
	"hierarchy",
];

const COMPLEX_QUESTION_PATTERNS: readonly RegExp[] = [
	/how\s+\w+\s+\w+\s+\w+/,
	/why\s+\w+\s+\w+/,
	/what\s+causes?\s+\w+/,
	/explain\s+\w+/,
];

export function isSimpleFactQuery(query: string): boolean {
	const lowered = query.toLowerCase().trim();
	if (SIMPLE_FACT_PATTERNS.some((pattern) => pattern.test(lowered))) return true;
	return lowered.split(/\s+/).filter(Boolean).length <= SHORT_QUERY_WORDS;
}

export function hasRelationshipCues(query: string): boolean {
	const lowered = query.toLowerCase();
	if (RELATIONSHIP_KEYWORDS.some((keyword) => lowered.includes(keyword))) return true;
	return COMPLEX_QUESTION_PATTERNS.some((pattern) => pattern.test(lowered));
}

type Attempt = { ok: true; body: string } | { ok: false; failure: BackendFailure };

function emptyCounts(): RoutingCounts {
	return { local: 0, lightrag: 0, autoLocal: 0, autoLightrag: 0, fallbackUsed: 0 };
}

/**
 * "Result 1 (Source: notes.md)" blocks separated by blank lines.
 */
export function formatLocalHits(hits: readonly KnowledgeHit[]): string {
	return hits
		.map((hit, index) => {
			const source = hit.source ? ` (Source: ${hit.source})` : "";
			return `Result ${index + 1}${source}\n${hit.content}`;
		})
		.join("\n\n");
}

/**
 * Plain-text rendering of a result for terminals and chat replies.
 */
export function renderKnowledgeResult(query: string, result: KnowledgeResult): string {
	const lines = [`${result.header} for '${query}':`, "", result.body];
	for (const failure of result.failures) {
		lines.push("", `[${failure.backend} ${failure.kind}] ${failure.message}`);
	}
	return lines.join("\n");
}

export type KnowledgeCoordinatorOptions = {
	local?: KnowledgeIndex;
	lightrag?: KnowledgeBackend;
	defaultMode?: string;
	defaultLimit?: number;
	/** Per-call LightRAG timeout when the caller passes none; 120 s by default */
	timeoutMs?: number;
};

export class KnowledgeCoordinator {
	private readonly local: KnowledgeIndex | undefined;
	private readonly lightrag: KnowledgeBackend | undefined;
	private readonly defaultMode: string;
	private readonly defaultLimit: number;
	private readonly timeoutMs: number;
	private counts: RoutingCounts = emptyCounts();

	constructor(options: KnowledgeCoordinatorOptions) {
		this.local = options.local;
		this.lightrag = options.lightrag;
		this.defaultMode = options.defaultMode ?? "auto";
		this.defaultLimit = options.defaultLimit ?? 5;
		if (options.timeoutMs !== undefined && !isValidTimeout(options.timeoutMs)) {
			throw new RangeError(`timeoutMs must be a positive number (got ${options.timeoutMs})`);
		}
		this.timeoutMs = options.timeoutMs ?? DEFAULT_GRAPH_TIMEOUT_MS;
	}

	determineRouting(query: string, mode: string): RoutingDecision {
		const normalized = mode.toLowerCase().trim();

		if (normalized === "local") {
			return { backend: "local", reason: "Explicit mode=local routing", auto: false };
		}
		if (isGraphMode(normalized)) {
			return {
				backend: "lightrag",
				mode: normalized,
				reason: `Explicit mode=${normalized} routing to LightRAG`,
				auto: false,
			};
		}
		if (normalized === "auto" || normalized === "" || normalized === "none") {
			// Fact lookups win over relationship words ("What is a graph database?").
			if (isSimpleFactQuery(query)) {
				return {
					backend: "local",
					reason: "Auto-detected: simple fact query → local",
					auto: true,
				};
			}
			if (hasRelationshipCues(query)) {
				return {
					backend: "lightrag",
					mode: FALLBACK_GRAPH_MODE,
					reason: "Auto-detected: relationship query → LightRAG",
					auto: true,
				};
			}
			return { backend: "local", reason: "Auto-detected: default to local for speed", auto: true };
		}

		logger.warn({ mode }, "unknown knowledge mode; routing locally");
		return { backend: "local", reason: `Unknown mode '${mode}' → default to local`, auto: false };
	}

	async query(text: string, options: KnowledgeQueryOptions = {}): Promise<KnowledgeResult> {
		const query = text.trim();
		if (!query) {
			return {
				source: "error",
				header: ERROR_HEADER,
				body: "Query cannot be empty",
				routing: null,
				failures: [],
			};
		}

		const limit = options.limit ?? this.defaultLimit;
		const routing = this.determineRouting(query, options.mode ?? this.defaultMode);
		this.record(routing);
		logger.info({ backend: routing.backend, reason: routing.reason }, "knowledge query routed");

		const primary = await this.attempt(routing.backend, query, limit, options, routing);
		if (primary.ok) {
			return {
				source: routing.backend,
				header: routing.backend === "local" ? LOCAL_HEADER : LIGHTRAG_HEADER,
				body: primary.body,
				routing,
				answeredBy: routing.backend,
				failures: [],
			};
		}

		const other: BackendName = routing.backend === "local" ? "lightrag" : "local";
		this.counts.fallbackUsed++;
		logger.warn(
			{ failed: routing.backend, kind: primary.failure.kind, error: primary.failure.message },
			`${routing.backend} failed; falling back to ${other}`,
		);

		const secondary = await this.attempt(other, query, limit, options, routing);
		if (secondary.ok) {
			return {
				source: "fallback",
				header: FALLBACK_HEADER,
				body: secondary.body,
				routing,
				answeredBy: other,
				failures: [primary.failure],
			};
		}

		const failures = [primary.failure, secondary.failure];
		logger.error({ failures }, "no knowledge backend could answer");
		return {
			source: "error",
			header: ERROR_HEADER,
			body: failures.map((failure) => `${failure.backend}: ${failure.message}`).join("\n"),
			routing,
			failures,
		};
	}

	routingStats(): RoutingStats {
		const counts = { ...this.counts };
		const totalQueries = counts.local + counts.lightrag;
		const share = (value: number) => (totalQueries > 0 ? (value / totalQueries) * 100 : 0);
		return {
			totalQueries,
			counts,
			percentages: {
				local: share(counts.local),
				lightrag: share(counts.lightrag),
				autoLocal: share(counts.autoLocal),
				autoLightrag: share(counts.autoLightrag),
				fallbackUsed: share(counts.fallbackUsed),
			},
		};
	}

	resetStats(): void {
		this.counts = emptyCounts();
		logger.info("knowledge routing statistics reset");
	}

	// The graph call is always bounded: unusable per-call values fall back to the default.
	private graphTimeout(timeoutMs: number | undefined): number {
		if (timeoutMs === undefined) return this.timeoutMs;
		if (isValidTimeout(timeoutMs)) return timeoutMs;
		logger.warn({ timeoutMs, fallbackMs: this.timeoutMs }, "invalid knowledge timeout; using default");
		return this.timeoutMs;
	}

	private record(routing: RoutingDecision): void {
		if (routing.backend === "local") {
			this.counts.local++;
			if (routing.auto) this.counts.autoLocal++;
		} else {
			this.counts.lightrag++;
			if (routing.auto) this.counts.autoLightrag++;
		}
	}

	private async attempt(
		backend: BackendName,
		query: string,
		limit: number,
		options: KnowledgeQueryOptions,
		routing: RoutingDecision,
	): Promise<Attempt> {
		try {
			if (backend === "local") {
				return await this.queryLocal(query, limit);
			}
			const mode = routing.backend === "lightrag" ? routing.mode : FALLBACK_GRAPH_MODE;
			return await this.queryGraph(query, mode, limit, options);
		} catch (err) {
			return {
				ok: false,
				failure: { backend, kind: classifyFailure(err), message: formatErrorSafe(err) },
			};
		}
	}

	private async queryLocal(query: string, limit: number): Promise<Attempt> {
		if (!this.local) {
			return {
				ok: false,
				failure: { backend: "local", kind: "unavailable", message: "local knowledge index not configured" },
			};
		}
		const hits = await this.local.search(query, limit);
		if (hits.length === 0) {
			return {
				ok: false,
				failure: { backend: "local", kind: "empty", message: `no local results for '${query}'` },
			};
		}
		logger.debug({ hits: hits.length }, "local knowledge search answered");
		return { ok: true, body: formatLocalHits(hits) };
	}

	private async queryGraph(
		query: string,
		mode: GraphMode,
		limit: number,
		options: KnowledgeQueryOptions,
	): Promise<Attempt> {
		if (!this.lightrag) {
			return {
				ok: false,
				failure: { backend: "lightrag", kind: "unavailable", message: "LightRAG is not configured" },
			};
		}
		const answer = await this.lightrag.query({
			query,
			mode,
			topK: limit,
			signal: options.signal,
			timeoutMs: this.graphTimeout(options.timeoutMs),
		});
		if (!answer.trim()) {
			return {
				ok: false,
				failure: { backend: "lightrag", kind: "empty", message: "LightRAG returned an empty answer" },
			};
		}
		return { ok: true, body: `(mode: ${mode})\n${answer}` };
	}
}
