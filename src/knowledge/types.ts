import type { FailureKind } from "../infra/network-errors.js";

export type KnowledgeMode = "auto" | "local" | "global" | "hybrid" | "mix" | "naive" | "bypass";

/** Retrieval modes the graph service understands. */
export type GraphMode = Exclude<KnowledgeMode, "auto" | "local">;

export const GRAPH_MODES: readonly GraphMode[] = ["global", "hybrid", "mix", "naive", "bypass"];

export function isGraphMode(mode: string): mode is GraphMode {
	return GRAPH_MODES.some((candidate) => candidate === mode);
}

export type BackendName = "local" | "lightrag";

export type RoutingDecision =
	| { backend: "local"; reason: string; auto: boolean }
	| { backend: "lightrag"; mode: GraphMode; reason: string; auto: boolean };

export type KnowledgeHit = {
	content: string;
	source?: string;
	score?: number;
};

/**
 * Fast similarity lookup answered in process.
 */
export interface KnowledgeIndex {
	search(query: string, limit: number): KnowledgeHit[] | Promise<KnowledgeHit[]>;
}

export type GraphQueryRequest = {
	query: string;
	mode: GraphMode;
	topK: number;
	signal?: AbortSignal;
	timeoutMs?: number;
};

/**
 * External graph-retrieval service. Resolves to the answer text; rejects on
 * any transport or HTTP failure.
 */
export interface KnowledgeBackend {
	query(request: GraphQueryRequest): Promise<string>;
}

export type BackendFailure = {
	backend: BackendName;
	/** "empty": answered with nothing; "unavailable": not configured */
	kind: FailureKind | "empty" | "unavailable";
	message: string;
};

export type KnowledgeSource = "local" | "lightrag" | "fallback" | "error";

export type KnowledgeResult = {
	source: KnowledgeSource;
	header: string;
	body: string;
	/** Null only when the query was rejected before routing */
	routing: RoutingDecision | null;
	/** Backend whose output is in `body`, when any */
	answeredBy?: BackendName;
	failures: BackendFailure[];
};

export type KnowledgeQueryOptions = {
	/** A KnowledgeMode; anything else routes locally with a warning. */
	mode?: string;
	limit?: number;
	signal?: AbortSignal;
	timeoutMs?: number;
};

export type RoutingCounts = {
	local: number;
	lightrag: number;
	autoLocal: number;
	autoLightrag: number;
	fallbackUsed: number;
};

export type RoutingStats = {
	totalQueries: number;
	counts: RoutingCounts;
	/** Share of totalQueries, 0-100 */
	percentages: RoutingCounts;
};
