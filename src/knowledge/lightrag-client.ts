import { z } from "zod";

import { getChildLogger } from "../logging.js";
import { formatErrorSafe, isAbortError, isTransientNetworkError } from "../infra/network-errors.js";
import { type RetryConfig, retryAsync } from "../infra/retry.js";
import { type FetchLike, isValidTimeout, withTimeout } from "../infra/timeout.js";
import type { GraphQueryRequest, KnowledgeBackend } from "./types.js";

const logger = getChildLogger({ module: "lightrag-client" });

const DEFAULT_TIMEOUT_MS = 120_000;
const HEALTH_TIMEOUT_MS = 5_000;
const DEFAULT_RESPONSE_TYPE = "Multiple Paragraphs";

export class LightRagError extends Error {
	constructor(
		message: string,
		public readonly status: number,
	) {
		super(message);
		this.name = "LightRagError";
	}
}

export type LightRagClientOptions = {
	baseUrl: string;
	apiKey?: string;
	timeoutMs?: number;
	responseType?: string;
	retry?: Partial<RetryConfig>;
	fetchImpl?: FetchLike;
};

export type LightRagHealth =
	| { ok: true; status: number; detail: unknown }
	| { ok: false; status: number; error: string };

type LightRagApiResult =
	| { ok: true; status: number; data: unknown }
	| { ok: false; status: number; error: string };

// The server has answered under each of these keys across versions.
const QueryResponseSchema = z.union([
	z.string(),
	z
		.object({
			response: z.string().optional(),
			content: z.string().optional(),
			answer: z.string().optional(),
		})
		.passthrough(),
]);

const ErrorBodySchema = z.object({ detail: z.string() }).or(z.object({ error: z.string() }));

function safeJsonParse(raw: string): unknown {
	try {
		return JSON.parse(raw);
	} catch {
		// Plain-text bodies are passed through as-is.
		return raw;
	}
}

function describeErrorBody(payload: unknown, fallback: string): string {
	const parsed = ErrorBodySchema.safeParse(payload);
	if (parsed.success) {
		return "detail" in parsed.data ? parsed.data.detail : parsed.data.error;
	}
	if (typeof payload === "string") return payload || fallback;
	return payload == null ? fallback : JSON.stringify(payload);
}

/**
 * The answer text from a /query payload.
 */
export function extractAnswer(payload: unknown): string {
	if (payload == null) return "";
	const parsed = QueryResponseSchema.safeParse(payload);
	if (!parsed.success) {
		return JSON.stringify(payload);
	}
	const data = parsed.data;
	if (typeof data === "string") return data;
	return data.response ?? data.content ?? data.answer ?? JSON.stringify(data);
}

/**
 * HTTP client for a LightRAG server.
 */
export class LightRagClient implements KnowledgeBackend {
	private readonly baseUrl: string;
	private readonly apiKey: string | undefined;
	private readonly timeoutMs: number;
	private readonly responseType: string;
	private readonly retry: Partial<RetryConfig>;
	private readonly fetchImpl: FetchLike;

	constructor(options: LightRagClientOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, "");
		this.apiKey = options.apiKey;
		if (options.timeoutMs !== undefined && !isValidTimeout(options.timeoutMs)) {
			throw new RangeError(`LightRAG timeoutMs must be a positive number (got ${options.timeoutMs})`);
		}
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.responseType = options.responseType ?? DEFAULT_RESPONSE_TYPE;
		this.retry = options.retry ?? {};
		this.fetchImpl = options.fetchImpl ?? fetch;
	}

	/**
	 * Per-request timeout, or the client's own when the one given cannot
	 * bound the call (zero, negative, NaN, Infinity).
	 */
	private resolveTimeout(timeoutMs: number | undefined): number {
		if (timeoutMs === undefined) return this.timeoutMs;
		if (isValidTimeout(timeoutMs)) return timeoutMs;
		logger.warn({ timeoutMs, fallbackMs: this.timeoutMs }, "invalid LightRAG timeout; using default");
		return this.timeoutMs;
	}

	get url(): string {
		return this.baseUrl;
	}

	private async request(
		path: string,
		init: RequestInit,
		timeoutMs: number,
	): Promise<LightRagApiResult> {
		const headers = new Headers(init.headers ?? {});
		if (this.apiKey) {
			headers.set("X-API-Key", this.apiKey);
		}
		if (init.body && !headers.has("Content-Type")) {
			headers.set("Content-Type", "application/json");
		}

		const url = `${this.baseUrl}${path}`;
		// Headers and body share one deadline; a server that stalls mid-body still times out.
		return withTimeout(
			async (signal): Promise<LightRagApiResult> => {
				const response = await this.fetchImpl(url, { ...init, headers, signal });
				const status = response.status;
				const raw = await response.text();
				const payload = raw ? safeJsonParse(raw) : null;

				if (!response.ok) {
					return { ok: false, status, error: describeErrorBody(payload, response.statusText) };
				}
				return { ok: true, status, data: payload };
			},
			{ timeoutMs, signal: init.signal, label: `LightRAG ${path}` },
		);
	}

	private async queryOnce(request: GraphQueryRequest): Promise<string> {
		const result = await this.request(
			"/query",
			{
				method: "POST",
				body: JSON.stringify({
					query: request.query,
					mode: request.mode,
					top_k: request.topK,
					response_type: this.responseType,
				}),
				signal: request.signal,
			},
			this.resolveTimeout(request.timeoutMs),
		);

		if (!result.ok) {
			throw new LightRagError(
				`LightRAG query failed (${result.status}): ${result.error}`,
				result.status,
			);
		}
		return extractAnswer(result.data);
	}

	/**
	 * Ask the server. Connection-level failures are retried per `retry`;
	 * timeouts, aborts and HTTP errors are not.
	 */
	async query(request: GraphQueryRequest): Promise<string> {
		const started = Date.now();
		const answer = await retryAsync(() => this.queryOnce(request), {
			...this.retry,
			signal: request.signal,
			shouldRetry: (err) => isTransientNetworkError(err) && !isAbortError(err),
			onRetry: (err, info) =>
				logger.warn(
					{ attempt: info.attempt, delayMs: info.delayMs, error: formatErrorSafe(err) },
					"retrying LightRAG query",
				),
		});
		logger.info(
			{ mode: request.mode, topK: request.topK, elapsedMs: Date.now() - started },
			"LightRAG query answered",
		);
		return answer;
	}

	async health(): Promise<LightRagHealth> {
		try {
			const result = await this.request("/health", { method: "GET" }, HEALTH_TIMEOUT_MS);
			if (!result.ok) {
				return result;
			}
			return { ok: true, status: result.status, detail: result.data };
		} catch (err) {
			const error = formatErrorSafe(err);
			logger.warn({ error }, "LightRAG health check failed");
			return { ok: false, status: 0, error };
		}
	}
}
