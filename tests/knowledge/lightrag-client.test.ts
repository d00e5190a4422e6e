import { describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import { TimeoutError } from "../../src/infra/timeout.js";
import { extractAnswer, LightRagClient, LightRagError } from "../../src/knowledge/lightrag-client.js";

const BASE_URL = "http://lightrag.test/";

function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}

function mockFetch(respond: () => Response | Promise<Response>) {
	return vi.fn(async (_input: string | URL, _init?: RequestInit) => respond());
}

// Never answers; rejects with the signal's reason once aborted.
function hangingFetch(_input: string | URL, init?: RequestInit): Promise<Response> {
	return new Promise((_resolve, reject) => {
		const signal = init?.signal;
		if (!signal) {
			reject(new Error("expected a signal"));
			return;
		}
		if (signal.aborted) {
			reject(signal.reason);
			return;
		}
		signal.addEventListener("abort", () => reject(signal.reason), { once: true });
	});
}

// Headers arrive, then the body stops mid-JSON and never ends.
function stalledBodyFetch(_input: string | URL, _init?: RequestInit): Promise<Response> {
	const body = new ReadableStream<Uint8Array>({
		start(controller) {
			controller.enqueue(new TextEncoder().encode('{"response": "partial'));
		},
	});
	return Promise.resolve(new Response(body, { status: 200 }));
}

describe("knowledge/lightrag-client", () => {
	describe("extractAnswer", () => {
		it("reads the answer from any known key", () => {
			expect(extractAnswer({ response: "a" })).toBe("a");
			expect(extractAnswer({ content: "b" })).toBe("b");
			expect(extractAnswer({ answer: "c" })).toBe("c");
			expect(extractAnswer("plain")).toBe("plain");
		});

		it("stringifies unknown payloads", () => {
			expect(extractAnswer({ result: 1 })).toBe('{"result":1}');
			expect(extractAnswer(42)).toBe("42");
			expect(extractAnswer(null)).toBe("");
		});
	});

	describe("query", () => {
		it("posts the query with the API key", async () => {
			const fetchImpl = mockFetch(() => jsonResponse({ response: "Inflation raises rates." }));
			const client = new LightRagClient({ baseUrl: BASE_URL, apiKey: "test-secret", fetchImpl });

			const answer = await client.query({ query: "How do rates move?", mode: "hybrid", topK: 3 });

			expect(answer).toBe("Inflation raises rates.");
			expect(fetchImpl).toHaveBeenCalledTimes(1);
			const [url, init] = fetchImpl.mock.calls[0] ?? [];
			expect(url).toBe("http://lightrag.test/query");
			expect(init?.method).toBe("POST");
			expect(JSON.parse(String(init?.body))).toEqual({
				query: "How do rates move?",
				mode: "hybrid",
				top_k: 3,
				response_type: "Multiple Paragraphs",
			});
			const headers = new Headers(init?.headers);
			expect(headers.get("X-API-Key")).toBe("test-secret");
			expect(headers.get("Content-Type")).toBe("application/json");
		});

		it("sends no key when none is configured", async () => {
			const fetchImpl = mockFetch(() => jsonResponse({ content: "ok" }));
			const client = new LightRagClient({
				baseUrl: BASE_URL,
				responseType: "Bullet Points",
				fetchImpl,
			});

			expect(await client.query({ query: "q", mode: "mix", topK: 1 })).toBe("ok");
			const init = fetchImpl.mock.calls[0]?.[1];
			expect(new Headers(init?.headers).has("X-API-Key")).toBe(false);
			expect(JSON.parse(String(init?.body)).response_type).toBe("Bullet Points");
		});

		it("throws LightRagError with the server's detail", async () => {
			const fetchImpl = mockFetch(() => jsonResponse({ detail: "index missing" }, 500));
			const client = new LightRagClient({ baseUrl: BASE_URL, fetchImpl });

			const attempt = client.query({ query: "q", mode: "global", topK: 5 });
			await expect(attempt).rejects.toBeInstanceOf(LightRagError);
			await expect(attempt).rejects.toMatchObject({
				message: "LightRAG query failed (500): index missing",
				status: 500,
			});
		});

		it("does not retry HTTP errors", async () => {
			const fetchImpl = mockFetch(
				() => new Response("", { status: 503, statusText: "Service Unavailable" }),
			);
			const client = new LightRagClient({
				baseUrl: BASE_URL,
				fetchImpl,
				retry: { maxAttempts: 3, baseDelayMs: 0 },
			});

			await expect(client.query({ query: "q", mode: "global", topK: 5 })).rejects.toThrow(
				"LightRAG query failed (503): Service Unavailable",
			);
			expect(fetchImpl).toHaveBeenCalledTimes(1);
		});

		it("retries connection failures when configured", async () => {
			const fetchImpl = vi
				.fn(async (_input: string | URL, _init?: RequestInit) => jsonResponse({ response: "second time" }))
				.mockRejectedValueOnce(new TypeError("fetch failed"));
			const client = new LightRagClient({
				baseUrl: BASE_URL,
				fetchImpl,
				retry: { maxAttempts: 2, baseDelayMs: 0 },
			});

			expect(await client.query({ query: "q", mode: "naive", topK: 5 })).toBe("second time");
			expect(fetchImpl).toHaveBeenCalledTimes(2);
		});

		it("gives up after one attempt by default", async () => {
			const fetchImpl = mockFetch(() => {
				throw new TypeError("fetch failed");
			});
			const client = new LightRagClient({ baseUrl: BASE_URL, fetchImpl });

			await expect(client.query({ query: "q", mode: "naive", topK: 5 })).rejects.toThrow("fetch failed");
			expect(fetchImpl).toHaveBeenCalledTimes(1);
		});

		it("times out slow requests", async () => {
			const client = new LightRagClient({ baseUrl: BASE_URL, fetchImpl: hangingFetch });

			const attempt = client.query({ query: "q", mode: "hybrid", topK: 5, timeoutMs: 10 });
			await expect(attempt).rejects.toBeInstanceOf(TimeoutError);
			await expect(attempt).rejects.toThrow("LightRAG /query timed out after 10ms");
		});

		it("times out a response whose body stalls", async () => {
			const client = new LightRagClient({ baseUrl: BASE_URL, fetchImpl: stalledBodyFetch, timeoutMs: 20 });

			const attempt = client.query({ query: "q", mode: "hybrid", topK: 5 });
			await expect(attempt).rejects.toBeInstanceOf(TimeoutError);
			await expect(attempt).rejects.toThrow("LightRAG /query timed out after 20ms");
		});

		it("uses its own timeout when a request carries an unusable one", async () => {
			const client = new LightRagClient({ baseUrl: BASE_URL, fetchImpl: hangingFetch, timeoutMs: 15 });

			await expect(client.query({ query: "q", mode: "hybrid", topK: 5, timeoutMs: 0 })).rejects.toThrow(
				"LightRAG /query timed out after 15ms",
			);
			await expect(client.query({ query: "q", mode: "hybrid", topK: 5, timeoutMs: -5 })).rejects.toThrow(
				"LightRAG /query timed out after 15ms",
			);
		});

		it("refuses a client timeout that cannot bound the call", () => {
			expect(() => new LightRagClient({ baseUrl: BASE_URL, timeoutMs: 0 })).toThrow(RangeError);
		});

		it("stops when the caller aborts", async () => {
			const client = new LightRagClient({
				baseUrl: BASE_URL,
				fetchImpl: hangingFetch,
				retry: { maxAttempts: 3, baseDelayMs: 0 },
			});
			const controller = new AbortController();
			controller.abort();

			await expect(
				client.query({ query: "q", mode: "hybrid", topK: 5, signal: controller.signal }),
			).rejects.toHaveProperty("name", "AbortError");
		});
	});

	describe("health", () => {
		it("reports a reachable server", async () => {
			const fetchImpl = mockFetch(() => jsonResponse({ status: "healthy" }));
			const client = new LightRagClient({ baseUrl: BASE_URL, fetchImpl });

			expect(await client.health()).toEqual({ ok: true, status: 200, detail: { status: "healthy" } });
			expect(fetchImpl.mock.calls[0]?.[0]).toBe("http://lightrag.test/health");
			expect(fetchImpl.mock.calls[0]?.[1]?.method).toBe("GET");
		});

		it("reports HTTP errors", async () => {
			const fetchImpl = mockFetch(() => jsonResponse({ error: "bad key" }, 401));
			const client = new LightRagClient({ baseUrl: BASE_URL, fetchImpl });

			expect(await client.health()).toEqual({ ok: false, status: 401, error: "bad key" });
		});

		it("reports connection failures without throwing", async () => {
			const fetchImpl = mockFetch(() => {
				throw new TypeError("fetch failed");
			});
			const client = new LightRagClient({ baseUrl: BASE_URL, fetchImpl });

			expect(await client.health()).toEqual({ ok: false, status: 0, error: "TypeError: fetch failed" });
		});
	});
});
