import { afterEach, describe, expect, it, vi } from "vitest";

import { classifyFailure } from "../../src/infra/network-errors.js";
import { isValidTimeout, TimeoutError, withTimeout } from "../../src/infra/timeout.js";

function pendingFetch(onSignal?: (signal: AbortSignal) => void) {
	return vi.fn(
		(_url: string | URL, init?: RequestInit) =>
			new Promise<Response>((_resolve, reject) => {
				const signal = init?.signal;
				if (!signal) return;
				onSignal?.(signal);
				if (signal.aborted) {
					reject(signal.reason);
					return;
				}
				signal.addEventListener("abort", () => reject(signal.reason), { once: true });
			}),
	);
}

describe("infra/timeout", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("resolves with the task's result and hands it a live signal", async () => {
		let seen: AbortSignal | undefined;

		const result = await withTimeout(
			async (signal) => {
				seen = signal;
				return "ok";
			},
			{ timeoutMs: 1000 },
		);

		expect(result).toBe("ok");
		expect(seen?.aborted).toBe(false);
	});

	it("refuses timeouts that cannot bound the task", async () => {
		const task = vi.fn(async () => "never");

		for (const timeoutMs of [0, -1, Number.NaN, Number.POSITIVE_INFINITY]) {
			await expect(withTimeout(task, { timeoutMs })).rejects.toBeInstanceOf(RangeError);
		}
		expect(task).not.toHaveBeenCalled();
		expect(isValidTimeout(25)).toBe(true);
		expect(isValidTimeout(undefined)).toBe(false);
	});

	it("settles at the deadline when the task ignores its signal", async () => {
		vi.useFakeTimers();

		const result = withTimeout(() => new Promise<string>(() => undefined), {
			timeoutMs: 30,
			label: "body read",
		}).catch((err: unknown) => err);
		await vi.advanceTimersByTimeAsync(30);

		const err = await result;
		expect(err).toBeInstanceOf(TimeoutError);
		expect(err).toMatchObject({ message: "body read timed out after 30ms", timeoutMs: 30 });
	});

	it("aborts the underlying fetch on timeout", async () => {
		vi.useFakeTimers();

		let capturedSignal: AbortSignal | undefined;
		const fetchImpl = pendingFetch((signal) => {
			capturedSignal = signal;
		});

		const promise = withTimeout((signal) => fetchImpl("https://example.test", { signal }), {
			timeoutMs: 25,
			label: "LightRAG /query",
		});

		// Attach catch handler BEFORE advancing timers to prevent unhandled rejection
		const result = promise.catch((err: unknown) => err);
		await vi.advanceTimersByTimeAsync(25);

		const err = await result;
		expect(err).toBeInstanceOf(TimeoutError);
		expect(err).toMatchObject({ message: "LightRAG /query timed out after 25ms", timeoutMs: 25 });
		expect(capturedSignal?.aborted).toBe(true);
		expect(classifyFailure(err)).toBe("timeout");
	});

	it("wraps non-timeout errors raised after the deadline", async () => {
		vi.useFakeTimers();

		const fetchImpl = vi.fn(
			(_url: string | URL, init?: RequestInit) =>
				new Promise<Response>((_resolve, reject) => {
					init?.signal?.addEventListener("abort", () => reject(new Error("socket closed")), {
						once: true,
					});
				}),
		);

		const result = withTimeout((signal) => fetchImpl("https://example.test", { signal }), {
			timeoutMs: 10,
		}).catch((err: unknown) => err);
		await vi.advanceTimersByTimeAsync(10);

		const err = await result;
		expect(err).toBeInstanceOf(TimeoutError);
		expect(err).toMatchObject({ message: "request timed out after 10ms" });
		expect(err instanceof Error ? err.cause : undefined).toEqual(new Error("socket closed"));
	});

	it("relays an external abort signal", async () => {
		const external = new AbortController();
		const fetchImpl = pendingFetch();

		const promise = withTimeout((signal) => fetchImpl("https://example.test", { signal }), {
			timeoutMs: 5000,
			signal: external.signal,
		});
		external.abort(new Error("upstream-abort"));

		await expect(promise).rejects.toMatchObject({ message: "upstream-abort" });
	});

	it("rejects at once when the external signal is already aborted", async () => {
		const external = new AbortController();
		external.abort();
		const fetchImpl = pendingFetch();

		const err = await withTimeout((signal) => fetchImpl("https://example.test", { signal }), {
			timeoutMs: 5000,
			signal: external.signal,
		}).catch((error: unknown) => error);

		expect(err).not.toBeInstanceOf(TimeoutError);
		expect(classifyFailure(err)).toBe("aborted");
	});
});
