import { sleep } from "../utils.js";

export type RetryConfig = {
	/** Attempts including the first. At least 1. */
	maxAttempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
	/** Exponential backoff factor. */
	factor: number;
	/** 0-1; the delay is randomized by ±jitter. */
	jitter: number;
};

export type RetryInfo = {
	/** 1-based attempt that just failed */
	attempt: number;
	maxAttempts: number;
	/** Wait before the next attempt */
	delayMs: number;
};

export type RetryOptions = Partial<RetryConfig> & {
	/** Return false to give up immediately. Every error is retried by default. */
	shouldRetry?: (err: unknown, info: RetryInfo) => boolean;
	onRetry?: (err: unknown, info: RetryInfo) => void;
	/** Stops both the backoff wait and further attempts. */
	signal?: AbortSignal;
};

// One attempt unless the caller opts in; knowledge queries can be slow and a
// blind retry doubles the wait.
const DEFAULT_CONFIG: RetryConfig = {
	maxAttempts: 1,
	baseDelayMs: 500,
	maxDelayMs: 5_000,
	factor: 2,
	jitter: 0.25,
};

export function resolveRetryConfig(opts?: Partial<RetryConfig>): RetryConfig {
	return {
		maxAttempts: Math.max(1, Math.floor(opts?.maxAttempts ?? DEFAULT_CONFIG.maxAttempts)),
		baseDelayMs: Math.max(0, opts?.baseDelayMs ?? DEFAULT_CONFIG.baseDelayMs),
		maxDelayMs: Math.max(0, opts?.maxDelayMs ?? DEFAULT_CONFIG.maxDelayMs),
		factor: Math.max(1, opts?.factor ?? DEFAULT_CONFIG.factor),
		jitter: Math.min(1, Math.max(0, opts?.jitter ?? DEFAULT_CONFIG.jitter)),
	};
}

/**
 * Backoff delay before retrying after `attempt` (1-based) failed.
 */
export function computeRetryDelay(config: RetryConfig, attempt: number): number {
	const base = config.baseDelayMs * config.factor ** (attempt - 1);
	const capped = Math.min(base, config.maxDelayMs);
	const jitterRange = capped * config.jitter;
	const jitter = (Math.random() - 0.5) * 2 * jitterRange;
	return Math.max(0, Math.round(capped + jitter));
}

/**
 * Run `fn` until it resolves or the attempts run out; the last error is
 * rethrown. An aborted signal rethrows the error that was pending.
 */
export async function retryAsync<T>(fn: () => Promise<T>, opts: RetryOptions = {}): Promise<T> {
	const config = resolveRetryConfig(opts);
	const { shouldRetry, onRetry, signal } = opts;

	for (let attempt = 1; ; attempt++) {
		try {
			return await fn();
		} catch (err) {
			if (attempt >= config.maxAttempts || signal?.aborted) {
				throw err;
			}

			const info: RetryInfo = {
				attempt,
				maxAttempts: config.maxAttempts,
				delayMs: computeRetryDelay(config, attempt),
			};
			if (shouldRetry && !shouldRetry(err, info)) {
				throw err;
			}

			onRetry?.(err, info);
			if (info.delayMs > 0) {
				await sleep(info.delayMs, signal).catch(() => {
					throw err;
				});
			}
		}
	}
}
