/**
 * Deadlines for outbound calls.
 */

export class TimeoutError extends Error {
	constructor(
		message: string,
		public readonly timeoutMs: number,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "TimeoutError";
	}
}

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type TimeoutOptions = {
	timeoutMs: number;
	/** Caller cancellation, relayed to the task's signal. */
	signal?: AbortSignal | null;
	/** Used in the TimeoutError message. */
	label?: string;
};

export function isValidTimeout(timeoutMs: number | undefined): timeoutMs is number {
	return timeoutMs !== undefined && Number.isFinite(timeoutMs) && timeoutMs > 0;
}

/**
 * Run `task` with a signal that aborts after `timeoutMs` or when the caller's
 * signal does. Settles at the deadline even when the task ignores its signal,
 * so everything awaited inside the task (a response body included) is bounded.
 *
 * Rejects with TimeoutError on the deadline; a caller abort rejects with the
 * abort reason instead.
 */
export async function withTimeout<T>(
	task: (signal: AbortSignal) => Promise<T>,
	options: TimeoutOptions,
): Promise<T> {
	const { timeoutMs } = options;
	if (!isValidTimeout(timeoutMs)) {
		throw new RangeError(`timeoutMs must be a positive number (got ${timeoutMs})`);
	}
	const label = options.label ?? "request";
	const controller = new AbortController();
	const external = options.signal ?? undefined;

	let timedOut = false;
	let timer: ReturnType<typeof setTimeout> | undefined;
	let rejectAborted: (reason: unknown) => void = () => undefined;
	const aborted = new Promise<never>((_resolve, reject) => {
		rejectAborted = reject;
	});
	const onAbort = () => rejectAborted(controller.signal.reason);
	const relay = () => controller.abort(external?.reason);

	try {
		// Started first so its own rejection, when it has one, wins the race.
		const running = task(controller.signal);
		controller.signal.addEventListener("abort", onAbort, { once: true });
		if (external?.aborted) {
			relay();
		} else {
			external?.addEventListener("abort", relay, { once: true });
		}
		timer = setTimeout(() => {
			timedOut = true;
			controller.abort(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs));
		}, timeoutMs);
		timer.unref();

		return await Promise.race([running, aborted]);
	} catch (err) {
		if (timedOut && !(err instanceof TimeoutError)) {
			throw new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs, { cause: err });
		}
		throw err;
	} finally {
		clearTimeout(timer);
		external?.removeEventListener("abort", relay);
		controller.signal.removeEventListener("abort", onAbort);
	}
}
