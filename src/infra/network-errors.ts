/**
 * Failure classification for outbound calls.
 *
 * Walks the error graph breadth-first through `.cause`, `.reason` and
 * `.errors`, so a TimeoutError or ECONNREFUSED buried under a fetch wrapper
 * still counts.
 */

import { truncate } from "../utils.js";

export type FailureKind = "timeout" | "aborted" | "network" | "http" | "unknown";

/** Error codes that indicate a transient network issue. */
const TRANSIENT_NETWORK_CODES = new Set([
	"ECONNRESET",
	"ECONNREFUSED",
	"ECONNABORTED",
	"ETIMEDOUT",
	"EPIPE",
	"ENETUNREACH",
	"EHOSTUNREACH",
	"EAI_AGAIN",
	"ENOTFOUND",
	"UND_ERR_CONNECT_TIMEOUT",
	"UND_ERR_SOCKET",
	"UND_ERR_HEADERS_TIMEOUT",
	"UND_ERR_BODY_TIMEOUT",
]);

/** Lower-case message fragments that indicate a transient network issue. */
const TRANSIENT_MESSAGE_FRAGMENTS = [
	"fetch failed",
	"network error",
	"socket hang up",
	"other side closed",
	"econnreset",
	"etimedout",
	"econnrefused",
	"client network socket disconnected",
];

const ABORT_MESSAGE_FRAGMENTS = [
	"this operation was aborted",
	"the operation was aborted",
	"signal is aborted",
];

/**
 * The error plus everything reachable from it, breadth-first, without cycles.
 */
export function collectErrorCandidates(err: unknown, maxDepth = 5): unknown[] {
	const candidates: unknown[] = [];
	const queue: Array<{ value: unknown; depth: number }> = [{ value: err, depth: 0 }];
	const seen = new WeakSet<object>();

	while (queue.length > 0) {
		const item = queue.shift();
		if (!item) break;
		if (item.depth > maxDepth) continue;

		const val = item.value;
		if (val == null) continue;
		if (typeof val !== "object") {
			candidates.push(val);
			continue;
		}

		if (seen.has(val)) continue;
		seen.add(val);
		candidates.push(val);

		const nextDepth = item.depth + 1;
		if ("cause" in val && val.cause != null) {
			queue.push({ value: val.cause, depth: nextDepth });
		}
		if ("reason" in val && val.reason != null) {
			queue.push({ value: val.reason, depth: nextDepth });
		}
		if ("errors" in val && Array.isArray(val.errors)) {
			for (const e of val.errors) {
				queue.push({ value: e, depth: nextDepth });
			}
		}
	}

	return candidates;
}

function readField(val: unknown, field: "name" | "code" | "message" | "status"): unknown {
	if (typeof val !== "object" || val === null || !(field in val)) return undefined;
	return Reflect.get(val, field);
}

function messageOf(val: unknown): string | null {
	if (typeof val === "string") return val;
	const message = readField(val, "message");
	return typeof message === "string" ? message : null;
}

function anyCandidate(err: unknown, predicate: (candidate: unknown) => boolean): boolean {
	return collectErrorCandidates(err).some(predicate);
}

export function isTimeoutError(err: unknown): boolean {
	return anyCandidate(err, (c) => readField(c, "name") === "TimeoutError");
}

/**
 * Caller cancellation: DOMException AbortError, Node's ABORT_ERR, or the
 * messages fetch implementations use for them.
 */
export function isAbortError(err: unknown): boolean {
	return anyCandidate(err, (c) => {
		if (readField(c, "name") === "AbortError" || readField(c, "code") === "ABORT_ERR") {
			return true;
		}
		const message = messageOf(c)?.toLowerCase();
		return message !== undefined && ABORT_MESSAGE_FRAGMENTS.some((f) => message.includes(f));
	});
}

export function isTransientNetworkError(err: unknown): boolean {
	return anyCandidate(err, (c) => {
		const code = readField(c, "code");
		if (typeof code === "string" && TRANSIENT_NETWORK_CODES.has(code)) return true;
		const message = messageOf(c)?.toLowerCase();
		return (
			message !== undefined && TRANSIENT_MESSAGE_FRAGMENTS.some((f) => message.includes(f))
		);
	});
}

function hasHttpStatus(err: unknown): boolean {
	return anyCandidate(err, (c) => typeof readField(c, "status") === "number");
}

/**
 * Reduce any thrown value to one kind. A timeout wins over the abort it
 * causes; an HTTP status wins over a generic network message.
 */
export function classifyFailure(err: unknown): FailureKind {
	if (isTimeoutError(err)) return "timeout";
	if (isAbortError(err)) return "aborted";
	if (hasHttpStatus(err)) return "http";
	if (isTransientNetworkError(err)) return "network";
	return "unknown";
}

/**
 * One-line description for logs and result payloads. URLs are redacted since
 * they may carry credentials.
 */
export function formatErrorSafe(err: unknown, maxLength = 500): string {
	if (err == null) return "unknown error";

	let msg: string;
	if (err instanceof Error) {
		msg = `${err.name}: ${err.message}`;
		if (err.cause != null) {
			msg += ` [cause: ${formatErrorSafe(err.cause, Math.floor(maxLength / 2))}]`;
		}
	} else {
		msg = String(err);
	}
	return truncate(redactUrls(msg), maxLength);
}

function redactUrls(str: string): string {
	return str.replace(/https?:\/\/[^\s]+/g, "[URL]");
}
