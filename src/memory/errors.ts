export class MemoryValidationError extends Error {
	constructor(
		message: string,
		public readonly field: string,
	) {
		super(message);
		this.name = "MemoryValidationError";
	}
}

/**
 * A persistence adapter failed. The original error is kept as `cause`.
 */
export class PersistenceError extends Error {
	constructor(
		message: string,
		public readonly operation: "read" | "write" | "delete",
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "PersistenceError";
	}
}

export function describeError(err: unknown): string {
	if (err instanceof Error) {
		if (err.cause instanceof Error) {
			return `${err.message} (${err.cause.message})`;
		}
		return err.message;
	}
	return String(err);
}
