/**
 * Picks out sentences worth remembering from free text.
 */

const MIN_STATEMENT_LENGTH = 10;

const MEMORABLE_PATTERNS: readonly RegExp[] = [
	/\bi am\b/i,
	/\bmy name is\b/i,
	/\bi work\b/i,
	/\bi live\b/i,
	/\bi like\b/i,
	/\bi love\b/i,
	/\bi hate\b/i,
	/\bi prefer\b/i,
	/\bi have\b/i,
	/\bi study\b/i,
	/\bi graduated\b/i,
	/\bmy favorite\b/i,
	/\bmy goal\b/i,
	/\bi want to\b/i,
	/\bi plan to\b/i,
];

export function isMemorableStatement(sentence: string): boolean {
	return MEMORABLE_PATTERNS.some((pattern) => pattern.test(sentence));
}

/**
 * Split on sentence punctuation and keep first-person facts of 10+ characters,
 * trimmed, in input order.
 */
export function extractMemorableStatements(text: string): string[] {
	return text
		.split(/[.!?]+/)
		.map((sentence) => sentence.trim())
		.filter((sentence) => sentence.length >= MIN_STATEMENT_LENGTH && isMemorableStatement(sentence));
}
