export type MemoryEntry = {
	/** UUID assigned at creation */
	id: string;
	/** User or namespace the entry belongs to */
	ownerId: string;
	text: string;
	/** Ordered, de-duplicated, never empty */
	topics: string[];
	/** 0-1; 1.0 means the user said it directly */
	confidence: number;
	/** Written by a delegated agent rather than the primary one */
	isProxy: boolean;
	proxyAgent?: string;
	/** Raw user input this fact was extracted from */
	input?: string;
	createdAt: number;
	updatedAt: number;
};

export type StorageStatus =
	| "success"
	| "duplicate_exact"
	| "duplicate_semantic"
	| "content_empty"
	| "content_too_long"
	| "validation_error"
	| "storage_error";

export type StorageResult = {
	status: StorageStatus;
	message: string;
	memoryId?: string;
	topics?: string[];
	/** Id of the entry that caused a duplicate rejection */
	duplicateOf?: string;
	similarityScore?: number;
	entry?: MemoryEntry;
};

export type AddMemoryOptions = {
	topics?: string[] | string;
	confidence?: number;
	isProxy?: boolean;
	proxyAgent?: string;
	input?: string;
};

export type UpdateMemoryPatch = {
	text?: string;
	topics?: string[] | string;
	confidence?: number;
};

export type SearchOptions = {
	limit?: number;
	similarityThreshold?: number;
	/** Added to the score when a query term matches one of the entry's topics */
	topicBoost?: number;
};

export type ScoredEntry = {
	entry: MemoryEntry;
	score: number;
};

export type MemoryStats = {
	total: number;
	topicDistribution: Record<string, number>;
	duplicateRejectionsSeen: number;
	averageLength: number;
	/** Entries touched since local midnight */
	recentCount: number;
	mostCommonTopic: string | null;
};

export type IngestResult = {
	added: Array<{ memoryId: string; text: string; topics: string[] }>;
	rejected: Array<{ text: string; status: StorageStatus; reason: string }>;
	totalProcessed: number;
};

export function isStored(result: StorageResult): boolean {
	return result.status === "success";
}

export function isRejected(result: StorageResult): boolean {
	return (
		result.status === "duplicate_exact" ||
		result.status === "duplicate_semantic" ||
		result.status === "content_empty" ||
		result.status === "content_too_long" ||
		result.status === "validation_error"
	);
}
