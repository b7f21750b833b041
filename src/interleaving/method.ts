/**
 * Capability contract for interleaving methods.
 */

import type { InterleavedResult } from "./ranking.js";
import type { DocumentId, PairwisePreference, RankedList } from "./types.js";

export interface InterleavingMethod<T extends DocumentId = DocumentId> {
	/** Human-readable method name */
	readonly name: string;

	/**
	 * Blend two rankings into a result of at most `k` documents.
	 */
	interleave(k: number, a: RankedList<T>, b: RankedList<T>): InterleavedResult<T>;

	/**
	 * Blend any number of rankings into a result of at most `k` documents.
	 */
	multileave(k: number, ...lists: RankedList<T>[]): InterleavedResult<T>;

	/**
	 * Infer pairwise ranker preferences from clicked positions.
	 */
	evaluate(result: InterleavedResult<T>, clicks: readonly number[]): PairwisePreference[];
}
