/**
 * Click-count evaluation of an interleaved result.
 *
 * Every clicked position credits the ranker that contributed it. Rankers
 * are then compared pairwise: the one with more credited clicks wins, equal
 * counts are a tie and produce no preference.
 */

import type { InterleavedResult } from "../ranking.js";
import type { DocumentId, PairwisePreference } from "../types.js";

/**
 * Clicks credited to each ranker. Repeated clicks on a position count again.
 */
export function countClicks<T extends DocumentId>(
	result: InterleavedResult<T>,
	clicks: readonly number[],
): number[] {
	const counts = new Array<number>(result.rankerCount).fill(0);
	for (const position of clicks) {
		counts[result.rankerAt(position)]++;
	}
	return counts;
}

/**
 * Pairwise preferences ordered by (i, j) over ranker pairs i < j.
 */
export function evaluateClicks<T extends DocumentId>(
	result: InterleavedResult<T>,
	clicks: readonly number[],
): PairwisePreference[] {
	const counts = countClicks(result, clicks);

	const preferences: PairwisePreference[] = [];
	for (let i = 0; i < result.rankerCount; i++) {
		for (let j = i + 1; j < result.rankerCount; j++) {
			if (counts[i] > counts[j]) {
				preferences.push({ winner: i, loser: j });
			} else if (counts[i] < counts[j]) {
				preferences.push({ winner: j, loser: i });
			}
		}
	}
	return preferences;
}
