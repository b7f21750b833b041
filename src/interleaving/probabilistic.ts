/**
 * Probabilistic Interleaving
 *
 * Each step picks a ranker, then draws a document from that ranker's
 * surviving list with a power-law bias towards the top (see
 * CumulativeDistributionCache). The drawn document is removed from every
 * list, so documents shared between rankers appear at most once and each
 * later draw only sees what is left.
 */

import { CumulativeDistributionCache } from "./distribution/index.js";
import { evaluateClicks } from "./evaluation/evaluate.js";
import {
	InvalidArgumentError,
	assertPositiveInteger,
	assertPositiveNumber,
} from "./errors.js";
import type { InterleavingMethod } from "./method.js";
import { defaultRandom, randomInt, shuffle, type RandomSource } from "./random.js";
import { InterleavedResult } from "./ranking.js";
import { NodePool, RemovableSequence } from "./sequence/index.js";
import type {
	DocumentId,
	EngineOptions,
	PairwisePreference,
	RankedList,
} from "./types.js";
import { DEFAULT_INTERLEAVING_CONFIG } from "./types.js";

// ============================================================================
// Types
// ============================================================================

export interface ProbabilisticOptions<T extends DocumentId> extends EngineOptions {
	/** Shared table cache; engines with equal τ reuse each other's tables */
	distribution?: CumulativeDistributionCache;
	/** Node arena for the per-call sequences */
	pool?: NodePool<T>;
}

// ============================================================================
// ProbabilisticInterleaving Class
// ============================================================================

export class ProbabilisticInterleaving<T extends DocumentId = DocumentId>
	implements InterleavingMethod<T>
{
	readonly name = "probabilistic";
	readonly tau: number;
	private readonly random: RandomSource;
	private readonly distribution: CumulativeDistributionCache;
	private readonly pool: NodePool<T>;

	constructor(options: ProbabilisticOptions<T> = {}) {
		const tau = options.tau ?? DEFAULT_INTERLEAVING_CONFIG.tau;
		assertPositiveNumber("tau", tau);

		this.tau = tau;
		this.random = options.random ?? defaultRandom;
		this.distribution = options.distribution ?? new CumulativeDistributionCache();
		this.pool = options.pool ?? new NodePool<T>();
	}

	/**
	 * Interleave two rankings. Each step picks one of the rankers that still
	 * has documents left, uniformly at random.
	 *
	 * The result holds min(k, distinct documents in a ∪ b) documents.
	 */
	interleave(k: number, a: RankedList<T>, b: RankedList<T>): InterleavedResult<T> {
		assertPositiveInteger("k", k);

		const result = new InterleavedResult<T>(2);
		const sequences = [this.createSequence(a), this.createSequence(b)];
		try {
			let active = activeRankers(sequences);
			while (result.length < k && active.length > 0) {
				const rankerIndex = active[randomInt(this.random, active.length)];
				this.advance(sequences, rankerIndex, result);
				active = activeRankers(sequences);
			}
		} finally {
			drainAll(sequences);
		}
		return result.seal();
	}

	/**
	 * Multileave any number of rankings in rounds. A round visits every
	 * ranker with documents left once, in random order, so each active
	 * ranker contributes once per completed round. Stops mid-round when
	 * the result reaches `k`.
	 */
	multileave(k: number, ...lists: RankedList<T>[]): InterleavedResult<T> {
		assertPositiveInteger("k", k);
		if (lists.length === 0) {
			throw new InvalidArgumentError("lists", "at least one ranked list is required");
		}

		const result = new InterleavedResult<T>(lists.length);
		const sequences = lists.map((list) => this.createSequence(list));
		try {
			let active = activeRankers(sequences);
			while (result.length < k && active.length > 0) {
				for (const rankerIndex of shuffle(this.random, active)) {
					// emptied earlier in this round by overlap with another list
					if (sequences[rankerIndex].length === 0) continue;

					this.advance(sequences, rankerIndex, result);
					if (result.length >= k) break;
				}
				active = activeRankers(sequences);
			}
		} finally {
			drainAll(sequences);
		}
		return result.seal();
	}

	/**
	 * Draw a document from ranker `rankerIndex`, record it, and remove it
	 * from every sequence.
	 */
	advance(
		sequences: readonly RemovableSequence<T>[],
		rankerIndex: number,
		result: InterleavedResult<T>,
	): T {
		const document = this.distribution.choose(this.tau, sequences[rankerIndex], this.random);
		result.append(document, rankerIndex);
		for (const sequence of sequences) {
			sequence.remove(document);
		}
		return document;
	}

	evaluate(result: InterleavedResult<T>, clicks: readonly number[]): PairwisePreference[] {
		return evaluateClicks(result, clicks);
	}

	private createSequence(list: RankedList<T>): RemovableSequence<T> {
		return new RemovableSequence(this.pool, list);
	}
}

// ============================================================================
// Helpers
// ============================================================================

function activeRankers<T>(sequences: readonly RemovableSequence<T>[]): number[] {
	const active: number[] = [];
	sequences.forEach((sequence, index) => {
		if (sequence.length > 0) active.push(index);
	});
	return active;
}

function drainAll<T>(sequences: readonly RemovableSequence<T>[]): void {
	for (const sequence of sequences) {
		sequence.drain();
	}
}

// ============================================================================
// Factory
// ============================================================================

export function createProbabilisticInterleaving<T extends DocumentId = DocumentId>(
	options?: ProbabilisticOptions<T>,
): ProbabilisticInterleaving<T> {
	return new ProbabilisticInterleaving<T>(options);
}
