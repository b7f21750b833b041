/**
 * CumulativeDistributionCache - Rank-biased document selection.
 *
 * For a sequence of n surviving documents, the document at position i
 * (0-based) is selected with probability weight(i + 1) / Σ weight(1..n).
 * Selection draws one uniform number and scans the cumulative table built
 * from those probabilities.
 *
 * Tables are memoized per (τ, n) and never invalidated.
 */

import { InvariantViolationError } from "../errors.js";
import { getOrCompute } from "../memo.js";
import type { RandomSource } from "../random.js";
import { PowerLawWeightCache } from "./weight-cache.js";

/** Anything with a surviving length and an in-order traversal */
export interface SelectableSequence<T> extends Iterable<T> {
	readonly length: number;
}

export class CumulativeDistributionCache {
	private readonly weights: PowerLawWeightCache;
	private tables = new Map<number, Map<number, readonly number[]>>();

	constructor(weights: PowerLawWeightCache = new PowerLawWeightCache()) {
		this.weights = weights;
	}

	/**
	 * Cumulative probabilities for `n` ranks under skew `tau`.
	 *
	 * The last entry is exactly 1 so that any draw in [0, 1) terminates.
	 */
	table(tau: number, n: number): readonly number[] {
		const byLength = getOrCompute(this.tables, tau, () => new Map<number, readonly number[]>());
		return getOrCompute(byLength, n, () => this.build(tau, n));
	}

	/**
	 * Draw one surviving element of `sequence`, biased towards its head.
	 */
	choose<T>(tau: number, sequence: SelectableSequence<T>, random: RandomSource): T {
		const n = sequence.length;
		if (n === 0) {
			throw new InvariantViolationError("Cannot choose from an empty sequence", { tau });
		}

		const cumulation = this.table(tau, n);
		const u = random();
		let i = 0;
		for (const value of sequence) {
			if (u < cumulation[i]) return value;
			i++;
		}

		throw new InvariantViolationError("Sequence ended before the cumulative table", {
			tau,
			length: n,
			visited: i,
		});
	}

	/** Number of tables memoized for `tau` */
	tableCount(tau: number): number {
		return this.tables.get(tau)?.size ?? 0;
	}

	private build(tau: number, n: number): readonly number[] {
		const result: number[] = [];
		if (n === 0) return result;

		const denominator = this.weights.sum(tau, n);
		for (let r = 1; r < n; r++) {
			result.push(this.weights.sum(tau, r) / denominator);
		}
		result.push(1);
		return result;
	}
}
