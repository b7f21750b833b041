/**
 * PowerLawWeightCache - Memoized rank weights 1 / r^τ.
 *
 * Weights and their prefix sums are stored per τ in arrays that grow on
 * demand, so every (τ, r) pair is computed at most once for the lifetime
 * of the cache.
 */

import { getOrCompute } from "../memo.js";

interface WeightTable {
	/** weights[r - 1] = 1 / r^τ */
	weights: number[];
	/** prefixSums[n] = Σ weights for ranks 1..n (prefixSums[0] = 0) */
	prefixSums: number[];
}

export class PowerLawWeightCache {
	private tables = new Map<number, WeightTable>();

	/**
	 * Weight of rank `r` (1-based) under skew `tau`.
	 */
	weight(tau: number, r: number): number {
		const table = this.extend(tau, r);
		return table.weights[r - 1];
	}

	/**
	 * Σ_{r=1..n} 1 / r^τ
	 */
	sum(tau: number, n: number): number {
		const table = this.extend(tau, n);
		return table.prefixSums[n];
	}

	/** Number of τ values seen so far */
	get size(): number {
		return this.tables.size;
	}

	/** Number of ranks memoized for `tau` */
	rankCount(tau: number): number {
		return this.tables.get(tau)?.weights.length ?? 0;
	}

	private extend(tau: number, r: number): WeightTable {
		const table = getOrCompute(this.tables, tau, () => ({ weights: [], prefixSums: [0] }));
		for (let rank = table.weights.length + 1; rank <= r; rank++) {
			const w = 1.0 / rank ** tau;
			table.weights.push(w);
			table.prefixSums.push(table.prefixSums[rank - 1] + w);
		}
		return table;
	}
}
