/**
 * Probabilistic interleaving for rankblend
 *
 * Blends the rankings of competing rankers into one list, then credits user
 * clicks back to the rankers to infer which one is better.
 *
 * Architecture:
 * - distribution/ - Memoized power-law weights and rank-biased selection
 * - sequence/     - Pooled linked sequences with O(1) removal by identity
 * - evaluation/   - Click crediting and win tallies
 * - simulation/   - Cascade click models for offline comparisons
 *
 * Usage:
 * ```typescript
 * import { createInterleavingSystem } from "./interleaving/index.js";
 *
 * const system = createInterleavingSystem({ tau: 3.0, seed: 42 });
 *
 * const result = system.method.interleave(4, ["d1", "d2", "d3"], ["d4", "d2", "d5"]);
 * const outcome = system.method.evaluate(result, [0, 2]);
 * system.tally.record(outcome, result.rankerCount);
 * ```
 */

import { CumulativeDistributionCache, PowerLawWeightCache } from "./distribution/index.js";
import { WinTally } from "./evaluation/index.js";
import { createProbabilisticInterleaving, type ProbabilisticInterleaving } from "./probabilistic.js";
import { createSeededRandom, defaultRandom, type RandomSource } from "./random.js";
import type { DocumentId, InterleavingConfig } from "./types.js";
import { DEFAULT_INTERLEAVING_CONFIG } from "./types.js";

// ============================================================================
// Re-exports
// ============================================================================

// Types
export * from "./types.js";
export * from "./errors.js";
export type { InterleavingMethod } from "./method.js";

// Components
export {
	PowerLawWeightCache,
	CumulativeDistributionCache,
	type SelectableSequence,
} from "./distribution/index.js";
export { NodePool, RemovableSequence } from "./sequence/index.js";
export {
	InterleavedResult,
	interleavedResultSchema,
	type SerializedInterleavedResult,
} from "./ranking.js";
export {
	ProbabilisticInterleaving,
	createProbabilisticInterleaving,
	type ProbabilisticOptions,
} from "./probabilistic.js";
export { countClicks, evaluateClicks, WinTally } from "./evaluation/index.js";
export {
	CLICK_MODELS,
	isClickModelName,
	simulateClicks,
	runSimulation,
	type CascadeClickModel,
	type ClickModelName,
	type RelevanceJudgments,
	type SimulationOptions,
} from "./simulation/index.js";
export {
	MAX_SEED,
	assertSeed,
	createSeededRandom,
	defaultRandom,
	randomInt,
	shuffle,
	type RandomSource,
} from "./random.js";

// ============================================================================
// Convenience Factory
// ============================================================================

/**
 * Interleaving components wired together.
 */
export interface InterleavingSystem<T extends DocumentId = DocumentId> {
	config: InterleavingConfig;
	/** Shared probability tables */
	distribution: CumulativeDistributionCache;
	/** Random source used by the method */
	random: RandomSource;
	method: ProbabilisticInterleaving<T>;
	tally: WinTally;
}

/**
 * Create an interleaving system.
 *
 * @param config - Optional configuration overrides
 * @param distribution - Table cache to share with other systems
 */
export function createInterleavingSystem<T extends DocumentId = DocumentId>(
	config: Partial<InterleavingConfig> = {},
	distribution: CumulativeDistributionCache = new CumulativeDistributionCache(
		new PowerLawWeightCache(),
	),
): InterleavingSystem<T> {
	const mergedConfig = { ...DEFAULT_INTERLEAVING_CONFIG, ...config };
	const random =
		mergedConfig.seed === undefined ? defaultRandom : createSeededRandom(mergedConfig.seed);
	const method = createProbabilisticInterleaving<T>({
		tau: mergedConfig.tau,
		random,
		distribution,
	});

	return {
		config: mergedConfig,
		distribution,
		random,
		method,
		tally: new WinTally(),
	};
}
