/**
 * Distribution module - Memoized rank weights and rank-biased selection.
 */

export { PowerLawWeightCache } from "./weight-cache.js";
export {
	CumulativeDistributionCache,
	type SelectableSequence,
} from "./cumulative-cache.js";
