/**
 * Types for probabilistic interleaving.
 *
 * This module defines interfaces for:
 * - Documents and the ranked lists produced by rankers
 * - Pairwise preferences inferred from clicks
 * - Engine configuration
 */

import type { RandomSource } from "./random.js";

// ============================================================================
// Documents & Rankings
// ============================================================================

/**
 * Opaque document identifier. Only identity matters: IDs are compared with
 * `Map` key semantics and never inspected.
 */
export type DocumentId = string | number;

/** Documents in the order one ranker put them */
export type RankedList<T extends DocumentId = DocumentId> = readonly T[];

// ============================================================================
// Evaluation Types
// ============================================================================

/**
 * One inferred preference: `winner` received more clicks than `loser`
 * on the same interleaved result.
 */
export interface PairwisePreference {
	winner: number;
	loser: number;
}

/** Aggregated head-to-head record for one ranker */
export interface RankerScore {
	rankerIndex: number;
	wins: number;
	losses: number;
	ties: number;
	/** (wins + 0.5 * ties) / comparisons, 0 when never compared */
	winRate: number;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Engine configuration.
 */
export interface InterleavingConfig {
	/** Skew of the rank-selection distribution (higher favours top ranks) */
	tau: number;
	/** Seed for a reproducible random source; unseeded uses Math.random */
	seed?: number;
	/** Default maximum length of an interleaved result */
	k: number;
}

/** Default configuration values */
export const DEFAULT_INTERLEAVING_CONFIG: InterleavingConfig = {
	tau: 3.0,
	k: 10,
};

/**
 * Options accepted by engine constructors. Everything is optional so that
 * engines can share caches and random sources explicitly.
 */
export interface EngineOptions {
	tau?: number;
	random?: RandomSource;
}
