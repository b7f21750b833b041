/**
 * Random sources for document and ranker selection.
 *
 * Everything random in the engine goes through a `RandomSource` so that a
 * seed reproduces an interleaving exactly.
 */

import { InvalidArgumentError } from "./errors.js";

/** Returns a float uniformly distributed in [0, 1) */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/** Seeds are unsigned 32-bit integers */
export const MAX_SEED = 0xffffffff;

/**
 * Throw unless `seed` is an integer in [0, MAX_SEED].
 */
export function assertSeed(name: string, seed: number): void {
	if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
		throw new InvalidArgumentError(name, `expected an integer in [0, ${MAX_SEED}], got ${seed}`, {
			value: seed,
		});
	}
}

/**
 * Deterministic linear congruential generator. Every seed gives its own stream.
 */
export function createSeededRandom(seed: number): RandomSource {
	assertSeed("seed", seed);
	let state = seed;

	return () => {
		state = (state * 1664525 + 1013904223) >>> 0;
		return state / 4294967296;
	};
}

/**
 * Uniform integer in [0, n).
 */
export function randomInt(random: RandomSource, n: number): number {
	return Math.floor(random() * n);
}

/**
 * Shuffle a copy of an array using Fisher-Yates.
 */
export function shuffle<T>(random: RandomSource, array: readonly T[]): T[] {
	const result = [...array];
	for (let i = result.length - 1; i > 0; i--) {
		const j = randomInt(random, i + 1);
		[result[i], result[j]] = [result[j], result[i]];
	}
	return result;
}
