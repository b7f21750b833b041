/**
 * Unit tests for the rank weight and cumulative distribution caches
 */

import { describe, test, expect } from "vitest";
import {
	CumulativeDistributionCache,
	PowerLawWeightCache,
} from "../../src/interleaving/distribution/index.js";
import { InvariantViolationError } from "../../src/interleaving/errors.js";
import { NodePool, RemovableSequence } from "../../src/interleaving/sequence/index.js";

describe("PowerLawWeightCache", () => {
	test("weight is 1 / r^tau", () => {
		const cache = new PowerLawWeightCache();
		expect(cache.weight(3, 1)).toBe(1);
		expect(cache.weight(3, 2)).toBe(0.125);
		expect(cache.weight(1, 4)).toBe(0.25);
		expect(cache.weight(2, 10)).toBeCloseTo(0.01, 12);
	});

	test("weights strictly decrease with rank", () => {
		const cache = new PowerLawWeightCache();
		for (const tau of [0.5, 1, 3, 7.5]) {
			for (let r = 1; r < 30; r++) {
				expect(cache.weight(tau, r)).toBeGreaterThan(cache.weight(tau, r + 1));
			}
		}
	});

	test("sum accumulates weights of ranks 1..n", () => {
		const cache = new PowerLawWeightCache();
		expect(cache.sum(1, 0)).toBe(0);
		expect(cache.sum(1, 4)).toBeCloseTo(1 + 1 / 2 + 1 / 3 + 1 / 4, 12);
		expect(cache.sum(3, 2)).toBe(1.125);
	});

	test("memoizes per tau and extends lazily", () => {
		const cache = new PowerLawWeightCache();
		cache.weight(3, 5);
		expect(cache.rankCount(3)).toBe(5);
		cache.weight(3, 2);
		expect(cache.rankCount(3)).toBe(5);
		cache.weight(2, 1);
		expect(cache.size).toBe(2);
		expect(cache.rankCount(2)).toBe(1);
		expect(cache.rankCount(9)).toBe(0);
	});
});

describe("CumulativeDistributionCache", () => {
	test("table ends at exactly 1 and never decreases", () => {
		const cache = new CumulativeDistributionCache();
		for (const tau of [0.1, 1, 3, 10]) {
			for (let n = 1; n <= 40; n++) {
				const table = cache.table(tau, n);
				expect(table).toHaveLength(n);
				expect(table[n - 1]).toBe(1);
				for (let i = 1; i < n; i++) {
					expect(table[i]).toBeGreaterThanOrEqual(table[i - 1]);
				}
			}
		}
	});

	test("entries are normalized prefix sums", () => {
		const cache = new CumulativeDistributionCache();
		// weights 1, 1/8, 1/27 for tau = 3
		const total = 1 + 0.125 + 1 / 27;
		const table = cache.table(3, 3);
		expect(table[0]).toBeCloseTo(1 / total, 12);
		expect(table[1]).toBeCloseTo(1.125 / total, 12);
		expect(table[2]).toBe(1);
	});

	test("single element table is [1]", () => {
		expect(new CumulativeDistributionCache().table(3, 1)).toEqual([1]);
	});

	test("empty table for n = 0", () => {
		expect(new CumulativeDistributionCache().table(3, 0)).toEqual([]);
	});

	test("returns the memoized table on repeated lookups", () => {
		const cache = new CumulativeDistributionCache();
		const first = cache.table(3, 5);
		expect(cache.table(3, 5)).toBe(first);
		expect(cache.table(2, 5)).not.toBe(first);
		expect(cache.tableCount(3)).toBe(1);
		expect(cache.tableCount(2)).toBe(1);
	});

	test("caches built on a shared weight cache reuse its weights", () => {
		const weights = new PowerLawWeightCache();
		const a = new CumulativeDistributionCache(weights);
		const b = new CumulativeDistributionCache(weights);
		a.table(3, 6);
		expect(weights.rankCount(3)).toBe(6);
		b.table(3, 4);
		expect(weights.rankCount(3)).toBe(6);
	});

	describe("choose", () => {
		const cache = new CumulativeDistributionCache();
		const pool = new NodePool<string>();

		test("returns the element at the first index where u < table[i]", () => {
			const sequence = new RemovableSequence(pool, ["a", "b", "c"]);
			const table = cache.table(3, 3);

			expect(cache.choose(3, sequence, () => 0)).toBe("a");
			expect(cache.choose(3, sequence, () => table[0])).toBe("b");
			expect(cache.choose(3, sequence, () => table[1])).toBe("c");
			expect(cache.choose(3, sequence, () => 0.999999)).toBe("c");
			sequence.drain();
		});

		test("only sees surviving elements", () => {
			const sequence = new RemovableSequence(pool, ["a", "b", "c"]);
			sequence.remove("a");
			expect(cache.choose(3, sequence, () => 0)).toBe("b");
			expect(cache.choose(3, sequence, () => 0.999999)).toBe("c");
			sequence.drain();
		});

		test("higher tau concentrates draws on the head", () => {
			const sequence = new RemovableSequence(pool, ["a", "b", "c", "d"]);
			const u = 0.9;
			// tau = 10: table[0] ≈ 0.999, so u = 0.9 still selects the head
			expect(cache.choose(10, sequence, () => u)).toBe("a");
			// tau = 0.5: table[0] ≈ 0.36, so u = 0.9 lands deeper
			expect(cache.choose(0.5, sequence, () => u)).not.toBe("a");
			sequence.drain();
		});

		test("throws on an empty sequence", () => {
			const sequence = new RemovableSequence<string>(pool);
			expect(() => cache.choose(3, sequence, () => 0.5)).toThrow(InvariantViolationError);
		});
	});
});
