/**
 * Integration tests for the rankblend CLI
 *
 * Tests:
 * - interleave / multileave output
 * - evaluate from ranker assignments and serialized results
 * - simulate summary
 * - error reporting and exit codes
 */

import { describe, test, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import {
	getFlag,
	getPositionals,
	hasFlag,
	parseIndexList,
	parseList,
	parseRelevance,
	runCli,
} from "../../src/cli.js";
import { InvalidArgumentError } from "../../src/interleaving/errors.js";

describe("rankblend CLI", () => {
	let log: MockInstance<typeof console.log>;
	let error: MockInstance<typeof console.error>;

	beforeEach(() => {
		log = vi.spyOn(console, "log").mockImplementation(() => {});
		error = vi.spyOn(console, "error").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	function logged(): string[] {
		return log.mock.calls.map((call) => String(call[0]));
	}

	function errors(): string[] {
		return error.mock.calls.map((call) => String(call[0]));
	}

	describe("interleave", () => {
		test("prints a JSON result with --json", async () => {
			const code = await runCli(["interleave", "1,2,3", "4,5,6", "-k", "4", "--seed", "7", "--json"]);
			expect(code).toBe(0);

			const output = JSON.parse(logged()[0]);
			expect(output.rankerCount).toBe(2);
			expect(output.documents).toHaveLength(4);
			expect(new Set(output.documents).size).toBe(4);
			for (const document of output.documents) {
				expect(["1", "2", "3", "4", "5", "6"]).toContain(document);
			}
			expect(output.rankerIndices).toHaveLength(4);
		});

		test("the same seed prints the same result", async () => {
			await runCli(["interleave", "a,b,c,d", "c,e,a,f", "-k", "5", "--seed", "123", "--json"]);
			await runCli(["interleave", "a,b,c,d", "c,e,a,f", "-k", "5", "--seed", "123", "--json"]);
			const [first, second] = logged();
			expect(first).toBe(second);
		});

		test("prints a table by default", async () => {
			const code = await runCli(["interleave", "a", "b", "-k", "2", "--seed", "1"]);
			expect(code).toBe(0);

			const lines = logged();
			expect(lines[0]).toBe("\nInterleaved 2 documents from 2 rankers (τ=3)\n");
			expect(lines[1]).toBe("   Pos Document                         Ranker");
			expect(lines).toHaveLength(5);
		});

		test("warns when the lists run out before k", async () => {
			const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
			const code = await runCli(["interleave", "a", "a", "-k", "3", "--seed", "1"]);
			expect(code).toBe(0);
			expect(warn).toHaveBeenCalledWith("⚠ Only 1 distinct documents available (k=3)");
		});

		test("requires exactly two lists", async () => {
			const code = await runCli(["interleave", "a", "b", "c"]);
			expect(code).toBe(1);
			expect(errors()[0]).toBe("✗ Invalid lists: interleave takes exactly 2 lists, got 3");
		});

		test("rejects a non-positive k", async () => {
			const code = await runCli(["interleave", "a", "b", "-k", "0"]);
			expect(code).toBe(1);
			expect(errors()[0]).toBe("✗ Invalid k: expected a positive integer, got 0");
		});

		test.each(["1.5", "-1", "4294967297"])("rejects seed %s", async (seed) => {
			const code = await runCli(["interleave", "a,b", "c,d", "--seed", seed, "--json"]);
			expect(code).toBe(1);
			expect(logged()).toEqual([]);
			expect(errors()[0]).toBe(`✗ Invalid --seed: expected an integer in [0, 4294967295], got ${Number(seed)}`);
		});

		test("takes lists starting with a dash", async () => {
			const code = await runCli(["interleave", "-1,-2", "-3", "-k", "3", "--seed", "4", "--json"]);
			expect(code).toBe(0);

			const output = JSON.parse(logged()[0]);
			expect([...output.documents].sort()).toEqual(["-1", "-2", "-3"]);
		});

		test("rejects unknown options", async () => {
			const code = await runCli(["interleave", "a", "b", "--frobnicate"]);
			expect(code).toBe(1);
			expect(errors()[0]).toBe("✗ Invalid --frobnicate: unknown option");
		});

		test("rejects a non-positive tau", async () => {
			const code = await runCli(["interleave", "a", "b", "--tau", "-1"]);
			expect(code).toBe(1);
			expect(errors()[0]).toBe("✗ Invalid tau: expected a positive number, got -1");
		});
	});

	describe("multileave", () => {
		test("blends every list", async () => {
			const code = await runCli([
				"multileave",
				"a1,a2",
				"b1,b2",
				"c1,c2",
				"-k",
				"3",
				"--seed",
				"5",
				"--json",
			]);
			expect(code).toBe(0);

			const output = JSON.parse(logged()[0]);
			expect(output.rankerCount).toBe(3);
			expect([...output.rankerIndices].sort()).toEqual([0, 1, 2]);
		});
	});

	describe("evaluate", () => {
		test("credits clicks from ranker assignments", async () => {
			const code = await runCli(["evaluate", "--rankers", "0,1,0,1", "--clicks", "0,2", "--json"]);
			expect(code).toBe(0);
			expect(logged()).toEqual(['[{"winner":0,"loser":1}]']);
		});

		test("no clicks yields no preferences", async () => {
			await runCli(["evaluate", "--rankers", "0,1,0,1", "--clicks", "", "--json"]);
			expect(logged()).toEqual(["[]"]);
		});

		test("prints preferences as text", async () => {
			await runCli(["evaluate", "--rankers", "0,1,0,1", "--clicks", "3"]);
			expect(logged()).toEqual(["  ranker 1 beats ranker 0"]);
		});

		test("reports ties", async () => {
			await runCli(["evaluate", "--rankers", "0,1", "--clicks", "0,1"]);
			expect(logged()).toEqual(["No preference: every ranker pair tied"]);
		});

		test("--count adds rankers without positions", async () => {
			await runCli(["evaluate", "--rankers", "0,0", "--count", "3", "--clicks", "1", "--json"]);
			expect(JSON.parse(logged()[0])).toEqual([
				{ winner: 0, loser: 1 },
				{ winner: 0, loser: 2 },
			]);
		});

		test("reads an inline serialized result", async () => {
			const result = JSON.stringify({
				rankerCount: 2,
				documents: ["a", "b", "c"],
				rankerIndices: [1, 0, 1],
			});
			await runCli(["evaluate", "--result", result, "--clicks", "0,2", "--json"]);
			expect(logged()).toEqual(['[{"winner":1,"loser":0}]']);
		});

		test("rejects clicks outside the result", async () => {
			const code = await runCli(["evaluate", "--rankers", "0,1,0,1", "--clicks", "9"]);
			expect(code).toBe(1);
			expect(errors()[0]).toBe("✗ Invalid click: position 9 is outside the result (length 4)");
		});

		test("requires --clicks", async () => {
			const code = await runCli(["evaluate", "--rankers", "0,1"]);
			expect(code).toBe(1);
			expect(errors()[0]).toBe(
				"✗ Invalid --clicks: required (comma-separated positions, may be empty)",
			);
		});

		test("reports a missing result file", async () => {
			const code = await runCli(["evaluate", "--result", "/nonexistent/result.json", "--clicks", "0"]);
			expect(code).toBe(1);
			expect(errors()[0]).toBe("✗ Invalid --result: file not found: /nonexistent/result.json");
		});
	});

	describe("simulate", () => {
		test("prints scores for every ranker", async () => {
			const code = await runCli([
				"simulate",
				"r1,r2,n1",
				"n2,n3,r1",
				"--relevant",
				"r1,r2",
				"--model",
				"perfect",
				"--impressions",
				"50",
				"-k",
				"3",
				"--seed",
				"4",
				"--json",
			]);
			expect(code).toBe(0);

			const output = JSON.parse(logged()[0]);
			expect(output.impressions).toBe(50);
			expect(output.scores).toHaveLength(2);
			expect(output.scores[0].wins + output.scores[0].losses + output.scores[0].ties).toBe(50);
		});

		test("rejects unknown click models", async () => {
			const code = await runCli(["simulate", "a", "b", "--relevant", "a", "--model", "lazy"]);
			expect(code).toBe(1);
			expect(errors()[0]).toBe(
				'✗ Invalid --model: unknown click model "lazy" (expected perfect, navigational, informational)',
			);
		});

		test("requires relevance judgments", async () => {
			const code = await runCli(["simulate", "a", "b"]);
			expect(code).toBe(1);
		});
	});

	describe("general", () => {
		test("prints the version", async () => {
			expect(await runCli(["--version"])).toBe(0);
			expect(logged()).toEqual(["rankblend version 0.1.0"]);
		});

		test("prints help without a command", async () => {
			expect(await runCli(["--nologo"])).toBe(0);
			expect(logged()[0]).toContain("USAGE");
		});

		test("fails on unknown commands", async () => {
			expect(await runCli(["rank"])).toBe(1);
			expect(errors()[0]).toBe("✗ Unknown command: rank");
		});
	});
});

describe("argument parsing", () => {
	test("parseList splits and trims", () => {
		expect(parseList(" a, b,,c ")).toEqual(["a", "b", "c"]);
		expect(parseList("")).toEqual([]);
	});

	test("parseIndexList accepts non-negative integers only", () => {
		expect(parseIndexList("--clicks", "0, 3,3")).toEqual([0, 3, 3]);
		expect(() => parseIndexList("--clicks", "1,-1")).toThrow(InvalidArgumentError);
		expect(() => parseIndexList("--clicks", "x")).toThrow(InvalidArgumentError);
	});

	test("parseRelevance reads optional grades", () => {
		expect(parseRelevance("a,b:2,c:0")).toEqual(
			new Map([
				["a", 1],
				["b", 2],
				["c", 0],
			]),
		);
		expect(() => parseRelevance("a:high")).toThrow(InvalidArgumentError);
	});

	test("getPositionals skips flags and their values", () => {
		expect(getPositionals(["a,b", "-k", "3", "--json", "c", "--tau", "2"])).toEqual(["a,b", "c"]);
	});

	test("getPositionals keeps lists that start with a dash", () => {
		expect(getPositionals(["-1,2", "-k", "3", "-3"])).toEqual(["-1,2", "-3"]);
	});

	test("everything after -- is positional", () => {
		expect(getPositionals(["a", "--", "--json", "-k"])).toEqual(["a", "--json", "-k"]);
		expect(getFlag(["a", "--", "-k", "3"], "-k")).toBeUndefined();
		expect(hasFlag(["a", "--", "--json"], "--json")).toBe(false);
		expect(hasFlag(["a", "--json"], "--json")).toBe(true);
		expect(() => getFlag(["-k", "--", "3"], "-k")).toThrow(InvalidArgumentError);
	});

	test("getPositionals rejects unknown long options", () => {
		expect(() => getPositionals(["a", "--bogus"])).toThrow(InvalidArgumentError);
	});

	test("getFlag requires a value", () => {
		expect(getFlag(["--seed", "4"], "--seed")).toBe("4");
		expect(getFlag(["--json"], "--seed")).toBeUndefined();
		expect(() => getFlag(["--seed"], "--seed")).toThrow(InvalidArgumentError);
	});
});
