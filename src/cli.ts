/**
 * rankblend CLI
 *
 * Command-line interface for interleaving rankings, evaluating clicks and
 * running simulated comparisons.
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { resolveConfig } from "./config.js";
import {
	CLICK_MODELS,
	InterleavedResult,
	InvalidArgumentError,
	assertSeed,
	createInterleavingSystem,
	isClickModelName,
	isInterleavingError,
	runSimulation,
	type InterleavingConfig,
	type PairwisePreference,
} from "./interleaving/index.js";
import {
	c,
	getHighlight,
	formatPercent,
	logDebug,
	logWarn,
	printLogo,
	renderError,
	renderHeader,
	renderInfo,
	renderSuccess,
	renderTable,
	type CellValue,
} from "./ui/index.js";

// ============================================================================
// Version & Branding
// ============================================================================

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
	const packageJson: unknown = JSON.parse(
		readFileSync(join(__dirname, "../package.json"), "utf-8"),
	);
	if (
		typeof packageJson === "object" &&
		packageJson !== null &&
		"version" in packageJson &&
		typeof packageJson.version === "string"
	) {
		return packageJson.version;
	}
	return "0.0.0";
}

/** Flags without a value */
const BOOLEAN_FLAGS = new Set(["--json", "--help", "-h", "--version", "-v", "--nologo"]);

/** Everything after it is positional */
const END_OF_OPTIONS = "--";

/** Flags that take a value */
const VALUE_FLAGS = new Set([
	"-k",
	"--tau",
	"--seed",
	"--result",
	"--rankers",
	"--count",
	"--clicks",
	"--relevant",
	"--impressions",
	"--model",
	"--path",
]);

// ============================================================================
// CLI Entry Point
// ============================================================================

/**
 * Run the CLI and return the process exit code.
 */
export async function runCli(args: string[]): Promise<number> {
	let noLogo = false;
	if (args.includes("--nologo")) {
		noLogo = true;
		args = args.filter((a) => a !== "--nologo");
	}

	const command = args[0];

	if (args.includes("--version") || args.includes("-v")) {
		console.log(`rankblend version ${readVersion()}`);
		return 0;
	}

	if (args.includes("--help") || args.includes("-h") || !command) {
		if (!noLogo) printLogo(readVersion());
		printHelp();
		return 0;
	}

	try {
		switch (command) {
			case "interleave":
				handleInterleave(args.slice(1), false);
				break;
			case "multileave":
				handleInterleave(args.slice(1), true);
				break;
			case "evaluate":
				handleEvaluate(args.slice(1));
				break;
			case "simulate":
				handleSimulate(args.slice(1));
				break;
			default:
				renderError(`Unknown command: ${command}`);
				console.error('Run "rankblend --help" for usage information.');
				return 1;
		}
	} catch (error) {
		if (isInterleavingError(error)) {
			renderError(error.message);
			logDebug(error.name, error.toJSON());
			return 1;
		}
		throw error;
	}
	return 0;
}

// ============================================================================
// Argument Parsing
// ============================================================================

/** Arguments before the `--` terminator */
function optionArgs(args: string[]): string[] {
	const end = args.indexOf(END_OF_OPTIONS);
	return end < 0 ? args : args.slice(0, end);
}

export function hasFlag(args: string[], ...names: string[]): boolean {
	return optionArgs(args).some((a) => names.includes(a));
}

/**
 * Value following the first of `names`, or undefined when absent.
 */
export function getFlag(args: string[], ...names: string[]): string | undefined {
	const options = optionArgs(args);
	const idx = options.findIndex((a) => names.includes(a));
	if (idx < 0) return undefined;

	const value = args[idx + 1];
	if (value === undefined || idx + 1 >= options.length) {
		throw new InvalidArgumentError(options[idx], "missing value");
	}
	return value;
}

/**
 * Arguments that are neither flags nor flag values. A list may start
 * with "-" (e.g. "-1,2"); only "--name" arguments must be known options.
 */
export function getPositionals(args: string[]): string[] {
	const positionals: string[] = [];
	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === END_OF_OPTIONS) {
			positionals.push(...args.slice(i + 1));
			break;
		}
		if (VALUE_FLAGS.has(arg)) {
			i++;
			continue;
		}
		if (BOOLEAN_FLAGS.has(arg)) continue;
		if (arg.startsWith("--")) {
			throw new InvalidArgumentError(arg, "unknown option");
		}
		positionals.push(arg);
	}
	return positionals;
}

/**
 * Split a comma-separated list of document IDs.
 */
export function parseList(value: string): string[] {
	return value
		.split(",")
		.map((item) => item.trim())
		.filter((item) => item.length > 0);
}

/**
 * Split a comma-separated list of non-negative integers.
 */
export function parseIndexList(name: string, value: string): number[] {
	return parseList(value).map((item) => {
		const n = Number(item);
		if (!Number.isInteger(n) || n < 0) {
			throw new InvalidArgumentError(name, `"${item}" is not a non-negative integer`);
		}
		return n;
	});
}

/**
 * Parse "doc,doc:2" into relevance grades (grade 1 when omitted).
 */
export function parseRelevance(value: string): Map<string, number> {
	const relevance = new Map<string, number>();
	for (const item of parseList(value)) {
		const sep = item.lastIndexOf(":");
		const id = sep >= 0 ? item.slice(0, sep) : item;
		const grade = sep >= 0 ? Number(item.slice(sep + 1)) : 1;
		if (!id || !Number.isInteger(grade) || grade < 0) {
			throw new InvalidArgumentError("--relevant", `"${item}" is not a document or document:grade`);
		}
		relevance.set(id, grade);
	}
	return relevance;
}

function parseNumberFlag(args: string[], ...names: string[]): number | undefined {
	const value = getFlag(args, ...names);
	if (value === undefined) return undefined;

	const n = Number(value);
	if (value.trim() === "" || Number.isNaN(n)) {
		throw new InvalidArgumentError(names[names.length - 1], `"${value}" is not a number`);
	}
	return n;
}

function loadConfig(args: string[]): InterleavingConfig {
	const projectPath = resolve(getFlag(args, "--path") ?? process.cwd());
	const seed = parseNumberFlag(args, "--seed");
	if (seed !== undefined) assertSeed("--seed", seed);

	const config = resolveConfig(projectPath, {
		tau: parseNumberFlag(args, "--tau"),
		seed,
		k: parseNumberFlag(args, "-k"),
	});
	logDebug("resolved config", { projectPath, ...config });
	return config;
}

// ============================================================================
// Command Handlers
// ============================================================================

function handleInterleave(args: string[], multi: boolean): void {
	const lists = getPositionals(args).map(parseList);
	if (!multi && lists.length !== 2) {
		throw new InvalidArgumentError("lists", `interleave takes exactly 2 lists, got ${lists.length}`);
	}

	const config = loadConfig(args);
	const { method } = createInterleavingSystem<string>(config);
	const result = multi
		? method.multileave(config.k, ...lists)
		: method.interleave(config.k, lists[0], lists[1]);

	if (hasFlag(args, "--json")) {
		console.log(JSON.stringify(result.toJSON()));
		return;
	}

	const verb = multi ? "Multileaved" : "Interleaved";
	renderHeader(`${verb} ${result.length} documents from ${result.rankerCount} rankers (τ=${config.tau})`);
	renderTable(
		[
			{ header: "Pos", width: 4, align: "right" },
			{ header: "Document", width: 32 },
			{ header: "Ranker", width: 6, align: "right" },
		],
		result.documents.map((document, position) => [
			{ value: String(position) },
			{ value: String(document) },
			{ value: String(result.rankerIndices[position]) },
		]),
	);

	if (result.length < config.k) {
		logWarn(`Only ${result.length} distinct documents available (k=${config.k})`);
	}
}

function handleEvaluate(args: string[]): void {
	const clicksArg = getFlag(args, "--clicks");
	if (clicksArg === undefined) {
		throw new InvalidArgumentError("--clicks", "required (comma-separated positions, may be empty)");
	}
	const clicks = parseIndexList("--clicks", clicksArg);
	const result = readResult(args);

	const { method } = createInterleavingSystem();
	const preferences = method.evaluate(result, clicks);

	if (hasFlag(args, "--json")) {
		console.log(JSON.stringify(preferences));
		return;
	}
	printPreferences(preferences);
}

function handleSimulate(args: string[]): void {
	const lists = getPositionals(args).map(parseList);
	if (lists.length < 2) {
		throw new InvalidArgumentError("lists", `simulate needs at least 2 lists, got ${lists.length}`);
	}

	const relevantArg = getFlag(args, "--relevant");
	if (relevantArg === undefined) {
		throw new InvalidArgumentError("--relevant", "required (comma-separated document[:grade])");
	}
	const relevance = parseRelevance(relevantArg);

	const modelName = getFlag(args, "--model") ?? "navigational";
	if (!isClickModelName(modelName)) {
		throw new InvalidArgumentError(
			"--model",
			`unknown click model "${modelName}" (expected ${Object.keys(CLICK_MODELS).join(", ")})`,
		);
	}
	const impressions = parseNumberFlag(args, "--impressions") ?? 1000;

	const config = loadConfig(args);
	const { method, random } = createInterleavingSystem<string>(config);
	const tally = runSimulation({
		method,
		lists,
		relevance,
		k: config.k,
		impressions,
		model: CLICK_MODELS[modelName],
		random,
	});

	const scores = tally.scores();
	if (hasFlag(args, "--json")) {
		console.log(JSON.stringify({ impressions: tally.impressions, scores }));
		return;
	}

	const rates = scores.map((s) => s.winRate);
	const min = Math.min(...rates);
	const max = Math.max(...rates);

	renderHeader(`Simulated ${tally.impressions} impressions (${modelName} user, τ=${config.tau}, k=${config.k})`);
	renderTable(
		[
			{ header: "Ranker", width: 6, align: "right" },
			{ header: "Wins", width: 7, align: "right" },
			{ header: "Losses", width: 7, align: "right" },
			{ header: "Ties", width: 7, align: "right" },
			{ header: "Win rate", width: 8, align: "right" },
		],
		scores.map((score): CellValue[] => [
			{ value: String(score.rankerIndex) },
			{ value: String(score.wins) },
			{ value: String(score.losses) },
			{ value: String(score.ties) },
			{
				value: formatPercent(score.winRate),
				highlight: getHighlight(score.winRate, min, max, true),
			},
		]),
	);
	console.log();

	const best = scores.filter((s) => s.winRate === max);
	if (best.length === 1 && min !== max) {
		renderSuccess(`Ranker ${best[0].rankerIndex} wins most comparisons`);
	} else {
		renderInfo("No single ranker is preferred");
	}
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Build the result to evaluate from --result (file or inline JSON) or from
 * --rankers (the ranker index of each position).
 */
function readResult(args: string[]): InterleavedResult {
	const resultArg = getFlag(args, "--result");
	if (resultArg !== undefined) {
		return InterleavedResult.fromJSON(parseJson(resultArg));
	}

	const rankersArg = getFlag(args, "--rankers");
	if (rankersArg === undefined) {
		throw new InvalidArgumentError("--result", "pass --result <file|json> or --rankers <indices>");
	}

	const rankerIndices = parseIndexList("--rankers", rankersArg);
	const count = parseNumberFlag(args, "--count") ?? Math.max(1, ...rankerIndices.map((i) => i + 1));
	return InterleavedResult.fromJSON({
		rankerCount: count,
		documents: rankerIndices.map((_, position) => position),
		rankerIndices,
	});
}

function parseJson(value: string): unknown {
	const inline = value.trimStart().startsWith("{");
	if (!inline && !existsSync(value)) {
		throw new InvalidArgumentError("--result", `file not found: ${value}`);
	}

	const text = inline ? value : readFileSync(value, "utf-8");
	try {
		return JSON.parse(text);
	} catch (error) {
		throw new InvalidArgumentError("--result", `not valid JSON (${error instanceof Error ? error.message : String(error)})`);
	}
}

function printPreferences(preferences: PairwisePreference[]): void {
	if (preferences.length === 0) {
		renderInfo("No preference: every ranker pair tied");
		return;
	}
	for (const { winner, loser } of preferences) {
		console.log(`  ranker ${c.green}${winner}${c.reset} beats ranker ${c.red}${loser}${c.reset}`);
	}
}

function printHelp(): void {
	console.log(`
${c.yellow}${c.bold}USAGE${c.reset}
  ${c.cyan}rankblend${c.reset} <command> [options]

${c.yellow}${c.bold}COMMANDS${c.reset}
  ${c.green}interleave${c.reset} <a> <b>         Interleave two comma-separated rankings
  ${c.green}multileave${c.reset} <list>...       Multileave any number of rankings
  ${c.green}evaluate${c.reset}                   Credit clicks to rankers
  ${c.green}simulate${c.reset} <list>...         Compare rankings with simulated users

${c.yellow}${c.bold}OPTIONS${c.reset}
  ${c.cyan}-k${c.reset} <n>                     Maximum result length (default: 10)
  ${c.cyan}--tau${c.reset} <t>                  Selection skew, > 0 (default: 3.0)
  ${c.cyan}--seed${c.reset} <n>                 Seed for reproducible output (0 to 4294967295)
  ${c.cyan}--json${c.reset}                     Print JSON instead of a table
  ${c.cyan}--path${c.reset} <dir>               Directory holding rankblend.json (default: cwd)
  ${c.cyan}--${c.reset}                         End of options; later arguments are lists

${c.yellow}${c.bold}EVALUATE${c.reset}
  ${c.cyan}--result${c.reset} <file|json>       Result printed by interleave --json
  ${c.cyan}--rankers${c.reset} <i,i,...>        Or: ranker index of each position
  ${c.cyan}--count${c.reset} <n>                Number of rankers (with --rankers)
  ${c.cyan}--clicks${c.reset} <p,p,...>         Clicked positions (0-based)

${c.yellow}${c.bold}SIMULATE${c.reset}
  ${c.cyan}--relevant${c.reset} <d[:g],...>     Relevant documents with optional grade
  ${c.cyan}--model${c.reset} <name>             perfect | navigational | informational
  ${c.cyan}--impressions${c.reset} <n>          Number of simulated users (default: 1000)

${c.yellow}${c.bold}ENVIRONMENT${c.reset}
  ${c.cyan}RANKBLEND_TAU${c.reset}, ${c.cyan}RANKBLEND_SEED${c.reset}, ${c.cyan}RANKBLEND_DEBUG${c.reset}

${c.yellow}${c.bold}EXAMPLES${c.reset}
  ${c.dim}rankblend interleave 1,2,3 4,5,6 -k 4 --seed 7${c.reset}
  ${c.dim}rankblend evaluate --rankers 0,1,0,1 --clicks 0,2${c.reset}
  ${c.dim}rankblend simulate d1,d2,d3 d3,d1,d4 --relevant d1,d3 --model perfect${c.reset}
`);
}
