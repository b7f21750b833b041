/**
 * Offline ranker comparison.
 *
 * Repeats interleave → simulated clicks → evaluate for a number of
 * impressions and accumulates the outcomes in a WinTally.
 */

import { InvalidArgumentError, assertPositiveInteger } from "../errors.js";
import { WinTally } from "../evaluation/tally.js";
import type { InterleavingMethod } from "../method.js";
import type { RandomSource } from "../random.js";
import type { InterleavedResult } from "../ranking.js";
import type { DocumentId, RankedList } from "../types.js";
import {
	simulateClicks,
	validateClickModel,
	type CascadeClickModel,
	type RelevanceJudgments,
} from "./click-model.js";

export interface SimulationOptions<T extends DocumentId> {
	method: InterleavingMethod<T>;
	lists: readonly RankedList<T>[];
	relevance: RelevanceJudgments<T>;
	k: number;
	impressions: number;
	model: CascadeClickModel;
	/** Drives the simulated user (the method keeps its own source) */
	random: RandomSource;
	/** Called after each impression */
	onImpression?: (index: number, result: InterleavedResult<T>, clicks: number[]) => void;
}

export function runSimulation<T extends DocumentId>(options: SimulationOptions<T>): WinTally {
	const { method, lists, relevance, k, impressions, model, random } = options;
	assertPositiveInteger("impressions", impressions);
	if (lists.length === 0) {
		throw new InvalidArgumentError("lists", "at least one ranked list is required");
	}
	validateClickModel(model);

	const tally = new WinTally(lists.length);
	for (let i = 0; i < impressions; i++) {
		const result =
			lists.length === 2
				? method.interleave(k, lists[0], lists[1])
				: method.multileave(k, ...lists);
		const clicks = simulateClicks(result, relevance, model, random);
		tally.record(method.evaluate(result, clicks), result.rankerCount);
		options.onImpression?.(i, result, clicks);
	}
	return tally;
}
