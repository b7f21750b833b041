/**
 * Cascade click models.
 *
 * A simulated user scans the result from the top. At each position they
 * click with a probability depending on the document's relevance grade,
 * and after a click they stop scanning with a grade-dependent probability.
 */

import { InvalidArgumentError } from "../errors.js";
import type { RandomSource } from "../random.js";
import type { InterleavedResult } from "../ranking.js";
import type { DocumentId } from "../types.js";

export interface CascadeClickModel {
	name: string;
	/** Click probability per relevance grade (index = grade) */
	clickProbability: readonly number[];
	/** Probability of stopping after a click, per relevance grade */
	stopProbability: readonly number[];
}

/** Relevance grade per document; unlisted documents are grade 0 */
export type RelevanceJudgments<T extends DocumentId = DocumentId> = ReadonlyMap<T, number>;

export const CLICK_MODELS = {
	perfect: {
		name: "perfect",
		clickProbability: [0.0, 1.0],
		stopProbability: [0.0, 0.0],
	},
	navigational: {
		name: "navigational",
		clickProbability: [0.05, 0.95],
		stopProbability: [0.2, 0.9],
	},
	informational: {
		name: "informational",
		clickProbability: [0.4, 0.9],
		stopProbability: [0.1, 0.5],
	},
} as const satisfies Record<string, CascadeClickModel>;

export type ClickModelName = keyof typeof CLICK_MODELS;

export function isClickModelName(name: string): name is ClickModelName {
	return Object.hasOwn(CLICK_MODELS, name);
}

/**
 * Probability for `grade`; grades past the end of the table use its last entry.
 */
function probabilityFor(table: readonly number[], grade: number): number {
	if (table.length === 0) return 0;
	const index = Math.min(Math.max(0, Math.floor(grade)), table.length - 1);
	return table[index];
}

/**
 * Simulate one user on `result` and return the clicked positions.
 */
export function simulateClicks<T extends DocumentId>(
	result: InterleavedResult<T>,
	relevance: RelevanceJudgments<T>,
	model: CascadeClickModel,
	random: RandomSource,
): number[] {
	const clicks: number[] = [];
	for (let position = 0; position < result.length; position++) {
		const grade = relevance.get(result.documents[position]) ?? 0;
		if (random() >= probabilityFor(model.clickProbability, grade)) continue;

		clicks.push(position);
		if (random() < probabilityFor(model.stopProbability, grade)) break;
	}
	return clicks;
}

/**
 * Check that every probability of `model` lies in [0, 1].
 */
export function validateClickModel(model: CascadeClickModel): void {
	const all = [...model.clickProbability, ...model.stopProbability];
	if (model.clickProbability.length === 0 || all.some((p) => !(p >= 0 && p <= 1))) {
		throw new InvalidArgumentError("model", `${model.name} has probabilities outside [0, 1]`, {
			model: model.name,
		});
	}
}
