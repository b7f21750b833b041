/**
 * Simulation module - Cascade users for offline comparisons.
 */

export {
	CLICK_MODELS,
	isClickModelName,
	simulateClicks,
	validateClickModel,
	type CascadeClickModel,
	type ClickModelName,
	type RelevanceJudgments,
} from "./click-model.js";
export { runSimulation, type SimulationOptions } from "./simulator.js";
