/**
 * Evaluation module - Click crediting and win tallies.
 */

export { countClicks, evaluateClicks } from "./evaluate.js";
export { WinTally } from "./tally.js";
