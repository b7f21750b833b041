/**
 * Sequence module - Pooled linked sequences for repeated draws.
 */

export { NodePool, NIL } from "./node-pool.js";
export { RemovableSequence } from "./removable-sequence.js";
