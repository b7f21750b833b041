/**
 * NodePool - Free-list arena of singly linked list nodes.
 *
 * Nodes are addressed by index into parallel arrays instead of object
 * references. Released indices go onto a free stack and are handed out
 * again by `acquire`, so repeated interleavings reuse the same slots
 * rather than allocating new nodes.
 */

import { InvariantViolationError } from "../errors.js";

/** Index that marks "no next node" */
export const NIL = -1;

export class NodePool<T> {
	private values: Array<T | undefined> = [];
	private nextIndex: number[] = [];
	private inUse: boolean[] = [];
	private free: number[] = [];

	/**
	 * Take a node holding `value`, with no successor.
	 */
	acquire(value: T): number {
		const reused = this.free.pop();
		const index = reused ?? this.values.length;
		if (reused === undefined) {
			this.values.push(value);
			this.nextIndex.push(NIL);
			this.inUse.push(true);
			return index;
		}

		this.values[index] = value;
		this.nextIndex[index] = NIL;
		this.inUse[index] = true;
		return index;
	}

	/**
	 * Return a node to the free list.
	 */
	release(index: number): void {
		if (!this.inUse[index]) {
			throw new InvariantViolationError(`Node ${index} released twice or never acquired`, {
				index,
			});
		}
		this.values[index] = undefined;
		this.nextIndex[index] = NIL;
		this.inUse[index] = false;
		this.free.push(index);
	}

	value(index: number): T {
		const value = this.values[index];
		if (!this.inUse[index] || value === undefined) {
			throw new InvariantViolationError(`Node ${index} is not in use`, { index });
		}
		return value;
	}

	next(index: number): number {
		return this.nextIndex[index];
	}

	setNext(index: number, next: number): void {
		this.nextIndex[index] = next;
	}

	/** Nodes ever created */
	get capacity(): number {
		return this.values.length;
	}

	/** Nodes waiting on the free list */
	get available(): number {
		return this.free.length;
	}
}
