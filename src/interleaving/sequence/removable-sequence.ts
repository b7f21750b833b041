/**
 * RemovableSequence - Ordered collection with O(1) removal by identity.
 *
 * Surviving elements form a singly linked list of pool nodes. Each element
 * maps to the node *before* it (or to the head), so removing an element
 * is a map lookup plus one relink:
 *
 * ```
 * head → [a] → [b] → [c]        predecessors: a→head, b→[a], c→[b]
 * remove(b)
 * head → [a] → [c]              predecessors: a→head, c→[a]
 * ```
 *
 * Positional access is O(n); the only access patterns are full in-order
 * scans and removal by identity.
 */

import { NIL, NodePool } from "./node-pool.js";

/** Predecessor marker for the first element */
const HEAD = NIL;

export class RemovableSequence<T> implements Iterable<T> {
	private readonly pool: NodePool<T>;
	private first = NIL;
	private last = NIL;
	private predecessors = new Map<T, number>();

	constructor(pool: NodePool<T>, values: Iterable<T> = []) {
		this.pool = pool;
		for (const value of values) {
			this.append(value);
		}
	}

	/**
	 * Append `value` at the end. Values already present are ignored, so the
	 * first occurrence keeps its position.
	 */
	append(value: T): boolean {
		if (this.predecessors.has(value)) return false;

		const node = this.pool.acquire(value);
		if (this.last === NIL) {
			this.first = node;
		} else {
			this.pool.setNext(this.last, node);
		}
		this.predecessors.set(value, this.last);
		this.last = node;
		return true;
	}

	/** Surviving element count */
	get length(): number {
		return this.predecessors.size;
	}

	has(value: T): boolean {
		return this.predecessors.has(value);
	}

	/**
	 * Unlink `value` and give its node back to the pool.
	 * Returns false when `value` is not in the sequence.
	 */
	remove(value: T): boolean {
		const prev = this.predecessors.get(value);
		if (prev === undefined) return false;

		const node = this.successorOf(prev);
		const after = this.pool.next(node);
		if (prev === HEAD) {
			this.first = after;
		} else {
			this.pool.setNext(prev, after);
		}

		if (after === NIL) {
			this.last = prev;
		} else {
			this.predecessors.set(this.pool.value(after), prev);
		}

		this.predecessors.delete(value);
		this.pool.release(node);
		return true;
	}

	/**
	 * Remove every surviving element, releasing all nodes to the pool.
	 * The sequence remains usable afterwards.
	 */
	drain(): void {
		let node = this.first;
		while (node !== NIL) {
			const after = this.pool.next(node);
			this.pool.release(node);
			node = after;
		}
		this.first = NIL;
		this.last = NIL;
		this.predecessors.clear();
	}

	*[Symbol.iterator](): Iterator<T> {
		let node = this.first;
		while (node !== NIL) {
			yield this.pool.value(node);
			node = this.pool.next(node);
		}
	}

	toArray(): T[] {
		return [...this];
	}

	private successorOf(prev: number): number {
		return prev === HEAD ? this.first : this.pool.next(prev);
	}
}
