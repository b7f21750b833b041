/**
 * InterleavedResult - The blended list shown to a user.
 *
 * Records each chosen document together with the index of the ranker it
 * was drawn from. Engines fill a result incrementally and seal it before
 * handing it out; a sealed result rejects further appends and its arrays
 * are frozen.
 */

import { z } from "zod";
import { InvalidArgumentError, InvariantViolationError } from "./errors.js";
import type { DocumentId } from "./types.js";

// ============================================================================
// Serialization Schema
// ============================================================================

export const interleavedResultSchema = z
	.object({
		rankerCount: z.number().int().positive(),
		documents: z.array(z.union([z.string(), z.number()])),
		rankerIndices: z.array(z.number().int().nonnegative()),
	})
	.refine((value) => value.documents.length === value.rankerIndices.length, {
		message: "documents and rankerIndices must have the same length",
	})
	.refine((value) => value.rankerIndices.every((index) => index < value.rankerCount), {
		message: "ranker index out of range",
	});

export type SerializedInterleavedResult = z.infer<typeof interleavedResultSchema>;

// ============================================================================
// InterleavedResult Class
// ============================================================================

export class InterleavedResult<T extends DocumentId = DocumentId> {
	readonly rankerCount: number;
	private docs: T[] = [];
	private rankers: number[] = [];
	private sealed = false;

	constructor(rankerCount: number) {
		this.rankerCount = rankerCount;
	}

	/**
	 * Record `document` as drawn from ranker `rankerIndex`.
	 */
	append(document: T, rankerIndex: number): void {
		if (this.sealed) {
			throw new InvariantViolationError("Cannot append to a sealed result", {
				length: this.docs.length,
			});
		}
		this.docs.push(document);
		this.rankers.push(rankerIndex);
	}

	seal(): this {
		this.sealed = true;
		Object.freeze(this.docs);
		Object.freeze(this.rankers);
		return this;
	}

	get isSealed(): boolean {
		return this.sealed;
	}

	get length(): number {
		return this.docs.length;
	}

	get documents(): readonly T[] {
		return this.docs;
	}

	/** Originating ranker per position, parallel to `documents` */
	get rankerIndices(): readonly number[] {
		return this.rankers;
	}

	/**
	 * Ranker that contributed the document at `position`.
	 */
	rankerAt(position: number): number {
		if (!Number.isInteger(position) || position < 0 || position >= this.rankers.length) {
			throw new InvalidArgumentError(
				"click",
				`position ${position} is outside the result (length ${this.rankers.length})`,
				{ position, length: this.rankers.length },
			);
		}
		return this.rankers[position];
	}

	toJSON(): SerializedInterleavedResult {
		return {
			rankerCount: this.rankerCount,
			documents: [...this.docs],
			rankerIndices: [...this.rankers],
		};
	}

	/**
	 * Rebuild a sealed result from its JSON form.
	 */
	static fromJSON(input: unknown): InterleavedResult {
		const parsed = interleavedResultSchema.safeParse(input);
		if (!parsed.success) {
			throw new InvalidArgumentError("result", parsed.error.issues.map((i) => i.message).join("; "));
		}

		const result = new InterleavedResult(parsed.data.rankerCount);
		parsed.data.documents.forEach((document, position) => {
			result.append(document, parsed.data.rankerIndices[position]);
		});
		return result.seal();
	}
}
