/**
 * WinTally - Head-to-head record across many impressions.
 *
 * Each recorded impression contributes one comparison per ranker pair:
 * a listed preference is a win for one side and a loss for the other,
 * an unlisted pair is a tie.
 */

import { InvalidArgumentError } from "../errors.js";
import type { PairwisePreference, RankerScore } from "../types.js";

export class WinTally {
	private rankerCount = 0;
	/** beats[i][j] = impressions in which ranker i beat ranker j */
	private beats: number[][] = [];
	private tieCounts: number[] = [];
	private recorded = 0;

	constructor(rankerCount = 0) {
		this.grow(rankerCount);
	}

	/**
	 * Record the outcome of one impression with `rankerCount` rankers.
	 */
	record(outcome: readonly PairwisePreference[], rankerCount: number): void {
		const decided = decidedPairs(outcome, rankerCount);

		this.grow(rankerCount);
		for (const { winner, loser } of outcome) {
			this.beats[winner][loser]++;
		}
		this.recorded++;
		this.recordTies(rankerCount, decided);
	}

	get impressions(): number {
		return this.recorded;
	}

	/**
	 * Copy of the preference matrix: entry [i][j] counts wins of i over j.
	 */
	preferenceMatrix(): number[][] {
		return this.beats.map((row) => [...row]);
	}

	scores(): RankerScore[] {
		const scores: RankerScore[] = [];
		for (let i = 0; i < this.rankerCount; i++) {
			let wins = 0;
			let losses = 0;
			for (let j = 0; j < this.rankerCount; j++) {
				wins += this.beats[i][j];
				losses += this.beats[j][i];
			}
			const ties = this.tieCounts[i];
			const total = wins + losses + ties;
			scores.push({
				rankerIndex: i,
				wins,
				losses,
				ties,
				winRate: total > 0 ? (wins + 0.5 * ties) / total : 0,
			});
		}
		return scores;
	}

	private recordTies(rankerCount: number, decided: ReadonlySet<string>): void {
		for (let i = 0; i < rankerCount; i++) {
			for (let j = i + 1; j < rankerCount; j++) {
				if (decided.has(pairKey(i, j))) continue;
				this.tieCounts[i]++;
				this.tieCounts[j]++;
			}
		}
	}

	private grow(rankerCount: number): void {
		if (rankerCount <= this.rankerCount) return;

		for (const row of this.beats) {
			while (row.length < rankerCount) row.push(0);
		}
		while (this.beats.length < rankerCount) {
			this.beats.push(new Array<number>(rankerCount).fill(0));
			this.tieCounts.push(0);
		}
		this.rankerCount = rankerCount;
	}
}

/**
 * Keys of the ranker pairs decided by `outcome`. Each pair may be decided
 * at most once per impression.
 */
function decidedPairs(outcome: readonly PairwisePreference[], rankerCount: number): Set<string> {
	const decided = new Set<string>();
	for (const { winner, loser } of outcome) {
		if (winner === loser || !inRange(winner, rankerCount) || !inRange(loser, rankerCount)) {
			throw new InvalidArgumentError("outcome", `bad preference ${winner} > ${loser}`, {
				winner,
				loser,
				rankerCount,
			});
		}
		const key = pairKey(Math.min(winner, loser), Math.max(winner, loser));
		if (decided.has(key)) {
			throw new InvalidArgumentError("outcome", `rankers ${winner} and ${loser} are compared twice`, {
				winner,
				loser,
			});
		}
		decided.add(key);
	}
	return decided;
}

function inRange(index: number, rankerCount: number): boolean {
	return Number.isInteger(index) && index >= 0 && index < rankerCount;
}

function pairKey(i: number, j: number): string {
	return `${i}:${j}`;
}
