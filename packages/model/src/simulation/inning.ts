/**
 * Inning Simulator
 *
 * Bats through the order until three outs or the run cap. Runners advance by
 * the batter's bases; anyone reaching base number 4 scores.
 */

import type { BaseState, Lineup } from '../types.js';
import type { AtBatModel } from './at-bat.js';

export interface InningOptions {
	/** Index into the batting order of the first batter. Default 0 */
	startIndex?: number;
	/** Default 3 */
	maxOuts?: number;
	/** Runs beyond the cap are not counted. Default 6 */
	runCap?: number;
}

export interface InningResult {
	runs: number;
	outs: number;
	atBats: number;
	/** Batting order index due up next inning */
	nextBatterIndex: number;
}

const HOME = 4;

export function createEmptyBases(): BaseState {
	return [null, null, null, null];
}

/**
 * Move every runner forward and put the batter on base.
 * Returns runs scored on the play; `bases` is updated in place.
 */
export function advanceRunners(bases: BaseState, batter: string, basesGained: number): number {
	let runs = 0;

	// Lead runner first so nobody is overwritten before moving
	for (let slot = bases.length - 1; slot >= 0; slot--) {
		const runner = bases[slot];
		if (runner === null) continue;

		bases[slot] = null;
		const target = slot + 1 + basesGained;
		if (target >= HOME) {
			runs++;
		} else {
			bases[target - 1] = runner;
		}
	}

	if (basesGained >= HOME) {
		runs++;
	} else {
		bases[basesGained - 1] = batter;
	}

	return runs;
}

/**
 * Play one inning and report what happened
 */
export function playInning(
	battingOrder: Lineup,
	atBat: AtBatModel,
	options: InningOptions = {}
): InningResult {
	const { startIndex = 0, maxOuts = 3, runCap = 6 } = options;

	if (battingOrder.length === 0) {
		return { runs: 0, outs: 0, atBats: 0, nextBatterIndex: 0 };
	}

	const bases = createEmptyBases();
	let runs = 0;
	let outs = 0;
	let atBats = 0;
	let index = startIndex;

	while (outs < maxOuts && runs < runCap) {
		const batter = battingOrder[index % battingOrder.length];
		const basesGained = atBat(batter);
		index++;
		atBats++;

		if (basesGained === 0) {
			outs++;
		} else {
			runs += advanceRunners(bases, batter, basesGained);
		}
	}

	return {
		runs: Math.min(runs, runCap),
		outs,
		atBats,
		nextBatterIndex: index % battingOrder.length
	};
}

/**
 * Runs scored in one inning
 */
export function simulateInning(
	battingOrder: Lineup,
	atBat: AtBatModel,
	options: InningOptions = {}
): number {
	return playInning(battingOrder, atBat, options).runs;
}
