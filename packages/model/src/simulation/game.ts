/**
 * Game Simulator - a fixed number of innings, runs summed
 */

import { DEFAULT_GAME_RULES } from '../types.js';
import type { Lineup } from '../types.js';
import type { AtBatModel } from './at-bat.js';
import { playInning, type InningOptions, type InningResult } from './inning.js';

/**
 * Plays one inning starting from a batting order index
 */
export type InningSimulator = (battingOrder: Lineup, startIndex: number) => InningResult;

export interface GameOptions {
	/** Default 6 */
	innings?: number;
	/** Carry the batting order across innings instead of restarting at the leadoff */
	continueBattingOrder?: boolean;
	/** Verbose hook, called after each inning (1-based) */
	onInning?: (inning: number, runs: number) => void;
}

/**
 * Inning simulator backed by an at-bat model
 */
export function createInningSimulator(
	atBat: AtBatModel,
	options: Omit<InningOptions, 'startIndex'> = {}
): InningSimulator {
	return (battingOrder, startIndex) => playInning(battingOrder, atBat, { ...options, startIndex });
}

/**
 * Total runs over one game
 */
export function simulateGame(
	battingOrder: Lineup,
	simulateInning: InningSimulator,
	options: GameOptions = {}
): number {
	const {
		innings = DEFAULT_GAME_RULES.innings,
		continueBattingOrder = DEFAULT_GAME_RULES.continueBattingOrder,
		onInning
	} = options;

	let totalRuns = 0;
	let nextBatter = 0;

	for (let inning = 1; inning <= innings; inning++) {
		const result = simulateInning(battingOrder, continueBattingOrder ? nextBatter : 0);
		totalRuns += result.runs;
		nextBatter = result.nextBatterIndex;
		onInning?.(inning, result.runs);
	}

	return totalRuns;
}
