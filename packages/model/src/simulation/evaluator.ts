/**
 * Lineup Evaluator - average runs over repeated games
 */

import { DEFAULT_GAMES_PER_LINEUP } from '../types.js';
import type { Lineup, LineupRecord } from '../types.js';

export interface EvaluateOptions {
	/** Games to simulate. Default 10 */
	games?: number;
	/** Runs scored by one game with this batting order */
	simulateGame: (battingOrder: Lineup) => number;
}

/**
 * Simulate `games` games and reduce them to an average
 */
export function evaluateLineup(lineup: Lineup, options: EvaluateOptions): LineupRecord {
	const { games = DEFAULT_GAMES_PER_LINEUP, simulateGame } = options;

	if (!Number.isInteger(games) || games <= 0) {
		throw new Error(`games must be a positive integer, got ${games}`);
	}

	const gameResults: number[] = [];
	let totalRuns = 0;
	for (let i = 0; i < games; i++) {
		const runs = simulateGame(lineup);
		totalRuns += runs;
		gameResults.push(runs);
	}

	return Object.freeze({
		lineup: Object.freeze([...lineup]),
		averageRuns: totalRuns / games,
		gameResults: Object.freeze(gameResults)
	});
}
