/**
 * Search Driver - evaluate candidate lineups and keep the best
 */

import { defaultRandom } from '../random.js';
import { countPermutations, generateLegalLineups, type GenerationStrategy } from '../lineup/generator.js';
import { LineupSimulator } from '../simulation/LineupSimulator.js';
import { DEFAULT_GAMES_PER_LINEUP } from '../types.js';
import type { GameRules, Lineup, LineupRecord, LineupRules, RandomSource, Roster } from '../types.js';

/**
 * Evaluates one lineup over `games` simulated games
 */
export type LineupEvaluator = (lineup: Lineup, games: number) => LineupRecord;

export interface SearchProgress {
	/** 0-100 */
	percent: number;
	evaluated: number;
	total: number;
	elapsedMs: number;
}

export interface SearchOptions {
	/** Default 10 */
	gamesPerLineup?: number;
	/** Evaluate at most this many lineups, sampled from the legal set */
	maxLineups?: number;
	strategy?: GenerationStrategy;
	maxAttempts?: number;
	rules?: Partial<LineupRules>;
	game?: Partial<GameRules>;
	random?: RandomSource;
	/** Candidates to evaluate instead of generating them */
	lineups?: readonly Lineup[];
	evaluate?: LineupEvaluator;
	onProgress?: (progress: SearchProgress) => void;
	/** Percent between progress reports. Default 10 */
	progressStep?: number;
	now?: () => number;
}

export interface SearchResult {
	/** null when there was nothing to evaluate */
	best: LineupRecord | null;
	/** Every evaluated lineup, in evaluation order */
	records: LineupRecord[];
	candidateCount: number;
	/** Size of the legal set; null when the candidates were sampled without counting it */
	legalLineupCount: number | null;
	totalPermutations: number;
	durationMs: number;
}

/**
 * Sort records by average runs, best first. Ties keep evaluation order.
 */
export function rankLineupRecords(records: readonly LineupRecord[], limit?: number): LineupRecord[] {
	const ranked = [...records].sort((a, b) => b.averageRuns - a.averageRuns);
	return limit === undefined ? ranked : ranked.slice(0, limit);
}

/**
 * Find the lineup with the highest average runs
 */
export function findBestLineup(roster: Roster, options: SearchOptions = {}): SearchResult {
	const {
		gamesPerLineup = DEFAULT_GAMES_PER_LINEUP,
		random = defaultRandom,
		progressStep = 10,
		now = Date.now,
		onProgress
	} = options;

	if (!Number.isInteger(gamesPerLineup) || gamesPerLineup <= 0) {
		throw new Error(`gamesPerLineup must be a positive integer, got ${gamesPerLineup}`);
	}

	const startTime = now();

	let candidates: readonly Lineup[];
	let legalLineupCount: number | null;
	if (options.lineups) {
		candidates = options.lineups;
		legalLineupCount = candidates.length;
	} else {
		const generated = generateLegalLineups(roster, {
			rules: options.rules,
			maxLineups: options.maxLineups,
			strategy: options.strategy,
			maxAttempts: options.maxAttempts,
			random
		});
		candidates = generated.lineups;
		legalLineupCount = generated.legalCount;
	}

	let evaluate = options.evaluate;
	if (!evaluate) {
		const simulator = new LineupSimulator(roster, { rules: options.game, random });
		evaluate = (lineup, games) => simulator.evaluate(lineup, games);
	}

	const records: LineupRecord[] = [];
	let best: LineupRecord | null = null;
	let bestAverage = Number.NEGATIVE_INFINITY;
	let reportedSteps = 0;
	const total = candidates.length;

	for (let i = 0; i < total; i++) {
		const record = evaluate(candidates[i], gamesPerLineup);
		records.push(record);

		if (record.averageRuns > bestAverage) {
			bestAverage = record.averageRuns;
			best = record;
		}

		// Whole progress steps completed, kept in integer arithmetic
		const steps = Math.floor(((i + 1) * 100) / (total * progressStep));
		if (onProgress && steps > reportedSteps) {
			onProgress({
				percent: ((i + 1) / total) * 100,
				evaluated: i + 1,
				total,
				elapsedMs: now() - startTime
			});
			reportedSteps = steps;
		}
	}

	return {
		best,
		records,
		candidateCount: total,
		legalLineupCount,
		totalPermutations: roster.players.length === 0 ? 0 : countPermutations(roster.players.length),
		durationMs: now() - startTime
	};
}
