/**
 * Legality census: how much of the permutation space the rule allows
 */

import { getPlayerNames, toCategories } from '../roster.js';
import type { Lineup, LineupRules, Roster } from '../types.js';
import { countPermutations, permutations } from './generator.js';
import { isLegalLineup, resolveLineupRules } from './legality.js';

export interface LegalityCensus {
	totalPermutations: number;
	legalCount: number;
	/** 0-100 */
	legalPercentage: number;
	/** First legal lineups in generation order */
	legalExamples: Lineup[];
	/** First illegal lineups in generation order */
	illegalExamples: Lineup[];
}

export interface CensusOptions {
	rules?: Partial<LineupRules>;
	/** Examples of each kind to keep. Default 5 */
	examples?: number;
}

export function censusLegalLineups(roster: Roster, options: CensusOptions = {}): LegalityCensus {
	const rules = resolveLineupRules(options.rules);
	const examples = options.examples ?? 5;
	const legalExamples: Lineup[] = [];
	const illegalExamples: Lineup[] = [];
	let legalCount = 0;

	if (roster.players.length === 0) {
		return { totalPermutations: 0, legalCount: 0, legalPercentage: 0, legalExamples, illegalExamples };
	}

	for (const lineup of permutations(getPlayerNames(roster))) {
		if (isLegalLineup(toCategories(lineup, roster), rules)) {
			legalCount++;
			if (legalExamples.length < examples) legalExamples.push(lineup);
		} else if (illegalExamples.length < examples) {
			illegalExamples.push(lineup);
		}
	}

	const totalPermutations = countPermutations(roster.players.length);
	return {
		totalPermutations,
		legalCount,
		legalPercentage: (legalCount / totalPermutations) * 100,
		legalExamples,
		illegalExamples
	};
}
