/**
 * Lineup Generator - legal batting orders for a roster
 *
 * Two strategies:
 * - enumerate: every permutation is checked, then optionally shuffled and
 *   truncated to `maxLineups`. Exact, but the work grows as n! so it stops
 *   being practical above ENUMERATION_CEILING players.
 * - rejection: uniform random permutations are drawn and kept when legal and
 *   not seen before. Needs `maxLineups`.
 */

import { defaultRandom, shuffle } from '../random.js';
import { getPlayerNames, toCategories } from '../roster.js';
import type { Lineup, LineupRules, RandomSource, Roster } from '../types.js';
import { isLegalLineup, isLegalOrder, resolveLineupRules } from './legality.js';

export type GenerationStrategy = 'enumerate' | 'rejection';

export interface GenerateLineupsOptions {
	rules?: Partial<LineupRules>;
	/** Return at most this many lineups, sampled uniformly from the legal set */
	maxLineups?: number;
	/** Used for sampling; defaults to Math.random */
	random?: RandomSource;
	/** Default 'enumerate' */
	strategy?: GenerationStrategy;
	/** Rejection strategy only. Default maxLineups * 1000 */
	maxAttempts?: number;
}

export interface GeneratedLineups {
	lineups: Lineup[];
	/** Size of the legal set before sampling. null when rejection sampling never counts it */
	legalCount: number | null;
}

/** Largest roster that full enumeration is expected to handle */
export const ENUMERATION_CEILING = 10;

const DEFAULT_ATTEMPTS_PER_LINEUP = 1000;

/**
 * Every ordering of `items`, first element varying slowest
 */
export function* permutations<T>(items: readonly T[]): Generator<T[]> {
	if (items.length === 0) {
		yield [];
		return;
	}
	for (let i = 0; i < items.length; i++) {
		const rest = [...items.slice(0, i), ...items.slice(i + 1)];
		for (const tail of permutations(rest)) {
			yield [items[i], ...tail];
		}
	}
}

/**
 * n!
 */
export function countPermutations(n: number): number {
	let total = 1;
	for (let i = 2; i <= n; i++) {
		total *= i;
	}
	return total;
}

export function exceedsEnumerationCeiling(roster: Roster): boolean {
	return roster.players.length > ENUMERATION_CEILING;
}

function assertPositiveInteger(value: number, label: string): void {
	if (!Number.isInteger(value) || value <= 0) {
		throw new Error(`${label} must be a positive integer, got ${value}`);
	}
}

/**
 * All legal lineups in generation order
 */
function enumerateLegalLineups(roster: Roster, rules: LineupRules): Lineup[] {
	if (roster.players.length === 0) {
		return [];
	}

	const names = getPlayerNames(roster);
	const legal: Lineup[] = [];
	for (const lineup of permutations(names)) {
		if (isLegalLineup(toCategories(lineup, roster), rules)) {
			legal.push(lineup);
		}
	}
	return legal;
}

/**
 * Distinct legal lineups found by drawing uniform permutations
 */
function sampleLegalLineups(
	roster: Roster,
	rules: LineupRules,
	count: number,
	random: RandomSource,
	maxAttempts: number
): Lineup[] {
	if (roster.players.length === 0) {
		return [];
	}

	const names = getPlayerNames(roster);
	const seen = new Set<string>();
	const found: Lineup[] = [];

	for (let attempt = 0; attempt < maxAttempts && found.length < count; attempt++) {
		const candidate = shuffle(names, random);
		if (!isLegalOrder(candidate, roster, rules)) continue;

		const key = candidate.join('\u0000');
		if (seen.has(key)) continue;

		seen.add(key);
		found.push(candidate);
	}

	return found;
}

/**
 * Generate legal lineups for a roster
 */
export function generateLegalLineups(
	roster: Roster,
	options: GenerateLineupsOptions = {}
): GeneratedLineups {
	const { maxLineups, random = defaultRandom, strategy = 'enumerate' } = options;
	const rules = resolveLineupRules(options.rules);

	if (maxLineups !== undefined) {
		assertPositiveInteger(maxLineups, 'maxLineups');
	}

	if (strategy === 'rejection') {
		if (maxLineups === undefined) {
			throw new Error('Rejection sampling needs maxLineups');
		}
		const maxAttempts = options.maxAttempts ?? maxLineups * DEFAULT_ATTEMPTS_PER_LINEUP;
		assertPositiveInteger(maxAttempts, 'maxAttempts');

		const lineups = sampleLegalLineups(roster, rules, maxLineups, random, maxAttempts);
		return { lineups, legalCount: null };
	}

	const legal = enumerateLegalLineups(roster, rules);
	if (maxLineups !== undefined && legal.length > maxLineups) {
		return { lineups: shuffle(legal, random).slice(0, maxLineups), legalCount: legal.length };
	}
	return { lineups: legal, legalCount: legal.length };
}
