/**
 * Lineup Legality - consecutive-category rule with wraparound
 *
 * A batting order cycles, so the last batters are followed by the leadoff.
 * A lineup is legal when no run of restricted players exceeds
 * `maxConsecutive`, both reading the order once and reading it again with its
 * first `wraparoundWindow` batters appended.
 */

import { toCategories } from '../roster.js';
import { DEFAULT_LINEUP_RULES } from '../types.js';
import type { Category, Lineup, LineupRules, Roster } from '../types.js';

/**
 * Fill in unset rules. `wraparoundWindow` follows `maxConsecutive` unless given.
 */
export function resolveLineupRules(rules: Partial<LineupRules> = {}): LineupRules {
	const maxConsecutive = rules.maxConsecutive ?? DEFAULT_LINEUP_RULES.maxConsecutive;
	return {
		maxConsecutive,
		wraparoundWindow: rules.wraparoundWindow ?? maxConsecutive
	};
}

/**
 * Longest run of restricted players in a sequence
 */
function longestRun(categories: readonly Category[]): number {
	let longest = 0;
	let current = 0;
	for (const category of categories) {
		if (category === 'restricted') {
			current++;
			if (current > longest) longest = current;
		} else {
			current = 0;
		}
	}
	return longest;
}

/**
 * The sequence followed by its own first `window` entries
 */
function withWraparound<T>(items: readonly T[], window: number): T[] {
	return [...items, ...items.slice(0, window)];
}

/**
 * Longest restricted run, counting the wraparound into the top of the order
 */
export function longestRestrictedRun(
	categories: readonly Category[],
	wraparoundWindow: number = DEFAULT_LINEUP_RULES.wraparoundWindow
): number {
	return Math.max(longestRun(categories), longestRun(withWraparound(categories, wraparoundWindow)));
}

/**
 * Check a category sequence against the consecutive rule
 */
export function isLegalLineup(
	categories: readonly Category[],
	rules: Partial<LineupRules> = {}
): boolean {
	const { maxConsecutive, wraparoundWindow } = resolveLineupRules(rules);

	if (longestRun(categories) > maxConsecutive) {
		return false;
	}

	// Always run the wraparound scan, even for short orders
	return longestRun(withWraparound(categories, wraparoundWindow)) <= maxConsecutive;
}

/**
 * Check a batting order of player names against the roster's categories
 */
export function isLegalOrder(
	lineup: Lineup,
	roster: Roster,
	rules: Partial<LineupRules> = {}
): boolean {
	return isLegalLineup(toCategories(lineup, roster), rules);
}
