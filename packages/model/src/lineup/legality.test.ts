/**
 * Tests for Lineup Legality
 */

import { describe, it, expect } from 'vitest';
import { isLegalLineup, isLegalOrder, longestRestrictedRun, resolveLineupRules } from './legality.js';
import { createRoster } from '../roster.js';
import type { Category } from '../types.js';

const R: Category = 'restricted';
const U: Category = 'unrestricted';

describe('Lineup Legality', () => {
	describe('resolveLineupRules', () => {
		it('should default to three in a row with a matching window', () => {
			expect(resolveLineupRules()).toEqual({ maxConsecutive: 3, wraparoundWindow: 3 });
		});

		it('should let the window follow maxConsecutive', () => {
			expect(resolveLineupRules({ maxConsecutive: 2 })).toEqual({ maxConsecutive: 2, wraparoundWindow: 2 });
		});

		it('should keep an explicit window independent of maxConsecutive', () => {
			expect(resolveLineupRules({ maxConsecutive: 2, wraparoundWindow: 5 })).toEqual({
				maxConsecutive: 2,
				wraparoundWindow: 5
			});
		});
	});

	describe('isLegalLineup', () => {
		it('should accept an empty order', () => {
			expect(isLegalLineup([])).toBe(true);
		});

		it('should accept three restricted players in a row', () => {
			expect(isLegalLineup([R, R, R, U])).toBe(true);
		});

		it('should reject four restricted players in a row', () => {
			expect(isLegalLineup([R, R, R, R, U])).toBe(false);
		});

		it('should reject a run that no window of three can reveal', () => {
			// Every 3-wide window holds at most 3 restricted players, yet the run is 4 long
			expect(isLegalLineup([U, R, R, R, R])).toBe(false);
		});

		it('should reject a run formed across the wraparound', () => {
			expect(isLegalLineup([R, R, U, R, R])).toBe(false);
		});

		it('should accept short runs on both sides of the wraparound', () => {
			expect(isLegalLineup([R, R, U, R, U])).toBe(true);
		});

		it('should run the wraparound scan for short orders too', () => {
			expect(isLegalLineup([R])).toBe(true);
			expect(isLegalLineup([R, R])).toBe(false);
			expect(isLegalLineup([R, R, R])).toBe(false);
			expect(isLegalLineup([R, R, U])).toBe(true);
		});

		it('should honor a lower maxConsecutive', () => {
			expect(isLegalLineup([R, R, U, U], { maxConsecutive: 2 })).toBe(true);
			expect(isLegalLineup([R, R, U, R], { maxConsecutive: 2 })).toBe(false);
		});

		it('should only look as far into the wraparound as the window allows', () => {
			expect(isLegalLineup([R, R, U, R, R], { wraparoundWindow: 0 })).toBe(true);
			expect(isLegalLineup([R, R, U, R, R], { wraparoundWindow: 1 })).toBe(true);
			expect(isLegalLineup([R, R, U, R, R], { wraparoundWindow: 2 })).toBe(false);
		});

		it('should accept any order of an all-unrestricted roster', () => {
			expect(isLegalLineup([U, U, U, U, U, U])).toBe(true);
		});
	});

	describe('longestRestrictedRun', () => {
		it('should count runs that wrap to the top of the order', () => {
			expect(longestRestrictedRun([R, R, U, R, R])).toBe(4);
		});

		it('should count only the linear run without a window', () => {
			expect(longestRestrictedRun([R, R, U, R, R], 0)).toBe(2);
		});

		it('should be zero with no restricted players', () => {
			expect(longestRestrictedRun([U, U])).toBe(0);
		});
	});

	describe('isLegalOrder', () => {
		const roster = createRoster({
			ratings: { A: 1.0, B: 1.0, C: 1.0, D: 1.0 },
			unrestricted: ['D']
		});

		it('should accept three restricted players followed by an unrestricted one', () => {
			expect(isLegalOrder(['A', 'B', 'C', 'D'], roster)).toBe(true);
		});

		it('should accept every order when restricted players number no more than the limit', () => {
			expect(isLegalOrder(['D', 'A', 'B', 'C'], roster)).toBe(true);
			expect(isLegalOrder(['A', 'D', 'B', 'C'], roster)).toBe(true);
		});

		it('should read names missing from the roster as unrestricted', () => {
			const allRestricted = createRoster({
				ratings: { A: 1, B: 1, C: 1 },
				unrestricted: []
			});
			expect(isLegalOrder(['A', 'B', 'C', 'Z'], allRestricted)).toBe(true);
		});
	});
});
