/**
 * Tests for the Inning Simulator
 */

import { describe, it, expect } from 'vitest';
import { advanceRunners, createEmptyBases, playInning, simulateInning } from './inning.js';
import type { AtBatModel } from './at-bat.js';
import type { BasesGained, BaseState } from '../types.js';

const ORDER = ['Avery', 'Blake', 'Casey', 'Drew'];

const always = (bases: BasesGained): AtBatModel => () => bases;

/** Plays the given outcomes in order, then outs */
function scripted(outcomes: BasesGained[]): AtBatModel {
	let next = 0;
	return () => {
		const bases = next < outcomes.length ? outcomes[next] : 0;
		next++;
		return bases;
	};
}

describe('Inning Simulator', () => {
	describe('advanceRunners', () => {
		it('should score runners who reach home and place the batter', () => {
			const bases: BaseState = ['Avery', null, 'Casey', null];
			const runs = advanceRunners(bases, 'Drew', 2);
			expect(runs).toBe(1);
			expect(bases).toEqual([null, 'Drew', 'Avery', null]);
		});

		it('should move the lead runner before the trailing one', () => {
			const bases: BaseState = ['Avery', 'Blake', null, null];
			const runs = advanceRunners(bases, 'Casey', 1);
			expect(runs).toBe(0);
			expect(bases).toEqual(['Casey', 'Avery', 'Blake', null]);
		});

		it('should clear the bases on a home run', () => {
			const bases: BaseState = ['Avery', 'Blake', 'Casey', null];
			const runs = advanceRunners(bases, 'Drew', 4);
			expect(runs).toBe(4);
			expect(bases).toEqual(createEmptyBases());
		});
	});

	describe('playInning', () => {
		it('should score one run per home run up to the cap', () => {
			const result = playInning(ORDER, always(4));
			expect(result).toEqual({ runs: 6, outs: 0, atBats: 6, nextBatterIndex: 2 });
		});

		it('should end after three straight outs', () => {
			const result = playInning(ORDER, always(0));
			expect(result).toEqual({ runs: 0, outs: 3, atBats: 3, nextBatterIndex: 3 });
		});

		it('should return nothing for an empty batting order', () => {
			const result = playInning([], always(4));
			expect(result).toEqual({ runs: 0, outs: 0, atBats: 0, nextBatterIndex: 0 });
		});

		it('should score a runner from first on a triple', () => {
			expect(playInning(ORDER, scripted([1, 3])).runs).toBe(1);
		});

		it('should hold a runner at third when a single follows a double', () => {
			expect(playInning(ORDER, scripted([2, 1])).runs).toBe(0);
		});

		it('should force a run home on a single with the bases loaded', () => {
			const result = playInning(ORDER, scripted([1, 1, 1, 1]));
			expect(result.runs).toBe(1);
			expect(result.atBats).toBe(7);
		});

		it('should not count runs beyond the cap', () => {
			const result = playInning(ORDER, scripted([1, 1, 1, 4]), { runCap: 2 });
			expect(result.runs).toBe(2);
			expect(result.atBats).toBe(4);
		});

		it('should cycle through the order from the start index', () => {
			const batters: string[] = [];
			const atBat: AtBatModel = (name) => {
				batters.push(name);
				return 0;
			};
			const result = playInning(['Avery', 'Blake', 'Casey'], atBat, { startIndex: 1 });
			expect(batters).toEqual(['Blake', 'Casey', 'Avery']);
			expect(result.nextBatterIndex).toBe(1);
		});

		it('should wrap the order when it is shorter than the inning', () => {
			const batters: string[] = [];
			const atBat: AtBatModel = (name) => {
				batters.push(name);
				return batters.length <= 2 ? 1 : 0;
			};
			playInning(['Avery', 'Blake'], atBat);
			expect(batters).toEqual(['Avery', 'Blake', 'Avery', 'Blake', 'Avery']);
		});

		it('should honor a custom out limit', () => {
			expect(playInning(ORDER, always(0), { maxOuts: 1 }).atBats).toBe(1);
		});
	});

	describe('simulateInning', () => {
		it('should return the runs scored', () => {
			expect(simulateInning(ORDER, always(4))).toBe(6);
			expect(simulateInning(ORDER, always(0))).toBe(0);
		});
	});
});
