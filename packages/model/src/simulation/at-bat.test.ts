/**
 * Tests for the At-Bat Model
 */

import { describe, it, expect } from 'vitest';
import { createAtBatModel, simulateAtBat } from './at-bat.js';
import { createSeededRandom } from '../random.js';
import { createRoster } from '../roster.js';
import type { RandomSource } from '../types.js';

function countingRandom(value: number): { random: RandomSource; calls: () => number } {
	let calls = 0;
	return {
		random: () => {
			calls++;
			return value;
		},
		calls: () => calls
	};
}

describe('At-Bat Model', () => {
	describe('simulateAtBat', () => {
		it('should round up when the draw falls under the fractional part', () => {
			expect(simulateAtBat(1.3, () => 0.2)).toBe(2);
		});

		it('should round down otherwise', () => {
			expect(simulateAtBat(1.3, () => 0.5)).toBe(1);
			expect(simulateAtBat(0.65, () => 0.65)).toBe(0);
		});

		it('should always return the whole part for whole ratings', () => {
			expect(simulateAtBat(2, () => 0)).toBe(2);
			expect(simulateAtBat(0, () => 0)).toBe(0);
		});

		it('should cap at four bases', () => {
			expect(simulateAtBat(3.5, () => 0.1)).toBe(4);
			expect(simulateAtBat(4.5, () => 0.1)).toBe(4);
			expect(simulateAtBat(4.5, () => 0.9)).toBe(4);
			expect(simulateAtBat(12, () => 0.9)).toBe(4);
			expect(simulateAtBat(Number.POSITIVE_INFINITY, () => 0.5)).toBe(4);
		});

		it('should clamp negative ratings to an out', () => {
			expect(simulateAtBat(-0.5, () => 0.2)).toBe(0);
			expect(simulateAtBat(-0.5, () => 0.9)).toBe(0);
			expect(simulateAtBat(-3, () => 0.9)).toBe(0);
		});

		it('should treat NaN as an out', () => {
			expect(simulateAtBat(Number.NaN, () => 0)).toBe(0);
		});

		it('should consume exactly one draw', () => {
			const whole = countingRandom(0.5);
			simulateAtBat(2, whole.random);
			expect(whole.calls()).toBe(1);

			const fractional = countingRandom(0.5);
			simulateAtBat(0.3, fractional.random);
			expect(fractional.calls()).toBe(1);
		});

		it('should average close to the rating over many draws', () => {
			const random = createSeededRandom(2024);
			for (const rating of [0, 0.3, 0.65, 1.25, 2.5, 3.9]) {
				let total = 0;
				const draws = 100_000;
				for (let i = 0; i < draws; i++) {
					total += simulateAtBat(rating, random);
				}
				expect(Math.abs(total / draws - rating)).toBeLessThan(0.02);
			}
		});
	});

	describe('createAtBatModel', () => {
		const roster = createRoster({ ratings: { Avery: 1.0, Blake: 2.5 }, unrestricted: [] });

		it('should use the named player rating', () => {
			const atBat = createAtBatModel(roster, { random: () => 0.4 });
			expect(atBat('Avery')).toBe(1);
			expect(atBat('Blake')).toBe(3);
		});

		it('should record an out for an unknown player without drawing', () => {
			const counter = countingRandom(0);
			const atBat = createAtBatModel(roster, { random: counter.random });
			expect(atBat('Ghost')).toBe(0);
			expect(counter.calls()).toBe(0);
		});

		it('should throw for an unknown player when asked to', () => {
			const atBat = createAtBatModel(roster, { random: () => 0, unknownPlayer: 'throw' });
			expect(() => atBat('Ghost')).toThrow('Unknown player in batting order: Ghost');
		});
	});
});
