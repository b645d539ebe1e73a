/**
 * At-Bat Model
 *
 * A rating of r average bases becomes a two-point distribution over
 * floor(r) and floor(r) + 1, with P(floor(r) + 1) = r - floor(r).
 * The mean equals r while r < 4.
 */

import { defaultRandom } from '../random.js';
import type { BasesGained, RandomSource, Roster, UnknownPlayerPolicy } from '../types.js';

/**
 * Bases gained by the batter currently at the plate
 */
export type AtBatModel = (playerName: string) => BasesGained;

export interface AtBatModelOptions {
	random?: RandomSource;
	/** Default 'out' */
	unknownPlayer?: UnknownPlayerPolicy;
}

const MAX_BASES = 4;

function clampBases(bases: number): BasesGained {
	if (bases <= 0) return 0;
	if (bases === 1) return 1;
	if (bases === 2) return 2;
	if (bases === 3) return 3;
	return 4;
}

/**
 * Simulate one at-bat for a rating. Always consumes exactly one draw.
 */
export function simulateAtBat(rating: number, random: RandomSource = defaultRandom): BasesGained {
	const r = Number.isNaN(rating) ? 0 : rating;
	const whole = Math.floor(r);
	const fraction = r - whole;

	if (random() < fraction) {
		return clampBases(Math.min(whole + 1, MAX_BASES));
	}
	return clampBases(Math.min(whole, MAX_BASES));
}

/**
 * At-bat model bound to a roster
 */
export function createAtBatModel(roster: Roster, options: AtBatModelOptions = {}): AtBatModel {
	const { random = defaultRandom, unknownPlayer = 'out' } = options;
	const ratings = new Map(roster.players.map((p) => [p.name, p.rating]));

	return (playerName) => {
		const rating = ratings.get(playerName);
		if (rating === undefined) {
			if (unknownPlayer === 'throw') {
				throw new Error(`Unknown player in batting order: ${playerName}`);
			}
			return 0;
		}
		return simulateAtBat(rating, random);
	};
}
