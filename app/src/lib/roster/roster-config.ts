/**
 * Roster Configuration
 *
 * Reads and validates roster files. A roster file looks like:
 *
 * ```json
 * {
 *   "name": "Thursday League",
 *   "players": { "Avery": 0.65, "Casey": 0.3 },
 *   "unrestricted": ["Casey"],
 *   "rules": { "maxConsecutive": 3 }
 * }
 * ```
 *
 * Everyone not listed in `unrestricted` is restricted.
 */

import { readFileSync } from 'fs';
import type { LineupRules, RosterConfig } from '@lineup/model';

export interface LoadedRosterConfig {
	name: string;
	roster: RosterConfig;
	rules: Partial<LineupRules>;
}

export interface RosterConfigValidationResult {
	/** Whether the configuration can be used */
	isValid: boolean;
	/** Problems that prevent loading */
	errors: string[];
	/** Unusual but usable settings */
	warnings: string[];
	/** Present when valid */
	config?: LoadedRosterConfig;
}

const RULE_KEYS = ['maxConsecutive', 'wraparoundWindow'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate parsed roster JSON.
 *
 * Validation rules:
 * 1. `players` maps names to finite, non-negative ratings and is not empty
 * 2. `unrestricted` is an array of names (names missing from `players` only warn)
 * 3. `rules`, when given, holds non-negative integers (maxConsecutive at least 1)
 */
export function validateRosterConfig(raw: unknown, fallbackName = 'roster'): RosterConfigValidationResult {
	const errors: string[] = [];
	const warnings: string[] = [];

	if (!isRecord(raw)) {
		return { isValid: false, errors: ['Roster file must contain a JSON object'], warnings };
	}

	// Rule 1: players
	const ratings: Record<string, number> = {};
	if (!isRecord(raw.players)) {
		errors.push('"players" must be an object mapping names to ratings');
	} else {
		for (const [name, rating] of Object.entries(raw.players)) {
			if (typeof rating !== 'number' || !Number.isFinite(rating)) {
				errors.push(`Player ${name} has a non-numeric rating`);
			} else if (rating < 0) {
				errors.push(`Player ${name} has a negative rating (${rating})`);
			} else {
				ratings[name] = rating;
				if (rating > 4) {
					warnings.push(`Player ${name} rating ${rating} exceeds 4 and will always homer`);
				}
			}
		}
		if (Object.keys(raw.players).length === 0) {
			errors.push('Roster has no players');
		}
	}

	// Rule 2: unrestricted names
	const unrestricted: string[] = [];
	if (raw.unrestricted !== undefined) {
		if (!Array.isArray(raw.unrestricted)) {
			errors.push('"unrestricted" must be an array of player names');
		} else {
			for (const name of raw.unrestricted) {
				if (typeof name !== 'string') {
					errors.push(`"unrestricted" contains a non-string entry: ${JSON.stringify(name)}`);
				} else {
					unrestricted.push(name);
					if (isRecord(raw.players) && !(name in raw.players)) {
						warnings.push(`Unrestricted player ${name} is not on the roster`);
					}
				}
			}
		}
	}

	// Rule 3: rules
	const rules: Partial<LineupRules> = {};
	if (raw.rules !== undefined) {
		if (!isRecord(raw.rules)) {
			errors.push('"rules" must be an object');
		} else {
			for (const key of RULE_KEYS) {
				const value = raw.rules[key];
				if (value === undefined) continue;
				const minimum = key === 'maxConsecutive' ? 1 : 0;
				if (typeof value !== 'number' || !Number.isInteger(value) || value < minimum) {
					errors.push(`rules.${key} must be an integer of at least ${minimum}`);
				} else {
					rules[key] = value;
				}
			}
		}
	}

	const name = typeof raw.name === 'string' && raw.name.length > 0 ? raw.name : fallbackName;

	if (errors.length > 0) {
		return { isValid: false, errors, warnings };
	}

	return {
		isValid: true,
		errors,
		warnings,
		config: { name, roster: { ratings, unrestricted }, rules }
	};
}

/**
 * Read a roster file. Throws with every validation error when the file is unusable.
 */
export function loadRosterConfig(path: string): { config: LoadedRosterConfig; warnings: string[] } {
	let raw: unknown;
	try {
		raw = JSON.parse(readFileSync(path, 'utf-8'));
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new Error(`Failed to read roster file ${path}: ${reason}`);
	}

	const fallbackName = path.split(/[\\/]/).pop()?.replace(/\.json$/, '') ?? 'roster';
	const result = validateRosterConfig(raw, fallbackName);
	if (!result.isValid || !result.config) {
		throw new Error(`Invalid roster file ${path}: ${result.errors.join('; ')}`);
	}
	return { config: result.config, warnings: result.warnings };
}
