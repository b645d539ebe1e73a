/**
 * Tests for roster-config
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { loadRosterConfig, validateRosterConfig } from './roster-config.js';

const rosterPath = (file: string) => fileURLToPath(new URL(`../../../rosters/${file}`, import.meta.url));

describe('validateRosterConfig', () => {
	it('should accept a well-formed roster', () => {
		const result = validateRosterConfig({
			name: 'Test Roster',
			players: { Avery: 0.65, Casey: 0.3 },
			unrestricted: ['Casey'],
			rules: { maxConsecutive: 2 }
		});

		expect(result.isValid).toBe(true);
		expect(result.errors).toEqual([]);
		expect(result.config).toEqual({
			name: 'Test Roster',
			roster: { ratings: { Avery: 0.65, Casey: 0.3 }, unrestricted: ['Casey'] },
			rules: { maxConsecutive: 2 }
		});
	});

	it('should reject something that is not an object', () => {
		const result = validateRosterConfig([1, 2]);
		expect(result.isValid).toBe(false);
		expect(result.errors).toEqual(['Roster file must contain a JSON object']);
	});

	it('should fail fast on an empty roster', () => {
		const result = validateRosterConfig({ players: {} });
		expect(result.isValid).toBe(false);
		expect(result.errors).toEqual(['Roster has no players']);
	});

	it('should reject negative and non-numeric ratings', () => {
		const result = validateRosterConfig({ players: { Avery: -1, Blake: 'fast', Casey: 0.5 } });
		expect(result.isValid).toBe(false);
		expect(result.errors).toEqual(['Player Avery has a negative rating (-1)', 'Player Blake has a non-numeric rating']);
		expect(result.config).toBeUndefined();
	});

	it('should warn about ratings that always homer', () => {
		const result = validateRosterConfig({ players: { Avery: 5 } });
		expect(result.isValid).toBe(true);
		expect(result.warnings).toEqual(['Player Avery rating 5 exceeds 4 and will always homer']);
	});

	it('should warn about unrestricted names missing from the roster', () => {
		const result = validateRosterConfig({ players: { Avery: 1 }, unrestricted: ['Avery', 'Skyler'] });
		expect(result.isValid).toBe(true);
		expect(result.warnings).toEqual(['Unrestricted player Skyler is not on the roster']);
	});

	it('should reject malformed unrestricted lists', () => {
		expect(validateRosterConfig({ players: { Avery: 1 }, unrestricted: 'Avery' }).errors).toEqual([
			'"unrestricted" must be an array of player names'
		]);
		expect(validateRosterConfig({ players: { Avery: 1 }, unrestricted: [3] }).errors).toEqual([
			'"unrestricted" contains a non-string entry: 3'
		]);
	});

	it('should reject invalid rules', () => {
		const result = validateRosterConfig({
			players: { Avery: 1 },
			rules: { maxConsecutive: 0, wraparoundWindow: 1.5 }
		});
		expect(result.errors).toEqual([
			'rules.maxConsecutive must be an integer of at least 1',
			'rules.wraparoundWindow must be an integer of at least 0'
		]);
	});

	it('should default the name and the unrestricted list', () => {
		const result = validateRosterConfig({ players: { Avery: 1 } }, 'fallback');
		expect(result.config?.name).toBe('fallback');
		expect(result.config?.roster.unrestricted).toEqual([]);
		expect(result.config?.rules).toEqual({});
	});
});

describe('loadRosterConfig', () => {
	it('should load a roster file', () => {
		const { config, warnings } = loadRosterConfig(rosterPath('small.json'));
		expect(config.name).toBe('Small Roster');
		expect(Object.keys(config.roster.ratings)).toEqual(['Morgan', 'Riley', 'Jordan', 'Parker', 'Harper', 'Rowan']);
		expect(config.roster.unrestricted).toEqual(['Jordan', 'Harper']);
		expect(warnings).toEqual([]);
	});

	it('should pass on warnings from the example roster', () => {
		const { config, warnings } = loadRosterConfig(rosterPath('example.json'));
		expect(config.rules).toEqual({ maxConsecutive: 3 });
		expect(warnings).toEqual([
			'Unrestricted player Skyler is not on the roster',
			'Unrestricted player Tatum is not on the roster'
		]);
	});

	it('should throw for a missing file', () => {
		expect(() => loadRosterConfig(rosterPath('missing.json'))).toThrow(/^Failed to read roster file/);
	});
});
