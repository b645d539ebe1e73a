/**
 * Core types for the batting order optimizer
 */

/**
 * Fairness category of a player.
 * Restricted players may not bat more than `maxConsecutive` in a row.
 */
export type Category = 'restricted' | 'unrestricted';

/**
 * Whole bases gained by a single at-bat. 0 is an out, 4 is a home run.
 */
export type BasesGained = 0 | 1 | 2 | 3 | 4;

/**
 * Uniform random source on [0, 1)
 */
export type RandomSource = () => number;

export interface Player {
  /** Unique within the roster */
  name: string;
  /** Average bases per at-bat (non-negative) */
  rating: number;
  category: Category;
}

export interface Roster {
  players: readonly Player[];
}

/**
 * Roster as configured: ratings keyed by name plus the named unrestricted set.
 * Everyone not named in `unrestricted` is restricted.
 */
export interface RosterConfig {
  ratings: Readonly<Record<string, number>>;
  unrestricted: readonly string[];
}

/**
 * A batting order: every roster player's name exactly once.
 */
export type Lineup = readonly string[];

/**
 * Occupant of a base slot (player name), or null when empty
 */
export type Runner = string | null;

/**
 * First, second, third, and the home-bound marker.
 * Slot index i holds the runner standing on base number i + 1.
 */
export type BaseState = [Runner, Runner, Runner, Runner];

/**
 * Legality rules for the consecutive-category constraint
 */
export interface LineupRules {
  /** Most restricted players allowed in a row */
  maxConsecutive: number;
  /** How many leading players are appended when checking the wraparound */
  wraparoundWindow: number;
}

/**
 * What happens when the batting order names someone who is not on the roster
 */
export type UnknownPlayerPolicy = 'out' | 'throw';

/**
 * Structure of a simulated game
 */
export interface GameRules {
  innings: number;
  maxOuts: number;
  runCap: number;
  /** Start each inning where the previous one stopped instead of at the leadoff */
  continueBattingOrder: boolean;
  unknownPlayer: UnknownPlayerPolicy;
}

/**
 * One evaluated lineup
 */
export interface LineupRecord {
  lineup: Lineup;
  averageRuns: number;
  /** Per-game run totals in simulation order */
  gameResults: readonly number[];
}

export const DEFAULT_LINEUP_RULES: Readonly<LineupRules> = {
  maxConsecutive: 3,
  wraparoundWindow: 3,
};

export const DEFAULT_GAME_RULES: Readonly<GameRules> = {
  innings: 6,
  maxOuts: 3,
  runCap: 6,
  continueBattingOrder: false,
  unknownPlayer: 'out',
};

export const DEFAULT_GAMES_PER_LINEUP = 10;
