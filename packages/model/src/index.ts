/**
 * @lineup/model - Batting order optimizer
 *
 * Finds the batting order that scores the most runs on average, subject to a
 * limit on how many restricted-category players may bat in a row
 * (wrapping from the last batter back to the leadoff).
 *
 * Legal orders are enumerated (or sampled), each is played through a number of
 * simulated games, and the results are ranked by average runs.
 */

// Core types
export type {
  Category,
  BasesGained,
  RandomSource,
  Player,
  Roster,
  RosterConfig,
  Lineup,
  Runner,
  BaseState,
  LineupRules,
  UnknownPlayerPolicy,
  GameRules,
  LineupRecord,
} from './types.js';
export { DEFAULT_LINEUP_RULES, DEFAULT_GAME_RULES, DEFAULT_GAMES_PER_LINEUP } from './types.js';

// Randomness
export { defaultRandom, createSeededRandom, shuffle, MAX_SEED } from './random.js';

// Roster
export {
  createRoster,
  getPlayerNames,
  findPlayer,
  getPlayersInCategory,
  toCategories,
} from './roster.js';

// Lineups
export {
  isLegalLineup,
  isLegalOrder,
  longestRestrictedRun,
  resolveLineupRules,
} from './lineup/legality.js';
export {
  generateLegalLineups,
  permutations,
  countPermutations,
  exceedsEnumerationCeiling,
  ENUMERATION_CEILING,
  type GenerationStrategy,
  type GenerateLineupsOptions,
  type GeneratedLineups,
} from './lineup/generator.js';
export { censusLegalLineups, type LegalityCensus, type CensusOptions } from './lineup/census.js';

// Simulation
export {
  simulateAtBat,
  createAtBatModel,
  type AtBatModel,
  type AtBatModelOptions,
} from './simulation/at-bat.js';
export {
  playInning,
  simulateInning,
  advanceRunners,
  createEmptyBases,
  type InningOptions,
  type InningResult,
} from './simulation/inning.js';
export {
  simulateGame,
  createInningSimulator,
  type InningSimulator,
  type GameOptions,
} from './simulation/game.js';
export { evaluateLineup, type EvaluateOptions } from './simulation/evaluator.js';
export { LineupSimulator, type LineupSimulatorOptions } from './simulation/LineupSimulator.js';

// Search
export {
  findBestLineup,
  rankLineupRecords,
  type LineupEvaluator,
  type SearchOptions,
  type SearchProgress,
  type SearchResult,
} from './search/search.js';

// Utility functions
export { summarizeRuns, roundTo, type RunSummary } from './utils.js';
