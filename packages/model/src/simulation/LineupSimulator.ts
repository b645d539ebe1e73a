/**
 * Lineup Simulator
 *
 * Binds a roster, game rules and a random source into one object that plays
 * and evaluates whole games for any batting order drawn from that roster.
 * The search driver builds one of these per search.
 */

import { defaultRandom } from '../random.js';
import { DEFAULT_GAME_RULES, DEFAULT_GAMES_PER_LINEUP } from '../types.js';
import type { GameRules, Lineup, LineupRecord, RandomSource, Roster } from '../types.js';
import { createAtBatModel } from './at-bat.js';
import { evaluateLineup } from './evaluator.js';
import { createInningSimulator, simulateGame, type InningSimulator } from './game.js';

export interface LineupSimulatorOptions {
  rules?: Partial<GameRules>;
  random?: RandomSource;
}

function validateRules(rules: GameRules): void {
  for (const key of ['innings', 'maxOuts', 'runCap'] as const) {
    const value = rules[key];
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(`${key} must be a positive integer, got ${value}`);
    }
  }
}

export class LineupSimulator {
  private readonly rules: GameRules;
  private readonly inningSimulator: InningSimulator;

  constructor(roster: Roster, options: LineupSimulatorOptions = {}) {
    this.rules = { ...DEFAULT_GAME_RULES, ...options.rules };
    validateRules(this.rules);

    const atBat = createAtBatModel(roster, {
      random: options.random ?? defaultRandom,
      unknownPlayer: this.rules.unknownPlayer,
    });
    this.inningSimulator = createInningSimulator(atBat, {
      maxOuts: this.rules.maxOuts,
      runCap: this.rules.runCap,
    });
  }

  /**
   * Runs scored in one game
   */
  simulateGame(
    battingOrder: Lineup,
    onInning?: (inning: number, runs: number) => void
  ): number {
    return simulateGame(battingOrder, this.inningSimulator, {
      innings: this.rules.innings,
      continueBattingOrder: this.rules.continueBattingOrder,
      onInning,
    });
  }

  /**
   * Average runs over repeated games
   */
  evaluate(lineup: Lineup, games: number = DEFAULT_GAMES_PER_LINEUP): LineupRecord {
    return evaluateLineup(lineup, {
      games,
      simulateGame: (order) => this.simulateGame(order),
    });
  }
}
