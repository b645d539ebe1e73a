/**
 * Roster construction and lookups
 */

import type { Category, Lineup, Player, Roster, RosterConfig } from './types.js';

/**
 * Build an immutable roster from configured ratings.
 *
 * Players keep the insertion order of `config.ratings`. Anyone named in
 * `config.unrestricted` is unrestricted; everyone else is restricted.
 * Names in `config.unrestricted` that have no rating are ignored.
 */
export function createRoster(config: RosterConfig): Roster {
  const unrestricted = new Set(config.unrestricted);

  const players = Object.entries(config.ratings).map(([name, rating]) => {
    const player: Player = {
      name,
      rating,
      category: unrestricted.has(name) ? 'unrestricted' : 'restricted',
    };
    return Object.freeze(player);
  });

  return Object.freeze({ players: Object.freeze(players) });
}

/**
 * Player names in roster order
 */
export function getPlayerNames(roster: Roster): string[] {
  return roster.players.map((p) => p.name);
}

/**
 * Look up a player by name
 */
export function findPlayer(roster: Roster, name: string): Player | undefined {
  return roster.players.find((p) => p.name === name);
}

/**
 * Names of every player in a category, in roster order
 */
export function getPlayersInCategory(roster: Roster, category: Category): string[] {
  return roster.players.filter((p) => p.category === category).map((p) => p.name);
}

/**
 * Map a lineup to its category sequence.
 * A name missing from the roster reads as unrestricted so it never extends a run.
 */
export function toCategories(lineup: Lineup, roster: Roster): Category[] {
  const byName = new Map(roster.players.map((p) => [p.name, p.category]));
  return lineup.map((name) => byName.get(name) ?? 'unrestricted');
}
