/**
 * Utility functions for summarizing simulation output
 */

export interface RunSummary {
  games: number;
  average: number;
  min: number;
  max: number;
}

/**
 * Average, min and max of a list of game run totals
 */
export function summarizeRuns(gameResults: readonly number[]): RunSummary {
  if (gameResults.length === 0) {
    return { games: 0, average: 0, min: 0, max: 0 };
  }

  const total = gameResults.reduce((a, b) => a + b, 0);
  return {
    games: gameResults.length,
    average: total / gameResults.length,
    min: Math.min(...gameResults),
    max: Math.max(...gameResults),
  };
}

/**
 * Round to a fixed number of decimal places
 */
export function roundTo(value: number, decimals: number = 2): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}
