/**
 * Console report formatting for lineup searches
 *
 * Every function returns lines; the scripts decide where they go.
 */

import {
	findPlayer,
	getPlayersInCategory,
	longestRestrictedRun,
	rankLineupRecords,
	resolveLineupRules,
	roundTo,
	summarizeRuns,
	toCategories,
	type LegalityCensus,
	type Lineup,
	type LineupRules,
	type Roster,
	type SearchProgress,
	type SearchResult
} from '@lineup/model';
import type { StoredLineupResult, StoredSearchRun } from '../results/results-store.js';

export interface ReportOptions {
	/** Lineups in the top list. Default 5 */
	top?: number;
}

const RULE_LINE = '='.repeat(40);

function formatCount(value: number): string {
	return value.toLocaleString('en-US');
}

export function formatLineup(lineup: Lineup): string {
	return lineup.join(' → ');
}

/**
 * Roster summary printed before a search or census
 */
export function formatRosterSummary(roster: Roster, rules: Partial<LineupRules> = {}): string[] {
	const { maxConsecutive } = resolveLineupRules(rules);
	return [
		`Unrestricted: ${getPlayersInCategory(roster, 'unrestricted').join(', ')}`,
		`Restricted: ${getPlayersInCategory(roster, 'restricted').join(', ')}`,
		`Rule: At most ${maxConsecutive} restricted players in a row`
	];
}

export function formatProgress(progress: SearchProgress): string {
	const seconds = (progress.elapsedMs / 1000).toFixed(1);
	return `Progress: ${progress.percent.toFixed(1)}% (${formatCount(progress.evaluated)}/${formatCount(progress.total)} lineups) - ${seconds}s elapsed`;
}

export function formatInningLine(inning: number, runs: number): string {
	return `Inning ${inning}: ${runs} ${runs === 1 ? 'run' : 'runs'}`;
}

/**
 * Best lineup, its games, the top lineups and timing
 */
export function formatSearchReport(result: SearchResult, roster: Roster, options: ReportOptions = {}): string[] {
	const { top = 5 } = options;
	const lines: string[] = [];

	const total = formatCount(result.totalPermutations);
	if (result.legalLineupCount === null) {
		lines.push(`Sampled ${formatCount(result.candidateCount)} distinct legal lineups out of ${total} total possible`);
	} else {
		lines.push(`Found ${formatCount(result.legalLineupCount)} legal lineups out of ${total} total possible`);
	}
	lines.push('');
	lines.push('🏆 BEST LINEUP FOUND:');
	lines.push(RULE_LINE);

	const { best } = result;
	if (!best) {
		lines.push('No legal lineup found');
	} else {
		best.lineup.forEach((name, i) => {
			const rating = findPlayer(roster, name)?.rating ?? 0;
			lines.push(`${i + 1}. ${name.padEnd(10)} (avg: ${rating.toFixed(2)} bases)`);
		});

		const summary = summarizeRuns(best.gameResults);
		lines.push('');
		lines.push(`Average runs per game: ${best.averageRuns.toFixed(2)}`);
		lines.push(`Game results: [${best.gameResults.join(', ')}]`);
		lines.push(`Range: ${summary.min} - ${summary.max} runs`);
	}

	const ranked = rankLineupRecords(result.records, top);
	if (ranked.length > 0) {
		lines.push('');
		lines.push(`📊 TOP ${ranked.length} LINEUPS:`);
		lines.push(RULE_LINE);
		ranked.forEach((record, i) => {
			lines.push(`${i + 1}. ${record.averageRuns.toFixed(2)} avg runs`);
			lines.push(`   Lineup: ${formatLineup(record.lineup)}`);
			lines.push('');
		});
	}

	lines.push(`⏱️  Total time: ${(result.durationMs / 1000).toFixed(2)} seconds`);
	lines.push(`📈 Tested ${formatCount(result.records.length)} lineups`);
	return lines;
}

/**
 * Warning for a sampled search that gave up before finding `requested` lineups
 */
export function formatSampleShortfall(result: SearchResult, requested: number): string | null {
	if (result.legalLineupCount !== null || result.candidateCount >= requested) {
		return null;
	}
	return `Only found ${formatCount(result.candidateCount)} of ${formatCount(requested)} requested lineups before running out of attempts`;
}

/**
 * Legal versus total permutations, with examples of each.
 * Illegal examples show their longest restricted run.
 */
export function formatCensusReport(census: LegalityCensus, roster: Roster, rules: Partial<LineupRules> = {}): string[] {
	const { maxConsecutive, wraparoundWindow } = resolveLineupRules(rules);
	const lines = [
		`Total possible lineups: ${formatCount(census.totalPermutations)}`,
		`Legal lineups: ${formatCount(census.legalCount)}`,
		`Percentage legal: ${roundTo(census.legalPercentage, 1).toFixed(1)}%`,
		'',
		'Example legal lineups:'
	];

	census.legalExamples.forEach((lineup, i) => lines.push(`${i + 1}. ${formatLineup(lineup)}`));

	lines.push('');
	lines.push(`Example illegal lineups (${maxConsecutive + 1}+ restricted in a row):`);
	if (census.illegalExamples.length === 0) {
		lines.push('None: every ordering of this roster satisfies the rule');
	} else {
		census.illegalExamples.forEach((lineup, i) => {
			const run = longestRestrictedRun(toCategories(lineup, roster), wraparoundWindow);
			lines.push(`${i + 1}. ${formatLineup(lineup)} (${run} in a row)`);
		});
	}

	return lines;
}

/**
 * One line per stored run, newest first
 */
export function formatRunList(runs: readonly StoredSearchRun[]): string[] {
	if (runs.length === 0) {
		return ['No saved runs'];
	}
	return runs.map((run) => {
		const best = run.bestAverage === null ? 'no lineup' : `best ${run.bestAverage.toFixed(2)} avg runs`;
		const seed = run.seed === null ? '' : `, seed ${run.seed}`;
		return `#${run.id} ${run.createdAt} ${run.rosterName}: ${formatCount(run.candidateCount)} lineups x ${run.gamesPerLineup} games, ${best}${seed}`;
	});
}

/**
 * A stored run with its best lineups
 */
export function formatRunDetail(run: StoredSearchRun, lineups: readonly StoredLineupResult[]): string[] {
	const legal = run.legalLineupCount === null ? 'sampled' : `${formatCount(run.legalLineupCount)} legal`;
	const lines = [
		`Run #${run.id}: ${run.rosterName}`,
		`Saved: ${run.createdAt}`,
		`Lineups tested: ${formatCount(run.candidateCount)} (${legal} of ${formatCount(run.totalPermutations)} possible)`,
		`Games per lineup: ${run.gamesPerLineup}`,
		`Seed: ${run.seed === null ? 'none' : run.seed}`,
		`Time: ${(run.durationMs / 1000).toFixed(2)} seconds`
	];

	if (lineups.length > 0) {
		lines.push('');
		lines.push(`📊 TOP ${lineups.length} LINEUPS:`);
		lines.push(RULE_LINE);
		for (const result of lineups) {
			lines.push(`${result.rank}. ${result.averageRuns.toFixed(2)} avg runs (tested #${result.evaluationOrder + 1})`);
			lines.push(`   Lineup: ${formatLineup(result.lineup)}`);
			lines.push(`   Games: [${result.gameResults.join(', ')}]`);
		}
	}
	return lines;
}
