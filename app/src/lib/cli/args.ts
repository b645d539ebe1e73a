/**
 * Command-line argument parsing for the lineup scripts
 */

import { MAX_SEED, type GenerationStrategy } from '@lineup/model';

export interface SearchArgs {
	rosterPath?: string;
	gamesPerLineup: number;
	maxLineups?: number;
	seed?: number;
	strategy: GenerationStrategy;
	innings: number;
	runCap: number;
	continueBattingOrder: boolean;
	strictPlayers: boolean;
	top: number;
	dbPath?: string;
	verbose: boolean;
}

export interface CensusArgs {
	rosterPath?: string;
	examples: number;
}

export interface HistoryArgs {
	dbPath: string;
	/** Show one run in detail */
	runId?: number;
	/** Delete one run */
	deleteRunId?: number;
	top: number;
}

const DEFAULT_SEARCH_ARGS: SearchArgs = {
	gamesPerLineup: 10,
	strategy: 'enumerate',
	innings: 6,
	runCap: 6,
	continueBattingOrder: false,
	strictPlayers: false,
	top: 5,
	verbose: false
};

function takeValue(argv: readonly string[], index: number, flag: string): string {
	const value = argv[index + 1];
	if (value === undefined || value.startsWith('--')) {
		throw new Error(`${flag} needs a value`);
	}
	return value;
}

function parseInteger(value: string, flag: string, minimum: number, maximum?: number): number {
	const parsed = Number(value);
	if (maximum !== undefined) {
		if (!Number.isInteger(parsed) || parsed < minimum || parsed > maximum) {
			throw new Error(`${flag} must be an integer from ${minimum} to ${maximum}, got "${value}"`);
		}
		return parsed;
	}
	if (!Number.isInteger(parsed) || parsed < minimum) {
		throw new Error(`${flag} must be an integer of at least ${minimum}, got "${value}"`);
	}
	return parsed;
}

/**
 * Parse arguments for find-best-lineup (without the node and script entries)
 */
export function parseSearchArgs(argv: readonly string[]): SearchArgs {
	const args: SearchArgs = { ...DEFAULT_SEARCH_ARGS };

	for (let i = 0; i < argv.length; i++) {
		const flag = argv[i];
		switch (flag) {
			case '--roster':
				args.rosterPath = takeValue(argv, i++, flag);
				break;
			case '--games':
				args.gamesPerLineup = parseInteger(takeValue(argv, i++, flag), flag, 1);
				break;
			case '--max-lineups':
				args.maxLineups = parseInteger(takeValue(argv, i++, flag), flag, 1);
				break;
			case '--seed':
				args.seed = parseInteger(takeValue(argv, i++, flag), flag, 0, MAX_SEED);
				break;
			case '--strategy': {
				const value = takeValue(argv, i++, flag);
				if (value !== 'enumerate' && value !== 'rejection') {
					throw new Error(`--strategy must be "enumerate" or "rejection", got "${value}"`);
				}
				args.strategy = value;
				break;
			}
			case '--innings':
				args.innings = parseInteger(takeValue(argv, i++, flag), flag, 1);
				break;
			case '--run-cap':
				args.runCap = parseInteger(takeValue(argv, i++, flag), flag, 1);
				break;
			case '--continue-order':
				args.continueBattingOrder = true;
				break;
			case '--strict-players':
				args.strictPlayers = true;
				break;
			case '--top':
				args.top = parseInteger(takeValue(argv, i++, flag), flag, 1);
				break;
			case '--db':
				args.dbPath = takeValue(argv, i++, flag);
				break;
			case '--verbose':
				args.verbose = true;
				break;
			default:
				throw new Error(`Unknown option: ${flag}`);
		}
	}

	if (args.strategy === 'rejection' && args.maxLineups === undefined) {
		throw new Error('--strategy rejection needs --max-lineups');
	}

	return args;
}

/**
 * Parse arguments for check-legal-lineups
 */
export function parseCensusArgs(argv: readonly string[]): CensusArgs {
	const args: CensusArgs = { examples: 5 };

	for (let i = 0; i < argv.length; i++) {
		const flag = argv[i];
		switch (flag) {
			case '--roster':
				args.rosterPath = takeValue(argv, i++, flag);
				break;
			case '--examples':
				args.examples = parseInteger(takeValue(argv, i++, flag), flag, 0);
				break;
			default:
				throw new Error(`Unknown option: ${flag}`);
		}
	}

	return args;
}

/**
 * Parse arguments for search-history
 */
export function parseHistoryArgs(argv: readonly string[]): HistoryArgs {
	let dbPath: string | undefined;
	let runId: number | undefined;
	let deleteRunId: number | undefined;
	let top = 5;

	for (let i = 0; i < argv.length; i++) {
		const flag = argv[i];
		switch (flag) {
			case '--db':
				dbPath = takeValue(argv, i++, flag);
				break;
			case '--run':
				runId = parseInteger(takeValue(argv, i++, flag), flag, 1);
				break;
			case '--delete':
				deleteRunId = parseInteger(takeValue(argv, i++, flag), flag, 1);
				break;
			case '--top':
				top = parseInteger(takeValue(argv, i++, flag), flag, 1);
				break;
			default:
				throw new Error(`Unknown option: ${flag}`);
		}
	}

	if (dbPath === undefined) {
		throw new Error('--db is required');
	}
	if (runId !== undefined && deleteRunId !== undefined) {
		throw new Error('--run and --delete cannot be used together');
	}

	const args: HistoryArgs = { dbPath, top };
	if (runId !== undefined) args.runId = runId;
	if (deleteRunId !== undefined) args.deleteRunId = deleteRunId;
	return args;
}
