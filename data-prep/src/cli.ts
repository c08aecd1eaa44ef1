#!/usr/bin/env tsx
/**
 * Harvest one season of statsheets into ./out
 *
 * Usage:
 *   npx tsx data-prep/src/cli.ts <season>
 *
 * <season> is the 1-based season number. Games land in
 * out/games/<day>/<homeTeam>.json and players in
 * out/players/<playerId>/<day>.json.
 */

import { fileURLToPath } from 'url';
import { resolve } from 'path';
import { resolveConfig } from './config.js';
import { ArgumentError, describeError } from './errors.js';
import { SeasonOrchestrator, type SeasonOrchestratorOptions } from './season-orchestrator.js';

export const USAGE = 'Usage: statsheet-archive <season>';

/**
 * Run the harvest for `argv` (arguments after the script name).
 * Resolves with the process exit code.
 */
export async function main(argv: readonly string[], options: SeasonOrchestratorOptions = {}): Promise<number> {
	const logger = options.logger ?? console;
	try {
		const orchestrator = new SeasonOrchestrator(resolveConfig(), options);
		const summary = await orchestrator.run(argv[0]);
		logger.log(
			`✅ Season ${summary.season + 1}: ${summary.games} games and ${summary.players} player statsheets ` +
				`over ${summary.days.length} days (${summary.requests} requests)`
		);
		return 0;
	} catch (error) {
		logger.error(`error: ${describeError(error)}`);
		if (error instanceof ArgumentError) {
			logger.error(USAGE);
		}
		return 1;
	}
}

function isEntryPoint(): boolean {
	const script = process.argv[1];
	return script !== undefined && resolve(script) === fileURLToPath(import.meta.url);
}

if (isEntryPoint()) {
	main(process.argv.slice(2)).then(
		(code) => {
			process.exitCode = code;
		},
		(error: unknown) => {
			console.error(error);
			process.exitCode = 1;
		}
	);
}
