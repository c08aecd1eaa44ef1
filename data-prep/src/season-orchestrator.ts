/**
 * Run every day of a season concurrently against one shared client.
 */

import { BatchFetcher } from './batch-fetcher.js';
import { createLimiter, runTaskGroup } from './concurrency.js';
import type { HarvestConfig } from './config.js';
import { DayPipeline } from './day-pipeline.js';
import { ArgumentError } from './errors.js';
import { HttpClient, type FetchLike } from './http-client.js';
import { RecordWriter } from './record-writer.js';
import type { DaySummary, Logger, SeasonSummary } from './types.js';

/**
 * Parse a 1-based season number into the service's 0-based season index
 */
export function parseSeason(seasonArg: string | undefined): number {
	if (seasonArg === undefined || seasonArg.trim() === '') {
		throw new ArgumentError('Missing season!');
	}
	const trimmed = seasonArg.trim();
	if (!/^\d+$/.test(trimmed)) {
		throw new ArgumentError(`Season must be a positive integer, got ${JSON.stringify(seasonArg)}`);
	}
	const season = Number.parseInt(trimmed, 10);
	if (season < 1 || !Number.isSafeInteger(season)) {
		throw new ArgumentError(`Season must be a positive integer, got ${JSON.stringify(seasonArg)}`);
	}
	return season - 1;
}

export interface SeasonOrchestratorOptions {
	fetch?: FetchLike;
	logger?: Logger;
}

export class SeasonOrchestrator {
	private readonly config: HarvestConfig;
	private readonly fetchImpl: FetchLike | undefined;
	private readonly logger: Logger;

	constructor(config: HarvestConfig, options: SeasonOrchestratorOptions = {}) {
		this.config = config;
		this.fetchImpl = options.fetch;
		this.logger = options.logger ?? console;
	}

	/**
	 * Harvest a whole season. The argument is validated before any request
	 * is made.
	 */
	async run(seasonArg: string | undefined, signal?: AbortSignal): Promise<SeasonSummary> {
		const season = parseSeason(seasonArg);
		const { config, logger } = this;

		const client = new HttpClient({
			baseUrl: config.baseUrl,
			maxConcurrentRequests: config.maxConcurrentRequests,
			requestTimeoutMs: config.requestTimeoutMs,
			fetch: this.fetchImpl,
		});
		const pipeline = new DayPipeline({
			fetcher: new BatchFetcher(client, logger),
			writer: new RecordWriter({
				outDir: config.outDir,
				limiter: createLimiter(config.maxConcurrentWrites),
				logger,
			}),
			teamBatchSize: config.teamBatchSize,
			logger,
		});

		logger.log(`[SeasonOrchestrator] harvesting season index ${season}, ${config.daysPerSeason} days`);
		const days: DaySummary[] = [];
		await runTaskGroup(
			signal,
			(spawn) => {
				for (let day = 0; day < config.daysPerSeason; day++) {
					spawn(async (daySignal) => {
						days.push(await pipeline.run(season, day, daySignal));
					});
				}
			},
			logger
		);

		days.sort((a, b) => a.day - b.day);
		return {
			season,
			days,
			games: days.reduce((total, day) => total + day.games, 0),
			players: days.reduce((total, day) => total + day.players, 0),
			requests: client.requestCount,
		};
	}
}
