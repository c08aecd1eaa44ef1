/**
 * One day of a season: games → game statsheets → team statsheets → player
 * statsheets, persisting games and players as they arrive.
 *
 * Game writes start as soon as the games are known and run beside the
 * statsheet chain, so a statsheet failure never holds them back. Team
 * statsheets are split into batches, each batch fetching and writing its
 * players independently.
 */

import {
	chunk,
	playerStatsheetIdsOf,
	statsheetIdsOf,
	teamStatsheetIdsOf,
	type GameUpdate,
	type TeamStatsheet,
} from '@statsheet-archive/model';
import type { BatchFetcher } from './batch-fetcher.js';
import { runTaskGroup } from './concurrency.js';
import type { RecordWriter } from './record-writer.js';
import type { DaySummary, Logger } from './types.js';

export interface DayPipelineOptions {
	fetcher: BatchFetcher;
	writer: RecordWriter;
	teamBatchSize: number;
	logger?: Logger;
}

export class DayPipeline {
	private readonly fetcher: BatchFetcher;
	private readonly writer: RecordWriter;
	private readonly teamBatchSize: number;
	private readonly logger: Logger;

	constructor(options: DayPipelineOptions) {
		this.fetcher = options.fetcher;
		this.writer = options.writer;
		this.teamBatchSize = options.teamBatchSize;
		this.logger = options.logger ?? console;
	}

	/**
	 * Fetch and persist everything for one day.
	 *
	 * Rejects with the first failure of any branch; by then every other
	 * branch of the day has settled. Writes of records already fetched are
	 * allowed to finish, pending requests are cancelled.
	 */
	async run(season: number, day: number, signal?: AbortSignal): Promise<DaySummary> {
		this.logger.log(`[DayPipeline] fetching day ${day}`);
		const games = await this.fetcher.fetchGames(season, day, signal);
		this.logger.log(`[DayPipeline] received day ${day}: ${games.length} games`);

		const summary: DaySummary = { day, games: games.length, players: 0, batches: 0 };
		if (games.length === 0) {
			return summary;
		}

		await runTaskGroup(
			signal,
			(spawn) => {
				for (const game of games) {
					spawn(() => this.writer.writeGame(day, game));
				}
				spawn((groupSignal) => this.fetchStatsheets(day, games, summary, groupSignal));
			},
			this.logger
		);

		this.logger.log(`[DayPipeline] finished day ${day}`);
		return summary;
	}

	private async fetchStatsheets(
		day: number,
		games: readonly GameUpdate[],
		summary: DaySummary,
		signal: AbortSignal
	): Promise<void> {
		const statsheetIds = statsheetIdsOf(games);
		this.logger.log(`[DayPipeline] fetching day ${day} game statsheets`);
		const gameStatsheets = await this.fetcher.fetch('gameStatsheets', statsheetIds, signal);

		const teamIds = teamStatsheetIdsOf(gameStatsheets);
		this.logger.log(`[DayPipeline] fetching day ${day} team statsheets`);
		const teamStatsheets = await this.fetcher.fetch('teamStatsheets', teamIds, signal);

		const batches = chunk(teamStatsheets, this.teamBatchSize);
		summary.batches = batches.length;
		this.logger.log(`[DayPipeline] fetching day ${day} player statsheets in ${batches.length} batches`);

		await runTaskGroup(
			signal,
			(spawn) => {
				for (const batch of batches) {
					spawn((batchSignal) => this.fetchPlayerBatch(day, batch, summary, batchSignal));
				}
			},
			this.logger
		);
	}

	private async fetchPlayerBatch(
		day: number,
		batch: readonly TeamStatsheet[],
		summary: DaySummary,
		signal: AbortSignal
	): Promise<void> {
		const playerIds = playerStatsheetIdsOf(batch);
		const players = await this.fetcher.fetch('playerSeasonStats', playerIds, signal);

		await runTaskGroup(
			signal,
			(spawn) => {
				for (const player of players) {
					spawn(async () => {
						await this.writer.writePlayer(day, player);
						summary.players++;
					});
				}
			},
			this.logger
		);
	}
}
