/**
 * Batched statsheet fetches.
 *
 * Every id-addressed endpoint takes its ids as one comma-joined `ids`
 * parameter and answers with a JSON array. Callers only name the endpoint and
 * hand over the ids; how they are encoded stays in here.
 */

import {
	GameStatsheetSchema,
	GameUpdateSchema,
	PlayerStatsheetSchema,
	TeamStatsheetSchema,
	decodeTaggedArray,
	joinIds,
	type GameUpdate,
	type TaggedRecord,
} from '@statsheet-archive/model';
import type { z } from 'zod';
import { DecodeError } from './errors.js';
import type { HttpClient, JsonResponse } from './http-client.js';
import type { Logger } from './types.js';

export const BATCH_ENDPOINTS = {
	gameStatsheets: GameStatsheetSchema,
	teamStatsheets: TeamStatsheetSchema,
	playerSeasonStats: PlayerStatsheetSchema,
} as const;

export type BatchEndpoint = keyof typeof BATCH_ENDPOINTS;

export type EndpointRecord<E extends BatchEndpoint> = TaggedRecord<z.infer<(typeof BATCH_ENDPOINTS)[E]>>;

function decodeResponse<S extends z.AnyZodObject>(
	schema: S,
	response: JsonResponse
): TaggedRecord<z.infer<S>>[] {
	const result = decodeTaggedArray(schema, response.body);
	if (!result.success) {
		throw new DecodeError(response.url, `Unexpected response shape: ${result.message}`);
	}
	return result.records;
}

export class BatchFetcher {
	constructor(
		private readonly client: HttpClient,
		private readonly logger: Logger = console
	) {}

	/**
	 * Fetch the records for `ids` from `endpoint` in one request.
	 *
	 * An empty id list is still sent (as `ids=`). Records come back in
	 * whatever order the service chooses.
	 */
	async fetch<E extends BatchEndpoint>(
		endpoint: E,
		ids: readonly string[],
		signal?: AbortSignal
	): Promise<EndpointRecord<E>[]> {
		const response = await this.client.getJson(endpoint, { ids: joinIds(ids) }, signal);
		const records = decodeResponse<(typeof BATCH_ENDPOINTS)[E]>(BATCH_ENDPOINTS[endpoint], response);
		if (records.length !== ids.length) {
			this.logger.warn(`[BatchFetcher] ${endpoint}: asked for ${ids.length} ids, got ${records.length} records`);
		}
		return records;
	}

	/** Entry fetch of a day: all games for (season, day) */
	async fetchGames(season: number, day: number, signal?: AbortSignal): Promise<GameUpdate[]> {
		const response = await this.client.getJson('games', { season, day }, signal);
		return decodeResponse(GameUpdateSchema, response);
	}
}
