/**
 * Id derivation and batching helpers for the fetch tiers
 */

import type { GameStatsheet, GameUpdate, TeamStatsheet } from './types.js';

/**
 * Split `items` into consecutive batches of at most `size` items
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }

  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Join ids into the service's `ids` query value. An empty list gives ''.
 */
export function joinIds(ids: readonly string[]): string {
  return ids.join(',');
}

export function statsheetIdsOf(games: readonly GameUpdate[]): string[] {
  return games.map((game) => game.fields.statsheet);
}

/**
 * Away then home team statsheet id for every game statsheet, in order.
 * Duplicates are kept.
 */
export function teamStatsheetIdsOf(statsheets: readonly GameStatsheet[]): string[] {
  return statsheets.flatMap((sheet) => [sheet.fields.awayTeamStats, sheet.fields.homeTeamStats]);
}

export function playerStatsheetIdsOf(teams: readonly TeamStatsheet[]): string[] {
  return teams.flatMap((team) => team.fields.playerStats);
}
