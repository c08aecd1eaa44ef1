/**
 * Wire schemas for the statsheet service's JSON records.
 *
 * Only the keys the pipeline reads are declared. Anything else the service
 * sends is kept aside as passthrough data (see records.ts).
 */

import { z } from 'zod';

const entityId = z.string();

/**
 * One game of a day, as returned by the `games` endpoint.
 */
export const GameUpdateSchema = z.object({
  id: entityId,
  statsheet: entityId,
  awayTeam: entityId,
  homeTeam: entityId,
});

export const GameStatsheetSchema = z.object({
  awayTeamStats: entityId,
  homeTeamStats: entityId,
});

/**
 * Team statsheet for one game. `playerStats` keeps the service's order.
 */
export const TeamStatsheetSchema = z.object({
  playerStats: z.array(entityId),
});

export const PlayerStatsheetSchema = z.object({
  id: entityId,
  playerId: entityId,
  teamId: entityId,
});
