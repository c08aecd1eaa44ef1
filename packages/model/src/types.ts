/**
 * Core types for statsheet records
 */

import type { z } from 'zod';
import type {
  GameUpdateSchema,
  GameStatsheetSchema,
  TeamStatsheetSchema,
  PlayerStatsheetSchema,
} from './schemas.js';

/**
 * A decoded record: the declared fields plus every key the schema does not
 * know about, in the order the service sent them.
 */
export interface TaggedRecord<T> {
  fields: T;
  extra: Map<string, unknown>;
}

export type GameUpdateFields = z.infer<typeof GameUpdateSchema>;
export type GameStatsheetFields = z.infer<typeof GameStatsheetSchema>;
export type TeamStatsheetFields = z.infer<typeof TeamStatsheetSchema>;
export type PlayerStatsheetFields = z.infer<typeof PlayerStatsheetSchema>;

export type GameUpdate = TaggedRecord<GameUpdateFields>;
export type GameStatsheet = TaggedRecord<GameStatsheetFields>;
export type TeamStatsheet = TaggedRecord<TeamStatsheetFields>;
export type PlayerStatsheet = TaggedRecord<PlayerStatsheetFields>;

export type DecodeResult<T> =
  | { success: true; records: TaggedRecord<T>[] }
  | { success: false; message: string };
