/**
 * @statsheet-archive/model - statsheet records and id derivation
 *
 * Schemas for the records the statsheet service returns, the tagged-record
 * model that keeps unknown fields intact, and the helpers that turn one
 * tier's records into the next tier's request ids.
 */

// Core types
export type {
  TaggedRecord,
  DecodeResult,
  GameUpdateFields,
  GameStatsheetFields,
  TeamStatsheetFields,
  PlayerStatsheetFields,
  GameUpdate,
  GameStatsheet,
  TeamStatsheet,
  PlayerStatsheet,
} from './types.js';

// Wire schemas
export {
  GameUpdateSchema,
  GameStatsheetSchema,
  TeamStatsheetSchema,
  PlayerStatsheetSchema,
} from './schemas.js';

// Tagged records
export { decodeTaggedArray, serializeTagged } from './records.js';

// Derivation
export {
  chunk,
  joinIds,
  statsheetIdsOf,
  teamStatsheetIdsOf,
  playerStatsheetIdsOf,
} from './utils.js';
