/**
 * Tests for tagged record decoding and serialization
 */

import { describe, it, expect } from 'vitest';
import { decodeTaggedArray, serializeTagged } from './records.js';
import { GameUpdateSchema, PlayerStatsheetSchema, TeamStatsheetSchema } from './schemas.js';
import type { GameUpdate } from './types.js';

describe('decodeTaggedArray', () => {
  it('should split declared fields from passthrough fields', () => {
    const result = decodeTaggedArray(GameUpdateSchema, [
      { id: 'g1', weather: 7, statsheet: 's1', awayTeam: 'A', homeTeam: 'H', outcomes: ['rain'] },
    ]);

    expect(result.success).toBe(true);
    if (!result.success) return;
    const [game] = result.records;
    expect(game.fields).toEqual({ id: 'g1', statsheet: 's1', awayTeam: 'A', homeTeam: 'H' });
    expect([...game.extra.entries()]).toEqual([
      ['weather', 7],
      ['outcomes', ['rain']],
    ]);
  });

  it('should decode an empty array to no records', () => {
    const result = decodeTaggedArray(PlayerStatsheetSchema, []);
    expect(result).toEqual({ success: true, records: [] });
  });

  it('should keep the order of player statsheet ids', () => {
    const result = decodeTaggedArray(TeamStatsheetSchema, [{ playerStats: ['p3', 'p1', 'p2'] }]);
    expect(result.success && result.records[0].fields.playerStats).toEqual(['p3', 'p1', 'p2']);
  });

  it('should reject a body that is not an array', () => {
    const result = decodeTaggedArray(PlayerStatsheetSchema, { id: 'x' });
    expect(result.success).toBe(false);
  });

  it('should reject array elements that are not objects', () => {
    const result = decodeTaggedArray(PlayerStatsheetSchema, [null]);
    expect(result.success).toBe(false);
  });

  it('should name the failing record and field', () => {
    const result = decodeTaggedArray(PlayerStatsheetSchema, [
      { id: 'p1', playerId: 'P1', teamId: 'T1' },
      { id: 'p2', teamId: 'T1' },
    ]);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.message).toMatch(/^record 1: playerId: /);
  });
});

describe('serializeTagged', () => {
  it('should write declared fields before passthrough fields', () => {
    const result = decodeTaggedArray(GameUpdateSchema, [
      { weather: 7, homeTeam: 'H', id: 'g1', awayTeam: 'A', statsheet: 's1' },
    ]);
    if (!result.success) throw new Error(result.message);

    expect(serializeTagged(result.records[0])).toBe(
      '{"id":"g1","statsheet":"s1","awayTeam":"A","homeTeam":"H","weather":7}'
    );
  });

  it('should prefer a declared field over a passthrough key of the same name', () => {
    const game: GameUpdate = {
      fields: { id: 'g1', statsheet: 's1', awayTeam: 'A', homeTeam: 'H' },
      extra: new Map<string, unknown>([
        ['homeTeam', 'stale'],
        ['day', 3],
      ]),
    };

    expect(serializeTagged(game)).toBe('{"id":"g1","statsheet":"s1","awayTeam":"A","homeTeam":"H","day":3}');
  });

  it('should round-trip nested passthrough values unchanged', () => {
    const raw = {
      id: 'ps1',
      playerId: 'P1',
      teamId: 'T1',
      name: 'Test Player',
      atBats: 4,
      splits: { vsLeft: [1, 0, null], note: 'x' },
    };
    const result = decodeTaggedArray(PlayerStatsheetSchema, [raw]);
    if (!result.success) throw new Error(result.message);

    expect(JSON.parse(serializeTagged(result.records[0]))).toEqual(raw);
  });

  it('should keep declared fields ahead of integer-like and __proto__ passthrough keys', () => {
    const text = '{"id":"a","playerId":"p","teamId":"t","2024":1,"__proto__":{"x":1},"hits":3}';
    const result = decodeTaggedArray(PlayerStatsheetSchema, JSON.parse(`[${text}]`));
    if (!result.success) throw new Error(result.message);

    expect([...result.records[0].extra.keys()]).toEqual(['2024', '__proto__', 'hits']);
    expect(serializeTagged(result.records[0])).toBe(text);
  });
});
