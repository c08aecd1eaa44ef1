/**
 * Tagged records: typed fields plus passthrough fields.
 */

import { z } from 'zod';
import type { DecodeResult, TaggedRecord } from './types.js';

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'array' : typeof value;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// Reads the raw row, so keys a parser would drop (`__proto__`) are kept.
function extraFields(shape: z.ZodRawShape, row: JsonObject): Map<string, unknown> {
  const extra = new Map<string, unknown>();
  for (const [key, value] of Object.entries(row)) {
    if (!Object.hasOwn(shape, key)) {
      extra.set(key, value);
    }
  }
  return extra;
}

/**
 * Decode a response body that must be a JSON array of objects matching `schema`.
 *
 * Keys outside the schema are moved, untouched and in order, into each
 * record's `extra` map.
 */
export function decodeTaggedArray<S extends z.AnyZodObject>(
  schema: S,
  body: unknown
): DecodeResult<z.infer<S>> {
  if (!Array.isArray(body)) {
    return { success: false, message: `expected an array of objects, got ${describeValue(body)}` };
  }

  const records: TaggedRecord<z.infer<S>>[] = [];
  for (const [index, row] of body.entries()) {
    if (!isJsonObject(row)) {
      return { success: false, message: `record ${index}: expected an object, got ${describeValue(row)}` };
    }
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      return { success: false, message: `record ${index}: ${formatIssues(parsed.error)}` };
    }
    records.push({ fields: parsed.data, extra: extraFields(schema.shape, row) });
  }

  return { success: true, records };
}

/**
 * Serialize a tagged record as compact JSON.
 *
 * Declared fields are written first, then passthrough fields. When a
 * passthrough key shares a name with a declared field, the declared value is
 * the one written. Keys are emitted pair by pair, so integer-like keys keep
 * their place.
 */
export function serializeTagged<T extends object>(record: TaggedRecord<T>): string {
  const pairs: [string, unknown][] = Object.entries(record.fields);
  const declared = new Set(pairs.map(([key]) => key));
  for (const [key, value] of record.extra) {
    if (!declared.has(key)) {
      pairs.push([key, value]);
    }
  }

  const members = pairs
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${JSON.stringify(key)}:${JSON.stringify(value)}`);
  return `{${members.join(',')}}`;
}
