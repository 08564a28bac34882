import type { z } from 'zod';
import type { BaseRecord, JsonObject, JsonValue, RecordInput } from '../types.js';
import { DecodeError, ValidationError } from '../errors.js';
import { BaseRecordSchema, ErrorBodySchema } from './schema.js';
import { isJsonObject } from './accessors.js';

/** Per-item size limit enforced by the service. */
export const MAX_ITEM_BYTES = 400 * 1024;

/**
 * Builds a RecordInput from any JSON value. Objects pass through (copied);
 * other values are wrapped as `{ value }`. A given key overrides one
 * already present on the object.
 */
export function item(value: JsonValue, key?: string): RecordInput {
  const record: RecordInput = isJsonObject(value) ? { ...value } : { value };
  if (key !== undefined) record.key = key;
  return record;
}

export function checkKey(key: unknown): string {
  if (typeof key !== 'string' || key === '') {
    throw new ValidationError('Item key must be a non-empty string');
  }
  return key;
}

/**
 * Validates a record before it is sent: key (when present) must be a
 * non-empty string and the serialized item must fit the service limit.
 */
export function encodeRecord(record: RecordInput): JsonObject {
  if (!isJsonObject(record)) {
    throw new ValidationError('Item must be a JSON object; wrap other values with item()');
  }
  if ('key' in record && record.key !== undefined) checkKey(record.key);

  const encoded = JSON.stringify(record);
  const bytes = Buffer.byteLength(encoded, 'utf8');
  if (bytes > MAX_ITEM_BYTES) {
    throw new ValidationError(
      `Item ${record.key === undefined ? '' : `"${record.key}" `}is ${bytes} bytes; the limit is ${MAX_ITEM_BYTES}`,
    );
  }
  return record;
}

/** Parses a response body with the given schema or throws DecodeError. */
export function decodeBody<S extends z.ZodTypeAny>(
  operation: string,
  schema: S,
  body: unknown,
): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue === undefined || issue.path.length === 0 ? 'body' : issue.path.join('.');
    throw new DecodeError(
      operation,
      `unexpected response shape at ${where}: ${issue?.message ?? 'invalid'}`,
      result.error,
    );
  }
  return result.data;
}

export function decodeRecord(operation: string, body: unknown): BaseRecord {
  return decodeBody(operation, BaseRecordSchema, body);
}

/** Messages of a `{ "errors": [...] }` body; empty for any other shape. */
export function serviceMessages(body: unknown): string[] {
  const result = ErrorBodySchema.safeParse(body);
  return result.success ? result.data.errors : [];
}
