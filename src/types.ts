import type { QueryDefinition } from './query/types.js';
import type { UpdateDefinition } from './update/types.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/** A stored item. The service always returns its key. */
export type BaseRecord = JsonObject & { key: string };

/** An item to write. Without a key the service generates one. */
export type RecordInput = JsonObject & { key?: string };

export interface PutResult {
  processed: BaseRecord[];
  failed: JsonObject[];
}

export interface QueryOptions {
  /** Page size, 1..1000. The service default applies when omitted. */
  limit?: number;
  /** Cursor returned by a previous page; resume after it. */
  last?: string;
}

export interface QueryPage {
  items: BaseRecord[];
  size: number;
  /** Present while more pages remain. */
  last?: string;
}

export interface Base {
  readonly name: string;
  get(key: string): Promise<BaseRecord>;
  put(records: RecordInput | RecordInput[]): Promise<PutResult>;
  insert(record: RecordInput): Promise<BaseRecord>;
  update(key: string, patch: UpdateDefinition): Promise<void>;
  delete(key: string): Promise<void>;
  query(filter?: QueryDefinition, options?: QueryOptions): AsyncIterable<BaseRecord>;
  fetchPage(filter?: QueryDefinition, options?: QueryOptions): Promise<QueryPage>;
}
