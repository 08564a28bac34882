import type {
  Base,
  BaseRecord,
  JsonObject,
  PutResult,
  QueryOptions,
  QueryPage,
  RecordInput,
} from '../types.js';
import { DecodeError, NotFoundError, ServiceError, ValidationError } from '../errors.js';
import type { QueryDefinition } from '../query/types.js';
import { compileQueryBody } from '../query/compiler.js';
import type { UpdateDefinition } from '../update/types.js';
import { compileUpdate } from '../update/compiler.js';
import { checkKey, decodeBody, decodeRecord, encodeRecord } from '../record/codec.js';
import { PutResponseSchema, QueryResponseSchema } from '../record/schema.js';
import type { ResolvedConfig } from './config.js';
import { HttpTransport } from './transport.js';

/** Maximum number of items in one PUT /items request. */
export const MAX_PUT_ITEMS = 25;

const MATCH_ALL: QueryDefinition = { _filter: null };

function itemPath(key: string): string {
  return `items/${encodeURIComponent(checkKey(key))}`;
}

/**
 * Handle on one named base. Holds no mutable state; concurrent calls are
 * independent requests.
 */
export class DetaBase implements Base {
  private readonly transport: HttpTransport;

  constructor(
    config: ResolvedConfig,
    readonly name: string,
  ) {
    this.transport = new HttpTransport(config, name);
  }

  async get(key: string): Promise<BaseRecord> {
    const { body } = await this.transport.send({
      operation: 'get',
      method: 'GET',
      path: itemPath(key),
      idempotent: true,
      key,
    });
    const record = decodeRecord('get', body);
    if (record.key !== key) {
      throw new DecodeError('get', `asked for key "${key}", service returned "${record.key}"`);
    }
    return record;
  }

  /**
   * Upserts one item or a batch of at most 25. Items the service rejects
   * are returned in `failed`; nothing is retried per item.
   */
  async put(records: RecordInput | RecordInput[]): Promise<PutResult> {
    const batch = Array.isArray(records) ? records : [records];
    if (batch.length > MAX_PUT_ITEMS) {
      throw new ValidationError(
        `put accepts at most ${MAX_PUT_ITEMS} items per request, got ${batch.length}`,
      );
    }
    if (batch.length === 0) {
      return { processed: [], failed: [] };
    }

    const seen = new Set<string>();
    const items: JsonObject[] = batch.map((record) => {
      const encoded = encodeRecord(record);
      if (record.key !== undefined) {
        if (seen.has(record.key)) {
          throw new ValidationError(`put batch contains key "${record.key}" more than once`);
        }
        seen.add(record.key);
      }
      return encoded;
    });

    const { body } = await this.transport.send({
      operation: 'put',
      method: 'PUT',
      path: 'items',
      body: { items },
      idempotent: true,
    });
    const decoded = decodeBody('put', PutResponseSchema, body);
    return {
      processed: decoded.processed?.items ?? [],
      failed: decoded.failed?.items ?? [],
    };
  }

  /** Creates the item only if its key is free; ConflictError otherwise. */
  async insert(record: RecordInput): Promise<BaseRecord> {
    const { body } = await this.transport.send({
      operation: 'insert',
      method: 'POST',
      path: 'items',
      body: { item: encodeRecord(record) },
      idempotent: false,
      ...(record.key !== undefined ? { key: record.key } : {}),
    });
    return decodeRecord('insert', body);
  }

  async update(key: string, patch: UpdateDefinition): Promise<void> {
    await this.transport.send({
      operation: 'update',
      method: 'PATCH',
      path: itemPath(key),
      body: compileUpdate(patch),
      idempotent: false,
      key,
    });
  }

  /** Resolves whether or not the key existed. */
  async delete(key: string): Promise<void> {
    try {
      await this.transport.send({
        operation: 'delete',
        method: 'DELETE',
        path: itemPath(key),
        idempotent: true,
        key,
      });
    } catch (err) {
      // absent key: nothing to delete
      if (err instanceof NotFoundError) return;
      throw err;
    }
  }

  async fetchPage(
    filter: QueryDefinition = MATCH_ALL,
    options: QueryOptions = {},
  ): Promise<QueryPage> {
    const { page, status } = await this.requestPage(filter, options);
    if (page.last !== undefined && page.last === options.last) {
      throw new ServiceError(
        status,
        [],
        `query: service returned the same cursor "${page.last}" it was given`,
      );
    }
    return page;
  }

  /**
   * Lazily yields every matching item, one page per request, following the
   * service cursor until it is absent. Stopping early issues no further
   * requests; resuming requires the cursor of a page from fetchPage().
   */
  async *query(
    filter: QueryDefinition = MATCH_ALL,
    options: QueryOptions = {},
  ): AsyncGenerator<BaseRecord> {
    let last = options.last;
    // every cursor sent so far; a repeat would never terminate
    const followed = new Set<string>();
    if (last !== undefined) followed.add(last);

    while (true) {
      const { page, status } = await this.requestPage(filter, {
        ...(options.limit !== undefined ? { limit: options.limit } : {}),
        ...(last !== undefined ? { last } : {}),
      });
      if (page.last !== undefined && followed.has(page.last)) {
        throw new ServiceError(
          status,
          [],
          `query: service returned cursor "${page.last}" that was already followed`,
        );
      }

      for (const record of page.items) {
        yield record;
      }

      if (page.last === undefined) break;
      followed.add(page.last);
      last = page.last;
    }
  }

  private async requestPage(
    filter: QueryDefinition,
    options: QueryOptions,
  ): Promise<{ page: QueryPage; status: number }> {
    const response = await this.transport.send({
      operation: 'query',
      method: 'POST',
      path: 'query',
      body: compileQueryBody(filter, options),
      idempotent: true,
    });
    const decoded = decodeBody('query', QueryResponseSchema, response.body);
    return {
      status: response.status,
      page: {
        items: decoded.items,
        size: decoded.paging.size,
        ...(decoded.paging.last !== undefined ? { last: decoded.paging.last } : {}),
      },
    };
  }
}
