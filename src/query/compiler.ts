import type { JsonObject, JsonValue } from '../types.js';
import { ValidationError } from '../errors.js';
import type { FilterNode, QueryDefinition } from './types.js';

/**
 * Wire format of a query: the objects are OR-ed, the entries of one
 * object are AND-ed. An empty list matches everything.
 */
export type WireQuery = JsonObject[];

function wireKey(node: Extract<FilterNode, { kind: 'cond' }>): string {
  return node.op === 'eq' ? node.field : `${node.field}?${node.op}`;
}

function sameValue(a: JsonValue, b: JsonValue): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Merges two conjunctions. The same wire key with two different values
 * cannot be expressed in one object.
 */
function mergeConjunctions(left: JsonObject, right: JsonObject): JsonObject {
  const merged: JsonObject = { ...left };
  for (const [key, value] of Object.entries(right)) {
    const existing = merged[key];
    if (existing !== undefined && !sameValue(existing, value)) {
      throw new ValidationError(
        `Query has conflicting conditions on "${key}" within one AND group`,
      );
    }
    merged[key] = value;
  }
  return merged;
}

/**
 * Converts a FilterNode into disjunctive normal form.
 * or → concatenation; and → cross product of the children's disjunctions.
 */
function compileFilterNode(node: FilterNode): WireQuery {
  if (node.kind === 'cond') {
    return [{ [wireKey(node)]: node.value }];
  }

  if (node.kind === 'or') {
    return node.filters.flatMap((f) => compileFilterNode(f));
  }

  // node.kind === 'and'
  let product: WireQuery = [{}];
  for (const child of node.filters) {
    const disjunction = compileFilterNode(child);
    product = product.flatMap((left) =>
      disjunction.map((right) => mergeConjunctions(left, right)),
    );
  }
  return dedupe(product);
}

function dedupe(conjunctions: WireQuery): WireQuery {
  const seen = new Set<string>();
  const out: WireQuery = [];
  for (const conjunction of conjunctions) {
    const canonical = JSON.stringify(
      Object.keys(conjunction).sort().map((k) => [k, conjunction[k]]),
    );
    if (!seen.has(canonical)) {
      seen.add(canonical);
      out.push(conjunction);
    }
  }
  return out;
}

export function compileFilter(query: QueryDefinition): WireQuery {
  if (query._filter === null) return [];
  return dedupe(compileFilterNode(query._filter));
}

export const MAX_QUERY_LIMIT = 1000;

/**
 * Compiles a QueryDefinition plus paging options into a POST /query body.
 * The query member is omitted when the filter matches everything.
 */
export function compileQueryBody(
  query: QueryDefinition,
  options: { limit?: number; last?: string } = {},
): JsonObject {
  const body: JsonObject = {};
  const wire = compileFilter(query);
  if (wire.length > 0) body['query'] = wire;

  if (options.limit !== undefined) {
    if (!Number.isInteger(options.limit) || options.limit < 1 || options.limit > MAX_QUERY_LIMIT) {
      throw new ValidationError(
        `Query limit must be an integer between 1 and ${MAX_QUERY_LIMIT}, got ${options.limit}`,
      );
    }
    body['limit'] = options.limit;
  }
  if (options.last !== undefined) {
    if (options.last === '') {
      throw new ValidationError('Query cursor must be a non-empty string');
    }
    body['last'] = options.last;
  }
  return body;
}
