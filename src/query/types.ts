import type { JsonValue } from '../types.js';

/** Wire suffix of each operator; `eq` is sent as the bare field name. */
export type Operator =
  | 'eq'
  | 'ne'
  | 'lt'
  | 'gt'
  | 'lte'
  | 'gte'
  | 'pfx'
  | 'r'
  | 'contains'
  | 'not_contains';

export type FilterNode =
  | { kind: 'cond'; field: string; op: Operator; value: JsonValue }
  | { kind: 'and';  filters: FilterNode[] }
  | { kind: 'or';   filters: FilterNode[] };

/**
 * Opaque filter passed to query() and fetchPage().
 * Built exclusively via the query DSL; do not construct directly.
 * A null filter matches every item.
 */
export interface QueryDefinition {
  readonly _filter: FilterNode | null;
}
