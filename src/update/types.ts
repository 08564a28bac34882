import type { JsonValue } from '../types.js';

export type UpdateOperation =
  | { kind: 'set';       path: string; value: JsonValue }
  | { kind: 'increment'; path: string; value: number }
  | { kind: 'append';    path: string; values: JsonValue[] }
  | { kind: 'prepend';   path: string; values: JsonValue[] }
  | { kind: 'delete';    path: string };

/**
 * Opaque partial update passed to update().
 * Built exclusively via the update DSL; operations are kept in call order.
 */
export interface UpdateDefinition {
  readonly _operations: readonly UpdateOperation[];
}
