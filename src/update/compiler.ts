import type { JsonObject, JsonValue } from '../types.js';
import { ValidationError } from '../errors.js';
import type { UpdateDefinition, UpdateOperation } from './types.js';

type Group = UpdateOperation['kind'];

function isListGroup(group: Group): boolean {
  return group === 'append' || group === 'prepend';
}

function compatible(a: Group, b: Group): boolean {
  return a === b || (isListGroup(a) && isListGroup(b));
}

/**
 * Compiles an UpdateDefinition into a PATCH body:
 * `{ set?, increment?, append?, prepend?, delete? }`, empty groups omitted.
 * set/increment: last call wins. append/prepend: values accumulate in call
 * order. delete: deduplicated. A path may belong to one group only, except
 * that append and prepend may target the same list.
 */
export function compileUpdate(def: UpdateDefinition): JsonObject {
  if (def._operations.length === 0) {
    throw new ValidationError('Update has no operations');
  }

  const owner = new Map<string, Group>();
  const set: JsonObject = {};
  const increment: Record<string, number> = {};
  const append: Record<string, JsonValue[]> = {};
  const prepend: Record<string, JsonValue[]> = {};
  const deletes: string[] = [];

  for (const op of def._operations) {
    const previous = owner.get(op.path);
    if (previous !== undefined && !compatible(previous, op.kind)) {
      throw new ValidationError(
        `Update path "${op.path}" is used by both "${previous}" and "${op.kind}"`,
      );
    }
    if (previous === undefined) owner.set(op.path, op.kind);

    switch (op.kind) {
      case 'set':
        set[op.path] = op.value;
        break;
      case 'increment':
        increment[op.path] = op.value;
        break;
      case 'append':
        append[op.path] = [...(append[op.path] ?? []), ...op.values];
        break;
      case 'prepend':
        prepend[op.path] = [...(prepend[op.path] ?? []), ...op.values];
        break;
      case 'delete':
        if (!deletes.includes(op.path)) deletes.push(op.path);
        break;
    }
  }

  const body: JsonObject = {};
  if (Object.keys(set).length > 0) body['set'] = set;
  if (Object.keys(increment).length > 0) body['increment'] = increment;
  if (Object.keys(append).length > 0) body['append'] = append;
  if (Object.keys(prepend).length > 0) body['prepend'] = prepend;
  if (deletes.length > 0) body['delete'] = deletes;
  return body;
}
