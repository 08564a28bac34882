import type { JsonValue } from '../types.js';
import { ValidationError } from '../errors.js';
import type { UpdateDefinition, UpdateOperation } from './types.js';

function checkPath(path: string): string {
  if (path.trim() === '') {
    throw new ValidationError('Update path must be a non-empty string');
  }
  if (path === 'key' || path.startsWith('key.')) {
    throw new ValidationError('The "key" attribute of an item cannot be updated');
  }
  return path;
}

/**
 * Fluent immutable update builder. Every call returns a new UpdateBuilder.
 * Dots in a path address nested attributes ("profile.age").
 */
export class UpdateBuilder implements UpdateDefinition {
  constructor(readonly _operations: readonly UpdateOperation[]) {}

  private _with(op: UpdateOperation): UpdateBuilder {
    return new UpdateBuilder([...this._operations, op]);
  }

  set(path: string, value: JsonValue): UpdateBuilder {
    return this._with({ kind: 'set', path: checkPath(path), value });
  }

  /** Negative values decrement. */
  increment(path: string, by: number = 1): UpdateBuilder {
    if (!Number.isFinite(by)) {
      throw new ValidationError(`Increment for "${path}" must be a finite number`);
    }
    return this._with({ kind: 'increment', path: checkPath(path), value: by });
  }

  /** Appends to a list attribute. An array argument appends each element. */
  append(path: string, value: JsonValue): UpdateBuilder {
    const values = Array.isArray(value) ? value : [value];
    return this._with({ kind: 'append', path: checkPath(path), values });
  }

  /** Prepends to a list attribute. An array argument prepends each element. */
  prepend(path: string, value: JsonValue): UpdateBuilder {
    const values = Array.isArray(value) ? value : [value];
    return this._with({ kind: 'prepend', path: checkPath(path), values });
  }

  /** Removes the attribute. */
  delete(path: string): UpdateBuilder {
    return this._with({ kind: 'delete', path: checkPath(path) });
  }
}

/**
 * Entry point for the update DSL.
 *
 * @example
 * update.set('profile.age', 33)
 *   .increment('purchases', 2)
 *   .append('likes', 'ramen')
 *   .delete('profile.hometown')
 */
export const update = {
  set(path: string, value: JsonValue): UpdateBuilder {
    return new UpdateBuilder([]).set(path, value);
  },
  increment(path: string, by?: number): UpdateBuilder {
    return new UpdateBuilder([]).increment(path, by);
  },
  append(path: string, value: JsonValue): UpdateBuilder {
    return new UpdateBuilder([]).append(path, value);
  },
  prepend(path: string, value: JsonValue): UpdateBuilder {
    return new UpdateBuilder([]).prepend(path, value);
  },
  delete(path: string): UpdateBuilder {
    return new UpdateBuilder([]).delete(path);
  },
};
