import type { JsonValue } from '../types.js';
import { ValidationError } from '../errors.js';
import type { FilterNode, Operator, QueryDefinition } from './types.js';

type Combinator = 'where' | 'and' | 'or';

/**
 * Combines a new condition with the existing filter using the given
 * combinator. Consecutive and/or calls accumulate into one flat node;
 * switching combinator wraps the existing filter (left-associative).
 */
function _applyFilter(
  existing: FilterNode | null,
  combinator: Combinator,
  newNode: FilterNode,
): FilterBuilder {
  if (combinator === 'where' || existing === null) {
    // No existing filter: same as where
    return new FilterBuilder(newNode);
  }
  if ((existing.kind === 'and' || existing.kind === 'or') && existing.kind === combinator) {
    // Flat accumulation: append to existing node
    return new FilterBuilder({ kind: combinator, filters: [...existing.filters, newNode] });
  }
  // Wrap both into a new node
  return new FilterBuilder({ kind: combinator, filters: [existing, newNode] });
}

/**
 * Fluent immutable filter builder. Implements QueryDefinition so it can
 * be passed directly to query() and fetchPage(). Every operation returns a
 * new FilterBuilder; existing instances are never mutated.
 */
export class FilterBuilder implements QueryDefinition {
  constructor(readonly _filter: FilterNode | null) {}

  /** Replace the filter with a new expression. */
  get where(): FieldSelector {
    return new FieldSelector(this._filter, 'where');
  }

  /** Combine with the existing filter using AND. */
  get and(): FieldSelector {
    return new FieldSelector(this._filter, 'and');
  }

  /** Combine with the existing filter using OR. */
  get or(): FieldSelector {
    return new FieldSelector(this._filter, 'or');
  }
}

/**
 * Intermediate builder step: holds the combinator and awaits a field name.
 */
export class FieldSelector {
  constructor(
    private readonly _existing: FilterNode | null,
    private readonly _combinator: Combinator,
  ) {}

  /** Select the attribute to match against. Dots address nested attributes. */
  field(name: string): ConditionSetter {
    if (name.trim() === '') {
      throw new ValidationError('Query field name must be a non-empty string');
    }
    if (name.includes('?')) {
      throw new ValidationError(`Query field name "${name}" must not contain "?"`);
    }
    return new ConditionSetter(this._existing, this._combinator, name);
  }
}

/**
 * Intermediate builder step: holds the field and awaits an operator.
 */
export class ConditionSetter {
  constructor(
    private readonly _existing: FilterNode | null,
    private readonly _combinator: Combinator,
    private readonly _field: string,
  ) {}

  private _complete(op: Operator, value: JsonValue): FilterBuilder {
    const newNode: FilterNode = { kind: 'cond', field: this._field, op, value };
    return _applyFilter(this._existing, this._combinator, newNode);
  }

  equals(value: JsonValue): FilterBuilder {
    return this._complete('eq', value);
  }

  notEquals(value: JsonValue): FilterBuilder {
    return this._complete('ne', value);
  }

  lessThan(value: number | string): FilterBuilder {
    return this._complete('lt', value);
  }

  greaterThan(value: number | string): FilterBuilder {
    return this._complete('gt', value);
  }

  lessThanOrEqual(value: number | string): FilterBuilder {
    return this._complete('lte', value);
  }

  greaterThanOrEqual(value: number | string): FilterBuilder {
    return this._complete('gte', value);
  }

  startsWith(prefix: string): FilterBuilder {
    return this._complete('pfx', prefix);
  }

  /** Inclusive range. */
  between(lower: number | string, upper: number | string): FilterBuilder {
    return this._complete('r', [lower, upper]);
  }

  /** Substring of a string attribute, or element of a list attribute. */
  contains(value: JsonValue): FilterBuilder {
    return this._complete('contains', value);
  }

  notContains(value: JsonValue): FilterBuilder {
    return this._complete('not_contains', value);
  }
}
