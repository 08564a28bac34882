import { FilterBuilder } from './builder.js';
import type { FieldSelector } from './builder.js';

/**
 * Entry point for the query DSL.
 *
 * @example
 * query.where.field('age').greaterThan(30)
 *   .and.field('name').startsWith('A')
 *   .or.field('active').equals(true)
 */
export const query = {
  /** Matches every item in the base. */
  all(): FilterBuilder {
    return new FilterBuilder(null);
  },
  get where(): FieldSelector {
    return new FilterBuilder(null).where;
  },
};
