import type { CategoryVariableMap } from '../tables/types';
import { variablesOf } from '../tables/parser';
import type { VariableDelta } from './types';

/**
 * Variables in `left` that are missing from `right`, per category.
 * A category absent from `right` contributes all of its variables.
 * Categories with nothing missing are left out.
 */
export function findDifference(left: CategoryVariableMap, right: CategoryVariableMap): VariableDelta {
  const diff: VariableDelta = {};

  for (const [category, values] of Object.entries(left)) {
    const other = new Set(variablesOf(right, category));
    const missing = new Set(values.filter((value) => !other.has(value)));
    if (missing.size > 0) {
      diff[category] = missing;
    }
  }

  return diff;
}

export function isEmptyDelta(delta: VariableDelta): boolean {
  return Object.keys(delta).length === 0;
}

export function formatDelta(delta: VariableDelta): string {
  return Object.entries(delta)
    .map(([category, values]) => `${category}: ${[...values].join(', ')}`)
    .join('\n');
}
