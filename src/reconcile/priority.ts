import type { Category } from '../tables/types';
import type { CategoryRanks } from './types';

export const SUMMARY_CATEGORY = 'summary';
export const MISC_CATEGORY = 'misc';
export const DEFAULT_RANK = 1;

/**
 * Categories ordered from lowest to highest priority. Equal ranks keep their
 * order in the settings file, so the earlier one is eliminated first.
 */
export function rankOrder(ranks: CategoryRanks): Category[] {
  return Object.entries(ranks)
    .sort((a, b) => a[1] - b[1])
    .map(([category]) => category);
}

/**
 * Walks the priority list from lowest to highest, dropping each item found
 * in `items`, until a single item is left.
 */
export function selectTopPriority<T>(items: readonly T[], priority: readonly T[]): T | undefined {
  const remaining = [...items];

  for (let index = 0; index < priority.length && remaining.length > 1; index++) {
    const position = remaining.indexOf(priority[index]);
    if (position !== -1) {
      remaining.splice(position, 1);
    }
  }

  return remaining[0];
}

/**
 * Rank for a category seen for the first time: summary goes last, misc
 * penultimate, everything else shares the lowest rank.
 */
export function initialRank(category: Category, observedCount: number): number {
  if (category === SUMMARY_CATEGORY) {
    return observedCount;
  }
  if (category === MISC_CATEGORY) {
    return observedCount - 1;
  }
  return DEFAULT_RANK;
}
