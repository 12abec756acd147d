import type { Category, Variable, CategoryVariableMap } from '../tables/types';
import type { CategoryRanks, DedupeOptions } from './types';
import { rankOrder, selectTopPriority, SUMMARY_CATEGORY } from './priority';
import { UnrankedCategoryError } from '../errors';

export const DEFAULT_SUMMARY_THRESHOLD = 0.7;

/**
 * Assigns every variable to exactly one category.
 *
 * A variable found in summary and in more than `summaryThreshold` of all
 * ranked categories stays in summary. Any other variable goes to the
 * highest-ranked category it appears in.
 *
 * @throws UnrankedCategoryError when a category in `variables` has no rank
 */
export function removeDuplicateVariables(
  variables: CategoryVariableMap,
  ranks: CategoryRanks,
  options: DedupeOptions = {}
): CategoryVariableMap {
  const threshold = options.summaryThreshold ?? DEFAULT_SUMMARY_THRESHOLD;
  const priority = rankOrder(ranks);

  const ranked = new Set(priority);
  const unranked = Object.keys(variables).filter((category) => !ranked.has(category));
  if (unranked.length > 0) {
    throw new UnrankedCategoryError(unranked);
  }

  const candidates = new Map<Variable, Category[]>();
  for (const [category, vars] of Object.entries(variables)) {
    for (const variable of vars) {
      const cats = candidates.get(variable) ?? [];
      if (!cats.includes(category)) {
        cats.push(category);
      }
      candidates.set(variable, cats);
    }
  }

  const owners = new Map<Variable, Category | undefined>();
  for (const [variable, cats] of candidates) {
    if (cats.length > priority.length * threshold && cats.includes(SUMMARY_CATEGORY)) {
      owners.set(variable, SUMMARY_CATEGORY);
    } else {
      owners.set(variable, selectTopPriority(cats, priority));
    }
  }

  const output = new Map<Category, Variable[]>();
  for (const [category, vars] of Object.entries(variables)) {
    for (const variable of vars) {
      if (owners.get(variable) !== category) {
        continue;
      }
      const owned = output.get(category) ?? [];
      if (!owned.includes(variable)) {
        owned.push(variable);
      }
      output.set(category, owned);
    }
  }

  return Object.fromEntries(output);
}
