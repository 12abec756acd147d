import type { Category, CategoryVariableMap, MatchPage } from '../tables/types';
import type { CategoryRanks, DedupeOptions, TableSettings, TablesUpdate, VariablesUpdate } from './types';
import { discoverCategories, discoverVariables } from '../tables';
import { initialRank } from './priority';
import { removeDuplicateVariables } from './dedupe';
import { findDifference } from './diff';
import { NoTablesFoundError } from '../errors';

/**
 * Ranks newly observed categories. Returns null when every observed category
 * is already ranked.
 */
export function reconcileTables(observed: Iterable<Category>, existing: CategoryRanks): TablesUpdate | null {
  const observedSet = new Set(observed);
  const known = new Set(Object.keys(existing));

  if (known.size > 0 && [...observedSet].every((category) => known.has(category))) {
    return null;
  }

  const tables: CategoryRanks = { ...existing };
  const added = new Set<Category>();

  for (const category of observedSet) {
    if (known.has(category)) {
      continue;
    }
    tables[category] = initialRank(category, observedSet.size);
    added.add(category);
  }

  return { tables, added };
}

/**
 * Maps observed variables to their owning category and compares the result
 * with the saved mapping.
 */
export function reconcileVariables(
  observed: CategoryVariableMap,
  settings: TableSettings,
  options: DedupeOptions = {}
): VariablesUpdate {
  const variables = removeDuplicateVariables(observed, settings.tables, options);

  return {
    variables,
    added: findDifference(variables, settings.variables),
    removed: findDifference(settings.variables, variables),
  };
}

/**
 * Checks the table categories on sample pages against the saved ranks.
 *
 * @throws NoTablesFoundError when a page has no stat tables
 */
export function updateTables(pages: MatchPage[], settings: TableSettings): TablesUpdate | null {
  const tables = discoverCategories(pages);
  if (!tables) {
    throw new NoTablesFoundError();
  }
  return reconcileTables(tables.values(), settings.tables);
}

/**
 * Rebuilds the variable mapping from sample pages. Ranks for every observed
 * category must already be saved.
 *
 * @throws UnrankedCategoryError
 * @throws NoTablesFoundError
 */
export function updateVariables(
  pages: MatchPage[],
  settings: TableSettings,
  options: DedupeOptions = {}
): VariablesUpdate {
  return reconcileVariables(discoverVariables(pages), settings, options);
}
