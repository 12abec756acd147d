import type { MatchPage, StatTable, Category, CategoryVariableMap, Variable } from './types';
import { NoTablesFoundError } from '../errors';

const STATS_MARKER = 'stats';
const SQUAD_ID_PATTERN = /\/squads\/([a-zA-Z0-9]+)/;

/**
 * Reads the two squad ids linked from the scorebox of a match page.
 */
export function getSquadIds(page: MatchPage): string[] {
  const { $ } = page;
  const ids: string[] = [];

  $('div[itemprop="performer"] a').each((_, link) => {
    const match = ($(link).attr('href') ?? '').match(SQUAD_ID_PATTERN);
    if (match && !ids.includes(match[1])) {
      ids.push(match[1]);
    }
  });

  return ids;
}

export function getStatTables(page: MatchPage): StatTable[] {
  const { $ } = page;

  return $(`table[id*="${STATS_MARKER}"]`)
    .toArray()
    .map((element) => ({ page, id: $(element).attr('id') ?? '', element }));
}

/**
 * Strips the stats marker and squad ids from a table id, leaving the bare category.
 * "stats_18bb7c10_passing_types" -> "passing_types"
 */
export function toCategory(tableId: string, squadIds: string[]): Category {
  let label = tableId.replaceAll(STATS_MARKER, '');
  for (const squadId of squadIds.slice(0, 2)) {
    label = label.replaceAll(squadId, '');
  }
  return label.replace(/^[ _]+|[ _]+$/g, '');
}

/**
 * Lists every stat table on the given pages with its category.
 * Returns null as soon as one page has no stat tables.
 */
export function discoverCategories(pages: MatchPage[]): Map<StatTable, Category> | null {
  const tables = new Map<StatTable, Category>();

  for (const page of pages) {
    const statTables = getStatTables(page);
    if (statTables.length === 0) {
      return null;
    }

    const squadIds = getSquadIds(page);
    for (const table of statTables) {
      tables.set(table, toCategory(table.id, squadIds));
    }
  }

  return tables;
}

/**
 * Reads the column variables of a table from the data-stat attributes of its last header row.
 */
export function getTableVariables(table: StatTable): string[] {
  const { $ } = table.page;

  return $(table.element)
    .children('thead')
    .children('tr')
    .last()
    .children('th[data-stat]')
    .toArray()
    .map((th) => $(th).attr('data-stat') ?? '')
    .filter((variable) => variable.length > 0);
}

/**
 * Collects the variables present in each category across all pages.
 * Variables are unique within a category but may repeat across categories.
 */
export function discoverVariables(pages: MatchPage[]): CategoryVariableMap {
  const tables = discoverCategories(pages);
  if (!tables) {
    throw new NoTablesFoundError();
  }

  const variables = new Map<Category, Variable[]>();
  for (const [table, category] of tables) {
    const seen = variables.get(category) ?? [];
    for (const variable of getTableVariables(table)) {
      if (!seen.includes(variable)) {
        seen.push(variable);
      }
    }
    variables.set(category, seen);
  }

  return Object.fromEntries(variables);
}

/**
 * The variables listed for a category, or none. Only own keys count, so a
 * category named like an Object method is not mistaken for one.
 */
export function variablesOf(map: CategoryVariableMap, category: Category): Variable[] {
  return Object.hasOwn(map, category) ? map[category] : [];
}
