import type { Category, MatchPage, TableRow } from './tables';
import { discoverCategories, extractMatchDetails, extractTable, variablesOf } from './tables';
import type { TableSettings } from './reconcile';
import { NoTablesFoundError } from './errors';

export interface MatchStats {
  url: string;
  teamIds: string[];
  officials: Record<string, string>;
  tables: Record<Category, TableRow[]>;
}

const ROW_KEYS = ['player', 'player_id'];

/**
 * Keeps the team, the player and the variables a category owns, plus the
 * `_id` companions of owned player columns.
 */
function pickOwned(row: TableRow, owned: Set<string>, teamId: string | null): TableRow {
  const picked: TableRow = { team_id: teamId };

  for (const [key, value] of Object.entries(row)) {
    const base = key.endsWith('_id') ? key.slice(0, -3) : key;
    if (ROW_KEYS.includes(key) || owned.has(key) || (base !== key && owned.has(base))) {
      picked[key] = value;
    }
  }

  return picked;
}

/**
 * Extracts the stat tables of one match, keeping each variable only in the
 * category that owns it in the settings. Categories without owned variables
 * are skipped; both teams' rows of a category are concatenated.
 */
export function scrapeMatch(page: MatchPage, settings: TableSettings): MatchStats {
  const tables = discoverCategories([page]);
  if (!tables) {
    throw new NoTablesFoundError(`No valid stats tables found at ${page.url}`);
  }

  const details = extractMatchDetails(page);
  const byCategory = new Map<Category, TableRow[]>();

  for (const [table, category] of tables) {
    const owned = new Set(variablesOf(settings.variables, category));
    if (owned.size === 0) {
      continue;
    }

    const teamId = details.teamIds.find((id) => table.id.includes(id)) ?? null;
    const rows = extractTable(table).map((row) => pickOwned(row, owned, teamId));
    byCategory.set(category, [...(byCategory.get(category) ?? []), ...rows]);
  }

  return { url: page.url, ...details, tables: Object.fromEntries(byCategory) };
}
