import { hasChildren, isText, type AnyNode } from 'domhandler';
import type { MatchPage, StatTable, TableRow, MatchDetails } from './types';
import { getSquadIds, getTableVariables } from './parser';

const PLAYER_ID_PATTERN = /\/players\/([a-zA-Z0-9]+)/g;
const OFFICIAL_PATTERN = /^(.+?)\s*\(([^)]+)\)/;

function collectText(node: AnyNode, out: string[]): string[] {
  if (isText(node)) {
    out.push(node.data);
  } else if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, out);
    }
  }
  return out;
}

/**
 * Text of the last non-blank text node in a cell. Player cells carry a
 * leading indent for substitutes and nationality cells a flag code before
 * the country, so the last node is the value.
 */
function cellValue(cell: AnyNode | undefined): string {
  if (!cell) {
    return '';
  }
  const texts = collectText(cell, []).filter((text) => text.trim().length > 0);
  return texts.length > 0 ? texts[texts.length - 1].trim() : '';
}

function playerIds(hrefs: string[]): string[] {
  const ids: string[] = [];
  for (const href of hrefs) {
    for (const match of href.matchAll(PLAYER_ID_PATTERN)) {
      ids.push(match[1]);
    }
  }
  return ids;
}

/**
 * Extracts every body row of a stat table. Values are left as they appear on
 * the page; each player column gets a `<column>_id` list of linked player ids.
 */
export function extractTable(table: StatTable): TableRow[] {
  const { $ } = table.page;
  const variables = getTableVariables(table);
  const rows: TableRow[] = [];

  $(table.element)
    .children('tbody')
    .children('tr')
    .each((_, tr) => {
      const cells = $(tr).children();
      const cellFor = (variable: string) =>
        cells.filter((_, cell) => $(cell).attr('data-stat') === variable).first();

      const row: TableRow = {};

      for (const variable of variables) {
        const cell = cellFor(variable);
        row[variable] = cellValue(cell.get(0));

        if (variable.includes('player')) {
          const hrefs = cell
            .find('[href]')
            .toArray()
            .map((el) => $(el).attr('href') ?? '');
          row[`${variable}_id`] = playerIds(hrefs);
        }
      }

      rows.push(row);
    });

  return rows;
}

/**
 * Team ids and match officials from the scorebox.
 */
export function extractMatchDetails(page: MatchPage): MatchDetails {
  const { $ } = page;
  const officials: Record<string, string> = {};

  $('div.scorebox_meta > div')
    .filter((_, div) => $(div).children('strong').text().includes('Officials'))
    .find('span')
    .each((_, span) => {
      const match = $(span).text().trim().match(OFFICIAL_PATTERN);
      if (match) {
        officials[`official_${match[2].trim().toLowerCase()}`] = match[1].trim();
      }
    });

  return { teamIds: getSquadIds(page), officials };
}
