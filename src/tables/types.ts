import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

/**
 * A fetched match report, parsed and ready for selector queries.
 */
export interface MatchPage {
  url: string;
  $: CheerioAPI;
}

/**
 * A stat table located on a match page.
 */
export interface StatTable {
  page: MatchPage;
  id: string;
  element: Element;
}

export type Category = string; // e.g. "summary", "passing", "keeper"
export type Variable = string; // data-stat column identifier, e.g. "passes_completed"

/**
 * Variables observed (or owned) per category, in document order.
 */
export type CategoryVariableMap = Record<Category, Variable[]>;

/**
 * One row of a stat table. Column values are raw cell text; `<col>_id`
 * companions hold the player ids linked from player columns.
 */
export type TableRow = Record<string, string | string[] | null>;

export interface MatchDetails {
  teamIds: string[];
  officials: Record<string, string>;
}
