import type { MatchStats } from './match-stats';

export type ExportFormat = 'json' | 'csv';

export interface ExportRecord {
  match_url: string;
  category: string;
  [column: string]: string | string[] | null;
}

/**
 * Flattens match stats into one record per table row, tagged with its match and category.
 */
export function toRecords(matches: MatchStats[]): ExportRecord[] {
  const records: ExportRecord[] = [];

  for (const match of matches) {
    for (const [category, rows] of Object.entries(match.tables)) {
      for (const row of rows) {
        const record: ExportRecord = { match_url: match.url, category };
        for (const [column, value] of Object.entries(row)) {
          if (!Object.hasOwn(record, column)) {
            record[column] = value;
          }
        }
        records.push(record);
      }
    }
  }

  return records;
}

function escapeCSVValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  const str = Array.isArray(value) ? value.join(';') : String(value);
  if (str.includes(',') || str.includes('"') || str.includes('\n')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * CSV with the union of all columns, in the order they are first seen.
 * Player id lists are joined with ";".
 */
export function formatCsv(records: ExportRecord[]): string {
  if (records.length === 0) {
    return '';
  }

  const headers: string[] = [];
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!headers.includes(key)) {
        headers.push(key);
      }
    }
  }

  const lines: string[] = [headers.join(',')];
  for (const record of records) {
    lines.push(headers.map((h) => escapeCSVValue(record[h])).join(','));
  }

  return lines.join('\n');
}

export function formatJson(matches: MatchStats[]): string {
  return JSON.stringify(matches, null, 2);
}
