import { describe, it, expect } from 'vitest';
import {
  reconcileTables,
  reconcileVariables,
  updateTables,
  updateVariables,
} from '../../src/reconcile/engine';
import { findDifference } from '../../src/reconcile/diff';
import type { TableSettings } from '../../src/reconcile/types';
import { NoTablesFoundError, UnrankedCategoryError } from '../../src/errors';
import { emptyMatchPage, fullMatchPage } from '../fixtures/match-page';

const emptySettings = (): TableSettings => ({ tables: {}, variables: {} });

describe('reconcileTables', () => {
  it('ranks new categories with summary last and misc penultimate', () => {
    const result = reconcileTables(['summary', 'misc', 'passing'], {});

    expect(result?.tables).toEqual({ summary: 3, misc: 2, passing: 1 });
    expect(result?.added).toEqual(new Set(['summary', 'misc', 'passing']));
  });

  it('returns null when every observed category is ranked', () => {
    expect(reconcileTables(['summary'], { summary: 2, passing: 1 })).toBeNull();
  });

  it('keeps existing ranks and adds only new categories', () => {
    const existing = { summary: 9, passing: 4 };

    const result = reconcileTables(['summary', 'passing', 'defense'], existing);

    expect(result?.tables).toEqual({ summary: 9, passing: 4, defense: 1 });
    expect(result?.added).toEqual(new Set(['defense']));
    expect(existing).toEqual({ summary: 9, passing: 4 });
  });
});

describe('updateTables', () => {
  it('discovers categories from pages', () => {
    const result = updateTables([fullMatchPage()], emptySettings());

    expect(result?.tables).toEqual({ summary: 4, passing: 1, misc: 3, keeper: 1 });
  });

  it('is idempotent until the ranks are saved', () => {
    const settings = emptySettings();
    const pages = [fullMatchPage()];

    const first = updateTables(pages, settings);
    const second = updateTables(pages, settings);
    expect(second?.added).toEqual(first?.added);

    const saved: TableSettings = { ...settings, tables: first?.tables ?? {} };
    expect(updateTables(pages, saved)).toBeNull();
  });

  it('throws when a page has no stat tables', () => {
    expect(() => updateTables([emptyMatchPage()], emptySettings())).toThrow(NoTablesFoundError);
  });
});

describe('findDifference', () => {
  it('treats a category named like an Object member as missing', () => {
    expect(findDifference({ constructor: ['built'] }, {})).toEqual({ constructor: new Set(['built']) });
  });

  it('reports variables moved between categories', () => {
    const existing = { passing: ['cmp', 'att'] };
    const next = { passing: ['cmp'], shooting: ['att'] };

    expect(findDifference(next, existing)).toEqual({ shooting: new Set(['att']) });
    expect(findDifference(existing, next)).toEqual({ passing: new Set(['att']) });
  });

  it('omits categories without differences', () => {
    expect(findDifference({ a: ['x'] }, { a: ['x', 'y'] })).toEqual({});
  });
});

describe('reconcileVariables', () => {
  it('computes added and removed against the saved mapping', () => {
    const settings: TableSettings = {
      tables: { summary: 2, passing: 1 },
      variables: { summary: ['minutes', 'old_stat'], passing: ['cmp'] },
    };

    const result = reconcileVariables({ summary: ['minutes', 'xg'], passing: ['cmp', 'minutes'] }, settings);

    expect(result.variables).toEqual({ summary: ['minutes', 'xg'], passing: ['cmp'] });
    expect(result.added).toEqual({ summary: new Set(['xg']) });
    expect(result.removed).toEqual({ summary: new Set(['old_stat']) });
  });

  it('reports nothing when the mapping is unchanged', () => {
    const settings: TableSettings = {
      tables: { summary: 2, passing: 1 },
      variables: { summary: ['minutes'], passing: ['cmp'] },
    };

    const result = reconcileVariables({ summary: ['minutes'], passing: ['cmp', 'minutes'] }, settings);

    expect(result.added).toEqual({});
    expect(result.removed).toEqual({});
  });
});

describe('updateVariables', () => {
  it('maps page variables using the saved ranks', () => {
    const settings: TableSettings = {
      tables: { summary: 4, passing: 1, misc: 3, keeper: 1 },
      variables: {},
    };

    const result = updateVariables([fullMatchPage()], settings);

    expect(result.variables).toEqual({
      summary: ['player', 'nationality', 'minutes', 'goals', 'passes_completed'],
      passing: ['passes'],
      misc: ['fouls'],
      keeper: ['gk_saves'],
    });
    expect(result.added.passing).toEqual(new Set(['passes']));
    expect(result.removed).toEqual({});
  });

  it('refuses to map categories without a rank', () => {
    const settings: TableSettings = { tables: { summary: 2, passing: 1 }, variables: {} };

    expect(() => updateVariables([fullMatchPage()], settings)).toThrow(UnrankedCategoryError);
  });
});
