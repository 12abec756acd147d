import { describe, it, expect } from 'vitest';
import { removeDuplicateVariables } from '../../src/reconcile/dedupe';
import { UnrankedCategoryError } from '../../src/errors';

function ownerCount(map: Record<string, string[]>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const vars of Object.values(map)) {
    for (const v of vars) {
      counts.set(v, (counts.get(v) ?? 0) + 1);
    }
  }
  return counts;
}

describe('removeDuplicateVariables', () => {
  it('assigns a shared variable to the higher ranked category', () => {
    const result = removeDuplicateVariables(
      { a: ['shared', 'only_a'], b: ['shared', 'only_b'] },
      { a: 1, b: 3 }
    );

    expect(result).toEqual({ a: ['only_a'], b: ['shared', 'only_b'] });
  });

  it('keeps a variable in summary when it appears in more than 70% of categories', () => {
    const variables = {
      summary: ['minutes'],
      passing: ['minutes'],
      passing_types: ['minutes'],
      defense: ['minutes'],
      possession: ['minutes', 'touches'],
      misc: ['fouls'],
      keeper: ['gk_saves'],
    };
    // passing outranks summary, so only the frequency rule can keep minutes in summary
    const ranks = { summary: 1, passing: 7, passing_types: 2, defense: 3, possession: 4, misc: 5, keeper: 6 };

    const result = removeDuplicateVariables(variables, ranks);

    expect(result.summary).toEqual(['minutes']);
    expect(result.passing).toBeUndefined();
  });

  it('uses elimination when the frequency rule is not met', () => {
    const variables = {
      summary: ['xg'],
      shots: ['xg'],
      passing: ['cmp'],
      defense: ['tkl'],
    };
    const ranks = { summary: 4, shots: 1, passing: 2, defense: 3 };

    // 2 of 4 categories is 50%
    expect(removeDuplicateVariables(variables, ranks)).toEqual({
      summary: ['xg'],
      passing: ['cmp'],
      defense: ['tkl'],
    });
    expect(removeDuplicateVariables(variables, { ...ranks, summary: 1, shots: 4 })).toEqual({
      shots: ['xg'],
      passing: ['cmp'],
      defense: ['tkl'],
    });
  });

  it('does not apply the frequency rule without summary', () => {
    const variables = { a: ['v'], b: ['v'], c: ['v'] };

    expect(removeDuplicateVariables(variables, { a: 2, b: 1, c: 1 })).toEqual({ a: ['v'] });
  });

  it('honours a custom threshold', () => {
    const variables = { summary: ['v'], a: ['v'], b: ['w'], c: ['x'] };
    const ranks = { summary: 1, a: 2, b: 1, c: 1 };

    expect(removeDuplicateVariables(variables, ranks).a).toEqual(['v']);
    expect(removeDuplicateVariables(variables, ranks, { summaryThreshold: 0.4 }).summary).toEqual(['v']);
  });

  it('leaves every variable in exactly one category', () => {
    const variables = {
      summary: ['player', 'minutes', 'goals', 'xg'],
      passing: ['player', 'minutes', 'cmp', 'att'],
      defense: ['player', 'minutes', 'tkl', 'att'],
      misc: ['player', 'fouls', 'goals'],
    };
    const ranks = { summary: 4, misc: 3, passing: 1, defense: 1 };

    const result = removeDuplicateVariables(variables, ranks);

    const counts = ownerCount(result);
    expect([...counts.keys()].sort()).toEqual(['att', 'cmp', 'fouls', 'goals', 'minutes', 'player', 'tkl', 'xg']);
    expect([...counts.values()].every((n) => n === 1)).toBe(true);
    // equal ranks: passing comes first in the settings, so it is eliminated first
    expect(result.defense).toEqual(['tkl', 'att']);
  });

  it('accepts categories named like Object members', () => {
    const result = removeDuplicateVariables(
      { summary: ['minutes', 'goals'], constructor: ['minutes', 'built'] },
      { summary: 2, constructor: 1 }
    );

    expect(result).toEqual({ summary: ['minutes', 'goals'], constructor: ['built'] });
  });

  it('names the categories missing a rank', () => {
    const call = () => removeDuplicateVariables({ summary: ['a'], shots: ['b'], keeper: ['c'] }, { summary: 1 });

    expect(call).toThrow(UnrankedCategoryError);
    try {
      call();
    } catch (error) {
      expect(error).toBeInstanceOf(UnrankedCategoryError);
      if (error instanceof UnrankedCategoryError) {
        expect(error.categories).toEqual(['shots', 'keeper']);
        expect(error.message).toContain('shots, keeper');
      }
    }
  });
});
