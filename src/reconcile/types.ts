import type { Category, Variable, CategoryVariableMap } from '../tables/types';

/**
 * Priority rank per category. Higher rank wins when a variable appears in several tables.
 */
export type CategoryRanks = Record<Category, number>;

/**
 * The reconciled part of the settings file.
 */
export interface TableSettings {
  tables: CategoryRanks;
  variables: CategoryVariableMap;
}

/**
 * Variables per category present on one side of a comparison but not the other.
 */
export type VariableDelta = Record<Category, Set<Variable>>;

export interface TablesUpdate {
  tables: CategoryRanks;
  added: Set<Category>;
}

export interface VariablesUpdate {
  variables: CategoryVariableMap;
  added: VariableDelta;
  removed: VariableDelta;
}

export interface DedupeOptions {
  /** Share of ranked categories a summary variable must exceed to stay in summary. Default 0.7 */
  summaryThreshold?: number;
}
