export { reconcileTables, reconcileVariables, updateTables, updateVariables } from './engine';
export { removeDuplicateVariables, DEFAULT_SUMMARY_THRESHOLD } from './dedupe';
export { findDifference, formatDelta, isEmptyDelta } from './diff';
export { rankOrder, selectTopPriority, initialRank, SUMMARY_CATEGORY, MISC_CATEGORY } from './priority';
export type {
  CategoryRanks,
  TableSettings,
  VariableDelta,
  TablesUpdate,
  VariablesUpdate,
  DedupeOptions,
} from './types';
