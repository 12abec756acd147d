export { discoverCategories, discoverVariables, getSquadIds, getStatTables, getTableVariables, toCategory, variablesOf } from './parser';
export { extractTable, extractMatchDetails } from './rows';
export type { MatchPage, StatTable, Category, Variable, CategoryVariableMap, TableRow, MatchDetails } from './types';
