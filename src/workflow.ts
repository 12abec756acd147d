import type { Category, MatchPage } from './tables';
import { formatDelta, isEmptyDelta, updateTables, updateVariables, type VariableDelta } from './reconcile';
import type { SettingsHandle } from './settings';
import { createLogger, type Logger } from './reliability';

export type ReconcileState =
  | 'INIT'
  | 'TABLES_CHECKED'
  | 'VARIABLES_CHECKED'
  | 'AWAITING_CONFIRM'
  | 'SAVED'
  | 'ABORTED'
  | 'NO_CHANGE';

export type TerminalState = Extract<ReconcileState, 'SAVED' | 'ABORTED' | 'NO_CHANGE'>;

export interface ReconcileOutcome {
  state: TerminalState;
  stage: 'tables' | 'variables';
  history: ReconcileState[];
  tablesAdded: Category[];
  variablesAdded: VariableDelta;
  variablesRemoved: VariableDelta;
}

export interface ReconcileOptions {
  pages: MatchPage[];
  store: SettingsHandle;
  confirm: (question: string) => Promise<boolean>;
  notify?: (message: string) => void;
  assumeYes?: boolean;
  summaryThreshold?: number;
  logger?: Logger;
}

/**
 * Two-step check of sample pages against the settings file.
 *
 * New table categories are ranked and offered for saving first; the run ends
 * there so ranks can be reviewed before variables are mapped with them. Only
 * when the ranks cover every category are variables reconciled and offered.
 */
export async function runReconciliation(options: ReconcileOptions): Promise<ReconcileOutcome> {
  const logger = options.logger ?? createLogger('reconcile');
  const notify = options.notify ?? ((message: string) => console.log(message));
  const history: ReconcileState[] = ['INIT'];

  const outcome = (
    state: TerminalState,
    stage: ReconcileOutcome['stage'],
    extra: Partial<Pick<ReconcileOutcome, 'tablesAdded' | 'variablesAdded' | 'variablesRemoved'>> = {}
  ): ReconcileOutcome => {
    history.push(state);
    logger.debug('Reconciliation finished', { state, stage });
    return { state, stage, history, tablesAdded: [], variablesAdded: {}, variablesRemoved: {}, ...extra };
  };

  const approve = async (): Promise<boolean> => {
    history.push('AWAITING_CONFIRM');
    return options.assumeYes === true || (await options.confirm('Save changes?'));
  };

  // Tables
  const settings = options.store.read();
  const tablesUpdate = updateTables(options.pages, settings);
  history.push('TABLES_CHECKED');

  if (tablesUpdate) {
    const tablesAdded = [...tablesUpdate.added];
    notify(`New tables added to settings: ${tablesAdded.join(', ')}`);

    if (!(await approve())) {
      notify('Exiting without saving changes.');
      return outcome('ABORTED', 'tables', { tablesAdded });
    }

    options.store.update({ tables: tablesUpdate.tables });
    await options.store.save();
    notify('Saving changes. Review the table priorities in the settings file and rerun.');
    return outcome('SAVED', 'tables', { tablesAdded });
  }

  notify('No changes to table priorities.');

  // Variables
  const variablesUpdate = updateVariables(options.pages, settings, {
    summaryThreshold: options.summaryThreshold,
  });
  history.push('VARIABLES_CHECKED');

  const { added, removed } = variablesUpdate;
  if (isEmptyDelta(added) && isEmptyDelta(removed)) {
    notify('No changes to variables.');
    return outcome('NO_CHANGE', 'variables');
  }

  notify(`Variables added:\n${formatDelta(added) || '(none)'}`);
  notify(`Variables removed:\n${formatDelta(removed) || '(none)'}`);

  if (!(await approve())) {
    notify('Exiting without saving changes.');
    return outcome('ABORTED', 'variables', { variablesAdded: added, variablesRemoved: removed });
  }

  options.store.update({ variables: variablesUpdate.variables });
  await options.store.save();
  notify('Saving changes.');
  return outcome('SAVED', 'variables', { variablesAdded: added, variablesRemoved: removed });
}
