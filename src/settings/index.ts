export {
  SettingsStore,
  resolveSettingsPath,
  DEFAULT_SETTINGS_FILE,
  USER_SETTINGS_FILE,
  type SettingsHandle,
} from './store';
