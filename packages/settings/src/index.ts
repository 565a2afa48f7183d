/* c8 ignore file */
export {
  SETTINGS_SCHEMA_VERSION,
  defaultSettings,
  parseSettings,
  validateSettings
} from './app-settings';
export type { AppSettings } from './app-settings';
export {
  FileSettingsPersistence,
  SettingsValidationError,
  getSettingsDirectory,
  getSettingsFilePath
} from './persistence';
export type { SettingsPersistence } from './persistence';
export { SETTINGS_CORRUPTED_MESSAGE, SettingsStore } from './settings-store';
export type {
  SettingsListener,
  SettingsLogger,
  SettingsSource,
  SettingsState,
  SettingsStoreOptions
} from './settings-store';
