/**
 * Settings Module
 *
 * Exports the SettingsManager for persistent settings storage.
 */

export {
  SettingsManager,
  resolveDataDir,
  DEFAULT_SETTINGS,
  SETTING_KEYS,
  isSettingKey,
  timeoutConflict,
} from './SettingsManager.js';

export type { AppSettings, ApiService, ISettingsManager, SettingKey, SettingsReader } from './SettingsManager.js';
