/**
 * SettingsManager - Persistent Settings Storage for holdtalk
 *
 * Handles:
 * - Persistent settings storage with conf (schema validated)
 * - Data directory resolution (HOLDTALK_DATA_DIR or the platform default)
 * - API keys read from the environment, never written to disk
 * - Change event emission for reactive updates
 */

import Conf from 'conf';
import { homedir } from 'os';
import { join } from 'path';
import type { Language, RecordingMode } from '../../shared/types.js';
import { isTriggerKey, TRIGGER_KEYS, type TriggerKey } from '../../shared/hotkeys.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('SettingsManager');

// ============================================================================
// Types
// ============================================================================

/**
 * Complete application settings schema
 */
export interface AppSettings {
  // General
  language: Language;

  // Hotkeys
  recordingMode: RecordingMode;
  dictationKey: TriggerKey;
  assistantKey: TriggerKey;

  // Capture
  maxCaptureSeconds: number; // 5-600
  minCaptureMs: number; // 0-5000
  audioDevice: string;
  sampleRate: number;

  // Backends
  processingTimeoutSeconds: number;
  transcriptionTimeoutSeconds: number;
  assistantTimeoutSeconds: number;
  transcriptionModel: string;
  assistantModel: string;

  // Scheduling
  sweepIntervalSeconds: number;
  appointmentLeadMinutes: number;
  pastToleranceMinutes: number;
  notificationRetry: boolean;
}

export type SettingKey = keyof AppSettings;

export type ApiService = 'openai' | 'anthropic';

/**
 * Settings change callback type
 */
type SettingsChangeCallback = (key: SettingKey, newValue: unknown, oldValue: unknown) => void;

/**
 * SettingsManager interface
 */
export interface ISettingsManager {
  get<K extends SettingKey>(key: K): AppSettings[K];
  set<K extends SettingKey>(key: K, value: AppSettings[K]): void;
  getAll(): AppSettings;
  reset(): void;
  getApiKey(service: ApiService): string | null;
  onChange(callback: SettingsChangeCallback): () => void;
}

/**
 * Read-only view handed to services that follow live settings.
 */
export type SettingsReader = Pick<ISettingsManager, 'get'>;

export interface SettingsManagerOptions {
  /** Directory holding settings.json (defaults to the data directory) */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

// ============================================================================
// Constants
// ============================================================================

const API_KEY_ENV: Record<ApiService, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

/**
 * Default settings values
 */
const DEFAULT_SETTINGS: AppSettings = {
  language: 'en',
  recordingMode: 'hold',
  dictationKey: 'AltRight',
  assistantKey: 'CtrlRight',
  maxCaptureSeconds: 120,
  minCaptureMs: 500,
  audioDevice: 'default',
  sampleRate: 16000,
  processingTimeoutSeconds: 90,
  transcriptionTimeoutSeconds: 30,
  assistantTimeoutSeconds: 20,
  transcriptionModel: 'whisper-1',
  assistantModel: 'claude-3-5-haiku-latest',
  sweepIntervalSeconds: 30,
  appointmentLeadMinutes: 15,
  pastToleranceMinutes: 5,
  notificationRetry: false,
};

const SETTING_KEYS = Object.keys(DEFAULT_SETTINGS).filter(isSettingKey);

function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(DEFAULT_SETTINGS, key);
}

function inRange(min: number, max: number): (value: unknown) => boolean {
  return (value) => typeof value === 'number' && Number.isFinite(value) && value >= min && value <= max;
}

function nonEmptyString(value: unknown): boolean {
  return typeof value === 'string' && value.trim().length > 0;
}

const VALIDATORS: Record<SettingKey, (value: unknown) => boolean> = {
  language: (value) => value === 'en' || value === 'it',
  recordingMode: (value) => value === 'hold' || value === 'toggle',
  dictationKey: (value) => typeof value === 'string' && isTriggerKey(value),
  assistantKey: (value) => typeof value === 'string' && isTriggerKey(value),
  maxCaptureSeconds: inRange(5, 600),
  minCaptureMs: inRange(0, 5000),
  audioDevice: nonEmptyString,
  sampleRate: inRange(8000, 48000),
  processingTimeoutSeconds: inRange(5, 600),
  transcriptionTimeoutSeconds: inRange(5, 300),
  assistantTimeoutSeconds: inRange(5, 300),
  transcriptionModel: nonEmptyString,
  assistantModel: nonEmptyString,
  sweepIntervalSeconds: inRange(5, 3600),
  appointmentLeadMinutes: inRange(0, 1440),
  pastToleranceMinutes: inRange(0, 1440),
  notificationRetry: (value) => typeof value === 'boolean',
};

export type TimeoutKey = 'processingTimeoutSeconds' | 'transcriptionTimeoutSeconds' | 'assistantTimeoutSeconds';

/**
 * Processing bounds the whole pipeline, so it must outlast both backend calls.
 * Returns the problem, or null when the timeouts fit.
 */
export function timeoutConflict(settings: Pick<AppSettings, TimeoutKey>): string | null {
  const inner = settings.transcriptionTimeoutSeconds + settings.assistantTimeoutSeconds;
  if (settings.processingTimeoutSeconds > inner) {
    return null;
  }
  return (
    `processingTimeoutSeconds (${settings.processingTimeoutSeconds}) must be greater than ` +
    `transcriptionTimeoutSeconds + assistantTimeoutSeconds (${inner})`
  );
}

// ============================================================================
// Data Directory
// ============================================================================

/**
 * Where the store, settings, log and recovery file live.
 */
export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.HOLDTALK_DATA_DIR?.trim();
  if (override) {
    return override;
  }

  const home = homedir();
  switch (process.platform) {
    case 'darwin':
      return join(home, 'Library', 'Application Support', 'holdtalk');
    case 'win32':
      return join(env.APPDATA ?? join(home, 'AppData', 'Roaming'), 'holdtalk');
    default:
      return join(env.XDG_DATA_HOME ?? join(home, '.local', 'share'), 'holdtalk');
  }
}

// ============================================================================
// Implementation
// ============================================================================

export class SettingsManager implements ISettingsManager {
  private store: Conf<AppSettings>;
  private changeCallbacks: Set<SettingsChangeCallback> = new Set();
  private readonly env: NodeJS.ProcessEnv;
  readonly dataDir: string;

  constructor(options: SettingsManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.dataDir = resolveDataDir(this.env);

    this.store = new Conf<AppSettings>({
      projectName: 'holdtalk',
      cwd: options.cwd ?? this.dataDir,
      configName: 'settings',
      defaults: DEFAULT_SETTINGS,
      schema: {
        language: { type: 'string', enum: ['en', 'it'] },
        recordingMode: { type: 'string', enum: ['hold', 'toggle'] },
        dictationKey: { type: 'string', enum: [...TRIGGER_KEYS] },
        assistantKey: { type: 'string', enum: [...TRIGGER_KEYS] },
        maxCaptureSeconds: { type: 'number', minimum: 5, maximum: 600 },
        minCaptureMs: { type: 'number', minimum: 0, maximum: 5000 },
        audioDevice: { type: 'string', minLength: 1 },
        sampleRate: { type: 'number', minimum: 8000, maximum: 48000 },
        processingTimeoutSeconds: { type: 'number', minimum: 5, maximum: 600 },
        transcriptionTimeoutSeconds: { type: 'number', minimum: 5, maximum: 300 },
        assistantTimeoutSeconds: { type: 'number', minimum: 5, maximum: 300 },
        transcriptionModel: { type: 'string', minLength: 1 },
        assistantModel: { type: 'string', minLength: 1 },
        sweepIntervalSeconds: { type: 'number', minimum: 5, maximum: 3600 },
        appointmentLeadMinutes: { type: 'number', minimum: 0, maximum: 1440 },
        pastToleranceMinutes: { type: 'number', minimum: 0, maximum: 1440 },
        notificationRetry: { type: 'boolean' },
      },
      clearInvalidConfig: false,
    });

    log.debug('Initialized at', this.store.path);
  }

  // --------------------------------------------------------------------------
  // Core Methods
  // --------------------------------------------------------------------------

  /**
   * Get a single setting value
   */
  get<K extends SettingKey>(key: K): AppSettings[K] {
    return this.store.get(key);
  }

  /**
   * Set a single setting value
   */
  set<K extends SettingKey>(key: K, value: AppSettings[K]): void {
    if (!VALIDATORS[key](value)) {
      log.warn(`Invalid value for ${key}:`, value);
      return;
    }
    const conflict = this.timeoutConflictWith(key, value);
    if (conflict) {
      log.warn(`Rejected ${key}:`, conflict);
      return;
    }

    const oldValue = this.store.get(key);
    this.store.set(key, value);
    this.emitChange(key, value, oldValue);

    log.info(`Set ${key}:`, value);
  }

  /**
   * Parse and set a value typed on the command line.
   * Throws on an unknown key or an invalid value.
   */
  setFromString(key: string, raw: string): void {
    if (!isSettingKey(key)) {
      throw new Error(`Unknown setting "${key}". Known settings: ${SETTING_KEYS.join(', ')}`);
    }

    const value = parseRawValue(key, raw);
    if (!VALIDATORS[key](value)) {
      throw new Error(`Invalid value for ${key}: ${raw}`);
    }
    const conflict = this.timeoutConflictWith(key, value);
    if (conflict) {
      throw new Error(conflict);
    }

    const oldValue = this.store.get(key);
    this.store.set(key, value);
    this.emitChange(key, value, oldValue);
    log.info(`Set ${key}:`, value);
  }

  private timeoutConflictWith(key: SettingKey, value: unknown): string | null {
    const current = this.getAll();
    const pick = (name: TimeoutKey): number => (key === name && typeof value === 'number' ? value : current[name]);
    return timeoutConflict({
      processingTimeoutSeconds: pick('processingTimeoutSeconds'),
      transcriptionTimeoutSeconds: pick('transcriptionTimeoutSeconds'),
      assistantTimeoutSeconds: pick('assistantTimeoutSeconds'),
    });
  }

  /**
   * Get all settings
   */
  getAll(): AppSettings {
    return { ...DEFAULT_SETTINGS, ...this.store.store };
  }

  /**
   * Reset all settings to defaults
   */
  reset(): void {
    const oldSettings = this.getAll();
    this.store.clear();

    for (const key of SETTING_KEYS) {
      if (oldSettings[key] !== DEFAULT_SETTINGS[key]) {
        this.emitChange(key, DEFAULT_SETTINGS[key], oldSettings[key]);
      }
    }

    log.info('Reset to defaults');
  }

  // --------------------------------------------------------------------------
  // API Keys
  // --------------------------------------------------------------------------

  /**
   * API keys come from the environment only.
   */
  getApiKey(service: ApiService): string | null {
    const value = this.env[API_KEY_ENV[service]]?.trim();
    return value ? value : null;
  }

  hasApiKey(service: ApiService): boolean {
    return this.getApiKey(service) !== null;
  }

  // --------------------------------------------------------------------------
  // Change Events
  // --------------------------------------------------------------------------

  /**
   * Subscribe to settings changes
   * @returns Unsubscribe function
   */
  onChange(callback: SettingsChangeCallback): () => void {
    this.changeCallbacks.add(callback);
    return () => {
      this.changeCallbacks.delete(callback);
    };
  }

  private emitChange(key: SettingKey, newValue: unknown, oldValue: unknown): void {
    for (const callback of this.changeCallbacks) {
      try {
        callback(key, newValue, oldValue);
      } catch (error) {
        log.error('Error in change callback:', error);
      }
    }
  }

  /**
   * Get the storage path for debugging
   */
  getStorePath(): string {
    return this.store.path;
  }
}

function parseRawValue(key: SettingKey, raw: string): unknown {
  const current = DEFAULT_SETTINGS[key];
  if (typeof current === 'number') {
    const trimmed = raw.trim();
    return trimmed === '' ? Number.NaN : Number(trimmed);
  }
  if (typeof current === 'boolean') {
    if (raw === 'true' || raw === 'on' || raw === '1') return true;
    if (raw === 'false' || raw === 'off' || raw === '0') return false;
    return raw;
  }
  return raw;
}

export { DEFAULT_SETTINGS, SETTING_KEYS, isSettingKey };
export default SettingsManager;
