/**
 * SettingsManager Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DEFAULT_SETTINGS,
  SettingsManager,
  isSettingKey,
  resolveDataDir,
  timeoutConflict,
} from '../../../src/main/settings/index.js';

describe('SettingsManager', () => {
  let dir: string;
  let env: NodeJS.ProcessEnv;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'holdtalk-settings-'));
    env = { HOLDTALK_DATA_DIR: join(dir, 'data') };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function makeManager(): SettingsManager {
    return new SettingsManager({ cwd: dir, env });
  }

  it('starts from the defaults', () => {
    expect(makeManager().getAll()).toEqual(DEFAULT_SETTINGS);
  });

  it('resolves the data directory from the environment', () => {
    expect(makeManager().dataDir).toBe(join(dir, 'data'));
  });

  it('persists values across instances', () => {
    makeManager().set('recordingMode', 'toggle');

    expect(existsSync(join(dir, 'settings.json'))).toBe(true);
    expect(makeManager().get('recordingMode')).toBe('toggle');
  });

  it('ignores invalid values', () => {
    const settings = makeManager();
    settings.set('maxCaptureSeconds', 1);
    expect(settings.get('maxCaptureSeconds')).toBe(120);
  });

  it('notifies change listeners until unsubscribed', () => {
    const settings = makeManager();
    const listener = vi.fn();
    const unsubscribe = settings.onChange(listener);

    settings.set('language', 'it');
    unsubscribe();
    settings.set('language', 'en');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('language', 'it', 'en');
  });

  it('parses command-line values', () => {
    const settings = makeManager();

    settings.setFromString('minCaptureMs', ' 250 ');
    settings.setFromString('notificationRetry', 'on');
    settings.setFromString('dictationKey', 'F9');

    expect(settings.get('minCaptureMs')).toBe(250);
    expect(settings.get('notificationRetry')).toBe(true);
    expect(settings.get('dictationKey')).toBe('F9');
  });

  it('rejects unknown keys and bad command-line values', () => {
    const settings = makeManager();

    expect(() => settings.setFromString('volume', '11')).toThrow(/^Unknown setting "volume"/);
    expect(() => settings.setFromString('minCaptureMs', 'soon')).toThrow('Invalid value for minCaptureMs: soon');
    expect(() => settings.setFromString('notificationRetry', 'maybe')).toThrow(
      'Invalid value for notificationRetry: maybe',
    );
    expect(() => settings.setFromString('assistantKey', 'Space')).toThrow('Invalid value for assistantKey: Space');
  });

  it('keeps the processing timeout above both backend timeouts', () => {
    const settings = makeManager();

    settings.set('processingTimeoutSeconds', 50);
    expect(settings.get('processingTimeoutSeconds')).toBe(90);

    expect(() => settings.setFromString('transcriptionTimeoutSeconds', '300')).toThrow(
      'processingTimeoutSeconds (90) must be greater than transcriptionTimeoutSeconds + assistantTimeoutSeconds (320)',
    );
    expect(settings.get('transcriptionTimeoutSeconds')).toBe(30);

    settings.setFromString('processingTimeoutSeconds', '400');
    settings.setFromString('transcriptionTimeoutSeconds', '300');
    expect(settings.get('transcriptionTimeoutSeconds')).toBe(300);
  });

  it('resets to defaults and reports what changed', () => {
    const settings = makeManager();
    settings.set('sampleRate', 44100);
    const listener = vi.fn();
    settings.onChange(listener);

    settings.reset();

    expect(settings.get('sampleRate')).toBe(16000);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('sampleRate', 16000, 44100);
  });

  it('reads API keys from the environment only', () => {
    env.OPENAI_API_KEY = ' test-secret ';
    env.ANTHROPIC_API_KEY = '   ';
    const settings = makeManager();

    expect(settings.getApiKey('openai')).toBe('test-secret');
    expect(settings.getApiKey('anthropic')).toBeNull();
    expect(settings.hasApiKey('anthropic')).toBe(false);
  });
});

describe('isSettingKey', () => {
  it('accepts only known keys', () => {
    expect(isSettingKey('sweepIntervalSeconds')).toBe(true);
    expect(isSettingKey('toString')).toBe(false);
  });
});

describe('resolveDataDir', () => {
  it('prefers HOLDTALK_DATA_DIR', () => {
    expect(resolveDataDir({ HOLDTALK_DATA_DIR: ' /srv/holdtalk ' })).toBe('/srv/holdtalk');
  });

  it('ends in the application folder otherwise', () => {
    expect(resolveDataDir({ XDG_DATA_HOME: '/xdg', APPDATA: '/appdata' }).endsWith('holdtalk')).toBe(true);
  });
});

describe('timeoutConflict', () => {
  it('accepts a processing timeout longer than both backend calls', () => {
    expect(
      timeoutConflict({ processingTimeoutSeconds: 51, transcriptionTimeoutSeconds: 30, assistantTimeoutSeconds: 20 }),
    ).toBeNull();
  });

  it('rejects a processing timeout equal to their sum', () => {
    expect(
      timeoutConflict({ processingTimeoutSeconds: 50, transcriptionTimeoutSeconds: 30, assistantTimeoutSeconds: 20 }),
    ).toBe('processingTimeoutSeconds (50) must be greater than transcriptionTimeoutSeconds + assistantTimeoutSeconds (50)');
  });
});
