/**
 * HotkeyManager - Global trigger keys for holdtalk
 *
 * Handles:
 * - One trigger key per track, resolved to a keycode through the key source
 * - Physical key-repeat suppression (only the first key-down counts)
 * - Hold mode: press posts `hotkey:down`, release posts `hotkey:up`
 * - Toggle mode: first press posts `hotkey:down`, second press `hotkey:up`
 * - Live re-binding when the settings change
 *
 * Default keys:
 * - Right Alt (Right Option on macOS): Dictation
 * - Right Ctrl: Assistant
 */

import { SESSION_KINDS, type SessionKind } from '../shared/types.js';
import { formatTriggerKey, type TriggerKey } from '../shared/hotkeys.js';
import type { EventBus } from './EventBus.js';
import type { KeyEventSource } from './input/KeyEventSource.js';
import type { SettingsReader } from './settings/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('HotkeyManager');

/**
 * Edge of a trigger press, as seen by subscribers
 */
export type HotkeyEdge = 'down' | 'up';

export type HotkeyBindingMap = Record<SessionKind, TriggerKey>;

export interface HotkeyManagerOptions {
  source: KeyEventSource;
  bus: EventBus;
  settings: SettingsReader;
  /**
   * Toggle mode: whether a track is capturing right now. Without it the
   * manager alternates down/up on its own.
   */
  isCapturing?: (kind: SessionKind) => boolean;
}

const SETTING_FOR_KIND = {
  dictation: 'dictationKey',
  assistant: 'assistantKey',
} as const satisfies Record<SessionKind, 'dictationKey' | 'assistantKey'>;

// =============================================================================
// HotkeyManager
// =============================================================================

export class HotkeyManager {
  private readonly source: KeyEventSource;
  private readonly bus: EventBus;
  private readonly settings: SettingsReader;
  private readonly isCapturing: ((kind: SessionKind) => boolean) | null;

  private bindings: HotkeyBindingMap;
  private kindByKeycode: Map<number, SessionKind> = new Map();
  /** Keys physically held right now */
  private pressed: Set<SessionKind> = new Set();
  /** Toggle mode: tracks whose first press has been posted */
  private latched: Set<SessionKind> = new Set();

  private callbacks: Set<(kind: SessionKind, edge: HotkeyEdge) => void> = new Set();
  private cleanupFunctions: Array<() => void> = [];
  private started = false;

  constructor(options: HotkeyManagerOptions) {
    this.source = options.source;
    this.bus = options.bus;
    this.settings = options.settings;
    this.isCapturing = options.isCapturing ?? null;
    this.bindings = this.readBindings();
    this.rebuildKeycodes();
  }

  /**
   * Start listening to the global key hook
   */
  start(): void {
    if (this.started) {
      log.warn('Already started, skipping...');
      return;
    }

    this.cleanupFunctions.push(
      this.source.onKeyDown((keycode) => this.handleKeyDown(keycode)),
      this.source.onKeyUp((keycode) => this.handleKeyUp(keycode)),
    );
    this.source.start();
    this.started = true;

    log.info(
      `Listening: dictation=${formatTriggerKey(this.bindings.dictation)}, ` +
        `assistant=${formatTriggerKey(this.bindings.assistant)}, mode=${this.settings.get('recordingMode')}`,
    );
  }

  stop(): void {
    if (!this.started) {
      return;
    }
    for (const cleanup of this.cleanupFunctions) {
      cleanup();
    }
    this.cleanupFunctions = [];
    this.source.stop();
    this.releaseAll();
    this.started = false;
    log.info('Stopped');
  }

  /**
   * Re-read the trigger keys. Pass explicit keys to override the settings.
   */
  updateBindings(overrides: Partial<HotkeyBindingMap> = {}): HotkeyBindingMap {
    this.bindings = { ...this.readBindings(), ...overrides };
    this.rebuildKeycodes();
    this.releaseAll();
    log.info('Bindings updated:', this.bindings);
    return this.getBindings();
  }

  getBindings(): HotkeyBindingMap {
    return { ...this.bindings };
  }

  /**
   * Forget held and latched keys, e.g. after the machine wakes from sleep
   * with a key-up lost.
   */
  releaseAll(): void {
    this.pressed.clear();
    this.latched.clear();
  }

  /**
   * Subscribe to posted hotkey edges
   * Returns an unsubscribe function
   */
  onHotkey(callback: (kind: SessionKind, edge: HotkeyEdge) => void): () => void {
    this.callbacks.add(callback);
    return () => {
      this.callbacks.delete(callback);
    };
  }

  // ===========================================================================
  // Key handling
  // ===========================================================================

  private handleKeyDown(keycode: number): void {
    const kind = this.kindByKeycode.get(keycode);
    if (!kind) {
      return;
    }
    if (this.pressed.has(kind)) {
      // Auto-repeat
      return;
    }
    this.pressed.add(kind);

    if (this.settings.get('recordingMode') === 'toggle') {
      const active = this.isCapturing ? this.isCapturing(kind) : this.latched.has(kind);
      if (active) {
        this.latched.delete(kind);
        this.emit(kind, 'up');
      } else {
        this.latched.add(kind);
        this.emit(kind, 'down');
      }
      return;
    }

    this.emit(kind, 'down');
  }

  private handleKeyUp(keycode: number): void {
    const kind = this.kindByKeycode.get(keycode);
    if (!kind || !this.pressed.has(kind)) {
      return;
    }
    this.pressed.delete(kind);

    if (this.settings.get('recordingMode') === 'toggle') {
      return;
    }
    this.emit(kind, 'up');
  }

  private emit(kind: SessionKind, edge: HotkeyEdge): void {
    log.debug(`${kind} ${edge}`);
    this.bus.post({ type: edge === 'down' ? 'hotkey:down' : 'hotkey:up', kind });

    for (const callback of Array.from(this.callbacks)) {
      try {
        callback(kind, edge);
      } catch (error) {
        log.error('Error in hotkey callback:', error);
      }
    }
  }

  // ===========================================================================
  // Bindings
  // ===========================================================================

  private readBindings(): HotkeyBindingMap {
    return {
      dictation: this.settings.get(SETTING_FOR_KIND.dictation),
      assistant: this.settings.get(SETTING_FOR_KIND.assistant),
    };
  }

  private rebuildKeycodes(): void {
    this.kindByKeycode.clear();
    for (const kind of SESSION_KINDS) {
      const keycode = this.source.keycodeFor(this.bindings[kind]);
      const existing = this.kindByKeycode.get(keycode);
      if (existing) {
        log.warn(`${formatTriggerKey(this.bindings[kind])} is bound to both ${existing} and ${kind}; ${existing} keeps it`);
        continue;
      }
      this.kindByKeycode.set(keycode, kind);
    }
  }
}

/**
 * Create a HotkeyManager bound to a key source
 */
export function createHotkeyManager(options: HotkeyManagerOptions): HotkeyManager {
  return new HotkeyManager(options);
}
