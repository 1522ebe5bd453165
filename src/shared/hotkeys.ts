/**
 * Trigger key definitions for holdtalk
 *
 * Each capture mode is bound to a single physical key that is held (or
 * tapped twice in toggle mode). Names follow the uiohook key table so the
 * input source can resolve them to keycodes.
 */

// ============================================================================
// Types
// ============================================================================

export const TRIGGER_KEYS = [
  'AltRight',
  'CtrlRight',
  'MetaRight',
  'ShiftRight',
  'Alt',
  'Ctrl',
  'Meta',
  'CapsLock',
  'ScrollLock',
  'Insert',
  'F1',
  'F2',
  'F3',
  'F4',
  'F5',
  'F6',
  'F7',
  'F8',
  'F9',
  'F10',
  'F11',
  'F12',
  'F13',
  'F14',
  'F15',
] as const;

export type TriggerKey = (typeof TRIGGER_KEYS)[number];

// ============================================================================
// Platform Detection
// ============================================================================

export function isMacOS(): boolean {
  return process.platform === 'darwin';
}

export function isWindows(): boolean {
  return process.platform === 'win32';
}

// ============================================================================
// Key Display Mappings
// ============================================================================

const MAC_NAMES: Partial<Record<TriggerKey, string>> = {
  AltRight: 'Right Option',
  CtrlRight: 'Right Control',
  MetaRight: 'Right Cmd',
  ShiftRight: 'Right Shift',
  Alt: 'Left Option',
  Ctrl: 'Left Control',
  Meta: 'Left Cmd',
};

const WIN_LINUX_NAMES: Partial<Record<TriggerKey, string>> = {
  AltRight: 'Right Alt',
  CtrlRight: 'Right Ctrl',
  MetaRight: isWindows() ? 'Right Win' : 'Right Super',
  ShiftRight: 'Right Shift',
  Alt: 'Left Alt',
  Ctrl: 'Left Ctrl',
  Meta: isWindows() ? 'Left Win' : 'Left Super',
};

// ============================================================================
// Utility Functions
// ============================================================================

export function isTriggerKey(value: string): value is TriggerKey {
  return TRIGGER_KEYS.some((key) => key === value);
}

/**
 * Platform-appropriate label, e.g. "Right Option" on macOS, "Right Alt" elsewhere.
 */
export function formatTriggerKey(key: TriggerKey): string {
  const names = isMacOS() ? MAC_NAMES : WIN_LINUX_NAMES;
  return names[key] ?? key.replace(/([a-z])([A-Z])/g, '$1 $2');
}

/**
 * Modifier used for the synthetic paste chord.
 */
export function pasteModifier(): 'Meta' | 'Ctrl' {
  return isMacOS() ? 'Meta' : 'Ctrl';
}
