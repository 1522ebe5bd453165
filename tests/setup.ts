/**
 * Test Setup - Global mocks and helpers for holdtalk tests
 *
 * Native and OS-bound modules (global key hook, clipboard, desktop
 * notifications) are replaced before any source module loads them.
 */

import { vi } from 'vitest';

// =============================================================================
// uiohook-napi Mock (Global Key Hook)
// =============================================================================

vi.mock('uiohook-napi', () => ({
  default: {
    uIOhook: {
      on: vi.fn(),
      off: vi.fn(),
      start: vi.fn(),
      stop: vi.fn(),
      keyTap: vi.fn(),
    },
    UiohookKey: {
      Ctrl: 29,
      CtrlRight: 3613,
      Alt: 56,
      AltRight: 3640,
      Meta: 3675,
      MetaRight: 3676,
      Shift: 42,
      ShiftRight: 54,
      CapsLock: 58,
      F9: 67,
      F10: 68,
      V: 47,
    },
  },
}));

// =============================================================================
// clipboardy Mock
// =============================================================================

vi.mock('clipboardy', () => ({
  default: {
    read: vi.fn(() => Promise.resolve('')),
    write: vi.fn(() => Promise.resolve()),
  },
}));

// =============================================================================
// node-notifier Mock (Desktop Toasts)
// =============================================================================

vi.mock('node-notifier', () => ({
  default: {
    notify: vi.fn((_options: unknown, callback?: (error: Error | null, response: string) => void) => {
      callback?.(null, 'ok');
    }),
  },
}));

// =============================================================================
// electron-log Mock
// =============================================================================

vi.mock('electron-log/node', () => ({
  default: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    transports: {
      console: { level: 'info', format: '' },
      file: { level: false, maxSize: 0, resolvePathFn: undefined },
    },
  },
}));

// =============================================================================
// Test Utilities
// =============================================================================

/**
 * Let chained promise callbacks run. Works under fake timers.
 */
export async function flushPromises(rounds = 20): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
