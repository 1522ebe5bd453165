/**
 * Raw global key events, as delivered by the OS hook.
 */

import type { TriggerKey } from '../../shared/hotkeys.js';

export type KeyListener = (keycode: number) => void;

export interface KeyEventSource {
  keycodeFor(key: TriggerKey): number;
  onKeyDown(listener: KeyListener): () => void;
  onKeyUp(listener: KeyListener): () => void;
  start(): void;
  stop(): void;
}
