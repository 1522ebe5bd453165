/**
 * uiohook-napi bindings: global key events in, synthetic paste chord out.
 */

import uiohook from 'uiohook-napi';
import { pasteModifier, type TriggerKey } from '../../shared/hotkeys.js';
import { createLogger } from '../../utils/logger.js';
import type { KeyEventSource, KeyListener } from './KeyEventSource.js';

const { uIOhook, UiohookKey } = uiohook;

const log = createLogger('Uiohook');

export class UiohookKeySource implements KeyEventSource {
  private started = false;
  private downListeners: Set<KeyListener> = new Set();
  private upListeners: Set<KeyListener> = new Set();

  private readonly handleDown = (event: { keycode: number }): void => {
    for (const listener of this.downListeners) {
      listener(event.keycode);
    }
  };

  private readonly handleUp = (event: { keycode: number }): void => {
    for (const listener of this.upListeners) {
      listener(event.keycode);
    }
  };

  keycodeFor(key: TriggerKey): number {
    return UiohookKey[key];
  }

  onKeyDown(listener: KeyListener): () => void {
    this.downListeners.add(listener);
    return () => {
      this.downListeners.delete(listener);
    };
  }

  onKeyUp(listener: KeyListener): () => void {
    this.upListeners.add(listener);
    return () => {
      this.upListeners.delete(listener);
    };
  }

  start(): void {
    if (this.started) {
      return;
    }
    uIOhook.on('keydown', this.handleDown);
    uIOhook.on('keyup', this.handleUp);
    uIOhook.start();
    this.started = true;
    log.info('Global key hook started');
  }

  stop(): void {
    if (!this.started) {
      return;
    }
    uIOhook.off('keydown', this.handleDown);
    uIOhook.off('keyup', this.handleUp);
    uIOhook.stop();
    this.started = false;
    log.info('Global key hook stopped');
  }
}

/**
 * Synthesize Ctrl+V (Cmd+V on macOS) into the foreground application.
 */
export function tapPasteChord(): void {
  const modifier = pasteModifier() === 'Meta' ? UiohookKey.Meta : UiohookKey.Ctrl;
  uIOhook.keyTap(UiohookKey.V, [modifier]);
}
