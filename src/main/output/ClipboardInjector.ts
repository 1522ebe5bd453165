/**
 * ClipboardInjector - pastes dictated text into the foreground application
 *
 * Saves the clipboard, writes the text, synthesizes the paste chord, then
 * restores what was there before. Any failure on the write or paste path is
 * INJECTION_FAILED; the caller owns the recovery-file fallback.
 */

import clipboard from 'clipboardy';
import { AppError, errorMessage, toAppError } from '../errors.js';
import { tapPasteChord } from '../input/uiohook.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('ClipboardInjector');

// =============================================================================
// Types
// =============================================================================

export interface Injector {
  /** Throws INJECTION_FAILED when the text could not be pasted */
  paste(text: string): Promise<void>;
}

export interface ClipboardAccess {
  read(): Promise<string>;
  write(text: string): Promise<void>;
}

export interface ClipboardInjectorOptions {
  clipboard?: ClipboardAccess;
  tapPaste?: () => void;
  /** Settle time between the clipboard write and the paste chord */
  settleMs?: number;
  /** Time the target app gets to read the clipboard before restore */
  restoreDelayMs?: number;
}

const DEFAULT_SETTLE_MS = 50;
const DEFAULT_RESTORE_DELAY_MS = 100;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// ClipboardInjector
// =============================================================================

export class ClipboardInjector implements Injector {
  private readonly clipboard: ClipboardAccess;
  private readonly tapPaste: () => void;
  private readonly settleMs: number;
  private readonly restoreDelayMs: number;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: ClipboardInjectorOptions = {}) {
    this.clipboard = options.clipboard ?? clipboard;
    this.tapPaste = options.tapPaste ?? tapPasteChord;
    this.settleMs = options.settleMs ?? DEFAULT_SETTLE_MS;
    this.restoreDelayMs = options.restoreDelayMs ?? DEFAULT_RESTORE_DELAY_MS;
  }

  /**
   * Pastes are serialized: both tracks share one clipboard.
   */
  paste(text: string): Promise<void> {
    const run = this.queue.then(() => this.pasteNow(text));
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async pasteNow(text: string): Promise<void> {
    let original: string | null = null;
    try {
      original = await this.clipboard.read();
    } catch (error) {
      log.warn('Could not read clipboard; it will not be restored:', errorMessage(error));
    }

    try {
      await this.clipboard.write(text);
      const written = await this.clipboard.read();
      if (written !== text) {
        throw new AppError('INJECTION_FAILED', 'Clipboard write did not take effect');
      }

      await sleep(this.settleMs);
      this.tapPaste();
      await sleep(this.restoreDelayMs);
      log.info(`Pasted ${text.length} characters`);
    } catch (error) {
      throw toAppError(error, 'INJECTION_FAILED', 'Paste failed');
    } finally {
      if (original !== null) {
        await this.restore(original);
      }
    }
  }

  private async restore(original: string): Promise<void> {
    try {
      await this.clipboard.write(original);
    } catch (error) {
      log.warn('Failed to restore clipboard:', errorMessage(error));
    }
  }
}
