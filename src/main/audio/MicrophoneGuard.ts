/**
 * MicrophoneGuard - the single physical input device, held by at most one track.
 *
 * A second capture request while the other track holds the device is
 * rejected (DEVICE_BUSY upstream), never queued.
 */

import type { SessionKind } from '../../shared/types.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('MicrophoneGuard');

export class MicrophoneGuard {
  private owner: SessionKind | null = null;

  /**
   * Returns true when `kind` now holds the device (or already did).
   */
  acquire(kind: SessionKind): boolean {
    if (this.owner === null) {
      this.owner = kind;
      log.debug(`Acquired by ${kind}`);
      return true;
    }
    return this.owner === kind;
  }

  release(kind: SessionKind): void {
    if (this.owner !== kind) {
      return;
    }
    this.owner = null;
    log.debug(`Released by ${kind}`);
  }

  holder(): SessionKind | null {
    return this.owner;
  }
}
