/**
 * RecoveryLog - durable fallback for dictation that could not be pasted.
 *
 * Each entry is one line: `[YYYY-MM-DD HH:MM:SS] text`.
 */

import { appendFile, mkdir } from 'fs/promises';
import { dirname, join } from 'path';
import { formatLocalTimestamp } from '../../shared/time.js';
import { systemClock, type Clock } from '../clock.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('RecoveryLog');

export const RECOVERY_FILE_NAME = 'recovery_notes.txt';

export class RecoveryLog {
  readonly path: string;

  constructor(dataDir: string, private readonly clock: Clock = systemClock) {
    this.path = join(dataDir, RECOVERY_FILE_NAME);
  }

  /**
   * Append one entry, creating the file and its directory when needed.
   * Returns the file path.
   */
  async append(text: string): Promise<string> {
    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, `[${formatLocalTimestamp(this.clock.now())}] ${text}\n`, 'utf8');
    log.info(`Saved ${text.length} characters to ${this.path}`);
    return this.path;
  }
}
