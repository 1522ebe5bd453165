/**
 * Notifier - desktop toasts through node-notifier.
 */

import notifier from 'node-notifier';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('Notifier');

export interface Notifier {
  /** Rejects when the OS notification could not be shown */
  fire(title: string, body: string): Promise<void>;
}

export class DesktopNotifier implements Notifier {
  fire(title: string, body: string): Promise<void> {
    return new Promise((resolve, reject) => {
      notifier.notify({ title, message: body, sound: true, wait: false }, (error) => {
        if (error) {
          reject(error);
          return;
        }
        log.debug(`Shown: ${title}`);
        resolve();
      });
    });
  }
}

export const desktopNotifier = new DesktopNotifier();
