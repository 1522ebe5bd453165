/**
 * NotificationScheduler - fires reminders and appointment toasts exactly once
 *
 * Every sweep claims the due entities in one Store transaction (the claim
 * sets `notified`), then shows a toast for each. The first sweep runs at
 * start, so anything that came due while the process was down fires then.
 * A toast that fails is logged; the entity stays claimed.
 */

import type { Appointment, DueNotification } from '../../shared/types.js';
import { errorMessage, toAppError } from '../errors.js';
import { errorHandler as defaultErrorHandler, type ErrorHandler } from '../ErrorHandler.js';
import { systemClock, type Clock } from '../clock.js';
import { t } from '../i18n/index.js';
import type { Store } from '../store/Store.js';
import type { SettingsReader } from '../settings/index.js';
import { createLogger } from '../../utils/logger.js';
import type { Notifier } from './Notifier.js';

const log = createLogger('NotificationScheduler');

const RETRY_DELAY_MS = 2_000;

export interface NotificationSchedulerDeps {
  store: Pick<Store, 'claimDueNotifications'>;
  notifier: Notifier;
  settings: SettingsReader;
  clock?: Clock;
  errors?: ErrorHandler;
  retryDelayMs?: number;
}

export interface Toast {
  title: string;
  body: string;
}

/**
 * Toast text for a claimed entity at `now`.
 */
export function toastFor(due: DueNotification, now: number): Toast {
  if (due.type === 'reminder') {
    return { title: t('reminder_toast_title'), body: due.reminder.text };
  }
  return { title: t('appointment_toast_title'), body: appointmentBody(due.appointment, now) };
}

function appointmentBody(appointment: Appointment, now: number): string {
  const minutes = Math.max(0, Math.floor((appointment.startAt - now) / 60_000));
  if (minutes === 0) {
    return t('appointment_toast_now', { title: appointment.title });
  }
  return t('appointment_toast_body', { title: appointment.title, minutes });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class NotificationScheduler {
  private readonly store: Pick<Store, 'claimDueNotifications'>;
  private readonly notifier: Notifier;
  private readonly settings: SettingsReader;
  private readonly clock: Clock;
  private readonly errors: ErrorHandler;
  private readonly retryDelayMs: number;

  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<number> | null = null;

  constructor(deps: NotificationSchedulerDeps) {
    this.store = deps.store;
    this.notifier = deps.notifier;
    this.settings = deps.settings;
    this.clock = deps.clock ?? systemClock;
    this.errors = deps.errors ?? defaultErrorHandler;
    this.retryDelayMs = deps.retryDelayMs ?? RETRY_DELAY_MS;
  }

  /**
   * Sweep now, then every sweepIntervalSeconds.
   */
  start(): void {
    if (this.timer) {
      log.warn('Already running, skipping...');
      return;
    }
    const intervalMs = this.settings.get('sweepIntervalSeconds') * 1000;
    this.timer = setInterval(() => this.tick(), intervalMs);
    this.tick();
    log.info(`Started, sweeping every ${intervalMs / 1000}s`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info('Stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Resolves when the sweep in flight (if any) has finished.
   */
  async idle(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Claim everything due and show it. Returns the number of claimed entities.
   */
  async sweep(): Promise<number> {
    const now = this.clock.now();
    let claimed: DueNotification[];
    try {
      claimed = this.store.claimDueNotifications(now);
    } catch (error) {
      this.errors.handle(toAppError(error, 'PERSISTENCE_ERROR', 'Notification sweep'), {
        component: 'NotificationScheduler',
        operation: 'sweep',
      });
      return 0;
    }

    for (const due of claimed) {
      await this.deliver(due, now);
    }
    if (claimed.length > 0) {
      log.info(`Fired ${claimed.length} notification(s)`);
    }
    return claimed.length;
  }

  private tick(): void {
    if (this.inFlight) {
      log.debug('Previous sweep still running, tick skipped');
      return;
    }
    this.inFlight = this.sweep()
      .catch((error: unknown) => {
        log.error('Sweep failed:', errorMessage(error));
        return 0;
      })
      .finally(() => {
        this.inFlight = null;
      });
  }

  private async deliver(due: DueNotification, now: number): Promise<void> {
    const { title, body } = toastFor(due, now);
    const label = due.type === 'reminder' ? `reminder #${due.reminder.id}` : `appointment #${due.appointment.id}`;
    const attempts = this.settings.get('notificationRetry') ? 2 : 1;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await this.notifier.fire(title, body);
        log.info(`Notified ${label}: ${body}`);
        return;
      } catch (error) {
        log.warn(`Toast for ${label} failed (attempt ${attempt}/${attempts}):`, errorMessage(error));
        if (attempt < attempts) {
          await sleep(this.retryDelayMs);
        }
      }
    }
    log.error(`Giving up on ${label}; it stays marked as notified`);
  }
}

export function createNotificationScheduler(deps: NotificationSchedulerDeps): NotificationScheduler {
  return new NotificationScheduler(deps);
}
