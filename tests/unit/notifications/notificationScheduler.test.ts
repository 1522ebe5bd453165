/**
 * NotificationScheduler Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import {
  createNotificationScheduler,
  toastFor,
  type NotificationScheduler,
} from '../../../src/main/notifications/index.js';
import type { Notifier } from '../../../src/main/notifications/index.js';
import { createStore, type Store } from '../../../src/main/store/Store.js';
import { ErrorHandler } from '../../../src/main/ErrorHandler.js';
import { setLanguage } from '../../../src/main/i18n/index.js';
import type { Appointment } from '../../../src/shared/types.js';
import { fakeClock, fakeSettings } from '../../helpers/fakes.js';
import { flushPromises } from '../../setup.js';

const T0 = 1_700_000_000_000;
const MINUTE = 60_000;

function appointment(overrides: Partial<Appointment> = {}): Appointment {
  return {
    id: 1,
    title: 'Dentist',
    description: '',
    startAt: T0 + 15 * MINUTE,
    remindLeadMinutes: 15,
    notified: true,
    createdAt: T0 - 60 * MINUTE,
    ...overrides,
  };
}

describe('toastFor', () => {
  beforeEach(() => setLanguage('en'));

  it('shows the reminder text', () => {
    const toast = toastFor(
      { type: 'reminder', reminder: { id: 3, text: 'stretch', fireAt: T0, notified: true, createdAt: T0 } },
      T0,
    );
    expect(toast).toEqual({ title: 'holdtalk Reminder', body: 'stretch' });
  });

  it('counts whole minutes to the appointment', () => {
    expect(toastFor({ type: 'appointment', appointment: appointment() }, T0 + 30_000)).toEqual({
      title: 'holdtalk Appointment',
      body: 'Dentist — in 14 min',
    });
  });

  it('says now when under a minute or already started', () => {
    expect(toastFor({ type: 'appointment', appointment: appointment() }, T0 + 14 * MINUTE + 1).body).toBe(
      'Dentist — now!',
    );
    expect(toastFor({ type: 'appointment', appointment: appointment() }, T0 + 20 * MINUTE).body).toBe(
      'Dentist — now!',
    );
  });
});

describe('NotificationScheduler', () => {
  let clock: ReturnType<typeof fakeClock>;
  let store: Store;
  let fire: Mock<Notifier['fire']>;
  let errors: ErrorHandler;
  let scheduler: NotificationScheduler;

  function makeScheduler(overrides: Parameters<typeof fakeSettings>[0] = {}): NotificationScheduler {
    return createNotificationScheduler({
      store,
      notifier: { fire },
      settings: fakeSettings({ sweepIntervalSeconds: 30, ...overrides }),
      clock,
      errors,
      retryDelayMs: 0,
    });
  }

  beforeEach(() => {
    setLanguage('en');
    clock = fakeClock(T0);
    store = createStore({ path: ':memory:', clock });
    store.open();
    fire = vi.fn<Notifier['fire']>(async () => undefined);
    errors = new ErrorHandler(() => T0);
    scheduler = makeScheduler();
  });

  afterEach(() => {
    scheduler.stop();
    store.close();
    vi.useRealTimers();
  });

  it('fires an overdue reminder once and marks it notified', async () => {
    const reminder = store.createReminder('take out the trash', T0 - 5 * MINUTE);

    expect(await scheduler.sweep()).toBe(1);
    expect(fire).toHaveBeenCalledTimes(1);
    expect(fire).toHaveBeenCalledWith('holdtalk Reminder', 'take out the trash');
    expect(store.getReminder(reminder.id)?.notified).toBe(true);

    expect(await scheduler.sweep()).toBe(0);
    expect(fire).toHaveBeenCalledTimes(1);
  });

  it('leaves future entities alone until they come due', async () => {
    store.createReminder('later', T0 + 2 * MINUTE);
    store.createAppointment({ title: 'Standup', startAt: T0 + 20 * MINUTE, remindLeadMinutes: 10 });

    expect(await scheduler.sweep()).toBe(0);

    clock.set(T0 + 10 * MINUTE);
    expect(await scheduler.sweep()).toBe(2);
    expect(fire.mock.calls).toEqual([
      ['holdtalk Reminder', 'later'],
      ['holdtalk Appointment', 'Standup — in 10 min'],
    ]);
  });

  it('does not fire again after an edit to something that already fired', async () => {
    const reminder = store.createReminder('water the plants', T0 - MINUTE);
    const dentist = store.createAppointment({ title: 'Dentist', startAt: T0 + 10 * MINUTE, remindLeadMinutes: 15 });

    expect(await scheduler.sweep()).toBe(2);

    store.updateReminderFireAt(reminder.id, T0 + 2 * MINUTE);
    store.updateAppointmentStart(dentist.id, T0 + 60 * MINUTE);
    clock.set(T0 + 50 * MINUTE);

    expect(await scheduler.sweep()).toBe(0);
    expect(fire).toHaveBeenCalledTimes(2);
  });

  it('marks a reminder notified even when the toast fails', async () => {
    const reminder = store.createReminder('stretch', T0);
    fire.mockRejectedValue(new Error('no notification daemon'));

    expect(await scheduler.sweep()).toBe(1);
    expect(fire).toHaveBeenCalledTimes(1);
    expect(store.getReminder(reminder.id)?.notified).toBe(true);
    expect(await scheduler.sweep()).toBe(0);
  });

  it('retries a failed toast once when enabled', async () => {
    scheduler = makeScheduler({ notificationRetry: true });
    store.createReminder('stretch', T0);
    fire.mockRejectedValueOnce(new Error('busy')).mockResolvedValueOnce(undefined);

    expect(await scheduler.sweep()).toBe(1);
    expect(fire).toHaveBeenCalledTimes(2);
  });

  it('reports a store failure and claims nothing', async () => {
    const handle = vi.spyOn(errors, 'handle');
    scheduler = createNotificationScheduler({
      store: {
        claimDueNotifications: () => {
          throw new Error('disk I/O error');
        },
      },
      notifier: { fire },
      settings: fakeSettings(),
      clock,
      errors,
    });

    expect(await scheduler.sweep()).toBe(0);
    expect(handle).toHaveBeenCalledTimes(1);
    expect(handle.mock.calls[0][0]).toMatchObject({
      code: 'PERSISTENCE_ERROR',
      message: 'Notification sweep: disk I/O error',
    });
    expect(fire).not.toHaveBeenCalled();
  });

  it('sweeps at start and then on every interval', async () => {
    vi.useFakeTimers();
    store.createReminder('first', T0 - MINUTE);

    scheduler.start();
    expect(scheduler.isRunning()).toBe(true);
    await scheduler.idle();
    expect(fire).toHaveBeenCalledWith('holdtalk Reminder', 'first');

    store.createReminder('second', T0 + MINUTE);
    clock.set(T0 + MINUTE);
    vi.advanceTimersByTime(30_000);
    await flushPromises();
    await scheduler.idle();

    expect(fire.mock.calls.map(([, body]) => body)).toEqual(['first', 'second']);

    scheduler.stop();
    expect(scheduler.isRunning()).toBe(false);
  });

  it('skips a tick while the previous sweep is still delivering', async () => {
    vi.useFakeTimers();
    let release: () => void = () => undefined;
    fire.mockReturnValueOnce(
      new Promise<void>((resolve) => {
        release = resolve;
      }),
    );
    store.createReminder('first', T0 - MINUTE);

    scheduler.start();
    const second = store.createReminder('second', T0);
    vi.advanceTimersByTime(30_000);
    await flushPromises();

    expect(fire).toHaveBeenCalledTimes(1);
    expect(store.getReminder(second.id)?.notified).toBe(false);

    release();
    await scheduler.idle();
    vi.advanceTimersByTime(30_000);
    await scheduler.idle();

    expect(fire.mock.calls.map(([, body]) => body)).toEqual(['first', 'second']);
    expect(store.getReminder(second.id)?.notified).toBe(true);
  });

  it('does not schedule a second timer when started twice', () => {
    vi.useFakeTimers();
    scheduler.start();
    scheduler.start();
    expect(vi.getTimerCount()).toBe(1);
  });
});
