/**
 * Store Tests
 *
 * Runs against an in-memory SQLite database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createStore, type Store } from '../../src/main/store/Store.js';
import { AppError } from '../../src/main/errors.js';
import { fakeClock } from '../helpers/fakes.js';

const T0 = 1_700_000_000_000;
const MINUTE = 60_000;

describe('Store', () => {
  let clock: ReturnType<typeof fakeClock>;
  let store: Store;

  beforeEach(() => {
    clock = fakeClock(T0);
    store = createStore({ path: ':memory:', clock });
    store.open();
  });

  afterEach(() => {
    store.close();
  });

  describe('lifecycle', () => {
    it('reports open state and closes idempotently', () => {
      expect(store.isOpen).toBe(true);
      store.close();
      expect(store.isOpen).toBe(false);
      expect(() => store.close()).not.toThrow();
    });

    it('rejects calls on a closed store', () => {
      store.close();
      expect(() => store.listNotes()).toThrow('Store is not open');
    });
  });

  describe('notes', () => {
    it('saves with defaults and lists newest first', () => {
      const first = store.saveNote({ text: 'buy milk' });
      clock.set(T0 + 1000);
      const second = store.saveNote({ text: 'call Anna', title: ' Call ', category: 'work' });

      expect(first).toEqual({ id: 1, title: '', text: 'buy milk', category: 'general', createdAt: T0 });
      expect(second.title).toBe('Call');
      expect(store.listNotes().map((note) => note.id)).toEqual([second.id, first.id]);
    });

    it('deletes by id', () => {
      const note = store.saveNote({ text: 'temporary' });
      expect(store.deleteNote(note.id)).toBe(true);
      expect(store.deleteNote(note.id)).toBe(false);
      expect(store.listNotes()).toEqual([]);
    });
  });

  describe('lists', () => {
    it('creates a list with items in order, skipping blanks', () => {
      const list = store.createList('Groceries', ['eggs', '  ', ' bread ']);

      expect(list.name).toBe('Groceries');
      expect(list.category).toBe('general');
      expect(list.items.map((item) => [item.text, item.position, item.done])).toEqual([
        ['eggs', 0, false],
        ['bread', 1, false],
      ]);
    });

    it('rejects a duplicate name regardless of case', () => {
      store.createList('Groceries', []);
      expect(() => store.createList('groceries', [])).toThrow('List "Groceries" already exists');
      expect(store.listLists()).toHaveLength(1);
    });

    it('finds by id, exact name, then substring', () => {
      const groceries = store.createList('Groceries', ['eggs']);
      clock.set(T0 + 1000);
      const hardware = store.createList('Hardware store', []);

      expect(store.findList(groceries.id)?.name).toBe('Groceries');
      expect(store.findList(String(hardware.id))?.name).toBe('Hardware store');
      expect(store.findList('GROCERIES')?.items.map((item) => item.text)).toEqual(['eggs']);
      expect(store.findList('hardware')?.id).toBe(hardware.id);
      expect(store.findList('pharmacy')).toBeNull();
      expect(store.findList('   ')).toBeNull();
    });

    it('appends items after the last position', () => {
      const list = store.createList('Groceries', ['eggs']);
      const added = store.addItems(list.id, ['milk', 'butter']);

      expect(added.map((item) => item.position)).toEqual([1, 2]);
      expect(store.findList(list.id)?.items.map((item) => item.text)).toEqual(['eggs', 'milk', 'butter']);
    });

    it('refuses items for a missing list', () => {
      expect(() => store.addItems(42, ['x'])).toThrow('List 42 does not exist');
    });

    it('toggles the first matching item back and forth', () => {
      const list = store.createList('Groceries', ['eggs', 'milk']);

      expect(store.toggleItem(list.id, 'Milk')?.done).toBe(true);
      expect(store.findList(list.id)?.items.map((item) => item.done)).toEqual([false, true]);
      expect(store.toggleItem(list.id, 'mil')?.done).toBe(false);
      expect(store.toggleItem(list.id, 'coffee')).toBeNull();
    });

    it('deletes items along with their list', () => {
      const list = store.createList('Groceries', ['eggs']);
      expect(store.deleteList(list.id)).toBe(true);
      store.createList('Other', []);
      expect(store.findList('Other')?.items).toEqual([]);
      expect(store.listLists()).toHaveLength(1);
    });
  });

  describe('appointments', () => {
    it('creates and lists in start order within a range', () => {
      const later = store.createAppointment({ title: 'Dentist', startAt: T0 + 120 * MINUTE, remindLeadMinutes: 15 });
      const sooner = store.createAppointment({
        title: 'Standup',
        startAt: T0 + 30 * MINUTE,
        remindLeadMinutes: 5,
        description: ' daily ',
      });

      expect(sooner.description).toBe('daily');
      expect(sooner.notified).toBe(false);
      expect(store.listAppointments().map((appt) => appt.title)).toEqual(['Standup', 'Dentist']);
      expect(store.listAppointments({ from: T0 + 60 * MINUTE }).map((appt) => appt.id)).toEqual([later.id]);
    });

    it('keeps the notified flag when moved', () => {
      const appt = store.createAppointment({ title: 'Call', startAt: T0 + 10 * MINUTE, remindLeadMinutes: 10 });
      store.claimDueNotifications(T0);

      expect(store.updateAppointmentStart(appt.id, T0 + 200 * MINUTE)).toBe(true);
      expect(store.getAppointment(appt.id)).toMatchObject({ startAt: T0 + 200 * MINUTE, notified: true });
      expect(store.updateAppointmentStart(999, T0)).toBe(false);
    });
  });

  describe('reminders', () => {
    it('lists pending reminders unless asked for all', () => {
      store.createReminder('stretch', T0 - MINUTE);
      const later = store.createReminder('water plants', T0 + MINUTE);
      store.claimDueNotifications(T0);

      expect(store.listReminders().map((r) => r.id)).toEqual([later.id]);
      expect(store.listReminders(true).map((r) => r.text)).toEqual(['stretch', 'water plants']);
    });

    it('reschedules and deletes', () => {
      const reminder = store.createReminder('stretch', T0);
      expect(store.updateReminderFireAt(reminder.id, T0 + MINUTE)).toBe(true);
      expect(store.getReminder(reminder.id)?.fireAt).toBe(T0 + MINUTE);
      expect(store.deleteReminder(reminder.id)).toBe(true);
      expect(store.getReminder(reminder.id)).toBeNull();
    });
  });

  describe('claimDueNotifications', () => {
    it('returns each due entity exactly once, ordered by due time', () => {
      store.createReminder('overdue', T0 - 5 * MINUTE);
      store.createReminder('future', T0 + 5 * MINUTE);
      store.createAppointment({ title: 'Meeting', startAt: T0 + 10 * MINUTE, remindLeadMinutes: 15 });
      store.createAppointment({ title: 'Lunch', startAt: T0 + 60 * MINUTE, remindLeadMinutes: 15 });

      const due = store.claimDueNotifications(T0);
      expect(due.map((item) => (item.type === 'reminder' ? item.reminder.text : item.appointment.title))).toEqual([
        'overdue',
        'Meeting',
      ]);
      expect(due.every((item) => (item.type === 'reminder' ? item.reminder.notified : item.appointment.notified))).toBe(
        true,
      );

      expect(store.claimDueNotifications(T0)).toEqual([]);
      expect(store.claimDueNotifications(T0 + 5 * MINUTE)).toHaveLength(1);
    });
  });

  describe('transaction', () => {
    it('rolls back every write when the body throws', () => {
      expect(() =>
        store.transaction(() => {
          store.saveNote({ text: 'kept?' });
          store.createList('Groceries', []);
          throw new AppError('UNRECOGNIZED_ACTION', 'abort');
        }),
      ).toThrow('abort');

      expect(store.listNotes()).toEqual([]);
      expect(store.listLists()).toEqual([]);
    });
  });
});
