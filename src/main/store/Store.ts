/**
 * Store - embedded SQLite persistence for notes, lists, appointments and reminders
 *
 * The single source of truth for the scheduler, the assistant executor and
 * the CLI read commands. better-sqlite3 is synchronous, so every call runs to
 * completion on the coordination loop and writes are serialized by
 * construction. Multi-statement operations run inside `transaction()`, which
 * nests as a savepoint when called from an outer transaction.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import type {
  Appointment,
  DueNotification,
  List,
  ListItem,
  ListWithItems,
  Note,
  Reminder,
} from '../../shared/types.js';
import { AppError, errorMessage } from '../errors.js';
import { systemClock, type Clock } from '../clock.js';
import { createLogger } from '../../utils/logger.js';
import {
  SCHEMA_SQL,
  SCHEMA_VERSION,
  type AppointmentRow,
  type ListItemRow,
  type ListRow,
  type NoteRow,
  type ReminderRow,
} from './schema.js';

const log = createLogger('Store');

const CORRUPTION_CODES = new Set(['SQLITE_CORRUPT', 'SQLITE_NOTADB']);
const MINUTE_MS = 60_000;

// ============================================================================
// Types
// ============================================================================

export interface StoreOptions {
  /** Database file path, or ':memory:' */
  path: string;
  clock?: Clock;
}

export interface NewNote {
  text: string;
  title?: string;
  category?: string;
}

export interface NewAppointment {
  title: string;
  startAt: number;
  remindLeadMinutes: number;
  description?: string;
}

export interface TimeRange {
  from?: number;
  to?: number;
}

// ============================================================================
// Row mapping
// ============================================================================

function toNote(row: NoteRow): Note {
  return {
    id: row.id,
    title: row.title,
    text: row.text,
    category: row.category,
    createdAt: row.created_at,
  };
}

function toList(row: ListRow): List {
  return { id: row.id, name: row.name, category: row.category, createdAt: row.created_at };
}

function toListItem(row: ListItemRow): ListItem {
  return {
    id: row.id,
    listId: row.list_id,
    text: row.text,
    done: row.done === 1,
    position: row.position,
  };
}

function toAppointment(row: AppointmentRow): Appointment {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    startAt: row.start_at,
    remindLeadMinutes: row.remind_lead_minutes,
    notified: row.notified === 1,
    createdAt: row.created_at,
  };
}

function toReminder(row: ReminderRow): Reminder {
  return {
    id: row.id,
    text: row.text,
    fireAt: row.fire_at,
    notified: row.notified === 1,
    createdAt: row.created_at,
  };
}

function sqliteCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

function normalizeText(value: string): string {
  return value.trim().toLowerCase();
}

// ============================================================================
// Store
// ============================================================================

export class Store {
  private db: Database.Database | null = null;
  private readonly clock: Clock;

  constructor(private readonly options: StoreOptions) {
    this.clock = options.clock ?? systemClock;
  }

  get path(): string {
    return this.options.path;
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Open the database, verify its integrity and apply the schema.
   * Throws STORE_CORRUPTED when the file is not a usable database.
   */
  open(): void {
    if (this.db) {
      return;
    }

    this.guard('open', () => {
      if (this.options.path !== ':memory:') {
        mkdirSync(dirname(this.options.path), { recursive: true });
      }

      const db = new Database(this.options.path);
      try {
        db.pragma('journal_mode = WAL');
        db.pragma('foreign_keys = ON');

        const integrity: unknown = db.pragma('integrity_check', { simple: true });
        if (integrity !== 'ok') {
          throw new AppError('STORE_CORRUPTED', `Integrity check failed: ${String(integrity)}`);
        }

        db.exec(SCHEMA_SQL);
        db.prepare<[string, string]>(
          `INSERT INTO meta (key, value) VALUES (?, ?)
           ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
        ).run('schema_version', String(SCHEMA_VERSION));
      } catch (error) {
        db.close();
        throw error;
      }
      this.db = db;
    });

    log.info(`Opened ${this.options.path} (schema v${SCHEMA_VERSION})`);
  }

  close(): void {
    if (!this.db) {
      return;
    }
    this.db.close();
    this.db = null;
    log.debug('Closed');
  }

  /**
   * Run `fn` atomically. Any throw rolls back every write made inside it.
   */
  transaction<T>(fn: () => T): T {
    const db = this.requireDb();
    return this.guard('transaction', () => db.transaction(fn)());
  }

  // ==========================================================================
  // Notes
  // ==========================================================================

  saveNote(note: NewNote): Note {
    return this.guard('saveNote', () => {
      const createdAt = this.clock.now();
      const title = note.title?.trim() ?? '';
      const category = note.category?.trim() || 'general';
      const result = this.requireDb()
        .prepare<[string, string, string, number]>(
          'INSERT INTO notes (title, text, category, created_at) VALUES (?, ?, ?, ?)',
        )
        .run(title, note.text, category, createdAt);
      return { id: Number(result.lastInsertRowid), title, text: note.text, category, createdAt };
    });
  }

  listNotes(): Note[] {
    return this.guard('listNotes', () =>
      this.requireDb()
        .prepare<[], NoteRow>('SELECT * FROM notes ORDER BY created_at DESC, id DESC')
        .all()
        .map(toNote),
    );
  }

  deleteNote(id: number): boolean {
    return this.guard('deleteNote', () =>
      this.requireDb().prepare<[number]>('DELETE FROM notes WHERE id = ?').run(id).changes > 0,
    );
  }

  // ==========================================================================
  // Lists
  // ==========================================================================

  /**
   * Create a list with its initial items. Names are unique, case-insensitively.
   */
  createList(name: string, items: string[], category = 'general'): ListWithItems {
    const trimmed = name.trim();
    return this.transaction(() => {
      const db = this.requireDb();
      const existing = db
        .prepare<[string], ListRow>('SELECT * FROM lists WHERE name = ? COLLATE NOCASE')
        .get(trimmed);
      if (existing) {
        throw new AppError('UNRECOGNIZED_ACTION', `List "${existing.name}" already exists`);
      }

      const createdAt = this.clock.now();
      const result = db
        .prepare<[string, string, number]>('INSERT INTO lists (name, category, created_at) VALUES (?, ?, ?)')
        .run(trimmed, category.trim() || 'general', createdAt);
      const listId = Number(result.lastInsertRowid);
      this.insertItems(listId, items);
      return this.requireListWithItems(listId);
    });
  }

  /**
   * Resolve a list reference: exact id, then case-insensitive exact name,
   * then substring of the name. Ties go to the most recently created list.
   */
  findList(nameOrId: string | number): ListWithItems | null {
    return this.guard('findList', () => {
      const db = this.requireDb();
      const query = String(nameOrId).trim();

      if (/^\d+$/.test(query)) {
        const byId = db.prepare<[number], ListRow>('SELECT * FROM lists WHERE id = ?').get(Number(query));
        if (byId) {
          return this.withItems(toList(byId));
        }
      }

      const target = normalizeText(query);
      if (!target) {
        return null;
      }
      const lists = db
        .prepare<[], ListRow>('SELECT * FROM lists ORDER BY created_at DESC, id DESC')
        .all();
      const match =
        lists.find((row) => normalizeText(row.name) === target) ??
        lists.find((row) => normalizeText(row.name).includes(target));
      return match ? this.withItems(toList(match)) : null;
    });
  }

  addItems(listId: number, items: string[]): ListItem[] {
    return this.transaction(() => {
      const list = this.requireDb().prepare<[number], ListRow>('SELECT * FROM lists WHERE id = ?').get(listId);
      if (!list) {
        throw new AppError('PERSISTENCE_ERROR', `List ${listId} does not exist`);
      }
      return this.insertItems(listId, items);
    });
  }

  /**
   * Flip `done` on the first item whose text matches. Returns null when no item matches.
   */
  toggleItem(listId: number, text: string): ListItem | null {
    return this.transaction(() => {
      const db = this.requireDb();
      const target = normalizeText(text);
      const items = db
        .prepare<[number], ListItemRow>('SELECT * FROM list_items WHERE list_id = ? ORDER BY position, id')
        .all(listId);
      const row =
        items.find((item) => normalizeText(item.text) === target) ??
        items.find((item) => normalizeText(item.text).includes(target));
      if (!row) {
        return null;
      }
      const done = row.done === 1 ? 0 : 1;
      db.prepare<[number, number]>('UPDATE list_items SET done = ? WHERE id = ?').run(done, row.id);
      return toListItem({ ...row, done });
    });
  }

  listLists(): ListWithItems[] {
    return this.guard('listLists', () =>
      this.requireDb()
        .prepare<[], ListRow>('SELECT * FROM lists ORDER BY created_at DESC, id DESC')
        .all()
        .map((row) => this.withItems(toList(row))),
    );
  }

  /**
   * Delete a list; its items go with it (ON DELETE CASCADE).
   */
  deleteList(id: number): boolean {
    return this.guard('deleteList', () =>
      this.requireDb().prepare<[number]>('DELETE FROM lists WHERE id = ?').run(id).changes > 0,
    );
  }

  // ==========================================================================
  // Appointments
  // ==========================================================================

  createAppointment(input: NewAppointment): Appointment {
    return this.guard('createAppointment', () => {
      const createdAt = this.clock.now();
      const description = input.description?.trim() ?? '';
      const result = this.requireDb()
        .prepare<[string, string, number, number, number]>(
          `INSERT INTO appointments (title, description, start_at, remind_lead_minutes, notified, created_at)
           VALUES (?, ?, ?, ?, 0, ?)`,
        )
        .run(input.title, description, input.startAt, input.remindLeadMinutes, createdAt);
      return {
        id: Number(result.lastInsertRowid),
        title: input.title,
        description,
        startAt: input.startAt,
        remindLeadMinutes: input.remindLeadMinutes,
        notified: false,
        createdAt,
      };
    });
  }

  listAppointments(range: TimeRange = {}): Appointment[] {
    return this.guard('listAppointments', () =>
      this.requireDb()
        .prepare<[number, number], AppointmentRow>(
          'SELECT * FROM appointments WHERE start_at >= ? AND start_at <= ? ORDER BY start_at, id',
        )
        .all(range.from ?? Number.MIN_SAFE_INTEGER, range.to ?? Number.MAX_SAFE_INTEGER)
        .map(toAppointment),
    );
  }

  getAppointment(id: number): Appointment | null {
    return this.guard('getAppointment', () => {
      const row = this.requireDb()
        .prepare<[number], AppointmentRow>('SELECT * FROM appointments WHERE id = ?')
        .get(id);
      return row ? toAppointment(row) : null;
    });
  }

  /**
   * Move an appointment. `notified` is left untouched.
   */
  updateAppointmentStart(id: number, startAt: number): boolean {
    return this.guard('updateAppointmentStart', () =>
      this.requireDb()
        .prepare<[number, number]>('UPDATE appointments SET start_at = ? WHERE id = ?')
        .run(startAt, id).changes > 0,
    );
  }

  deleteAppointment(id: number): boolean {
    return this.guard('deleteAppointment', () =>
      this.requireDb().prepare<[number]>('DELETE FROM appointments WHERE id = ?').run(id).changes > 0,
    );
  }

  // ==========================================================================
  // Reminders
  // ==========================================================================

  createReminder(text: string, fireAt: number): Reminder {
    return this.guard('createReminder', () => {
      const createdAt = this.clock.now();
      const result = this.requireDb()
        .prepare<[string, number, number]>(
          'INSERT INTO reminders (text, fire_at, notified, created_at) VALUES (?, ?, 0, ?)',
        )
        .run(text, fireAt, createdAt);
      return { id: Number(result.lastInsertRowid), text, fireAt, notified: false, createdAt };
    });
  }

  listReminders(includeNotified = false): Reminder[] {
    const sql = includeNotified
      ? 'SELECT * FROM reminders ORDER BY fire_at, id'
      : 'SELECT * FROM reminders WHERE notified = 0 ORDER BY fire_at, id';
    return this.guard('listReminders', () =>
      this.requireDb().prepare<[], ReminderRow>(sql).all().map(toReminder),
    );
  }

  getReminder(id: number): Reminder | null {
    return this.guard('getReminder', () => {
      const row = this.requireDb().prepare<[number], ReminderRow>('SELECT * FROM reminders WHERE id = ?').get(id);
      return row ? toReminder(row) : null;
    });
  }

  /**
   * Reschedule a reminder. A reminder that already fired stays notified.
   */
  updateReminderFireAt(id: number, fireAt: number): boolean {
    return this.guard('updateReminderFireAt', () =>
      this.requireDb()
        .prepare<[number, number]>('UPDATE reminders SET fire_at = ? WHERE id = ?')
        .run(fireAt, id).changes > 0,
    );
  }

  deleteReminder(id: number): boolean {
    return this.guard('deleteReminder', () =>
      this.requireDb().prepare<[number]>('DELETE FROM reminders WHERE id = ?').run(id).changes > 0,
    );
  }

  // ==========================================================================
  // Scheduler
  // ==========================================================================

  /**
   * Select every due, unnotified reminder and appointment and mark them
   * notified in the same transaction. Each entity is returned by exactly one
   * call for its whole lifetime.
   */
  claimDueNotifications(now: number): DueNotification[] {
    return this.transaction(() => {
      const db = this.requireDb();

      const reminders = db
        .prepare<[number], ReminderRow>(
          'SELECT * FROM reminders WHERE notified = 0 AND fire_at <= ? ORDER BY fire_at, id',
        )
        .all(now);
      const appointments = db
        .prepare<[number, number], AppointmentRow>(
          `SELECT * FROM appointments
           WHERE notified = 0 AND start_at - remind_lead_minutes * ? <= ?
           ORDER BY start_at, id`,
        )
        .all(MINUTE_MS, now);

      const markReminder = db.prepare<[number]>('UPDATE reminders SET notified = 1 WHERE id = ? AND notified = 0');
      const markAppointment = db.prepare<[number]>(
        'UPDATE appointments SET notified = 1 WHERE id = ? AND notified = 0',
      );

      const claimed: Array<{ notification: DueNotification; dueAt: number }> = [];
      for (const row of reminders) {
        if (markReminder.run(row.id).changes === 1) {
          claimed.push({
            notification: { type: 'reminder', reminder: toReminder({ ...row, notified: 1 }) },
            dueAt: row.fire_at,
          });
        }
      }
      for (const row of appointments) {
        if (markAppointment.run(row.id).changes === 1) {
          claimed.push({
            notification: { type: 'appointment', appointment: toAppointment({ ...row, notified: 1 }) },
            dueAt: row.start_at - row.remind_lead_minutes * MINUTE_MS,
          });
        }
      }

      return claimed.sort((a, b) => a.dueAt - b.dueAt).map((entry) => entry.notification);
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private requireDb(): Database.Database {
    if (!this.db) {
      throw new AppError('PERSISTENCE_ERROR', 'Store is not open');
    }
    return this.db;
  }

  private insertItems(listId: number, items: string[]): ListItem[] {
    const db = this.requireDb();
    const last = db
      .prepare<[number], { maxPosition: number | null }>(
        'SELECT MAX(position) AS maxPosition FROM list_items WHERE list_id = ?',
      )
      .get(listId);
    let position = (last?.maxPosition ?? -1) + 1;

    const insert = db.prepare<[number, string, number]>(
      'INSERT INTO list_items (list_id, text, done, position) VALUES (?, ?, 0, ?)',
    );
    const created: ListItem[] = [];
    for (const raw of items) {
      const text = raw.trim();
      if (!text) {
        continue;
      }
      const result = insert.run(listId, text, position);
      created.push({ id: Number(result.lastInsertRowid), listId, text, done: false, position });
      position += 1;
    }
    return created;
  }

  private withItems(list: List): ListWithItems {
    const items = this.requireDb()
      .prepare<[number], ListItemRow>('SELECT * FROM list_items WHERE list_id = ? ORDER BY position, id')
      .all(list.id)
      .map(toListItem);
    return { ...list, items };
  }

  private requireListWithItems(id: number): ListWithItems {
    const row = this.requireDb().prepare<[number], ListRow>('SELECT * FROM lists WHERE id = ?').get(id);
    if (!row) {
      throw new AppError('PERSISTENCE_ERROR', `List ${id} vanished`);
    }
    return this.withItems(toList(row));
  }

  /**
   * Map driver failures onto the error taxonomy. AppErrors pass through.
   */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      const code = sqliteCode(error);
      if (code && CORRUPTION_CODES.has(code)) {
        throw new AppError('STORE_CORRUPTED', `${operation}: ${errorMessage(error)}`, error);
      }
      log.error(`${operation} failed:`, error);
      throw new AppError('PERSISTENCE_ERROR', `${operation}: ${errorMessage(error)}`, error);
    }
  }
}

export function createStore(options: StoreOptions): Store {
  return new Store(options);
}
