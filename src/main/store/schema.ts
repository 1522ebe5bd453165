/**
 * SQLite schema for the holdtalk store.
 *
 * All instants are INTEGER epoch milliseconds (UTC). `notified` columns only
 * ever move 0 -> 1.
 */

export const SCHEMA_VERSION = 1;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS meta (
  key   TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS notes (
  id         INTEGER PRIMARY KEY AUTOINCREMENT,
  title      TEXT    NOT NULL DEFAULT '',
  text       TEXT    NOT NULL,
  category   TEXT    NOT NULL DEFAULT 'general',
  created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS lists (
  id         INTEGER PRIMARY KEY AUTOINCREMENT,
  name       TEXT    NOT NULL,
  category   TEXT    NOT NULL DEFAULT 'general',
  created_at INTEGER NOT NULL
);

CREATE UNIQUE INDEX IF NOT EXISTS lists_name_unique ON lists (name COLLATE NOCASE);

CREATE TABLE IF NOT EXISTS list_items (
  id       INTEGER PRIMARY KEY AUTOINCREMENT,
  list_id  INTEGER NOT NULL REFERENCES lists (id) ON DELETE CASCADE,
  text     TEXT    NOT NULL,
  done     INTEGER NOT NULL DEFAULT 0,
  position INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS list_items_list ON list_items (list_id, position);

CREATE TABLE IF NOT EXISTS appointments (
  id                  INTEGER PRIMARY KEY AUTOINCREMENT,
  title               TEXT    NOT NULL,
  description         TEXT    NOT NULL DEFAULT '',
  start_at            INTEGER NOT NULL,
  remind_lead_minutes INTEGER NOT NULL,
  notified            INTEGER NOT NULL DEFAULT 0,
  created_at          INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS appointments_due ON appointments (notified, start_at);

CREATE TABLE IF NOT EXISTS reminders (
  id         INTEGER PRIMARY KEY AUTOINCREMENT,
  text       TEXT    NOT NULL,
  fire_at    INTEGER NOT NULL,
  notified   INTEGER NOT NULL DEFAULT 0,
  created_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS reminders_due ON reminders (notified, fire_at);
`;

// ============================================================================
// Row shapes (snake_case as stored)
// ============================================================================

export interface NoteRow {
  id: number;
  title: string;
  text: string;
  category: string;
  created_at: number;
}

export interface ListRow {
  id: number;
  name: string;
  category: string;
  created_at: number;
}

export interface ListItemRow {
  id: number;
  list_id: number;
  text: string;
  done: number;
  position: number;
}

export interface AppointmentRow {
  id: number;
  title: string;
  description: string;
  start_at: number;
  remind_lead_minutes: number;
  notified: number;
  created_at: number;
}

export interface ReminderRow {
  id: number;
  text: string;
  fire_at: number;
  notified: number;
  created_at: number;
}
