/**
 * Plain-text views of the store for the read commands.
 *
 * Each formatter returns the lines to print, without the left margin.
 */

import type { Appointment, ListWithItems, Note, Reminder } from '../shared/types.js';
import { formatLocalDateTime } from '../shared/time.js';
import { t } from '../main/i18n/index.js';

export function formatNotes(notes: Note[], lists: ListWithItems[]): string[] {
  const lines: string[] = [];

  if (notes.length === 0) {
    lines.push(t('no_notes'));
  }
  for (const note of notes) {
    const title = note.title ? ` ${note.title}` : '';
    lines.push(`#${note.id}  ${formatLocalDateTime(note.createdAt)}  [${note.category}]${title}`);
    lines.push(`    ${note.text}`);
  }

  lines.push('');

  if (lists.length === 0) {
    lines.push(t('no_lists'));
  }
  for (const list of lists) {
    lines.push(`#${list.id}  ${list.name} [${list.category}]`);
    for (const item of list.items) {
      lines.push(`    [${item.done ? 'x' : ' '}] ${item.text}`);
    }
  }

  return lines;
}

export function formatAgenda(appointments: Appointment[], now: number): string[] {
  if (appointments.length === 0) {
    return [t('no_appointments')];
  }
  return appointments.flatMap((appointment) => {
    const marker = appointment.startAt < now ? ' (past)' : appointment.notified ? ' (notified)' : '';
    const lines = [`#${appointment.id}  ${formatLocalDateTime(appointment.startAt)}  ${appointment.title}${marker}`];
    if (appointment.description) {
      lines.push(`    ${appointment.description}`);
    }
    return lines;
  });
}

export function formatReminders(reminders: Reminder[]): string[] {
  if (reminders.length === 0) {
    return [t('no_reminders')];
  }
  return reminders.map(
    (reminder) =>
      `#${reminder.id}  ${formatLocalDateTime(reminder.fireAt)}  ${reminder.text}${reminder.notified ? ' (notified)' : ''}`,
  );
}
