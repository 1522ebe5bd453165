/**
 * ActionExecutor - applies a resolved batch against the Store atomically
 *
 * The whole batch runs in one Store transaction: the first failing action
 * rolls back everything the batch has written so far.
 */

import type { AgendaSnapshot } from '../../shared/types.js';
import { formatLocalDateTime } from '../../shared/time.js';
import { AppError } from '../errors.js';
import { t } from '../i18n/index.js';
import { systemClock, type Clock } from '../clock.js';
import type { Store } from '../store/Store.js';
import { createLogger } from '../../utils/logger.js';
import { isQueryAction, type Action, type QueryAction } from './actions.js';

const log = createLogger('ActionExecutor');

export interface ExecutionResult {
  /** One localized confirmation per action, in batch order */
  messages: string[];
  /** Set by the last query action of the batch */
  agenda?: AgendaSnapshot;
}

export class ActionExecutor {
  constructor(
    private readonly store: Store,
    private readonly clock: Clock = systemClock,
  ) {}

  apply(actions: Action[]): ExecutionResult {
    const result = this.store.transaction(() => {
      const messages: string[] = [];
      let agenda: AgendaSnapshot | undefined;
      for (const action of actions) {
        if (isQueryAction(action)) {
          agenda = this.query(action);
          messages.push(this.queryMessage(action));
        } else {
          messages.push(this.mutate(action));
        }
      }
      return { messages, agenda };
    });

    log.info(`Applied ${actions.length} action(s)`);
    return result;
  }

  private mutate(action: Exclude<Action, QueryAction>): string {
    switch (action.type) {
      case 'save_note': {
        const note = this.store.saveNote({ text: action.text, title: action.title, category: action.category });
        return t('note_saved', { id: note.id });
      }

      case 'create_list': {
        const existing = this.store.findList(action.name);
        if (existing && existing.name.trim().toLowerCase() === action.name.trim().toLowerCase()) {
          throw new AppError('UNRECOGNIZED_ACTION', t('list_exists', { name: existing.name }));
        }
        const list = this.store.createList(action.name, action.items, action.category);
        return t('list_saved', { name: list.name, count: list.items.length });
      }

      case 'add_item': {
        const list = this.store.findList(action.list);
        if (!list) {
          throw new AppError('UNRECOGNIZED_ACTION', t('list_not_found', { name: action.list }));
        }
        const added = this.store.addItems(list.id, action.items);
        return t('added_to_list', { count: added.length, name: list.name });
      }

      case 'check_item': {
        const list = this.store.findList(action.list);
        if (!list) {
          throw new AppError('UNRECOGNIZED_ACTION', t('list_not_found', { name: action.list }));
        }
        const item = this.store.toggleItem(list.id, action.text);
        if (!item) {
          throw new AppError('UNRECOGNIZED_ACTION', t('item_not_found', { item: action.text, name: list.name }));
        }
        return t(item.done ? 'item_checked' : 'item_unchecked', { item: item.text, name: list.name });
      }

      case 'create_appointment': {
        const appointment = this.store.createAppointment({
          title: action.title,
          startAt: action.startAt,
          remindLeadMinutes: action.remindLeadMinutes,
          description: action.description,
        });
        return t('appointment_created', {
          title: appointment.title,
          when: formatLocalDateTime(appointment.startAt),
        });
      }

      case 'create_reminder': {
        const reminder = this.store.createReminder(action.text, action.fireAt);
        return t('reminder_set', { when: formatLocalDateTime(reminder.fireAt) });
      }
    }
  }

  private query(action: QueryAction): AgendaSnapshot {
    switch (action.type) {
      case 'query_notes':
        return { view: 'notes', notes: this.store.listNotes(), lists: this.store.listLists() };
      case 'query_agenda': {
        const startOfToday = new Date(this.clock.now());
        startOfToday.setHours(0, 0, 0, 0);
        return { view: 'agenda', appointments: this.store.listAppointments({ from: startOfToday.getTime() }) };
      }
      case 'query_reminders':
        return { view: 'reminders', reminders: this.store.listReminders(false) };
    }
  }

  private queryMessage(action: QueryAction): string {
    switch (action.type) {
      case 'query_notes':
        return t('show_notes');
      case 'query_agenda':
        return t('show_appointments');
      case 'query_reminders':
        return t('show_reminders');
    }
  }
}
