/**
 * Assistant actions
 *
 * The closed set of typed mutations and queries a spoken command can turn
 * into. Tool calls coming back from the LLM are validated here with zod;
 * anything outside the set, or with malformed arguments, is rejected with
 * UNRECOGNIZED_ACTION before a single write happens.
 */

import { z } from 'zod';
import { AppError } from '../errors.js';
import { t } from '../i18n/index.js';

// ============================================================================
// Action Union
// ============================================================================

export const ACTION_NAMES = [
  'save_note',
  'create_list',
  'add_item',
  'check_item',
  'create_appointment',
  'create_reminder',
  'query_notes',
  'query_agenda',
  'query_reminders',
] as const;

export type ActionName = (typeof ACTION_NAMES)[number];

export type Action =
  | { type: 'save_note'; text: string; title?: string; category?: string }
  | { type: 'create_list'; name: string; items: string[]; category?: string }
  | { type: 'add_item'; list: string; items: string[] }
  | { type: 'check_item'; list: string; text: string }
  | {
      type: 'create_appointment';
      title: string;
      /** Absolute instant, epoch ms */
      startAt: number;
      remindLeadMinutes: number;
      description?: string;
    }
  | { type: 'create_reminder'; text: string; /** Absolute instant, epoch ms */ fireAt: number }
  | { type: 'query_notes' }
  | { type: 'query_agenda' }
  | { type: 'query_reminders' };

export type QueryAction = Extract<Action, { type: 'query_notes' | 'query_agenda' | 'query_reminders' }>;

export interface ToolCall {
  name: string;
  input: unknown;
}

export interface ActionContext {
  /** Wall-clock now, epoch ms */
  now: number;
  pastToleranceMinutes: number;
  /** Lead used when the appointment does not name one */
  appointmentLeadMinutes: number;
}

export function isActionName(value: string): value is ActionName {
  return ACTION_NAMES.some((name) => name === value);
}

export function isQueryAction(action: Action): action is QueryAction {
  return action.type === 'query_notes' || action.type === 'query_agenda' || action.type === 'query_reminders';
}

// ============================================================================
// Argument Schemas
// ============================================================================

const text = z.string().trim().min(1);
const optionalText = z.string().trim().optional();
const noArgs = z.object({}).strict();

export const actionInputSchemas = {
  save_note: z.object({ text, title: optionalText, category: optionalText }).strict(),
  create_list: z.object({ name: text, items: z.array(text).default([]), category: optionalText }).strict(),
  add_item: z.object({ list: text, items: z.array(text).min(1) }).strict(),
  check_item: z.object({ list: text, text }).strict(),
  create_appointment: z
    .object({
      title: text,
      start_at: text,
      remind_lead_minutes: z.number().int().min(0).max(1440).optional(),
      description: optionalText,
    })
    .strict(),
  create_reminder: z.object({ text, fire_at: text }).strict(),
  query_notes: noArgs,
  query_agenda: noArgs,
  query_reminders: noArgs,
} satisfies Record<ActionName, z.ZodTypeAny>;

// ============================================================================
// Timestamps
// ============================================================================

const ISO_DATETIME =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * Parse an ISO-8601 date-time into an absolute instant (epoch ms).
 * A value without offset is read in the process's local time zone.
 * Returns null when the value is not a complete, valid date-time.
 */
export function parseInstant(value: string): number | null {
  const match = ISO_DATETIME.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, y, mo, d, h, mi, s = '0', frac = '0', zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = Number(frac.padEnd(3, '0'));

  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  // Reject impossible calendar days such as Feb 30
  const calendar = new Date(Date.UTC(year, month - 1, day));
  if (calendar.getUTCMonth() !== month - 1 || calendar.getUTCDate() !== day) {
    return null;
  }

  if (!zone) {
    return new Date(year, month - 1, day, hour, minute, second, millis).getTime();
  }

  const utc = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  if (zone.toUpperCase() === 'Z') {
    return utc;
  }

  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const offsetHours = Number(digits.slice(0, 2));
  const offsetMinutes = Number(digits.slice(2, 4));
  if (offsetHours > 14 || offsetMinutes > 59) {
    return null;
  }
  return utc - sign * (offsetHours * 60 + offsetMinutes) * 60_000;
}

/**
 * Resolve a backend-supplied time and reject values that are unparseable or
 * already past by more than the tolerance.
 */
export function resolveInstant(value: string, context: ActionContext): number {
  const instant = parseInstant(value);
  if (instant === null) {
    throw new AppError('UNRECOGNIZED_ACTION', t('time_invalid', { value }));
  }
  if (instant < context.now - context.pastToleranceMinutes * 60_000) {
    throw new AppError('UNRECOGNIZED_ACTION', t('time_in_past', { value }));
  }
  return instant;
}

// ============================================================================
// Validation
// ============================================================================

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function parseArgs<S extends z.ZodTypeAny>(name: ActionName, schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    throw new AppError('UNRECOGNIZED_ACTION', `${name}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Validate one tool call and turn it into a typed Action.
 */
export function parseAction(call: ToolCall, context: ActionContext): Action {
  if (!isActionName(call.name)) {
    throw new AppError('UNRECOGNIZED_ACTION', t('unknown_command', { name: call.name }));
  }

  switch (call.name) {
    case 'save_note': {
      const args = parseArgs(call.name, actionInputSchemas.save_note, call.input);
      return { type: 'save_note', text: args.text, title: args.title, category: args.category };
    }
    case 'create_list': {
      const args = parseArgs(call.name, actionInputSchemas.create_list, call.input);
      return { type: 'create_list', name: args.name, items: args.items, category: args.category };
    }
    case 'add_item': {
      const args = parseArgs(call.name, actionInputSchemas.add_item, call.input);
      return { type: 'add_item', list: args.list, items: args.items };
    }
    case 'check_item': {
      const args = parseArgs(call.name, actionInputSchemas.check_item, call.input);
      return { type: 'check_item', list: args.list, text: args.text };
    }
    case 'create_appointment': {
      const args = parseArgs(call.name, actionInputSchemas.create_appointment, call.input);
      return {
        type: 'create_appointment',
        title: args.title,
        startAt: resolveInstant(args.start_at, context),
        remindLeadMinutes: args.remind_lead_minutes ?? context.appointmentLeadMinutes,
        description: args.description,
      };
    }
    case 'create_reminder': {
      const args = parseArgs(call.name, actionInputSchemas.create_reminder, call.input);
      return { type: 'create_reminder', text: args.text, fireAt: resolveInstant(args.fire_at, context) };
    }
    case 'query_notes':
    case 'query_agenda':
    case 'query_reminders':
      parseArgs(call.name, actionInputSchemas[call.name], call.input);
      return { type: call.name };
  }
}

/**
 * Validate a whole batch. One bad call rejects the batch; an empty batch
 * means the command was not understood.
 */
export function parseActionBatch(calls: ToolCall[], context: ActionContext): Action[] {
  if (calls.length === 0) {
    throw new AppError('UNRECOGNIZED_ACTION', t('not_understood'));
  }
  return calls.map((call) => parseAction(call, context));
}
