/**
 * Tool definitions sent to Claude. One tool per action; validation of what
 * comes back lives in actions.ts.
 */

import type Anthropic from '@anthropic-ai/sdk';
import type { ActionName } from './actions.js';

type ToolDefinition = Anthropic.Messages.Tool & { name: ActionName };

const EMPTY_INPUT = {
  type: 'object',
  properties: {},
  additionalProperties: false,
} as const;

export const ASSISTANT_TOOLS: ToolDefinition[] = [
  {
    name: 'save_note',
    description:
      'Save a free-text note. Use for generic notes, thoughts and ideas that have no specific time attached.',
    input_schema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Full note content, in the user\'s words' },
        title: { type: 'string', description: 'Short title for the note' },
        category: { type: 'string', description: 'Category: general, work, personal, idea' },
      },
      required: ['text'],
      additionalProperties: false,
    },
  },
  {
    name: 'create_list',
    description: 'Create a new named list (shopping list, todo list, packing list) with its initial items.',
    input_schema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'List name, e.g. "Shopping" or "Todo"' },
        items: { type: 'array', items: { type: 'string' }, description: 'Initial items, one entry each' },
        category: { type: 'string', description: 'Category: shopping, todo, general' },
      },
      required: ['name', 'items'],
      additionalProperties: false,
    },
  },
  {
    name: 'add_item',
    description: 'Add one or more items to an existing list, referenced by its name or numeric id.',
    input_schema: {
      type: 'object',
      properties: {
        list: { type: 'string', description: 'Name or id of the existing list' },
        items: { type: 'array', items: { type: 'string' }, minItems: 1, description: 'Items to add' },
      },
      required: ['list', 'items'],
      additionalProperties: false,
    },
  },
  {
    name: 'check_item',
    description: 'Mark an item of an existing list as done, or undo it if it is already done.',
    input_schema: {
      type: 'object',
      properties: {
        list: { type: 'string', description: 'Name or id of the existing list' },
        text: { type: 'string', description: 'Text of the item to check' },
      },
      required: ['list', 'text'],
      additionalProperties: false,
    },
  },
  {
    name: 'create_appointment',
    description: 'Create a calendar appointment at an absolute date and time.',
    input_schema: {
      type: 'object',
      properties: {
        title: { type: 'string', description: 'Appointment title' },
        start_at: {
          type: 'string',
          description: 'ISO-8601 date-time with UTC offset, e.g. 2026-02-23T15:00:00+01:00',
        },
        remind_lead_minutes: {
          type: 'integer',
          minimum: 0,
          description: 'Minutes before start_at to notify. Omit to use the default.',
        },
        description: { type: 'string', description: 'Optional details' },
      },
      required: ['title', 'start_at'],
      additionalProperties: false,
    },
  },
  {
    name: 'create_reminder',
    description: 'Set a reminder that triggers a notification at an absolute date and time.',
    input_schema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'What to remind the user about' },
        fire_at: {
          type: 'string',
          description: 'ISO-8601 date-time with UTC offset, e.g. 2026-02-23T10:00:00+01:00',
        },
      },
      required: ['text', 'fire_at'],
      additionalProperties: false,
    },
  },
  {
    name: 'query_notes',
    description: 'Show saved notes and lists. Use when the user asks to see their notes or lists.',
    input_schema: EMPTY_INPUT,
  },
  {
    name: 'query_agenda',
    description: 'Show upcoming appointments.',
    input_schema: EMPTY_INPUT,
  },
  {
    name: 'query_reminders',
    description: 'Show active (pending) reminders.',
    input_schema: EMPTY_INPUT,
  },
];
