/**
 * String tables for every user-facing message.
 *
 * Lookup falls back to English when a key is missing in the active language,
 * then to the key itself. `{name}` placeholders are replaced from params.
 */

import type { Language } from '../../shared/types.js';
import en from './locales/en.json' with { type: 'json' };
import it from './locales/it.json' with { type: 'json' };

export type MessageKey = keyof typeof en;

export type MessageParams = Record<string, string | number>;

const TABLES: Record<Language, Partial<Record<MessageKey, string>>> = { en, it };

let activeLanguage: Language = 'en';

export function setLanguage(language: Language): void {
  activeLanguage = language;
}

export function getLanguage(): Language {
  return activeLanguage;
}

export function t(key: MessageKey, params?: MessageParams): string {
  const template = TABLES[activeLanguage][key] ?? en[key] ?? key;
  if (!params) {
    return template;
  }
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    Object.hasOwn(params, name) ? String(params[name]) : match,
  );
}
