#!/usr/bin/env node
/**
 * holdtalk CLI - run the daemon and read the store from the command line
 *
 * Usage:
 *   holdtalk run                         Hold-to-talk daemon (until Ctrl+C)
 *   holdtalk notes                       Notes and lists
 *   holdtalk agenda [--all]              Appointments
 *   holdtalk reminders [--all]           Reminders
 *   holdtalk delete <type> <id>          Delete a note, list, appointment or reminder
 *   holdtalk config [key] [value]        Show or change settings
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { Command } from 'commander';
import { z } from 'zod';
import { formatTriggerKey } from '../shared/hotkeys.js';
import type { UserStatus } from '../shared/types.js';
import { AppError, errorMessage, isAppError } from '../main/errors.js';
import { errorHandler } from '../main/ErrorHandler.js';
import { setLanguage } from '../main/i18n/index.js';
import { createApp, STORE_FILE_NAME, type HoldtalkApp } from '../main/index.js';
import { SettingsManager, SETTING_KEYS, isSettingKey } from '../main/settings/index.js';
import { createStore, type Store } from '../main/store/Store.js';
import { configureFileLog, setConsoleLevel } from '../utils/logger.js';
import { formatAgenda, formatNotes, formatReminders } from './format.js';

export const EXIT_SUCCESS = 0;
export const EXIT_USER_ERROR = 1;
export const EXIT_SYSTEM_ERROR = 2;
export const EXIT_SIGINT = 130;

const packageJson = z.object({ version: z.string() });

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
    const parsed = packageJson.safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0-dev';
  } catch {
    return '0.0.0-dev';
  }
}

const VERSION = readVersion();

// ============================================================================
// Console output helpers
// ============================================================================

const SYMBOLS = {
  check: '\u2714',    // checkmark
  cross: '\u2718',    // cross
  arrow: '\u2192',    // right arrow
  bullet: '\u2022',   // bullet
  warning: '\u26A0',  // warning sign
  line: '\u2500',     // horizontal line
} as const;

function banner(): void {
  console.log();
  console.log(`  holdtalk v${VERSION} ${SYMBOLS.bullet} Voice dictation and assistant`);
  console.log(`  ${SYMBOLS.line.repeat(40)}`);
  console.log();
}

function step(message: string): void {
  console.log(`  ${SYMBOLS.arrow} ${message}`);
}

function success(message: string): void {
  console.log(`  ${SYMBOLS.check} ${message}`);
}

function fail(message: string): void {
  console.log(`  ${SYMBOLS.cross} ${message}`);
}

function printLines(lines: string[]): void {
  for (const line of lines) {
    console.log(line ? `  ${line}` : '');
  }
}

function printStatus(status: UserStatus): void {
  const symbol =
    status.tone === 'error' ? SYMBOLS.cross : status.tone === 'warning' ? SYMBOLS.warning : status.tone === 'success' ? SYMBOLS.check : SYMBOLS.arrow;
  for (const line of status.message.split('\n')) {
    console.log(`  ${symbol} [${status.kind}] ${line}`);
  }

  if (status.agenda?.view === 'notes') {
    printLines(formatNotes(status.agenda.notes, status.agenda.lists));
  } else if (status.agenda?.view === 'agenda') {
    printLines(formatAgenda(status.agenda.appointments, Date.now()));
  } else if (status.agenda?.view === 'reminders') {
    printLines(formatReminders(status.agenda.reminders));
  }
}

// ============================================================================
// Store access for the read commands
// ============================================================================

function loadSettings(): SettingsManager {
  const settings = new SettingsManager();
  setLanguage(settings.get('language'));
  return settings;
}

function exitOnError(error: unknown): never {
  if (isAppError(error) && error.code === 'STORE_CORRUPTED') {
    fail(errorHandler.statusMessage(error));
    fail(error.message);
    process.exit(EXIT_SYSTEM_ERROR);
  }
  fail(errorMessage(error));
  process.exit(isAppError(error) ? EXIT_SYSTEM_ERROR : EXIT_USER_ERROR);
}

function withStore<T>(fn: (store: Store) => T): T {
  setConsoleLevel('warn');
  const settings = loadSettings();
  const store = createStore({ path: join(settings.dataDir, STORE_FILE_NAME) });
  try {
    store.open();
    return fn(store);
  } catch (error) {
    return exitOnError(error);
  } finally {
    store.close();
  }
}

function buildApp(): HoldtalkApp {
  try {
    const settings = loadSettings();
    const logPath = configureFileLog(settings.dataDir);
    step(`Data directory: ${settings.dataDir}`);
    step(`Log file: ${logPath}`);
    return createApp({ settings });
  } catch (error) {
    return exitOnError(error);
  }
}

function parseId(raw: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) {
    fail(`Invalid id: ${raw}`);
    process.exit(EXIT_USER_ERROR);
  }
  return id;
}

function startOfToday(): number {
  const today = new Date();
  today.setHours(0, 0, 0, 0);
  return today.getTime();
}

// ============================================================================
// CLI definition
// ============================================================================

const program = new Command();

program
  .name('holdtalk')
  .description('Hold a key to dictate, hold another to command your notes, lists and agenda')
  .version(VERSION, '-v, --version')
  .showHelpAfterError('(use --help for available options)');

// ============================================================================
// run command
// ============================================================================

program
  .command('run')
  .description('Start the hold-to-talk daemon (stop with Ctrl+C)')
  .option('--verbose', 'Debug output on the console', false)
  .action(async (options: { verbose: boolean }) => {
    banner();
    if (options.verbose) {
      setConsoleLevel('debug');
    }

    const app = buildApp();

    errorHandler.setFatalHandler((error: AppError) => {
      fail(error.message);
      app.stop();
      process.exit(EXIT_SYSTEM_ERROR);
    });
    app.onStatus(printStatus);

    const shutdown = (): void => {
      console.log('\n  Interrupted, cleaning up...');
      app.stop();
      process.exit(EXIT_SIGINT);
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    try {
      await app.start();
    } catch (error) {
      app.stop();
      return exitOnError(error);
    }

    const bindings = app.hotkeys.getBindings();
    success(`Hold ${formatTriggerKey(bindings.dictation)} to dictate`);
    success(`Hold ${formatTriggerKey(bindings.assistant)} for the assistant`);
    console.log();
  });

// ============================================================================
// Read commands
// ============================================================================

program
  .command('notes')
  .description('Show notes and lists')
  .action(() => {
    withStore((store) => printLines(formatNotes(store.listNotes(), store.listLists())));
  });

program
  .command('agenda')
  .description('Show appointments from today on')
  .option('--all', 'Include past appointments', false)
  .action((options: { all: boolean }) => {
    withStore((store) => {
      const appointments = store.listAppointments(options.all ? {} : { from: startOfToday() });
      printLines(formatAgenda(appointments, Date.now()));
    });
  });

program
  .command('reminders')
  .description('Show pending reminders')
  .option('--all', 'Include reminders that already fired', false)
  .action((options: { all: boolean }) => {
    withStore((store) => printLines(formatReminders(store.listReminders(options.all))));
  });

program
  .command('delete')
  .description('Delete a note, list, appointment or reminder by id')
  .argument('<type>', 'note | list | appointment | reminder')
  .argument('<id>', 'Numeric id as shown by the read commands')
  .action((type: string, rawId: string) => {
    const id = parseId(rawId);
    const deleted = withStore((store) => {
      switch (type) {
        case 'note':
          return store.deleteNote(id);
        case 'list':
          return store.deleteList(id);
        case 'appointment':
          return store.deleteAppointment(id);
        case 'reminder':
          return store.deleteReminder(id);
        default:
          fail(`Unknown type "${type}" (expected note, list, appointment or reminder)`);
          process.exit(EXIT_USER_ERROR);
      }
    });

    if (!deleted) {
      fail(`No ${type} with id ${id}`);
      process.exit(EXIT_USER_ERROR);
    }
    success(`Deleted ${type} #${id}`);
  });

// ============================================================================
// config command
// ============================================================================

program
  .command('config')
  .description('Show all settings, one setting, or change one')
  .argument('[key]', `Setting name (${SETTING_KEYS.join(', ')})`)
  .argument('[value]', 'New value')
  .action((key: string | undefined, value: string | undefined) => {
    setConsoleLevel('warn');
    const settings = loadSettings();

    if (!key) {
      console.log(`  ${settings.getStorePath()}`);
      console.log();
      const all = settings.getAll();
      for (const name of SETTING_KEYS) {
        console.log(`  ${name.padEnd(28)} ${String(all[name])}`);
      }
      return;
    }

    try {
      if (!isSettingKey(key)) {
        throw new Error(`Unknown setting "${key}". Known settings: ${SETTING_KEYS.join(', ')}`);
      }
      if (value === undefined) {
        console.log(`  ${String(settings.get(key))}`);
        return;
      }
      settings.setFromString(key, value);
      success(`${key} = ${String(settings.get(key))}`);
    } catch (error) {
      fail(errorMessage(error));
      process.exit(EXIT_USER_ERROR);
    }
  });

// Show help if no command provided
if (process.argv.length <= 2) {
  banner();
  program.outputHelp();
  process.exit(EXIT_SUCCESS);
}

program.parseAsync().catch((error: unknown) => exitOnError(error));
