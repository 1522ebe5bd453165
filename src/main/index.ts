/**
 * holdtalk - Application Entry Point
 *
 * This is the orchestration heart of holdtalk. It:
 * - Builds every service in the correct order
 * - Wires hotkeys, the session controller and the capture pipeline
 * - Runs the notification scheduler
 * - Coordinates graceful shutdown
 *
 * Service Integration Order:
 * 1. Settings + language
 * 2. Store (opened and integrity-checked on start)
 * 3. Backend checks (standing warning if unreachable)
 * 4. Notification scheduler (first sweep catches up on missed items)
 * 5. Global hotkeys
 */

import { join } from 'path';
import type { SessionKind, UserStatus } from '../shared/types.js';
import { errorMessage } from './errors.js';
import { errorHandler as defaultErrorHandler, type ErrorHandler } from './ErrorHandler.js';
import { EventBus } from './EventBus.js';
import { systemClock, type Clock } from './clock.js';
import { setLanguage, t } from './i18n/index.js';
import { SettingsManager } from './settings/index.js';
import { createStore, type Store } from './store/Store.js';
import { audioCaptureService, MicrophoneGuard, type AudioSource } from './audio/index.js';
import { createTranscriptionService, type Transcriber } from './transcription/index.js';
import { createActionResolver, type Resolver } from './assistant/ActionResolver.js';
import { ActionExecutor } from './assistant/ActionExecutor.js';
import { ClipboardInjector, type Injector } from './output/ClipboardInjector.js';
import { RecoveryLog } from './output/RecoveryLog.js';
import { createCapturePipeline } from './pipeline/index.js';
import { SessionController } from './SessionController.js';
import { HotkeyManager } from './HotkeyManager.js';
import type { KeyEventSource } from './input/KeyEventSource.js';
import { UiohookKeySource } from './input/uiohook.js';
import { desktopNotifier, NotificationScheduler, type Notifier } from './notifications/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Main');

export const STORE_FILE_NAME = 'holdtalk.db';

// =============================================================================
// Types
// =============================================================================

/**
 * Replaceable services. Anything left out gets the production implementation.
 */
export interface AppDeps {
  settings?: SettingsManager;
  clock?: Clock;
  store?: Store;
  keySource?: KeyEventSource;
  audio?: AudioSource;
  transcriber?: Transcriber;
  injector?: Injector;
  resolver?: Resolver;
  notifier?: Notifier;
  errors?: ErrorHandler;
}

export interface HoldtalkApp {
  readonly bus: EventBus;
  readonly settings: SettingsManager;
  readonly store: Store;
  readonly controller: SessionController;
  readonly hotkeys: HotkeyManager;
  readonly scheduler: NotificationScheduler;
  readonly recovery: RecoveryLog;
  start(): Promise<void>;
  stop(): void;
  onStatus(callback: (status: UserStatus) => void): () => void;
}

// =============================================================================
// Wiring
// =============================================================================

export function createApp(deps: AppDeps = {}): HoldtalkApp {
  const settings = deps.settings ?? new SettingsManager();
  const clock = deps.clock ?? systemClock;
  const errors = deps.errors ?? defaultErrorHandler;
  const store = deps.store ?? createStore({ path: join(settings.dataDir, STORE_FILE_NAME), clock });

  const bus = new EventBus();
  const recovery = new RecoveryLog(settings.dataDir, clock);
  const resolver =
    deps.resolver ??
    createActionResolver({ apiKey: settings.getApiKey('anthropic'), settings, clock });
  const transcriber =
    deps.transcriber ?? createTranscriptionService({ apiKey: settings.getApiKey('openai'), settings });
  const notifier = deps.notifier ?? desktopNotifier;

  const pipeline = createCapturePipeline({
    transcriber,
    injector: deps.injector ?? new ClipboardInjector(),
    recovery,
    resolver,
    executor: new ActionExecutor(store, clock),
    settings,
  });

  const controller = new SessionController({
    bus,
    audio: deps.audio ?? audioCaptureService,
    microphone: new MicrophoneGuard(),
    pipeline,
    settings,
    clock,
    errors,
  });

  const hotkeys = new HotkeyManager({
    source: deps.keySource ?? new UiohookKeySource(),
    bus,
    settings,
    isCapturing: (kind: SessionKind) => controller.getTrack(kind).state === 'capturing',
  });

  const scheduler = new NotificationScheduler({ store, notifier, settings, clock, errors });

  let cleanupFunctions: Array<() => void> = [];
  let running = false;

  async function start(): Promise<void> {
    if (running) {
      log.warn('Already running, skipping...');
      return;
    }
    log.info('Starting...');

    // 1. Settings + language
    setLanguage(settings.get('language'));
    cleanupFunctions.push(
      settings.onChange((key) => {
        if (key === 'language') {
          setLanguage(settings.get('language'));
        } else if (key === 'dictationKey' || key === 'assistantKey') {
          hotkeys.updateBindings();
        }
      }),
    );
    errors.setNotifySink((title, message) => {
      notifier.fire(title, message).catch((error: unknown) => {
        log.warn('Could not show notification:', errorMessage(error));
      });
    });

    // 2. Store
    store.open();

    // 3. Backend checks
    if (!settings.hasApiKey('openai')) {
      errors.warnOnce('transcription-key', 'holdtalk', t('warning_transcription_key'));
    }
    const assistantUp = await resolver.ping();
    if (!assistantUp) {
      errors.warnOnce('assistant-down', 'holdtalk', t('warning_assistant_down'));
    }

    // 4. Scheduler
    scheduler.start();

    // 5. Hotkeys
    hotkeys.start();

    running = true;
    log.info('holdtalk initialization complete');
  }

  function stop(): void {
    if (!running) {
      return;
    }
    log.info('Stopping, cleaning up...');

    for (const cleanup of cleanupFunctions) {
      cleanup();
    }
    cleanupFunctions = [];
    errors.setNotifySink(null);

    hotkeys.stop();
    scheduler.stop();
    controller.destroy();
    store.close();

    running = false;
    log.info('Cleanup complete');
  }

  return {
    bus,
    settings,
    store,
    controller,
    hotkeys,
    scheduler,
    recovery,
    start,
    stop,
    onStatus: (callback) => controller.onStatus(callback),
  };
}
