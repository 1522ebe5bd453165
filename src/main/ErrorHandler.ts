/**
 * ErrorHandler - Centralized Error Management for holdtalk
 *
 * Provides:
 * - Structured logging with component/operation context
 * - Mapping of AppError codes to user-facing status messages
 * - Rate-limited user notifications
 * - One-shot standing warnings (backend down at startup)
 * - Fatal handling for store corruption
 */

import { AppError, type AppErrorCode } from './errors.js';
import { t, type MessageKey } from './i18n/index.js';
import { createLogger, type LogLevel } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface ErrorContext {
  component: string;
  operation: string;
  data?: Record<string, unknown>;
}

export type ErrorCategory =
  | 'audio'
  | 'transcription'
  | 'network'
  | 'assistant'
  | 'injection'
  | 'storage'
  | 'unknown';

export type UserNotifySink = (title: string, message: string) => void;

export type FatalHandler = (error: AppError) => void;

// ============================================================================
// Constants
// ============================================================================

const STATUS_KEYS: Record<AppErrorCode, MessageKey> = {
  DEVICE_UNAVAILABLE: 'error_device_unavailable',
  DEVICE_BUSY: 'error_device_busy',
  TRANSCRIPTION_FAILED: 'error_transcription_failed',
  NO_SPEECH_DETECTED: 'status_nothing_heard',
  BACKEND_UNAVAILABLE: 'error_backend_unavailable',
  BACKEND_TIMEOUT: 'error_backend_timeout',
  UNRECOGNIZED_ACTION: 'error_unrecognized_action',
  INJECTION_FAILED: 'error_injection_failed',
  PERSISTENCE_ERROR: 'error_persistence',
  STORE_CORRUPTED: 'error_store_corrupted',
};

const CATEGORY_BY_CODE: Record<AppErrorCode, ErrorCategory> = {
  DEVICE_UNAVAILABLE: 'audio',
  DEVICE_BUSY: 'audio',
  TRANSCRIPTION_FAILED: 'transcription',
  NO_SPEECH_DETECTED: 'transcription',
  BACKEND_UNAVAILABLE: 'network',
  BACKEND_TIMEOUT: 'network',
  UNRECOGNIZED_ACTION: 'assistant',
  INJECTION_FAILED: 'injection',
  PERSISTENCE_ERROR: 'storage',
  STORE_CORRUPTED: 'storage',
};

// ============================================================================
// ErrorHandler Class
// ============================================================================

export class ErrorHandler {
  private notifySink: UserNotifySink | null = null;
  private fatalHandler: FatalHandler | null = null;
  private shownWarnings: Set<string> = new Set();
  private lastNotificationAt = 0;
  private readonly NOTIFICATION_RATE_LIMIT_MS = 3000; // Min 3s between notifications

  constructor(private readonly now: () => number = Date.now) {}

  setNotifySink(sink: UserNotifySink | null): void {
    this.notifySink = sink;
  }

  setFatalHandler(handler: FatalHandler | null): void {
    this.fatalHandler = handler;
  }

  // ==========================================================================
  // Logging
  // ==========================================================================

  /**
   * Log a message with context
   */
  log(
    level: LogLevel,
    message: string,
    context?: Partial<ErrorContext> & { error?: string },
  ): void {
    const component = context?.component ?? 'holdtalk';
    const operation = context?.operation ? ` (${context.operation})` : '';
    const detail = context?.error ? `: ${context.error}` : '';
    const extra = context?.data ? [context.data] : [];
    createLogger(component)[level](`${message}${operation}${detail}`, ...extra);
  }

  // ==========================================================================
  // Session Errors
  // ==========================================================================

  /**
   * Log a recoverable pipeline error and return the status line to show.
   * Store corruption is escalated to the fatal handler.
   */
  handle(error: AppError, context: ErrorContext): string {
    if (!error.recoverable) {
      this.handleCriticalError(error, context);
      return this.statusMessage(error);
    }

    const level: LogLevel = error.code === 'NO_SPEECH_DETECTED' || error.code === 'DEVICE_BUSY'
      ? 'info'
      : 'warn';
    this.log(level, `${error.code}`, {
      component: context.component,
      operation: context.operation,
      error: error.message,
      data: { category: this.categorizeError(error), ...context.data },
    });
    return this.statusMessage(error);
  }

  /**
   * User-facing text for an error code.
   */
  statusMessage(error: AppError): string {
    return t(STATUS_KEYS[error.code], { detail: error.message });
  }

  // ==========================================================================
  // Critical Errors
  // ==========================================================================

  /**
   * Unrecoverable local storage corruption: the process must not continue
   * with an inconsistent store.
   */
  handleCriticalError(error: AppError, context: ErrorContext): void {
    this.log('error', 'CRITICAL ERROR', {
      component: context.component,
      operation: context.operation,
      error: error.message,
      data: { category: this.categorizeError(error), ...context.data },
    });
    this.notifyUser(t('error_store_corrupted'), error.message, { force: true });
    this.fatalHandler?.(error);
  }

  // ==========================================================================
  // Notifications
  // ==========================================================================

  /**
   * Show a standing warning exactly once per key for the process lifetime.
   * Returns true if the warning was shown now.
   */
  warnOnce(key: string, title: string, message: string): boolean {
    if (this.shownWarnings.has(key)) {
      return false;
    }
    this.shownWarnings.add(key);
    this.log('warn', message, { component: 'ErrorHandler', operation: 'warnOnce', data: { key } });
    this.notifyUser(title, message, { force: true });
    return true;
  }

  /**
   * Show a non-blocking notification to the user
   */
  notifyUser(title: string, message: string, options: { force?: boolean } = {}): void {
    // Rate limit notifications to prevent spam
    const now = this.now();
    if (!options.force && now - this.lastNotificationAt < this.NOTIFICATION_RATE_LIMIT_MS) {
      return;
    }
    this.lastNotificationAt = now;

    if (!this.notifySink) {
      this.log('info', `${title}: ${message}`, { component: 'ErrorHandler' });
      return;
    }
    try {
      this.notifySink(title, message);
    } catch (error) {
      this.log('warn', 'Notification sink failed', {
        component: 'ErrorHandler',
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // ==========================================================================
  // Error Classification
  // ==========================================================================

  /**
   * Area an error belongs to, attached to every logged session error
   */
  categorizeError(error: AppError): ErrorCategory {
    return CATEGORY_BY_CODE[error.code];
  }
}

// ============================================================================
// Singleton Export
// ============================================================================

export const errorHandler = new ErrorHandler();
export default ErrorHandler;
