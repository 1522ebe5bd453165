/**
 * ActionResolver - turns an assistant utterance into typed Actions via Claude
 *
 * Sends the transcript, a single-turn system prompt carrying the current local
 * time, and the fixed tool set. Every tool_use block in the reply is
 * validated; the batch is rejected as a whole on the first invalid call.
 *
 * Failure mapping:
 * - no API key, auth/4xx, or a transient failure that persists after one retry -> BACKEND_UNAVAILABLE
 * - no reply within the timeout -> BACKEND_TIMEOUT
 * - zero, unknown or malformed tool calls -> UNRECOGNIZED_ACTION
 */

import Anthropic from '@anthropic-ai/sdk';
import { AppError, errorMessage } from '../errors.js';
import { getLanguage, t } from '../i18n/index.js';
import { systemClock, type Clock } from '../clock.js';
import type { SettingsReader } from '../settings/index.js';
import { formatLocalDateTime, formatUtcOffset, formatWeekday } from '../../shared/time.js';
import { createLogger } from '../../utils/logger.js';
import { parseActionBatch, type Action, type ToolCall } from './actions.js';
import { ASSISTANT_TOOLS } from './tools.js';

const log = createLogger('ActionResolver');

// =============================================================================
// Types
// =============================================================================

export interface Resolver {
  resolve(text: string): Promise<Action[]>;
  ping(): Promise<boolean>;
}

export interface ActionResolverOptions {
  apiKey: string | null;
  settings: SettingsReader;
  clock?: Clock;
  baseUrl?: string;
  maxTokens?: number;
  /** Delay before the single retry */
  retryDelayMs?: number;
  pingTimeoutMs?: number;
}

const DEFAULT_MAX_TOKENS = 1024;
const DEFAULT_RETRY_DELAY_MS = 500;
const DEFAULT_PING_TIMEOUT_MS = 5_000;

const WEEKDAY_LOCALES = { en: 'en-US', it: 'it-IT' } as const;

// =============================================================================
// Helpers
// =============================================================================

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Network failures (no HTTP status), 408, 429 and 5xx are worth one more try.
 */
export function isTransientError(error: unknown): boolean {
  const status = statusOf(error);
  if (status === undefined) {
    return true;
  }
  return status === 408 || status === 429 || status >= 500;
}

export function buildSystemPrompt(now: number): string {
  const language = getLanguage();
  return t('system_prompt', {
    now: formatLocalDateTime(now),
    weekday: formatWeekday(now, WEEKDAY_LOCALES[language]),
    offset: formatUtcOffset(now),
    lang_name: t('lang_name'),
  });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// ActionResolver
// =============================================================================

export class ActionResolver implements Resolver {
  private client: Anthropic | null;
  private readonly settings: SettingsReader;
  private readonly clock: Clock;
  private readonly maxTokens: number;
  private readonly retryDelayMs: number;
  private readonly pingTimeoutMs: number;

  constructor(options: ActionResolverOptions) {
    this.settings = options.settings;
    this.clock = options.clock ?? systemClock;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.pingTimeoutMs = options.pingTimeoutMs ?? DEFAULT_PING_TIMEOUT_MS;

    if (options.apiKey) {
      const clientOptions: ConstructorParameters<typeof Anthropic>[0] = {
        apiKey: options.apiKey,
        // Retries are handled here so the once-only policy holds
        maxRetries: 0,
      };
      if (options.baseUrl) {
        clientOptions.baseURL = options.baseUrl;
      }
      this.client = new Anthropic(clientOptions);
    } else {
      this.client = null;
    }
  }

  get configured(): boolean {
    return this.client !== null;
  }

  /**
   * Resolve an utterance into an ordered, validated batch of actions.
   */
  async resolve(text: string): Promise<Action[]> {
    const client = this.requireClient();
    const now = this.clock.now();
    const timeoutMs = this.settings.get('assistantTimeoutSeconds') * 1000;

    log.info(`Resolving: "${text}"`);

    let response: Anthropic.Messages.Message;
    try {
      response = await this.withTimeout(client, text, now, timeoutMs);
    } catch (error) {
      if (error instanceof AppError || !isTransientError(error)) {
        throw this.toBackendError(error);
      }
      log.warn(`Transient failure, retrying once: ${errorMessage(error)}`);
      await sleep(this.retryDelayMs);
      try {
        response = await this.withTimeout(client, text, now, timeoutMs);
      } catch (retryError) {
        throw this.toBackendError(retryError);
      }
    }

    const calls: ToolCall[] = [];
    for (const block of response.content) {
      if (block.type === 'tool_use') {
        calls.push({ name: block.name, input: block.input });
      } else if (block.type === 'text' && block.text.trim()) {
        log.debug('Ignoring text reply:', block.text.trim());
      }
    }

    const actions = parseActionBatch(calls, {
      now,
      pastToleranceMinutes: this.settings.get('pastToleranceMinutes'),
      appointmentLeadMinutes: this.settings.get('appointmentLeadMinutes'),
    });
    log.info(`Resolved ${actions.length} action(s): ${actions.map((a) => a.type).join(', ')}`);
    return actions;
  }

  /**
   * Startup connectivity check. Never throws.
   */
  async ping(): Promise<boolean> {
    if (!this.client) {
      log.warn('ANTHROPIC_API_KEY is not set');
      return false;
    }

    let timeoutHandle: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutHandle = setTimeout(() => {
        reject(new AppError('BACKEND_TIMEOUT', `Ping timed out after ${this.pingTimeoutMs}ms`));
      }, this.pingTimeoutMs);
    });

    try {
      await Promise.race([this.client.models.list({ limit: 1 }), timeoutPromise]);
      return true;
    } catch (error) {
      log.warn('Assistant backend not reachable:', errorMessage(error));
      return false;
    } finally {
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private requireClient(): Anthropic {
    if (!this.client) {
      throw new AppError('BACKEND_UNAVAILABLE', 'ANTHROPIC_API_KEY is not set');
    }
    return this.client;
  }

  private async withTimeout(
    client: Anthropic,
    text: string,
    now: number,
    timeoutMs: number,
  ): Promise<Anthropic.Messages.Message> {
    const controller = new AbortController();
    let timeoutHandle: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutHandle = setTimeout(() => {
        controller.abort();
        reject(new AppError('BACKEND_TIMEOUT', `Assistant request timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    return Promise.race([
      client.messages.create(
        {
          model: this.settings.get('assistantModel'),
          max_tokens: this.maxTokens,
          temperature: 0,
          system: buildSystemPrompt(now),
          tools: ASSISTANT_TOOLS,
          tool_choice: { type: 'any' },
          messages: [{ role: 'user', content: text }],
        },
        { signal: controller.signal },
      ),
      timeoutPromise,
    ]).finally(() => {
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
    });
  }

  private toBackendError(error: unknown): AppError {
    if (error instanceof AppError) {
      return error;
    }
    const status = statusOf(error);
    const detail = status === undefined ? errorMessage(error) : `HTTP ${status}: ${errorMessage(error)}`;
    log.error('Assistant backend failed:', detail);
    return new AppError('BACKEND_UNAVAILABLE', detail, error);
  }
}

export function createActionResolver(options: ActionResolverOptions): ActionResolver {
  return new ActionResolver(options);
}
