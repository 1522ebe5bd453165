/**
 * CapturePipeline - the Processing phase of one capture session
 *
 * Pipeline stages:
 *   1. Too-short check      (captures under minCaptureMs are dropped)
 *   2. Transcription        (Transcriber)
 *   3. Dispatch             (DispatchRouter)
 *   4a. Dictation           paste, or append to the recovery file
 *   4b. Assistant           resolve actions, apply them in one transaction
 *
 * run() never rejects: every failure becomes a `failed` outcome so the
 * owning track always gets back to idle. Once the track aborts the run, the
 * paste and the store write are skipped; dictated text still reaches the
 * recovery file.
 */

import type { AudioBuffer, SessionKind } from '../../shared/types.js';
import { AppError, errorMessage, toAppError } from '../errors.js';
import type { Transcriber } from '../transcription/index.js';
import type { Injector } from '../output/ClipboardInjector.js';
import type { RecoveryLog } from '../output/RecoveryLog.js';
import type { Resolver } from '../assistant/ActionResolver.js';
import type { ActionExecutor, ExecutionResult } from '../assistant/ActionExecutor.js';
import type { Action } from '../assistant/actions.js';
import type { SettingsReader } from '../settings/index.js';
import { createLogger } from '../../utils/logger.js';
import { route } from './DispatchRouter.js';
import type { PipelineOutcome, SessionPipeline, TranscriptResult } from './types.js';

const log = createLogger('CapturePipeline');

export interface CapturePipelineDeps {
  transcriber: Transcriber;
  injector: Injector;
  recovery: Pick<RecoveryLog, 'append'>;
  resolver: Resolver;
  executor: Pick<ActionExecutor, 'apply'>;
  settings: SettingsReader;
}

export class CapturePipeline implements SessionPipeline {
  constructor(private readonly deps: CapturePipelineDeps) {}

  async run(kind: SessionKind, audio: AudioBuffer, signal: AbortSignal): Promise<PipelineOutcome> {
    const minCaptureMs = this.deps.settings.get('minCaptureMs');
    if (audio.durationMs < minCaptureMs) {
      log.info(`${kind}: capture of ${Math.round(audio.durationMs)}ms is under ${minCaptureMs}ms, skipped`);
      return { status: 'empty', reason: 'too-short' };
    }

    let transcript: TranscriptResult;
    try {
      transcript = await this.deps.transcriber.transcribe(audio);
    } catch (error) {
      return this.fail(kind, toAppError(error, 'TRANSCRIPTION_FAILED', 'Transcription failed'));
    }

    const target = route(kind, transcript);
    switch (target.to) {
      case 'none':
        if (target.reason === 'error') {
          return { status: 'failed', error: target.error };
        }
        return { status: 'empty', reason: 'no-speech' };

      case 'injector':
        return this.inject(target.text, signal);

      case 'resolver':
        return this.resolve(target.text, signal);
    }
  }

  private async inject(text: string, signal: AbortSignal): Promise<PipelineOutcome> {
    if (signal.aborted) {
      return this.recoverAfterTimeout(text);
    }

    try {
      await this.deps.injector.paste(text);
      return { status: 'injected', text };
    } catch (error) {
      const injectionError = toAppError(error, 'INJECTION_FAILED', 'Paste failed');
      log.warn('Paste failed, writing to recovery file:', injectionError.message);

      try {
        const recoveryPath = await this.deps.recovery.append(text);
        return { status: 'recovered', text, recoveryPath, error: injectionError };
      } catch (appendError) {
        log.error('Recovery file append failed; dictated text is lost:', errorMessage(appendError));
        return {
          status: 'failed',
          error: toAppError(appendError, 'PERSISTENCE_ERROR', 'Recovery file append failed'),
        };
      }
    }
  }

  /**
   * The session was already reported as timed out: keep the text, paste nothing.
   */
  private async recoverAfterTimeout(text: string): Promise<PipelineOutcome> {
    const error = processingTimedOut();
    try {
      const recoveryPath = await this.deps.recovery.append(text);
      log.warn(`dictation: ${error.message}; text written to ${recoveryPath} instead of pasted`);
    } catch (appendError) {
      log.error('Recovery file append failed; dictated text is lost:', errorMessage(appendError));
    }
    return { status: 'failed', error };
  }

  private async resolve(text: string, signal: AbortSignal): Promise<PipelineOutcome> {
    let actions: Action[];
    try {
      actions = await this.deps.resolver.resolve(text);
    } catch (error) {
      return this.fail('assistant', toAppError(error, 'BACKEND_UNAVAILABLE', 'Assistant request failed'));
    }

    if (signal.aborted) {
      log.warn(`assistant: processing timed out, ${actions.length} resolved action(s) not applied`);
      return { status: 'failed', error: processingTimedOut() };
    }

    let result: ExecutionResult;
    try {
      result = this.deps.executor.apply(actions);
    } catch (error) {
      return this.fail('assistant', toAppError(error, 'PERSISTENCE_ERROR', 'Applying actions failed'));
    }

    return {
      status: 'applied',
      actions,
      messages: result.messages,
      ...(result.agenda ? { agenda: result.agenda } : {}),
    };
  }

  private fail(kind: SessionKind, error: AppError): PipelineOutcome {
    log.error(`${kind}: pipeline failed:`, error.message);
    return { status: 'failed', error };
  }
}

function processingTimedOut(): AppError {
  return new AppError('BACKEND_TIMEOUT', 'Processing timed out');
}

export function createCapturePipeline(deps: CapturePipelineDeps): CapturePipeline {
  return new CapturePipeline(deps);
}
