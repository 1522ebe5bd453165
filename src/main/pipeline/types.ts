/**
 * Pipeline types shared by the router, the pipeline and the controller.
 */

import type { AgendaSnapshot, AudioBuffer, SessionKind } from '../../shared/types.js';
import type { AppError } from '../errors.js';
import type { Action } from '../assistant/actions.js';

/**
 * What the speech-to-text boundary returned for one capture.
 */
export type TranscriptResult =
  | { kind: 'text'; text: string }
  | { kind: 'no-speech' }
  | { kind: 'error'; error: AppError };

/**
 * Where a finished utterance goes.
 */
export type Route =
  | { to: 'injector'; text: string }
  | { to: 'resolver'; text: string }
  | { to: 'none'; reason: 'empty' }
  | { to: 'none'; reason: 'error'; error: AppError };

/**
 * Final result of one Processing phase. Every variant returns the track to idle.
 */
export type PipelineOutcome =
  | { status: 'injected'; text: string }
  | { status: 'recovered'; text: string; recoveryPath: string; error: AppError }
  | { status: 'applied'; actions: Action[]; messages: string[]; agenda?: AgendaSnapshot }
  | { status: 'empty'; reason: 'no-speech' | 'too-short' }
  | { status: 'failed'; error: AppError };

/**
 * The Processing phase as seen by the SessionController.
 */
export interface SessionPipeline {
  /**
   * `signal` aborts when the owning track gives up on the session; no paste or
   * store write may happen after that.
   */
  run(kind: SessionKind, audio: AudioBuffer, signal: AbortSignal): Promise<PipelineOutcome>;
}
