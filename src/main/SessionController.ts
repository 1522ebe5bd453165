/**
 * SessionController - Core Orchestrator for holdtalk
 *
 * Runs one finite state machine per track (dictation, assistant):
 *   idle -> capturing -> processing -> idle
 *
 * Responsibilities:
 * - Handle every BusEvent for both tracks, one at a time
 * - Open and close the microphone through the MicrophoneGuard
 * - Bound capturing by maxCaptureSeconds and processing by processingTimeoutSeconds
 * - Hand captured audio to the pipeline and drop completions of stale sessions
 * - Emit track state changes and user status lines to presentation consumers
 */

import { randomUUID } from 'crypto';
import {
  SESSION_KINDS,
  type AudioBuffer,
  type SessionKind,
  type StatusTone,
  type TrackSnapshot,
  type TrackState,
  type UserStatus,
} from '../shared/types.js';
import { AppError, toAppError } from './errors.js';
import { errorHandler as defaultErrorHandler, type ErrorHandler } from './ErrorHandler.js';
import type { BusEvent, EventBus } from './EventBus.js';
import { systemClock, type Clock } from './clock.js';
import { t } from './i18n/index.js';
import type { AudioSource, CaptureHandle } from './audio/index.js';
import type { MicrophoneGuard } from './audio/MicrophoneGuard.js';
import type { PipelineOutcome, SessionPipeline } from './pipeline/types.js';
import type { SettingsReader } from './settings/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('SessionController');

// =============================================================================
// Types - Track State Machine
// =============================================================================

/**
 * Valid state transitions.
 * Every state has a path back to 'idle'.
 */
const TRACK_TRANSITIONS: Record<TrackState, TrackState[]> = {
  idle: ['capturing'],
  capturing: ['processing', 'idle'], // release or limit, device failure
  processing: ['idle'],              // completed or timed out
};

interface Track {
  kind: SessionKind;
  state: TrackState;
  sessionId: string | null;
  startedAt: number | null;
  /** Monotonic reading at capture start, for the elapsed time */
  startedMonotonic: number | null;
  stateEnteredAt: number;
  handle: CaptureHandle | null;
  captureTimer: NodeJS.Timeout | null;
  processingTimer: NodeJS.Timeout | null;
  /** Cancels the in-flight pipeline run when processing times out */
  processingAbort: AbortController | null;
  cleanupFunctions: Array<() => void>;
}

export type SessionStatus = Record<SessionKind, TrackSnapshot>;

export interface SessionControllerDeps {
  bus: EventBus;
  audio: AudioSource;
  microphone: MicrophoneGuard;
  pipeline: SessionPipeline;
  settings: SettingsReader;
  clock?: Clock;
  errors?: ErrorHandler;
  createSessionId?: () => string;
}

// =============================================================================
// SessionController Class
// =============================================================================

export class SessionController {
  private readonly bus: EventBus;
  private readonly audio: AudioSource;
  private readonly microphone: MicrophoneGuard;
  private readonly pipeline: SessionPipeline;
  private readonly settings: SettingsReader;
  private readonly clock: Clock;
  private readonly errors: ErrorHandler;
  private readonly createSessionId: () => string;

  private tracks: Record<SessionKind, Track>;
  private stateCallbacks: Set<(snapshot: TrackSnapshot) => void> = new Set();
  private statusCallbacks: Set<(status: UserStatus) => void> = new Set();
  private unsubscribeBus: (() => void) | null;

  constructor(deps: SessionControllerDeps) {
    this.bus = deps.bus;
    this.audio = deps.audio;
    this.microphone = deps.microphone;
    this.pipeline = deps.pipeline;
    this.settings = deps.settings;
    this.clock = deps.clock ?? systemClock;
    this.errors = deps.errors ?? defaultErrorHandler;
    this.createSessionId = deps.createSessionId ?? randomUUID;

    this.tracks = {
      dictation: this.createTrack('dictation'),
      assistant: this.createTrack('assistant'),
    };
    this.unsubscribeBus = this.bus.subscribe((event) => this.handleEvent(event));
  }

  // ===========================================================================
  // Event Handling
  // ===========================================================================

  private handleEvent(event: BusEvent): void {
    switch (event.type) {
      case 'hotkey:down':
        this.startCapture(event.kind);
        break;
      case 'hotkey:up':
        this.handleRelease(event.kind);
        break;
      case 'capture:timeout':
        this.handleCaptureTimeout(event.kind, event.sessionId);
        break;
      case 'capture:failed':
        this.handleCaptureFailed(event.kind, event.sessionId, event.error);
        break;
      case 'pipeline:completed':
        this.handlePipelineCompleted(event.kind, event.sessionId, event.outcome);
        break;
      case 'processing:timeout':
        this.handleProcessingTimeout(event.kind, event.sessionId);
        break;
    }
  }

  /**
   * idle -> capturing
   */
  private startCapture(kind: SessionKind): void {
    const track = this.tracks[kind];
    if (track.state !== 'idle') {
      log.debug(`${kind}: key-down ignored in ${track.state}`);
      return;
    }

    if (!this.microphone.acquire(kind)) {
      this.reportError(
        kind,
        new AppError('DEVICE_BUSY', `Microphone is held by ${this.microphone.holder() ?? 'another track'}`),
        'startCapture',
      );
      return;
    }

    let handle: CaptureHandle;
    try {
      handle = this.audio.open({
        device: this.settings.get('audioDevice'),
        sampleRate: this.settings.get('sampleRate'),
      });
    } catch (error) {
      this.microphone.release(kind);
      this.reportError(kind, toAppError(error, 'DEVICE_UNAVAILABLE', 'Could not open input device'), 'startCapture');
      return;
    }

    const sessionId = this.createSessionId();
    track.sessionId = sessionId;
    track.startedAt = this.clock.now();
    track.startedMonotonic = this.clock.monotonic();
    track.handle = handle;
    track.cleanupFunctions.push(
      handle.onError((error) => this.bus.post({ type: 'capture:failed', kind, sessionId, error })),
    );

    const maxCaptureMs = this.settings.get('maxCaptureSeconds') * 1000;
    track.captureTimer = setTimeout(() => {
      track.captureTimer = null;
      this.bus.post({ type: 'capture:timeout', kind, sessionId });
    }, maxCaptureMs);

    this.transition(track, 'capturing');
    log.info(`${kind}: session ${sessionId} capturing`);
    this.emitStatus(kind, 'info', t('status_listening'));
  }

  /**
   * capturing -> processing, on key release
   */
  private handleRelease(kind: SessionKind): void {
    const track = this.tracks[kind];
    if (track.state !== 'capturing') {
      log.debug(`${kind}: key-up ignored in ${track.state}`);
      return;
    }
    this.finishCapture(track);
  }

  /**
   * capturing -> processing, on the capture limit
   */
  private handleCaptureTimeout(kind: SessionKind, sessionId: string): void {
    const track = this.tracks[kind];
    if (track.state !== 'capturing' || track.sessionId !== sessionId) {
      return;
    }
    log.warn(`${kind}: capture limit of ${this.settings.get('maxCaptureSeconds')}s reached`);
    this.emitStatus(kind, 'warning', t('status_max_duration'));
    this.finishCapture(track);
  }

  /**
   * capturing -> idle, the device died mid-capture
   */
  private handleCaptureFailed(kind: SessionKind, sessionId: string, error: AppError): void {
    const track = this.tracks[kind];
    if (track.state !== 'capturing' || track.sessionId !== sessionId) {
      return;
    }

    this.clearTimers(track);
    this.runCleanup(track);
    track.handle?.abort();
    track.handle = null;
    this.microphone.release(kind);

    this.toIdle(track);
    this.reportError(kind, error, 'capture');
  }

  /**
   * processing -> idle
   */
  private handlePipelineCompleted(kind: SessionKind, sessionId: string, outcome: PipelineOutcome): void {
    const track = this.tracks[kind];
    if (track.state !== 'processing' || track.sessionId !== sessionId) {
      log.info(`${kind}: late completion of session ${sessionId} ignored`);
      return;
    }

    this.clearTimers(track);
    track.processingAbort = null;
    const elapsed = track.startedMonotonic === null ? 0 : Math.round(this.clock.monotonic() - track.startedMonotonic);
    log.info(`${kind}: session ${sessionId} ${outcome.status} after ${elapsed}ms`);

    this.toIdle(track);
    this.reportOutcome(kind, outcome);
  }

  /**
   * processing -> idle, the pipeline took too long
   */
  private handleProcessingTimeout(kind: SessionKind, sessionId: string): void {
    const track = this.tracks[kind];
    if (track.state !== 'processing' || track.sessionId !== sessionId) {
      return;
    }

    const seconds = this.settings.get('processingTimeoutSeconds');
    this.clearTimers(track);
    this.abortProcessing(track);
    this.toIdle(track);
    this.reportError(kind, new AppError('BACKEND_TIMEOUT', `Processing exceeded ${seconds}s`), 'processing');
  }

  // ===========================================================================
  // Processing
  // ===========================================================================

  private finishCapture(track: Track): void {
    const { kind, sessionId, handle } = track;
    if (sessionId === null || handle === null) {
      this.toIdle(track);
      return;
    }

    this.clearTimers(track);
    this.runCleanup(track);
    track.handle = null;
    this.microphone.release(kind);

    this.transition(track, 'processing');
    const processingAbort = new AbortController();
    track.processingAbort = processingAbort;
    const processingMs = this.settings.get('processingTimeoutSeconds') * 1000;
    track.processingTimer = setTimeout(() => {
      track.processingTimer = null;
      this.bus.post({ type: 'processing:timeout', kind, sessionId });
    }, processingMs);

    this.process(kind, sessionId, handle, processingAbort.signal).catch((error: unknown) => {
      this.bus.post({
        type: 'pipeline:completed',
        kind,
        sessionId,
        outcome: { status: 'failed', error: toAppError(error, 'DEVICE_UNAVAILABLE', 'Processing failed') },
      });
    });
  }

  /**
   * Runs off the loop; reports back with exactly one completion event.
   */
  private async process(
    kind: SessionKind,
    sessionId: string,
    handle: CaptureHandle,
    signal: AbortSignal,
  ): Promise<void> {
    let audio: AudioBuffer;
    try {
      audio = await handle.stop();
    } catch (error) {
      this.bus.post({
        type: 'pipeline:completed',
        kind,
        sessionId,
        outcome: { status: 'failed', error: toAppError(error, 'DEVICE_UNAVAILABLE', 'Capture did not stop cleanly') },
      });
      return;
    }

    const outcome = await this.pipeline.run(kind, audio, signal);
    this.bus.post({ type: 'pipeline:completed', kind, sessionId, outcome });
  }

  // ===========================================================================
  // State Machine
  // ===========================================================================

  /**
   * Transition a track with validation.
   */
  private transition(track: Track, newState: TrackState): boolean {
    if (!TRACK_TRANSITIONS[track.state].includes(newState)) {
      log.error(`${track.kind}: invalid transition ${track.state} -> ${newState}`);
      return false;
    }

    const oldState = track.state;
    track.state = newState;
    track.stateEnteredAt = this.clock.now();
    log.debug(`${track.kind}: ${oldState} -> ${newState}`);

    this.emitStateChange(track);
    return true;
  }

  private toIdle(track: Track): void {
    this.transition(track, 'idle');
    track.sessionId = null;
    track.startedAt = null;
    track.startedMonotonic = null;
  }

  private abortProcessing(track: Track): void {
    track.processingAbort?.abort();
    track.processingAbort = null;
  }

  private clearTimers(track: Track): void {
    if (track.captureTimer) {
      clearTimeout(track.captureTimer);
      track.captureTimer = null;
    }
    if (track.processingTimer) {
      clearTimeout(track.processingTimer);
      track.processingTimer = null;
    }
  }

  private runCleanup(track: Track): void {
    for (const cleanup of track.cleanupFunctions) {
      cleanup();
    }
    track.cleanupFunctions = [];
  }

  private createTrack(kind: SessionKind): Track {
    return {
      kind,
      state: 'idle',
      sessionId: null,
      startedAt: null,
      startedMonotonic: null,
      stateEnteredAt: this.clock.now(),
      handle: null,
      captureTimer: null,
      processingTimer: null,
      processingAbort: null,
      cleanupFunctions: [],
    };
  }

  // ===========================================================================
  // Status Reporting
  // ===========================================================================

  private reportOutcome(kind: SessionKind, outcome: PipelineOutcome): void {
    switch (outcome.status) {
      case 'injected':
        this.emitStatus(kind, 'success', t('status_pasted'));
        break;
      case 'recovered':
        this.emitStatus(kind, 'warning', t('status_recovered', { path: outcome.recoveryPath }));
        break;
      case 'applied':
        this.emitStatus(kind, 'success', outcome.messages.join('\n'), outcome);
        break;
      case 'empty':
        this.emitStatus(kind, 'info', t(outcome.reason === 'too-short' ? 'status_too_short' : 'status_nothing_heard'));
        break;
      case 'failed':
        this.reportError(kind, outcome.error, 'pipeline');
        break;
    }
  }

  private reportError(kind: SessionKind, error: AppError, operation: string): void {
    const message = this.errors.handle(error, { component: 'SessionController', operation, data: { kind } });
    this.emitStatus(kind, error.code === 'DEVICE_BUSY' ? 'warning' : 'error', message);
  }

  private emitStatus(
    kind: SessionKind,
    tone: StatusTone,
    message: string,
    outcome?: Extract<PipelineOutcome, { status: 'applied' }>,
  ): void {
    const status: UserStatus = { kind, tone, message, timestamp: this.clock.now() };
    if (outcome?.agenda) {
      status.agenda = outcome.agenda;
    }
    for (const callback of Array.from(this.statusCallbacks)) {
      try {
        callback(status);
      } catch (error) {
        log.error('Error in status callback:', error);
      }
    }
  }

  private emitStateChange(track: Track): void {
    const snapshot = this.snapshot(track);
    for (const callback of Array.from(this.stateCallbacks)) {
      try {
        callback(snapshot);
      } catch (error) {
        log.error('Error in state change callback:', error);
      }
    }
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  getTrack(kind: SessionKind): TrackSnapshot {
    return this.snapshot(this.tracks[kind]);
  }

  getStatus(): SessionStatus {
    return {
      dictation: this.getTrack('dictation'),
      assistant: this.getTrack('assistant'),
    };
  }

  /**
   * Subscribe to track state changes
   * Returns an unsubscribe function
   */
  onStateChange(callback: (snapshot: TrackSnapshot) => void): () => void {
    this.stateCallbacks.add(callback);
    return () => {
      this.stateCallbacks.delete(callback);
    };
  }

  /**
   * Subscribe to user-facing status lines
   * Returns an unsubscribe function
   */
  onStatus(callback: (status: UserStatus) => void): () => void {
    this.statusCallbacks.add(callback);
    return () => {
      this.statusCallbacks.delete(callback);
    };
  }

  /**
   * Stop listening, abort any open capture and return both tracks to idle.
   */
  destroy(): void {
    this.unsubscribeBus?.();
    this.unsubscribeBus = null;

    for (const kind of SESSION_KINDS) {
      const track = this.tracks[kind];
      this.clearTimers(track);
      this.runCleanup(track);
      this.abortProcessing(track);
      track.handle?.abort();
      track.handle = null;
      this.microphone.release(kind);
      if (track.state !== 'idle') {
        log.warn(`${kind}: destroyed while ${track.state}`);
        this.toIdle(track);
      }
    }

    this.stateCallbacks.clear();
    this.statusCallbacks.clear();
    log.info('Destroyed');
  }

  private snapshot(track: Track): TrackSnapshot {
    return {
      kind: track.kind,
      state: track.state,
      sessionId: track.sessionId,
      startedAt: track.startedAt,
      stateEnteredAt: track.stateEnteredAt,
    };
  }
}

export function createSessionController(deps: SessionControllerDeps): SessionController {
  return new SessionController(deps);
}
