/**
 * EventBus - the coordination loop.
 *
 * Every session-state transition runs as the handling of one BusEvent.
 * Long-latency work (microphone, transcription, LLM) runs off the loop and
 * reports back by posting a single completion event, so no two pipeline
 * stages ever mutate track state concurrently.
 */

import type { SessionKind } from '../shared/types.js';
import type { AppError } from './errors.js';
import type { PipelineOutcome } from './pipeline/types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('EventBus');

export type BusEvent =
  | { type: 'hotkey:down'; kind: SessionKind }
  | { type: 'hotkey:up'; kind: SessionKind }
  | { type: 'capture:timeout'; kind: SessionKind; sessionId: string }
  | { type: 'capture:failed'; kind: SessionKind; sessionId: string; error: AppError }
  | { type: 'pipeline:completed'; kind: SessionKind; sessionId: string; outcome: PipelineOutcome }
  | { type: 'processing:timeout'; kind: SessionKind; sessionId: string };

export type BusEventType = BusEvent['type'];

export type BusHandler = (event: BusEvent) => void;

export class EventBus {
  private queue: BusEvent[] = [];
  private handlers: Set<BusHandler> = new Set();
  private draining = false;
  private processedCount = 0;

  /**
   * Enqueue an event. If the loop is idle it drains synchronously; events
   * posted by a handler are appended and handled after the current one.
   */
  post(event: BusEvent): void {
    this.queue.push(event);
    if (!this.draining) {
      this.drain();
    }
  }

  /**
   * Subscribe to all events. Returns an unsubscribe function.
   */
  subscribe(handler: BusHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /** Events waiting behind the one currently being handled */
  pending(): number {
    return this.queue.length;
  }

  processed(): number {
    return this.processedCount;
  }

  private drain(): void {
    this.draining = true;
    try {
      let event = this.queue.shift();
      while (event) {
        this.dispatch(event);
        this.processedCount++;
        event = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private dispatch(event: BusEvent): void {
    for (const handler of Array.from(this.handlers)) {
      try {
        handler(event);
      } catch (error) {
        log.error(`Handler failed for ${event.type}:`, error);
      }
    }
  }
}
