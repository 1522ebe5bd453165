/**
 * DispatchRouter - decides where a finished utterance goes.
 *
 * Pure: the same kind and transcript always give the same route. A
 * no-speech or blank transcript goes nowhere and never reaches the
 * injector or the resolver.
 */

import type { SessionKind } from '../../shared/types.js';
import type { Route, TranscriptResult } from './types.js';

export function route(kind: SessionKind, transcript: TranscriptResult): Route {
  if (transcript.kind === 'error') {
    return { to: 'none', reason: 'error', error: transcript.error };
  }
  if (transcript.kind === 'no-speech') {
    return { to: 'none', reason: 'empty' };
  }

  const text = transcript.text.trim();
  if (!text) {
    return { to: 'none', reason: 'empty' };
  }

  return kind === 'dictation' ? { to: 'injector', text } : { to: 'resolver', text };
}
