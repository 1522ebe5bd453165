/**
 * TranscriptionService
 *
 * Speech-to-text boundary: one AudioBuffer in, one TranscriptResult out.
 * Uploads the capture as a 16-bit WAV to the OpenAI transcription endpoint.
 * Never throws; failures come back as `{ kind: 'error' }`.
 */

import { z } from 'zod';
import type { AudioBuffer } from '../../shared/types.js';
import { encodeAudioBufferWav, rms } from '../audio/audioUtils.js';
import { AppError, errorMessage } from '../errors.js';
import type { SettingsReader } from '../settings/index.js';
import type { TranscriptResult } from '../pipeline/types.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('TranscriptionService');

// =============================================================================
// Configuration
// =============================================================================

const OPENAI_TRANSCRIPTIONS_URL = 'https://api.openai.com/v1/audio/transcriptions';

/** The endpoint rejects uploads shorter than this */
const MIN_UPLOAD_MS = 100;

/** Below this level the capture is treated as silence */
const SILENCE_RMS = 0.0005;

const transcriptionPayload = z.object({ text: z.string().default('') });
const openAiErrorPayload = z.object({ error: z.object({ message: z.string().optional() }).optional() });

// =============================================================================
// Types
// =============================================================================

export interface Transcriber {
  transcribe(audio: AudioBuffer): Promise<TranscriptResult>;
}

export interface TranscriptionServiceOptions {
  apiKey: string | null;
  settings: SettingsReader;
  endpoint?: string;
  fetchImpl?: typeof fetch;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Extract a user-friendly error message from an OpenAI API error response.
 */
async function extractOpenAiError(response: Response): Promise<string> {
  const raw = (await response.text()).trim();
  if (raw.length === 0) {
    return `HTTP ${response.status}`;
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(raw);
  } catch {
    return raw.length > 220 ? `${raw.slice(0, 220)}...` : raw;
  }

  const parsed = openAiErrorPayload.safeParse(parsedJson);
  const message = parsed.success ? parsed.data.error?.message?.trim() : undefined;
  if (message) {
    return message;
  }
  return raw.length > 220 ? `${raw.slice(0, 220)}...` : raw;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

// =============================================================================
// TranscriptionService
// =============================================================================

export class TranscriptionService implements Transcriber {
  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: TranscriptionServiceOptions) {
    this.endpoint = options.endpoint ?? OPENAI_TRANSCRIPTIONS_URL;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get configured(): boolean {
    return this.options.apiKey !== null;
  }

  async transcribe(audio: AudioBuffer): Promise<TranscriptResult> {
    if (audio.durationMs < MIN_UPLOAD_MS || rms(audio.samples) < SILENCE_RMS) {
      log.info(`Skipping upload: ${audio.durationMs}ms, below speech threshold`);
      return { kind: 'no-speech' };
    }

    const apiKey = this.options.apiKey;
    if (!apiKey) {
      return {
        kind: 'error',
        error: new AppError('TRANSCRIPTION_FAILED', 'OPENAI_API_KEY is not set; cannot transcribe'),
      };
    }

    const { settings } = this.options;
    const timeoutMs = settings.get('transcriptionTimeoutSeconds') * 1000;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const form = new FormData();
      form.append('model', settings.get('transcriptionModel'));
      form.append('language', settings.get('language'));
      form.append('response_format', 'json');
      form.append('temperature', '0');
      form.append(
        'file',
        new Blob([new Uint8Array(encodeAudioBufferWav(audio))], { type: 'audio/wav' }),
        'capture.wav',
      );

      const response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
        },
        body: form,
        signal: controller.signal,
      });

      if (!response.ok) {
        const detail = await extractOpenAiError(response);
        return {
          kind: 'error',
          error: new AppError('TRANSCRIPTION_FAILED', `OpenAI transcription failed (${response.status}): ${detail}`),
        };
      }

      const payload = transcriptionPayload.safeParse(await response.json());
      if (!payload.success) {
        return {
          kind: 'error',
          error: new AppError('TRANSCRIPTION_FAILED', 'OpenAI transcription returned an unexpected payload'),
        };
      }

      const text = payload.data.text.trim();
      if (!text) {
        return { kind: 'no-speech' };
      }

      log.info(`Transcribed ${audio.durationMs}ms -> ${text.length} chars`);
      return { kind: 'text', text };
    } catch (error) {
      if (isAbortError(error) || controller.signal.aborted) {
        return {
          kind: 'error',
          error: new AppError('BACKEND_TIMEOUT', `Transcription timed out after ${timeoutMs}ms`, error),
        };
      }
      return {
        kind: 'error',
        error: new AppError('TRANSCRIPTION_FAILED', `Transcription request failed: ${errorMessage(error)}`, error),
      };
    } finally {
      clearTimeout(timeout);
    }
  }
}

export function createTranscriptionService(options: TranscriptionServiceOptions): TranscriptionService {
  return new TranscriptionService(options);
}
