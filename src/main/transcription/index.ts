/**
 * Transcription Module
 *
 * OpenAI speech-to-text behind the Transcriber interface.
 */

export {
  TranscriptionService,
  createTranscriptionService,
  type Transcriber,
  type TranscriptionServiceOptions,
} from './TranscriptionService.js';
