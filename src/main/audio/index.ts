/**
 * Audio Module
 *
 * Microphone capture, the device lock shared by both tracks, and PCM helpers.
 */

export {
  AudioCaptureService,
  audioCaptureService,
  buildFfmpegArgs,
  type AudioSource,
  type CaptureHandle,
  type CaptureOptions,
} from './AudioCapture.js';

export { MicrophoneGuard } from './MicrophoneGuard.js';

export {
  createAudioBuffer,
  decodeFloat32Chunks,
  encodeAudioBufferWav,
  encodeFloat32Pcm16Wav,
  rms,
  samplesToDurationMs,
} from './audioUtils.js';
