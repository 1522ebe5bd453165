/**
 * Audio Utility Functions
 *
 * Conversions between the raw f32le stream ffmpeg writes, the in-memory
 * AudioBuffer handed to the pipeline, and the WAV upload the speech-to-text
 * backend expects.
 */

import type { AudioBuffer } from '../../shared/types.js';

const FLOAT32_BYTES = 4;

/**
 * Join raw little-endian Float32 chunks into one sample array.
 * A trailing partial sample (stream cut mid-frame) is dropped.
 */
export function decodeFloat32Chunks(chunks: Buffer[]): Float32Array {
  const joined = Buffer.concat(chunks);
  const sampleCount = Math.floor(joined.byteLength / FLOAT32_BYTES);
  const samples = new Float32Array(sampleCount);
  for (let i = 0; i < sampleCount; i++) {
    samples[i] = joined.readFloatLE(i * FLOAT32_BYTES);
  }
  return samples;
}

export function samplesToDurationMs(sampleCount: number, sampleRate: number, channels: number): number {
  if (sampleRate <= 0 || channels <= 0) {
    return 0;
  }
  return Math.round((sampleCount / channels / sampleRate) * 1000);
}

export function createAudioBuffer(samples: Float32Array, sampleRate: number, channels = 1): AudioBuffer {
  return {
    samples,
    sampleRate,
    channels,
    durationMs: samplesToDurationMs(samples.length, sampleRate, channels),
  };
}

/**
 * Root-mean-square level in [0, 1], for logging capture loudness.
 */
export function rms(samples: Float32Array): number {
  if (samples.length === 0) {
    return 0;
  }
  let sum = 0;
  for (const sample of samples) {
    sum += sample * sample;
  }
  return Math.sqrt(sum / samples.length);
}

/**
 * Encode Float32 PCM samples into a WAV container (PCM Int16 format).
 * Converts from Float32 [-1, 1] to Int16 [-32768, 32767].
 */
export function encodeFloat32Pcm16Wav(samples: Float32Array, sampleRate: number, channels: number): Buffer {
  const bytesPerSample = 2;
  const blockAlign = channels * bytesPerSample;
  const byteRate = sampleRate * blockAlign;
  const dataSize = samples.length * bytesPerSample;
  const buffer = Buffer.alloc(44 + dataSize);

  buffer.write('RIFF', 0, 'ascii');
  buffer.writeUInt32LE(36 + dataSize, 4);
  buffer.write('WAVE', 8, 'ascii');
  buffer.write('fmt ', 12, 'ascii');
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(1, 20);
  buffer.writeUInt16LE(channels, 22);
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(byteRate, 28);
  buffer.writeUInt16LE(blockAlign, 32);
  buffer.writeUInt16LE(16, 34);
  buffer.write('data', 36, 'ascii');
  buffer.writeUInt32LE(dataSize, 40);

  for (let i = 0; i < samples.length; i++) {
    const clamped = Math.max(-1, Math.min(1, samples[i]));
    const int16 = clamped < 0 ? Math.round(clamped * 0x8000) : Math.round(clamped * 0x7fff);
    buffer.writeInt16LE(int16, 44 + i * 2);
  }

  return buffer;
}

export function encodeAudioBufferWav(audio: AudioBuffer): Buffer {
  return encodeFloat32Pcm16Wav(audio.samples, audio.sampleRate, audio.channels);
}
