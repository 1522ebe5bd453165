/**
 * Audio utility and ffmpeg argument tests
 */

import { describe, it, expect } from 'vitest';
import {
  createAudioBuffer,
  decodeFloat32Chunks,
  encodeFloat32Pcm16Wav,
  rms,
  samplesToDurationMs,
} from '../../../src/main/audio/audioUtils.js';
import { buildFfmpegArgs, inputArgs } from '../../../src/main/audio/AudioCapture.js';

function float32Bytes(values: number[]): Buffer {
  const buffer = Buffer.alloc(values.length * 4);
  values.forEach((value, i) => buffer.writeFloatLE(value, i * 4));
  return buffer;
}

describe('decodeFloat32Chunks', () => {
  it('joins samples split across chunk boundaries', () => {
    const bytes = float32Bytes([0.5, -0.25, 1]);
    const samples = decodeFloat32Chunks([bytes.subarray(0, 6), bytes.subarray(6)]);

    expect(Array.from(samples)).toEqual([0.5, -0.25, 1]);
  });

  it('drops a trailing partial sample', () => {
    const bytes = float32Bytes([0.5, 0.75]);
    expect(Array.from(decodeFloat32Chunks([bytes.subarray(0, 7)]))).toEqual([0.5]);
  });
});

describe('durations', () => {
  it('derives milliseconds from the sample count', () => {
    expect(samplesToDurationMs(16000, 16000, 1)).toBe(1000);
    expect(samplesToDurationMs(8000, 16000, 2)).toBe(250);
    expect(samplesToDurationMs(100, 0, 1)).toBe(0);
  });

  it('builds a mono buffer', () => {
    const audio = createAudioBuffer(new Float32Array(4800), 16000);
    expect(audio).toMatchObject({ sampleRate: 16000, channels: 1, durationMs: 300 });
  });
});

describe('rms', () => {
  it('is zero for silence and empty input', () => {
    expect(rms(new Float32Array(0))).toBe(0);
    expect(rms(new Float32Array(10))).toBe(0);
  });

  it('equals the amplitude of a square wave', () => {
    expect(rms(new Float32Array([0.5, -0.5, 0.5, -0.5]))).toBe(0.5);
  });
});

describe('encodeFloat32Pcm16Wav', () => {
  it('writes a PCM header and clamped 16-bit samples', () => {
    const wav = encodeFloat32Pcm16Wav(new Float32Array([0, 1, -1, 2]), 16000, 1);

    expect(wav.byteLength).toBe(44 + 8);
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.readUInt32LE(4)).toBe(36 + 8);
    expect(wav.toString('ascii', 8, 12)).toBe('WAVE');
    expect(wav.readUInt16LE(20)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(16000);
    expect(wav.readUInt32LE(28)).toBe(32000);
    expect(wav.readUInt32LE(40)).toBe(8);
    expect([0, 1, 2, 3].map((i) => wav.readInt16LE(44 + i * 2))).toEqual([0, 32767, -32768, 32767]);
  });
});

describe('buildFfmpegArgs', () => {
  it('selects the capture backend per platform', () => {
    expect(inputArgs('darwin', 'default')).toEqual(['-f', 'avfoundation', '-i', ':default']);
    expect(inputArgs('win32', 'Microphone')).toEqual(['-f', 'dshow', '-i', 'audio=Microphone']);
    expect(inputArgs('linux', 'default')).toEqual(['-f', 'pulse', '-i', 'default']);
  });

  it('asks for mono float PCM on stdout', () => {
    expect(buildFfmpegArgs({ device: 'default', sampleRate: 16000 }, 'linux')).toEqual([
      '-hide_banner',
      '-loglevel', 'error',
      '-nostdin',
      '-f', 'pulse',
      '-i', 'default',
      '-ac', '1',
      '-ar', '16000',
      '-acodec', 'pcm_f32le',
      '-f', 'f32le',
      'pipe:1',
    ]);
  });
});
