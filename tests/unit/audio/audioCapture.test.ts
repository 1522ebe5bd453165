/**
 * AudioCaptureService Tests
 *
 * ffmpeg is never started; spawn hands back a scripted child process.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { children, spawnFake, type FakeChild } from '../../helpers/fakeChild.js';

vi.mock('child_process', async () => ({ spawn: (await import('../../helpers/fakeChild.js')).spawnFake }));

import { AudioCaptureService, buildFfmpegArgs } from '../../../src/main/audio/AudioCapture.js';
import { AppError } from '../../../src/main/errors.js';

const OPTIONS = { device: 'default', sampleRate: 16000 };

function pcm(sampleCount: number, value: number): Buffer {
  const buffer = Buffer.alloc(sampleCount * 4);
  for (let i = 0; i < sampleCount; i++) {
    buffer.writeFloatLE(value, i * 4);
  }
  return buffer;
}

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function lastChild(): FakeChild {
  const child = children[children.length - 1];
  if (!child) {
    throw new Error('ffmpeg was not spawned');
  }
  return child;
}

describe('AudioCaptureService', () => {
  let service: AudioCaptureService;

  beforeEach(() => {
    children.length = 0;
    spawnFake.mockClear();
    service = new AudioCaptureService('/opt/ffmpeg');
  });

  it('spawns ffmpeg with the capture arguments', () => {
    service.open(OPTIONS);

    expect(lastChild().command).toBe('/opt/ffmpeg');
    expect(lastChild().args).toEqual(buildFfmpegArgs(OPTIONS));
  });

  it('stops with SIGINT and returns everything captured', async () => {
    const handle = service.open(OPTIONS);
    const child = lastChild();

    child.stdout.write(pcm(800, 0.25));
    child.stdout.write(pcm(800, -0.25));
    await nextTurn();

    const audio = await handle.stop();

    expect(child.kill).toHaveBeenCalledWith('SIGINT');
    expect(audio.sampleRate).toBe(16000);
    expect(audio.channels).toBe(1);
    expect(audio.durationMs).toBe(100);
    expect(audio.samples.length).toBe(1600);
    expect(audio.samples[0]).toBe(0.25);
    expect(audio.samples[1599]).toBe(-0.25);
  });

  it('reports ffmpeg exiting before any audio, with its stderr', async () => {
    const handle = service.open(OPTIONS);
    const child = lastChild();
    const errors: AppError[] = [];
    handle.onError((error) => errors.push(error));

    child.stderr.write('Unknown input format: pulse\n');
    await nextTurn();
    child.emit('close', 1, null);

    expect(errors).toHaveLength(1);
    expect(errors[0].code).toBe('DEVICE_UNAVAILABLE');
    expect(errors[0].message).toBe(
      'ffmpeg exited before producing audio (code=1, signal=null): Unknown input format: pulse',
    );
  });

  it('reports a missing ffmpeg binary once', () => {
    const handle = service.open(OPTIONS);
    const child = lastChild();
    const errors: AppError[] = [];
    handle.onError((error) => errors.push(error));

    child.emit('error', new Error('spawn /opt/ffmpeg ENOENT'));
    child.emit('close', -2, null);

    expect(errors.map((error) => error.message)).toEqual(['ffmpeg could not start: spawn /opt/ffmpeg ENOENT']);
  });

  it('reports a device lost mid-capture', async () => {
    const handle = service.open(OPTIONS);
    const child = lastChild();
    const errors: AppError[] = [];
    handle.onError((error) => errors.push(error));

    child.stdout.write(pcm(160, 0.1));
    await nextTurn();
    child.emit('close', null, 'SIGPIPE');

    expect(errors.map((error) => error.message)).toEqual(['input device stopped (code=null, signal=SIGPIPE)']);
  });

  it('aborts with SIGKILL and reports nothing', async () => {
    const handle = service.open(OPTIONS);
    const child = lastChild();
    const errors: AppError[] = [];
    handle.onError((error) => errors.push(error));

    handle.abort();
    await nextTurn();

    expect(child.kill).toHaveBeenCalledWith('SIGKILL');
    expect(errors).toEqual([]);
  });

  it('fails to open when spawn throws', () => {
    spawnFake.mockImplementationOnce(() => {
      throw new Error('EAGAIN');
    });

    expect(() => service.open(OPTIONS)).toThrow(AppError);
    spawnFake.mockImplementationOnce(() => {
      throw new Error('EAGAIN');
    });
    expect(() => service.open(OPTIONS)).toThrow('Could not open input device: EAGAIN');
  });
});
