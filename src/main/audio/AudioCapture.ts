/**
 * AudioCapture - microphone capture through an ffmpeg child process.
 *
 * ffmpeg reads the platform input (avfoundation, dshow or pulse) and streams
 * mono Float32 PCM to stdout until the session stops it. Chunks are held in
 * memory; the session's T_max bounds their total size.
 */

import { spawn, type ChildProcessByStdio } from 'child_process';
import type { Readable } from 'stream';
import type { AudioBuffer } from '../../shared/types.js';
import { AppError, errorMessage } from '../errors.js';
import { createLogger } from '../../utils/logger.js';
import { createAudioBuffer, decodeFloat32Chunks, rms } from './audioUtils.js';

const log = createLogger('AudioCapture');

const SAFE_CHILD_ENV = {
  PATH: process.env.PATH,
  HOME: process.env.HOME || process.env.USERPROFILE,
  USERPROFILE: process.env.USERPROFILE,
  LANG: process.env.LANG,
  TMPDIR: process.env.TMPDIR || process.env.TEMP,
  TEMP: process.env.TEMP,
  XDG_RUNTIME_DIR: process.env.XDG_RUNTIME_DIR,
  PULSE_SERVER: process.env.PULSE_SERVER,
};

const STOP_GRACE_MS = 2_000;
const STDERR_TAIL_BYTES = 2_048;

// ============================================================================
// Types
// ============================================================================

export interface CaptureOptions {
  /** Input device name; "default" selects the system default */
  device: string;
  sampleRate: number;
}

/**
 * One open microphone session.
 */
export interface CaptureHandle {
  /** End the capture and resolve the contiguous buffer recorded so far */
  stop(): Promise<AudioBuffer>;
  /** Discard the capture */
  abort(): void;
  /** Asynchronous device failure (ffmpeg missing, device lost). Fires at most once. */
  onError(callback: (error: AppError) => void): () => void;
}

export interface AudioSource {
  /**
   * Open the device. Throws DEVICE_UNAVAILABLE when the capture cannot start.
   */
  open(options: CaptureOptions): CaptureHandle;
}

// ============================================================================
// ffmpeg arguments
// ============================================================================

export function inputArgs(platform: NodeJS.Platform, device: string): string[] {
  switch (platform) {
    case 'darwin':
      // ":device" means audio-only (no video input)
      return ['-f', 'avfoundation', '-i', `:${device}`];
    case 'win32':
      return ['-f', 'dshow', '-i', `audio=${device}`];
    default:
      return ['-f', 'pulse', '-i', device];
  }
}

export function buildFfmpegArgs(options: CaptureOptions, platform: NodeJS.Platform = process.platform): string[] {
  return [
    '-hide_banner',
    '-loglevel', 'error',
    '-nostdin',
    ...inputArgs(platform, options.device),
    '-ac', '1',
    '-ar', String(options.sampleRate),
    '-acodec', 'pcm_f32le',
    '-f', 'f32le',
    'pipe:1',
  ];
}

// ============================================================================
// Capture handle
// ============================================================================

type FfmpegProcess = ChildProcessByStdio<null, Readable, Readable>;

class FfmpegCapture implements CaptureHandle {
  private chunks: Buffer[] = [];
  private bytes = 0;
  private stderrTail = '';
  private exited = false;
  private stopping = false;
  private failed = false;
  private errorCallbacks: Set<(error: AppError) => void> = new Set();
  private exitWaiters: Array<() => void> = [];

  constructor(
    private readonly child: FfmpegProcess,
    private readonly options: CaptureOptions,
  ) {
    child.stdout.on('data', (chunk: Buffer) => {
      this.chunks.push(chunk);
      this.bytes += chunk.byteLength;
    });
    child.stderr.on('data', (chunk: Buffer) => {
      this.stderrTail = (this.stderrTail + chunk.toString('utf8')).slice(-STDERR_TAIL_BYTES);
    });
    child.on('error', (error) => {
      this.fail(`ffmpeg could not start: ${errorMessage(error)}`);
      this.markExited();
    });
    child.on('close', (code, signal) => {
      this.markExited();
      if (!this.stopping) {
        const reason = this.bytes === 0 ? 'ffmpeg exited before producing audio' : 'input device stopped';
        this.fail(`${reason} (code=${code ?? 'null'}, signal=${signal ?? 'null'})`);
      }
    });
  }

  onError(callback: (error: AppError) => void): () => void {
    this.errorCallbacks.add(callback);
    return () => {
      this.errorCallbacks.delete(callback);
    };
  }

  async stop(): Promise<AudioBuffer> {
    this.stopping = true;
    if (!this.exited) {
      const exited = new Promise<void>((resolve) => this.exitWaiters.push(resolve));
      this.child.kill('SIGINT');
      const forceKill = setTimeout(() => {
        if (!this.exited) {
          log.warn('ffmpeg did not stop after SIGINT, killing');
          this.child.kill('SIGKILL');
        }
      }, STOP_GRACE_MS);
      await exited;
      clearTimeout(forceKill);
    }

    const samples = decodeFloat32Chunks(this.chunks);
    this.chunks = [];
    const audio = createAudioBuffer(samples, this.options.sampleRate, 1);
    log.info(`Captured ${audio.durationMs}ms (rms=${rms(samples).toFixed(4)})`);
    return audio;
  }

  abort(): void {
    this.stopping = true;
    this.chunks = [];
    if (!this.exited) {
      this.child.kill('SIGKILL');
    }
  }

  private markExited(): void {
    if (this.exited) {
      return;
    }
    this.exited = true;
    for (const resolve of this.exitWaiters.splice(0)) {
      resolve();
    }
  }

  private fail(message: string): void {
    if (this.failed || this.stopping) {
      return;
    }
    this.failed = true;
    const detail = this.stderrTail.trim() ? `${message}: ${this.stderrTail.trim()}` : message;
    const error = new AppError('DEVICE_UNAVAILABLE', detail);
    log.error(detail);
    for (const callback of this.errorCallbacks) {
      try {
        callback(error);
      } catch (callbackError) {
        log.error('Error callback failed:', callbackError);
      }
    }
  }
}

// ============================================================================
// Service
// ============================================================================

export class AudioCaptureService implements AudioSource {
  constructor(private readonly ffmpegPath: string = process.env.HOLDTALK_FFMPEG || 'ffmpeg') {}

  open(options: CaptureOptions): CaptureHandle {
    const args = buildFfmpegArgs(options);
    log.debug(`Spawning ${this.ffmpegPath} ${args.join(' ')}`);

    let child: FfmpegProcess;
    try {
      child = spawn(this.ffmpegPath, args, {
        env: SAFE_CHILD_ENV,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });
    } catch (error) {
      throw new AppError('DEVICE_UNAVAILABLE', `Could not open input device: ${errorMessage(error)}`, error);
    }

    return new FfmpegCapture(child, options);
  }
}

export const audioCaptureService = new AudioCaptureService();
