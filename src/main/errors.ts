/**
 * Error taxonomy for holdtalk.
 *
 * Every failure that can end a capture session is mapped onto one of these
 * codes. All of them are recovered at the pipeline boundary except
 * STORE_CORRUPTED, which stops the process.
 */

export type AppErrorCode =
  | 'DEVICE_UNAVAILABLE'
  | 'DEVICE_BUSY'
  | 'TRANSCRIPTION_FAILED'
  | 'NO_SPEECH_DETECTED'
  | 'BACKEND_UNAVAILABLE'
  | 'BACKEND_TIMEOUT'
  | 'UNRECOGNIZED_ACTION'
  | 'INJECTION_FAILED'
  | 'PERSISTENCE_ERROR'
  | 'STORE_CORRUPTED';

export class AppError extends Error {
  readonly recoverable: boolean;

  constructor(
    public readonly code: AppErrorCode,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'AppError';
    this.recoverable = code !== 'STORE_CORRUPTED';
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Coerce anything thrown into an AppError, keeping existing codes.
 */
export function toAppError(error: unknown, fallback: AppErrorCode, context?: string): AppError {
  if (error instanceof AppError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new AppError(fallback, context ? `${context}: ${detail}` : detail, error);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
