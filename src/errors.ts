import type {
  BookOutcome,
  PipelineErrorCode,
  PipelineStage,
  SessionErrorCode,
} from './types';

const SESSION_CODES: ReadonlySet<PipelineErrorCode> = new Set<SessionErrorCode>([
  'ADB_UNAVAILABLE',
  'NO_DEVICE_FOUND',
  'MULTIPLE_DEVICES_AMBIGUOUS',
  'DEVICE_NOT_FOUND',
  'SCREEN_LOCKED',
  'DEVICE_LOST',
  'COLLECTION_NOT_FOUND',
  'APP_NOT_RESPONDING',
]);

export function isSessionFatal(code: PipelineErrorCode): code is SessionErrorCode {
  return SESSION_CODES.has(code);
}

/**
 * Typed failure raised by any pipeline stage
 */
export class PipelineError extends Error {
  constructor(
    public readonly code: PipelineErrorCode,
    public readonly stage: PipelineStage,
    message: string,
    public readonly bookTitle?: string
  ) {
    super(message);
    this.name = 'PipelineError';
  }

  get sessionFatal(): boolean {
    return isSessionFatal(this.code);
  }
}

/**
 * Aborts a run. Carries whatever per-book outcomes were recorded before the failure.
 */
export class SessionFatalError extends Error {
  constructor(
    public readonly failure: PipelineError,
    public readonly completed: BookOutcome[] = []
  ) {
    super(failure.message);
    this.name = 'SessionFatalError';
  }

  get code(): PipelineErrorCode {
    return this.failure.code;
  }
}

/**
 * adb exited non-zero or could not be spawned
 */
export class AdbCommandError extends Error {
  constructor(
    public readonly command: string,
    public readonly stderr: string,
    public readonly exitCode: number | null
  ) {
    super(`adb command failed (${exitCode ?? 'spawn error'}): ${command}${stderr ? ` - ${stderr.trim()}` : ''}`);
    this.name = 'AdbCommandError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Node system error with the given `code` (ENOENT, EEXIST, ...) */
export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
