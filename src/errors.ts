export type SentinelErrorCode =
  | 'IO_ERROR'
  | 'PATH_NOT_FOUND'
  | 'DETECTOR_ERROR'
  | 'TIMEOUT'
  | 'CONFIG_ERROR';

export class SentinelError extends Error {
  readonly code: SentinelErrorCode;

  constructor(code: SentinelErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SentinelError';
    this.code = code;
  }
}

export class IOError extends SentinelError {
  readonly path: string;

  constructor(filePath: string, cause?: unknown) {
    super('IO_ERROR', `Cannot read ${filePath}: ${describeError(cause)}`, { cause });
    this.name = 'IOError';
    this.path = filePath;
  }
}

export class PathNotFoundError extends SentinelError {
  readonly path: string;

  constructor(filePath: string) {
    super('PATH_NOT_FOUND', `Scan path not found: ${filePath}`);
    this.name = 'PathNotFoundError';
    this.path = filePath;
  }
}

export class DetectorError extends SentinelError {
  readonly detector: string;

  constructor(detector: string, filePath: string, cause?: unknown) {
    super('DETECTOR_ERROR', `${detector} failed on ${filePath}: ${describeError(cause)}`, { cause });
    this.name = 'DetectorError';
    this.detector = detector;
  }
}

export class TimeoutError extends SentinelError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super('TIMEOUT', `${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigError extends SentinelError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', message, options);
    this.name = 'ConfigError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err === undefined) return 'unknown error';
  return String(err);
}

/**
 * Run an operation with a deadline. The operation receives a signal that is
 * aborted when the deadline passes so streams can release their handles.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TimeoutError(label, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
