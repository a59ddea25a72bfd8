/**
 * Error taxonomy. Nothing here is fatal to the process: IO errors skip a
 * file, detector errors isolate one detector for one scan, sink errors are
 * retried and eventually counted as lost.
 */

export enum ErrorCode {
  IO_EXCLUDED = 'IO_EXCLUDED',
  IO_OVERSIZED = 'IO_OVERSIZED',
  IO_BINARY = 'IO_BINARY',
  IO_UNREADABLE = 'IO_UNREADABLE',
  IO_TIMEOUT = 'IO_TIMEOUT',
  DETECTOR_FAILED = 'DETECTOR_FAILED',
  SINK_WRITE_FAILED = 'SINK_WRITE_FAILED',
  SINK_BUFFER_OVERFLOW = 'SINK_BUFFER_OVERFLOW',
  SINK_RETRIES_EXHAUSTED = 'SINK_RETRIES_EXHAUSTED',
  CONFIG_INVALID = 'CONFIG_INVALID',
  QUEUE_FULL = 'QUEUE_FULL',
  SHUTDOWN = 'SHUTDOWN',
}

export type IOErrorCode =
  | ErrorCode.IO_EXCLUDED
  | ErrorCode.IO_OVERSIZED
  | ErrorCode.IO_BINARY
  | ErrorCode.IO_UNREADABLE
  | ErrorCode.IO_TIMEOUT;

/** Base error class for all leakguard operations. */
export class LeakGuardError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown> | undefined;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'LeakGuardError';
    this.code = code;
    this.details = details;
  }
}

/** A file could not or should not be read. */
export class IOError extends LeakGuardError {
  constructor(code: IOErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'IOError';
  }
}

/** A single detector failed on its input. */
export class DetectorError extends LeakGuardError {
  public readonly detectorName: string;

  constructor(detectorName: string, message: string, details?: Record<string, unknown>) {
    super(ErrorCode.DETECTOR_FAILED, message, details);
    this.name = 'DetectorError';
    this.detectorName = detectorName;
  }
}

/** Audit persistence failed. */
export class SinkError extends LeakGuardError {
  constructor(
    code: ErrorCode.SINK_WRITE_FAILED | ErrorCode.SINK_BUFFER_OVERFLOW | ErrorCode.SINK_RETRIES_EXHAUSTED,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, details);
    this.name = 'SinkError';
  }
}

export class ConfigError extends LeakGuardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.CONFIG_INVALID, message, details);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
