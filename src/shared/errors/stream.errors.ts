// src/shared/errors/stream.errors.ts

export type StreamErrorCode =
  | 'NO_ATTACHMENT'
  | 'ACQUISITION_FAILED'
  | 'TRANSCODE_START_FAILED'
  | 'TRANSCODE_RUNTIME_ERROR'
  | 'PROCESS_TERMINATION_TIMEOUT'
  | 'RECLAMATION_PARTIAL_FAILURE'
  | 'SESSION_STOPPED'
  | 'UNEXPECTED';

/**
 * Base error for the streaming core.
 * `retryable` decides whether a failed queue item consumes an attempt
 * and goes back to the queue, or is failed right away.
 */
export class StreamError extends Error {
  readonly code: StreamErrorCode;
  readonly retryable: boolean;
  readonly context?: Record<string, unknown>;

  constructor(
    code: StreamErrorCode,
    message: string,
    retryable: boolean,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.retryable = retryable;
    this.context = context;
  }
}

// --- QUEUE ITEM FAILURES ---

export class NoAttachmentError extends StreamError {
  constructor(itemName: string) {
    super('NO_ATTACHMENT', `No attachment found on item: ${itemName}`, false);
  }
}

export class AcquisitionFailureError extends StreamError {
  constructor(reason: string, context?: Record<string, unknown>) {
    super('ACQUISITION_FAILED', reason, true, context);
  }
}

export class TranscodeStartFailureError extends StreamError {
  constructor(reason: string, context?: Record<string, unknown>) {
    super('TRANSCODE_START_FAILED', reason, true, context);
  }
}

export class TranscodeRuntimeError extends StreamError {
  constructor(reason: string, context?: Record<string, unknown>) {
    super('TRANSCODE_RUNTIME_ERROR', reason, true, context);
  }
}

// --- SUPERVISOR / RECLAIMER SIGNALS (never item failures) ---

export class ProcessTerminationTimeoutError extends StreamError {
  constructor(graceMs: number, context?: Record<string, unknown>) {
    super(
      'PROCESS_TERMINATION_TIMEOUT',
      `Transcoder did not exit within ${graceMs}ms of SIGTERM`,
      false,
      context,
    );
  }
}

export class ReclamationPartialFailureError extends StreamError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('RECLAMATION_PARTIAL_FAILURE', message, false, context);
  }
}

export class SessionStoppedError extends StreamError {
  constructor(message = 'Session was stopped before it became active') {
    super('SESSION_STOPPED', message, false);
  }
}

export function isStreamError(error: unknown): error is StreamError {
  return error instanceof StreamError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function toStreamError(
  error: unknown,
  fallbackMessage: string,
  context?: Record<string, unknown>,
): StreamError {
  if (isStreamError(error)) return error;
  const message = error instanceof Error ? error.message : fallbackMessage;
  return new StreamError('UNEXPECTED', message, true, context);
}
