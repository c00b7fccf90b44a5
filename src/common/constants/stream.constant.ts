// src/common/constants/stream.constant.ts

/**
 * Domain events published on EventEmitter2.
 * Payload shapes live next to the emitting module (`*.events.ts`).
 */
export const QUEUE_EVENTS = {
  /** Fired after every item transition has been mirrored to the board */
  ITEM_STATE_CHANGED: 'queue.item.state_changed',
} as const;

export const STREAM_EVENTS = {
  /** Fired once a session passed verification */
  SESSION_STARTED: 'stream.session.started',
  /** Fired after teardown, whatever ended the session */
  SESSION_ENDED: 'stream.session.ended',
} as const;

export const STORAGE_EVENTS = {
  RECLAIMED: 'storage.reclaimed',
} as const;

// Diagnostic lines worth a warning; everything else is debug output
export const TRANSCODER_ERROR_PATTERN = /error|failed|invalid/i;
