// src/modules/transcode/interfaces/stream-session.interface.ts
import type { MediaAsset } from '../../../common/interfaces/media-asset.interface';
import type { ProcessExit } from './process-handle.interface';

export type SessionStatus =
  | 'STARTING'
  | 'VERIFYING'
  | 'ACTIVE'
  | 'STOPPING'
  | 'STOPPED';

export type SupervisorState = 'IDLE' | Exclude<SessionStatus, 'STOPPED'>;

export type SessionEndReason = 'duration' | 'exit' | 'stopped' | 'failed';

export interface SessionEnd {
  reason: SessionEndReason;
  exit?: ProcessExit;
  /** Last diagnostic lines, for failure reports */
  diagnostics: string[];
}

export interface StreamSession {
  readonly id: string;
  readonly asset: MediaAsset;
  readonly startedAt: Date;
  readonly durationOverrideSec?: number;
  status: SessionStatus;
  /** Resolves once the session is torn down, whatever ended it. */
  readonly finished: Promise<SessionEnd>;
}

export interface SupervisorSnapshot {
  state: SupervisorState;
  sessionId: string | null;
  mediaPath: string | null;
  startedAt: string | null;
  durationOverrideSec: number | null;
}
