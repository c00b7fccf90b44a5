// src/modules/transcode/events/transcode.events.ts
// Emitted via EventEmitter2 using the STREAM_EVENTS keys from stream.constant.ts.
import type { MediaKind } from '../../../common/constants/media.constant';
import type { SessionEndReason } from '../interfaces/stream-session.interface';

export interface SessionStartedEvent {
  sessionId: string;
  mediaPath: string;
  kind: MediaKind;
  durationOverrideSec: number | null;
}

export interface SessionEndedEvent {
  sessionId: string;
  mediaPath: string;
  reason: SessionEndReason;
  exitCode: number | null;
  forcedKill: boolean;
}
