// src/modules/transcode/services/transcode-supervisor.service.ts
import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
  OnModuleInit,
} from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { randomUUID } from 'crypto';
import transcodeConfig from '../../../config/transcode.config';
import {
  STREAM_EVENTS,
  TRANSCODER_ERROR_PATTERN,
} from '../../../common/constants/stream.constant';
import type { MediaAsset } from '../../../common/interfaces/media-asset.interface';
import { isTimerDuration } from '../../../common/utils/duration.util';
import { createLock } from '../../../common/utils/lock.util';
import { sleep, withTimeout } from '../../../common/utils/sleep.util';
import {
  getErrorMessage,
  isStreamError,
  ProcessTerminationTimeoutError,
  SessionStoppedError,
  TranscodeStartFailureError,
} from '../../../shared/errors';
import type {
  SessionEndedEvent,
  SessionStartedEvent,
} from '../events/transcode.events';
import { buildTranscodeInvocation } from '../ffmpeg/ffmpeg-presets';
import {
  describeExit,
  isAbnormalExit,
  PROCESS_LAUNCHER,
  ProcessExit,
  ProcessHandle,
  ProcessLauncher,
} from '../interfaces/process-handle.interface';
import type {
  SessionEnd,
  SessionEndReason,
  StreamSession,
  SupervisorSnapshot,
} from '../interfaces/stream-session.interface';
import { ActiveAssetRegistry } from './active-asset.registry';
import { SegmentDirectoryService } from './segment-directory.service';

/** Everything the supervisor tracks for the live session. */
interface LiveSession {
  session: StreamSession;
  resolveFinished: (end: SessionEnd) => void;
  handle: ProcessHandle | null;
  exited: Promise<ProcessExit> | null;
  exit: ProcessExit | null;
  /** Cuts the verification delay short (process exit or teardown) */
  wake: AbortController;
  unsubscribe: () => void;
  diagnostics: string[];
  warnings: number;
  durationTimer: NodeJS.Timeout | null;
  teardown: Promise<SessionEnd> | null;
}

/**
 * Owns the single ffmpeg process that feeds the segment directory.
 *
 * Lifecycle: IDLE → STARTING → VERIFYING → ACTIVE → STOPPING → IDLE.
 * Starts are serialized; a new start preempts the live session. Every
 * teardown path (stop, duration, natural exit, failed start) signals the
 * process, escalates to SIGKILL after the grace period, clears the segment
 * directory and releases the active asset.
 */
@Injectable()
export class TranscodeSupervisorService
  implements OnModuleInit, OnApplicationShutdown
{
  private readonly logger = new Logger(TranscodeSupervisorService.name);
  private readonly startLock = createLock();
  private live: LiveSession | null = null;

  constructor(
    @Inject(transcodeConfig.KEY)
    private readonly config: ConfigType<typeof transcodeConfig>,
    @Inject(PROCESS_LAUNCHER)
    private readonly launcher: ProcessLauncher,
    private readonly segments: SegmentDirectoryService,
    private readonly activeAssets: ActiveAssetRegistry,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async onModuleInit() {
    // Leftovers from a previous run must never be served
    await this.segments.clear();
  }

  async onApplicationShutdown() {
    await this.stop();
  }

  /**
   * Starts streaming `asset` and resolves once the output is verified.
   * Rejects with TranscodeStartFailureError when verification fails, or
   * SessionStoppedError when `stop()` interrupts the start.
   */
  start(asset: MediaAsset, durationOverrideSec?: number): Promise<StreamSession> {
    // Before any await: reclamation must already see this asset as in use
    this.activeAssets.protect(asset.path);
    return this.startLock(() => this.launch(asset, durationOverrideSec));
  }

  /** Idempotent; concurrent callers share one teardown. */
  async stop(): Promise<SessionEnd | null> {
    const live = this.live;
    if (!live) return null;
    return this.terminate(live, 'stopped');
  }

  isActive(): boolean {
    return this.live !== null;
  }

  currentMediaPath(): string | null {
    return this.live?.session.asset.path ?? null;
  }

  currentSession(): StreamSession | null {
    return this.live?.session ?? null;
  }

  snapshot(): SupervisorSnapshot {
    const session = this.live?.session;
    if (!session) {
      return {
        state: 'IDLE',
        sessionId: null,
        mediaPath: null,
        startedAt: null,
        durationOverrideSec: null,
      };
    }
    return {
      state: session.status === 'STOPPED' ? 'IDLE' : session.status,
      sessionId: session.id,
      mediaPath: session.asset.path,
      startedAt: session.startedAt.toISOString(),
      durationOverrideSec: session.durationOverrideSec ?? null,
    };
  }

  // ========================================
  // START
  // ========================================

  private async launch(
    asset: MediaAsset,
    durationOverrideSec?: number,
  ): Promise<StreamSession> {
    if (this.live) {
      this.logger.log(
        `Preempting session ${this.live.session.id} for ${asset.path}`,
      );
      await this.terminate(this.live, 'stopped');
    }
    // A preempted session of the same file released it on teardown
    this.activeAssets.protect(asset.path);

    const live = this.createLiveSession(asset, durationOverrideSec);
    this.live = live;

    try {
      await this.bringUp(live);
    } catch (error) {
      if (live.teardown) {
        await live.teardown;
        throw new SessionStoppedError();
      }

      const failure = isStreamError(error)
        ? error
        : new TranscodeStartFailureError(getErrorMessage(error), {
            sessionId: live.session.id,
          });
      this.logger.error(
        `Session ${live.session.id} failed to start: ${failure.message}`,
      );
      await this.terminate(live, 'failed');
      throw failure;
    }

    live.session.status = 'ACTIVE';
    this.logger.log(
      `Session ${live.session.id} active: ${asset.path}` +
        (durationOverrideSec ? ` (${durationOverrideSec}s)` : ''),
    );
    const started: SessionStartedEvent = {
      sessionId: live.session.id,
      mediaPath: asset.path,
      kind: asset.kind,
      durationOverrideSec: durationOverrideSec ?? null,
    };
    this.eventEmitter.emit(STREAM_EVENTS.SESSION_STARTED, started);

    if (live.exit) {
      // Input ran out before verification finished
      this.endInBackground(live, 'exit');
    } else if (durationOverrideSec && !isTimerDuration(durationOverrideSec)) {
      this.logger.warn(
        `Duration ${durationOverrideSec}s exceeds the timer limit, playing unbounded`,
      );
    } else if (durationOverrideSec) {
      live.durationTimer = setTimeout(
        () => this.endInBackground(live, 'duration'),
        durationOverrideSec * 1000,
      );
    }

    return live.session;
  }

  private createLiveSession(
    asset: MediaAsset,
    durationOverrideSec?: number,
  ): LiveSession {
    let resolveFinished: (end: SessionEnd) => void = () => undefined;
    const finished = new Promise<SessionEnd>((resolve) => {
      resolveFinished = resolve;
    });

    return {
      session: {
        id: randomUUID(),
        asset,
        startedAt: new Date(),
        durationOverrideSec,
        status: 'STARTING',
        finished,
      },
      resolveFinished,
      handle: null,
      exited: null,
      exit: null,
      wake: new AbortController(),
      unsubscribe: () => undefined,
      diagnostics: [],
      warnings: 0,
      durationTimer: null,
      teardown: null,
    };
  }

  private async bringUp(live: LiveSession): Promise<void> {
    const { session } = live;

    await this.segments.clear();
    if (live.teardown) throw new SessionStoppedError();

    const invocation = buildTranscodeInvocation(
      session.asset,
      this.segments.directory,
      this.config.hls,
    );
    const handle = this.launcher.launch(invocation);
    live.handle = handle;
    live.unsubscribe = handle.readDiagnostics((line) =>
      this.onDiagnostic(live, line),
    );
    live.exited = handle.wait().then((exit) => {
      live.exit = exit;
      this.onProcessExit(live, exit);
      return exit;
    });
    handle.start();

    session.status = 'VERIFYING';
    await sleep(this.config.verifyDelayMs, live.wake.signal);
    if (live.teardown) throw new SessionStoppedError();

    if (live.exit && isAbnormalExit(live.exit)) {
      throw new TranscodeStartFailureError(
        `Transcoder exited before verification: ${describeExit(live.exit)}`,
        { sessionId: session.id, diagnostics: [...live.diagnostics] },
      );
    }

    const verification = await this.segments.verify();
    if (live.teardown) throw new SessionStoppedError();
    if (!verification.ok) {
      throw new TranscodeStartFailureError(
        verification.reason ?? 'HLS output failed verification',
        { sessionId: session.id, diagnostics: [...live.diagnostics] },
      );
    }
  }

  // ========================================
  // MONITORING
  // ========================================

  private onDiagnostic(live: LiveSession, raw: string): void {
    const line = raw.trim();
    if (!line) return;

    live.diagnostics.push(line);
    if (live.diagnostics.length > this.config.diagnosticTailLines) {
      live.diagnostics.shift();
    }

    if (TRANSCODER_ERROR_PATTERN.test(line)) {
      live.warnings++;
      this.logger.warn(`ffmpeg: ${line}`);
    } else {
      this.logger.debug(`ffmpeg: ${line}`);
    }
  }

  private onProcessExit(live: LiveSession, exit: ProcessExit): void {
    live.wake.abort();
    if (live.teardown) return;

    if (isAbnormalExit(exit)) {
      this.logger.warn(
        `Transcoder for session ${live.session.id} exited abnormally: ${describeExit(exit)}`,
      );
    } else {
      this.logger.log(`Transcoder for session ${live.session.id} finished`);
    }

    // During start-up the start path decides what the exit means
    if (live.session.status === 'ACTIVE') {
      this.endInBackground(live, 'exit');
    }
  }

  // ========================================
  // TEARDOWN
  // ========================================

  private endInBackground(live: LiveSession, reason: SessionEndReason): void {
    this.terminate(live, reason).catch((error) =>
      this.logger.error(
        `Teardown of session ${live.session.id} failed: ${getErrorMessage(error)}`,
      ),
    );
  }

  private terminate(
    live: LiveSession,
    reason: SessionEndReason,
  ): Promise<SessionEnd> {
    if (!live.teardown) {
      live.teardown = this.runTeardown(live, reason);
    }
    return live.teardown;
  }

  private async runTeardown(
    live: LiveSession,
    reason: SessionEndReason,
  ): Promise<SessionEnd> {
    const { session } = live;
    session.status = 'STOPPING';
    live.wake.abort();
    if (live.durationTimer) {
      clearTimeout(live.durationTimer);
      live.durationTimer = null;
    }

    const forcedKill = await this.terminateProcess(live);
    live.unsubscribe();

    try {
      await this.segments.clear();
    } catch (error) {
      this.logger.error(
        `Failed to clear segment directory: ${getErrorMessage(error)}`,
      );
    }

    session.status = 'STOPPED';
    if (this.live === live) this.live = null;
    this.activeAssets.release(session.asset.path);

    const end: SessionEnd = {
      reason,
      exit: live.exit ?? undefined,
      diagnostics: [...live.diagnostics],
    };
    live.resolveFinished(end);

    this.logger.log(
      `Session ${session.id} ended (${reason})` +
        (live.warnings > 0 ? `, ${live.warnings} transcoder warnings` : ''),
    );
    const ended: SessionEndedEvent = {
      sessionId: session.id,
      mediaPath: session.asset.path,
      reason,
      exitCode: live.exit?.code ?? null,
      forcedKill,
    };
    this.eventEmitter.emit(STREAM_EVENTS.SESSION_ENDED, ended);
    return end;
  }

  /** SIGTERM, then SIGKILL after the grace period. Returns true when it had to kill. */
  private async terminateProcess(live: LiveSession): Promise<boolean> {
    const { handle, exited } = live;
    if (!handle || !exited || live.exit) return false;

    this.sendSignal(handle, 'SIGTERM');
    const graceful = await withTimeout(exited, this.config.gracePeriodMs);
    if (graceful.done) return false;

    const timeout = new ProcessTerminationTimeoutError(
      this.config.gracePeriodMs,
      { sessionId: live.session.id },
    );
    this.logger.warn(`${timeout.message}, sending SIGKILL`);
    this.sendSignal(handle, 'SIGKILL');

    const killed = await withTimeout(exited, this.config.gracePeriodMs);
    if (!killed.done) {
      this.logger.error(
        `Transcoder for session ${live.session.id} survived SIGKILL`,
      );
    }
    return true;
  }

  private sendSignal(handle: ProcessHandle, signal: NodeJS.Signals): void {
    try {
      handle.signal(signal);
    } catch (error) {
      this.logger.warn(`Failed to send ${signal}: ${getErrorMessage(error)}`);
    }
  }
}
