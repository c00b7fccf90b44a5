// src/modules/transcode/ffmpeg/ffmpeg-process.handle.ts
import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import ffmpeg, { FfmpegCommand } from 'fluent-ffmpeg';
import transcodeConfig from '../../../config/transcode.config';
import {
  DiagnosticListener,
  ProcessExit,
  ProcessHandle,
  ProcessLauncher,
  TranscodeInvocation,
} from '../interfaces/process-handle.interface';

const EXIT_CODE_PATTERN = /exited with code (\d+)/;
const EXIT_SIGNAL_PATTERN = /killed with signal (\w+)/;

/** fluent-ffmpeg reports a non-zero exit as an error message; recover code and signal from it. */
export function parseFfmpegExit(error: Error): ProcessExit {
  const code = EXIT_CODE_PATTERN.exec(error.message);
  if (code) {
    return { code: parseInt(code[1], 10), signal: null, error: error.message };
  }

  const signal = EXIT_SIGNAL_PATTERN.exec(error.message);
  if (signal) {
    return { code: null, signal: signal[1], error: error.message };
  }

  // Spawn failure: the process never ran
  return { code: null, signal: null, error: error.message };
}

export class FfmpegProcessHandle implements ProcessHandle {
  private readonly command: FfmpegCommand;
  private readonly listeners = new Set<DiagnosticListener>();
  private readonly exit: Promise<ProcessExit>;
  private settled = false;
  private started = false;

  constructor(invocation: TranscodeInvocation) {
    this.command = ffmpeg(invocation.inputPath);
    if (invocation.inputOptions.length > 0) {
      // Spread so fluent-ffmpeg keeps every token as one argument
      this.command.inputOptions(...invocation.inputOptions);
    }
    this.command.output(invocation.outputPath);
    this.command.outputOptions(...invocation.outputOptions);

    this.exit = new Promise<ProcessExit>((resolve) => {
      const settle = (exit: ProcessExit) => {
        if (this.settled) return;
        this.settled = true;
        this.listeners.clear();
        resolve(exit);
      };

      this.command
        .on('stderr', (line: string) => {
          for (const listener of this.listeners) listener(line);
        })
        .on('end', () => settle({ code: 0, signal: null }))
        .on('error', (err: Error) => settle(parseFfmpegExit(err)));
    });
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.command.run();
  }

  signal(signal: NodeJS.Signals): void {
    if (!this.started || this.settled) return;
    this.command.kill(signal);
  }

  wait(): Promise<ProcessExit> {
    return this.exit;
  }

  readDiagnostics(listener: DiagnosticListener): () => void {
    if (this.settled) return () => undefined;
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

@Injectable()
export class FfmpegProcessLauncher implements ProcessLauncher, OnModuleInit {
  private readonly logger = new Logger(FfmpegProcessLauncher.name);

  constructor(
    @Inject(transcodeConfig.KEY)
    private readonly config: ConfigType<typeof transcodeConfig>,
  ) {}

  onModuleInit() {
    if (this.config.ffmpegPath) {
      ffmpeg.setFfmpegPath(this.config.ffmpegPath);
      this.logger.log(`FFmpeg configured: ${this.config.ffmpegPath}`);
    }
    if (this.config.ffprobePath) {
      ffmpeg.setFfprobePath(this.config.ffprobePath);
      this.logger.log(`FFprobe configured: ${this.config.ffprobePath}`);
    }
  }

  launch(invocation: TranscodeInvocation): ProcessHandle {
    this.logger.debug(
      `ffmpeg ${invocation.inputOptions.join(' ')} -i ${invocation.inputPath} ${invocation.outputOptions.join(' ')} ${invocation.outputPath}`,
    );
    return new FfmpegProcessHandle(invocation);
  }

  /** Resolves true when ffmpeg answers a format query. */
  isAvailable(): Promise<boolean> {
    return new Promise((resolve) => {
      ffmpeg.getAvailableFormats((err) => {
        if (err) {
          this.logger.warn(`FFmpeg unavailable: ${err.message}`);
          resolve(false);
          return;
        }
        resolve(true);
      });
    });
  }
}
