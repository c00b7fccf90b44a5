// src/modules/transcode/interfaces/process-handle.interface.ts

export const PROCESS_LAUNCHER = Symbol('PROCESS_LAUNCHER');

/** How a transcoder process ended. `code` is null when it was signalled or never spawned. */
export interface ProcessExit {
  code: number | null;
  signal: string | null;
  error?: string;
}

export interface TranscodeInvocation {
  inputPath: string;
  inputOptions: string[];
  outputOptions: string[];
  outputPath: string;
}

export type DiagnosticListener = (line: string) => void;

/**
 * One external process. Created idle by a launcher; `start()` spawns it.
 */
export interface ProcessHandle {
  start(): void;
  signal(signal: NodeJS.Signals): void;
  /** Settles once, when the process is gone. Never rejects. */
  wait(): Promise<ProcessExit>;
  /** Subscribes to diagnostic (stderr) lines; returns the unsubscribe function. */
  readDiagnostics(listener: DiagnosticListener): () => void;
}

export interface ProcessLauncher {
  launch(invocation: TranscodeInvocation): ProcessHandle;
}

export const isAbnormalExit = (exit: ProcessExit): boolean =>
  exit.code !== 0;

export const describeExit = (exit: ProcessExit): string => {
  if (exit.code !== null) return `code ${exit.code}`;
  if (exit.signal) return `signal ${exit.signal}`;
  return exit.error ?? 'unknown reason';
};
