import type { Readable } from 'node:stream';
import type { SpawnOptions } from 'node:child_process';
import type { CoordinatorErrorCode } from './errors';

export type CoordinatorStatus = 'idle' | 'starting' | 'running' | 'stopping' | 'failed';

export interface StreamParameters {
  /** ffmpeg muxer name, e.g. `rtmp`, `flv`, `mpegts`. */
  format: string;
  /** Output destination handed to ffmpeg as its last argument. */
  target: string;
  /** Input URL or path. The configured lavfi source is used when absent. */
  source?: string;
}

export interface LastError {
  code: CoordinatorErrorCode;
  message: string;
  at: string;
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
}

export interface CoordinatorSnapshot {
  status: CoordinatorStatus;
  runId?: string;
  pid?: number;
  parameters?: StreamParameters;
  startedAt?: string;
  uptimeMs?: number;
  lastError?: LastError;
  restartCount: number;
}

export interface RunHandle {
  runId: string;
  pid?: number;
  startedAt: string;
  parameters: StreamParameters;
}

export interface StopResult {
  runId?: string;
  forced: boolean;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * The part of a `ChildProcess` the coordinator relies on.
 * Tests hand in an `EventEmitter` with two `PassThrough` streams.
 */
export interface SpawnedProcess {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  removeListener(event: 'spawn', listener: () => void): unknown;
  removeListener(event: 'error', listener: (error: Error) => void): unknown;
}

export type ProcessFactory = (command: string, args: string[], options: SpawnOptions) => SpawnedProcess;

export type ProcessKiller = (child: SpawnedProcess, signal: NodeJS.Signals) => Promise<void>;

/**
 * How the coordinator decides a freshly spawned process is ready.
 */
export type ReadinessPolicy =
  | { kind: 'output'; pattern: RegExp }
  | { kind: 'file'; path: string }
  | { kind: 'grace'; graceMs: number };

export interface RestartPolicy {
  maxRestarts: number;
  delayMs: number;
  /** Minimum time between two consecutive starts of a watchdog restart. */
  minIntervalMs: number;
}

export type StatusChangeHandler = (snapshot: CoordinatorSnapshot) => void;
export type CrashHandler = (error: LastError, snapshot: CoordinatorSnapshot) => void;
