import { randomUUID } from 'node:crypto';
import { spawn } from 'node:child_process';
import kill from 'tree-kill';
import { getLoggerFor } from 'global-logger-factory';
import { TransitionLock } from '../util/TransitionLock';
import { ManagedRun } from './ManagedRun';
import { waitForReadiness } from './readiness';
import {
  AlreadyRunningError,
  CoordinatorError,
  NotRunningError,
  ShutdownTimeoutError,
  SpawnFailureError,
  StartCancelledError,
  UnexpectedExitError,
  isCoordinatorError,
} from './errors';
import type {
  CoordinatorSnapshot,
  CoordinatorStatus,
  CrashHandler,
  ExitInfo,
  LastError,
  ProcessFactory,
  ProcessKiller,
  ReadinessPolicy,
  RestartPolicy,
  RunHandle,
  SpawnedProcess,
  StatusChangeHandler,
  StopResult,
  StreamParameters,
} from './types';

const MAX_OUTPUT_LINES = 200;

export const DEFAULT_READINESS_TIMEOUT_MS = 15_000;
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5_000;
export const DEFAULT_FORCE_KILL_TIMEOUT_MS = 2_000;
export const DEFAULT_POLL_INTERVAL_MS = 250;

export interface ProcessCoordinatorOptions {
  command: string;
  /** Turns caller parameters into an argument list; throws `InvalidParameters` on bad input. */
  buildArgs: (parameters: StreamParameters) => string[];
  readiness: ReadinessPolicy;
  readinessTimeoutMs?: number;
  shutdownTimeoutMs?: number;
  forceKillTimeoutMs?: number;
  pollIntervalMs?: number;
  restart?: RestartPolicy;
  env?: Record<string, string>;
  cwd?: string;
  processFactory?: ProcessFactory;
  killer?: ProcessKiller;
}

interface ProcessState {
  status: CoordinatorStatus;
  runId?: string;
  pid?: number;
  parameters?: StreamParameters;
  startedAt?: string;
  lastError?: LastError;
  restartCount: number;
}

/**
 * Kills the process and its descendants, so a shell wrapper around ffmpeg does not leak the encoder.
 */
export const treeKiller: ProcessKiller = async (child: SpawnedProcess, signal: NodeJS.Signals): Promise<void> => {
  const pid = child.pid;
  if (pid === undefined) {
    child.kill(signal);
    return;
  }
  await new Promise<void>((resolve, reject) => {
    kill(pid, signal, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
};

/**
 * Sole owner of the external media process.
 *
 * `start` and `stop` are serialised through a {@link TransitionLock}; `status` reads a copy of the
 * state and never waits. Only one process is alive at a time per coordinator, and the service creates
 * exactly one coordinator.
 */
export class ProcessCoordinator {
  private readonly logger = getLoggerFor(this);
  private readonly lock = new TransitionLock();
  private readonly command: string;
  private readonly buildArgs: (parameters: StreamParameters) => string[];
  private readonly readiness: ReadinessPolicy;
  private readonly readinessTimeoutMs: number;
  private readonly shutdownTimeoutMs: number;
  private readonly forceKillTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly restartPolicy?: RestartPolicy;
  private readonly env?: Record<string, string>;
  private readonly cwd?: string;
  private readonly processFactory: ProcessFactory;
  private readonly killer: ProcessKiller;

  private state: ProcessState = { status: 'idle', restartCount: 0 };
  private run?: ManagedRun;
  private lastStartAt = 0;
  private restartTimer?: NodeJS.Timeout;
  private readonly outputLog: string[] = [];
  private readonly crashHandlers = new Set<CrashHandler>();
  /** One controller per start that is queued on, or holding, the lock. */
  private readonly pendingStarts = new Set<AbortController>();
  private onStatusChange?: StatusChangeHandler;

  public constructor(options: ProcessCoordinatorOptions) {
    this.command = options.command;
    this.buildArgs = options.buildArgs;
    this.readiness = options.readiness;
    this.readinessTimeoutMs = options.readinessTimeoutMs ?? DEFAULT_READINESS_TIMEOUT_MS;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
    this.forceKillTimeoutMs = options.forceKillTimeoutMs ?? DEFAULT_FORCE_KILL_TIMEOUT_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.restartPolicy = options.restart;
    this.env = options.env;
    this.cwd = options.cwd;
    this.processFactory = options.processFactory ?? ((command, args, spawnOptions) => spawn(command, args, spawnOptions));
    this.killer = options.killer ?? treeKiller;
  }

  public setStatusChangeHandler(handler: StatusChangeHandler): void {
    this.onStatusChange = handler;
  }

  /**
   * Registers a callback for exits observed while running. Returns an unsubscribe function.
   */
  public onCrash(handler: CrashHandler): () => void {
    this.crashHandlers.add(handler);
    return () => {
      this.crashHandlers.delete(handler);
    };
  }

  public async start(parameters: StreamParameters): Promise<RunHandle> {
    this.assertCanStart();
    const args = this.buildArgs(parameters);

    const abort = new AbortController();
    this.pendingStarts.add(abort);
    const release = await this.lock.acquire();
    try {
      if (abort.signal.aborted) {
        throw new StartCancelledError();
      }
      this.assertCanStart();
      this.clearRestartTimer();
      this.updateState({ restartCount: 0 });
      return await this.launch(parameters, args, abort.signal);
    } finally {
      this.pendingStarts.delete(abort);
      release();
    }
  }

  public async stop(): Promise<StopResult> {
    // Queued starts and a start waiting for readiness give up the lock once aborted.
    const cancelled = this.pendingStarts.size;
    if (this.state.status === 'idle' && cancelled === 0) {
      throw new NotRunningError();
    }
    for (const abort of this.pendingStarts) {
      abort.abort();
    }
    this.clearRestartTimer();

    const release = await this.lock.acquire();
    try {
      if (this.state.status === 'idle') {
        if (cancelled > 0) {
          return { forced: false, exitCode: null, signal: null };
        }
        throw new NotRunningError();
      }

      const run = this.run;
      if (!run) {
        // Failed earlier and nothing is left to terminate; lastError stays visible.
        const runId = this.state.runId;
        this.updateState({ status: 'idle', pid: undefined, startedAt: undefined });
        return { runId, forced: false, exitCode: null, signal: null };
      }

      this.logger.info(`Stopping run ${run.runId} (pid ${run.pid ?? 'unknown'})`);
      this.updateState({ status: 'stopping' });
      try {
        const result = await this.terminate(run);
        this.run = undefined;
        this.updateState({ status: 'idle', pid: undefined, startedAt: undefined });
        this.logger.info(`Run ${run.runId} stopped${result.forced ? ' (forced)' : ''}`);
        return { runId: run.runId, ...result };
      } catch (error: unknown) {
        this.run = undefined;
        throw this.fail(this.asCoordinatorError(error));
      }
    } finally {
      release();
    }
  }

  public status(): CoordinatorSnapshot {
    const snapshot: CoordinatorSnapshot = {
      ...this.state,
      parameters: this.state.parameters ? { ...this.state.parameters } : undefined,
      lastError: this.state.lastError ? { ...this.state.lastError } : undefined,
    };
    if (snapshot.status === 'running' && snapshot.startedAt) {
      snapshot.uptimeMs = Date.now() - Date.parse(snapshot.startedAt);
    }
    return snapshot;
  }

  /**
   * Most recent stdout/stderr lines across runs, oldest first.
   */
  public output(limit?: number): string[] {
    if (typeof limit === 'number' && Number.isFinite(limit) && limit > 0) {
      return this.outputLog.slice(-limit);
    }
    return [ ...this.outputLog ];
  }

  /**
   * Cancels a pending restart and stops whatever is alive. Used on service shutdown.
   */
  public async shutdown(): Promise<void> {
    this.clearRestartTimer();
    try {
      await this.stop();
    } catch (error: unknown) {
      if (!isCoordinatorError(error, 'NotRunning')) {
        throw error;
      }
    }
  }

  private assertCanStart(): void {
    const { status } = this.state;
    if (status === 'running' || status === 'starting') {
      throw new AlreadyRunningError(status);
    }
  }

  /**
   * Spawns and waits for readiness. Must be called with the lock held.
   */
  private async launch(parameters: StreamParameters, args: string[], signal: AbortSignal): Promise<RunHandle> {
    const runId = randomUUID();
    this.lastStartAt = Date.now();
    this.updateState({ status: 'starting', runId, parameters, pid: undefined, startedAt: undefined });
    this.logger.info(`Starting run ${runId}: ${this.command} ${args.join(' ')}`);

    let child: SpawnedProcess;
    try {
      child = this.processFactory(this.command, args, {
        stdio: [ 'ignore', 'pipe', 'pipe' ],
        env: { ...process.env, ...this.env },
        cwd: this.cwd ?? process.cwd(),
      });
    } catch (error: unknown) {
      throw this.fail(new SpawnFailureError(this.command, error));
    }

    const run = new ManagedRun(runId, parameters, child);
    run.onLine((line, source) => this.record(`[${source}] ${line}`));
    this.run = run;

    try {
      await run.spawned();
    } catch (error: unknown) {
      this.run = undefined;
      throw this.fail(new SpawnFailureError(this.command, error));
    }
    this.updateState({ pid: run.pid });
    void run.exited.then((exit) => this.handleExit(run, exit));

    try {
      await waitForReadiness(run, this.readiness, {
        timeoutMs: this.readinessTimeoutMs,
        pollIntervalMs: this.pollIntervalMs,
        signal,
      });
    } catch (error: unknown) {
      if (isCoordinatorError(error, 'StartCancelled')) {
        // The pending stop owns the teardown.
        this.logger.info(`Run ${runId} cancelled before readiness`);
        throw error;
      }
      await this.discard(run);
      throw this.fail(this.asCoordinatorError(error));
    }

    const startedAt = new Date().toISOString();
    this.updateState({ status: 'running', startedAt, lastError: undefined });
    this.logger.info(`Run ${runId} is running (pid ${run.pid ?? 'unknown'})`);
    return { runId, pid: run.pid, startedAt, parameters };
  }

  /**
   * SIGTERM, bounded wait, SIGKILL, bounded wait.
   */
  private async terminate(run: ManagedRun): Promise<Omit<StopResult, 'runId'>> {
    if (run.exit) {
      return { forced: false, exitCode: run.exit.code, signal: run.exit.signal };
    }

    await this.signal(run, 'SIGTERM');
    const graceful = await run.waitForExit(this.shutdownTimeoutMs);
    if (graceful) {
      return { forced: false, exitCode: graceful.code, signal: graceful.signal };
    }

    this.logger.warn(`Run ${run.runId} ignored SIGTERM for ${this.shutdownTimeoutMs}ms, sending SIGKILL`);
    await this.signal(run, 'SIGKILL');
    const forced = await run.waitForExit(this.forceKillTimeoutMs);
    if (forced) {
      return { forced: true, exitCode: forced.code, signal: forced.signal };
    }
    throw new ShutdownTimeoutError(this.forceKillTimeoutMs);
  }

  private async signal(run: ManagedRun, signal: NodeJS.Signals): Promise<void> {
    try {
      await this.killer(run.child, signal);
    } catch (error: unknown) {
      // The process may have exited between the check and the signal; the exit wait decides.
      this.logger.warn(`Failed to send ${signal} to run ${run.runId}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Tears down a run whose start failed. The start error is what the caller sees.
   */
  private async discard(run: ManagedRun): Promise<void> {
    try {
      await this.terminate(run);
    } catch (error: unknown) {
      this.logger.error(`Could not terminate failed run ${run.runId}: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
      if (this.run === run) {
        this.run = undefined;
      }
    }
  }

  private handleExit(run: ManagedRun, exit: ExitInfo): void {
    this.logger.info(`Run ${run.runId} exited with code ${exit.code ?? 'null'} signal ${exit.signal ?? 'null'}`);
    if (this.run !== run || this.state.status !== 'running') {
      // Exits during starting/stopping are handled by the transition in flight.
      return;
    }

    this.run = undefined;
    const error = new UnexpectedExitError(exit, 'running', run.recentLines(5));
    this.fail(error);
    this.logger.error(`Run ${run.runId} crashed: ${error.message}`);

    const lastError = this.state.lastError;
    if (lastError) {
      const snapshot = this.status();
      for (const handler of this.crashHandlers) {
        try {
          handler(lastError, snapshot);
        } catch (handlerError: unknown) {
          this.logger.error(`Crash handler failed: ${handlerError instanceof Error ? handlerError.message : String(handlerError)}`);
        }
      }
    }
    this.scheduleRestart(run.parameters);
  }

  private scheduleRestart(parameters: StreamParameters): void {
    const policy = this.restartPolicy;
    if (!policy) {
      return;
    }
    if (this.state.restartCount >= policy.maxRestarts) {
      this.logger.error(`Exceeded max restarts (${policy.maxRestarts}), giving up`);
      return;
    }

    const sinceLastStart = Date.now() - this.lastStartAt;
    const delay = Math.max(policy.delayMs, policy.minIntervalMs - sinceLastStart);
    this.logger.warn(`Restarting in ${delay}ms (attempt ${this.state.restartCount + 1}/${policy.maxRestarts})`);
    this.clearRestartTimer();
    this.restartTimer = setTimeout(() => {
      this.restartTimer = undefined;
      this.restart(parameters).catch((error: unknown) => {
        this.logger.error(`Restart failed: ${error instanceof Error ? error.message : String(error)}`);
      });
    }, delay);
    this.restartTimer.unref();
  }

  private async restart(parameters: StreamParameters): Promise<void> {
    const abort = new AbortController();
    this.pendingStarts.add(abort);
    const release = await this.lock.acquire();
    try {
      if (abort.signal.aborted || this.state.status !== 'failed') {
        // Started or stopped by a caller in the meantime.
        return;
      }
      this.updateState({ restartCount: this.state.restartCount + 1 });
      try {
        await this.launch(parameters, this.buildArgs(parameters), abort.signal);
      } catch (error: unknown) {
        if (this.state.status === 'failed') {
          this.scheduleRestart(parameters);
        }
        throw error;
      }
    } finally {
      this.pendingStarts.delete(abort);
      release();
    }
  }

  private clearRestartTimer(): void {
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = undefined;
    }
  }

  private fail(error: CoordinatorError): CoordinatorError {
    const exit = error instanceof UnexpectedExitError ? error.exit : undefined;
    this.updateState({
      status: 'failed',
      pid: undefined,
      startedAt: undefined,
      lastError: {
        code: error.code,
        message: error.message,
        at: new Date().toISOString(),
        exitCode: exit?.code,
        signal: exit?.signal,
      },
    });
    return error;
  }

  private asCoordinatorError(error: unknown): CoordinatorError {
    return error instanceof CoordinatorError ? error : new SpawnFailureError(this.command, error);
  }

  private record(line: string): void {
    this.outputLog.push(line);
    if (this.outputLog.length > MAX_OUTPUT_LINES) {
      this.outputLog.splice(0, this.outputLog.length - MAX_OUTPUT_LINES);
    }
    this.logger.debug(line);
  }

  private updateState(update: Partial<ProcessState>): void {
    const previous = this.state.status;
    this.state = { ...this.state, ...update };
    if (update.status && update.status !== previous) {
      this.logger.debug(`Status ${previous} -> ${update.status}`);
    }
    try {
      this.onStatusChange?.(this.status());
    } catch (error: unknown) {
      this.logger.error(`Status change handler failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
