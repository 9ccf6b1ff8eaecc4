import type { ExitInfo } from './types';

export type CoordinatorErrorCode =
  | 'AlreadyRunning'
  | 'NotRunning'
  | 'SpawnFailure'
  | 'ReadinessTimeout'
  | 'UnexpectedExit'
  | 'ShutdownTimeout'
  | 'StartCancelled'
  | 'InvalidParameters';

export class CoordinatorError extends Error {
  public readonly code: CoordinatorErrorCode;

  public constructor(code: CoordinatorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = code;
    this.code = code;
  }
}

export class AlreadyRunningError extends CoordinatorError {
  public constructor(status: string) {
    super('AlreadyRunning', `A stream process is already ${status}`);
  }
}

export class NotRunningError extends CoordinatorError {
  public constructor() {
    super('NotRunning', 'No stream process is running');
  }
}

export class SpawnFailureError extends CoordinatorError {
  public constructor(command: string, cause: unknown) {
    super('SpawnFailure', `Failed to spawn ${command}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class ReadinessTimeoutError extends CoordinatorError {
  public constructor(timeoutMs: number, lastCheckError?: string) {
    const detail = lastCheckError ? ` (last check error: ${lastCheckError})` : '';
    super('ReadinessTimeout', `Process did not report readiness within ${timeoutMs}ms${detail}`);
  }
}

export class UnexpectedExitError extends CoordinatorError {
  public readonly exit: ExitInfo;

  public constructor(exit: ExitInfo, phase: 'starting' | 'running', outputTail: string[] = []) {
    const detail = outputTail.length > 0 ? `: ${outputTail.join(' | ')}` : '';
    super(
      'UnexpectedExit',
      `Process exited while ${phase} (code=${exit.code ?? 'null'} signal=${exit.signal ?? 'null'})${detail}`,
    );
    this.exit = exit;
  }
}

export class ShutdownTimeoutError extends CoordinatorError {
  public constructor(timeoutMs: number) {
    super('ShutdownTimeout', `Process did not exit within ${timeoutMs}ms of SIGKILL`);
  }
}

export class StartCancelledError extends CoordinatorError {
  public constructor() {
    super('StartCancelled', 'Start was cancelled by a stop request');
  }
}

export class InvalidParametersError extends CoordinatorError {
  public constructor(message: string) {
    super('InvalidParameters', message);
  }
}

export function isCoordinatorError(error: unknown, code?: CoordinatorErrorCode): error is CoordinatorError {
  return error instanceof CoordinatorError && (code === undefined || error.code === code);
}
