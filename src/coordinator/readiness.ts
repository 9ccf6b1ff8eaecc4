import { promises as fs } from 'node:fs';
import type { ManagedRun } from './ManagedRun';
import type { ReadinessPolicy } from './types';
import {
  ReadinessTimeoutError,
  StartCancelledError,
  UnexpectedExitError,
} from './errors';

/** Filesystems with coarse timestamps can report an mtime slightly before the spawn. */
const MTIME_TOLERANCE_MS = 1_000;

/**
 * ffmpeg started with `-progress pipe:1` prints `progress=continue` after every progress block,
 * the first of which appears once output is being produced.
 */
export const FFMPEG_PROGRESS_PATTERN = /^progress=(?:continue|end)$/u;

export interface ReadinessOptions {
  timeoutMs: number;
  pollIntervalMs: number;
  signal: AbortSignal;
}

/**
 * Waits until `run` satisfies `policy`.
 *
 * Rejects with `StartCancelled` when `signal` aborts, `UnexpectedExit` when the process dies first
 * and `ReadinessTimeout` after `timeoutMs`. File checks are retried every `pollIntervalMs` until then.
 */
export async function waitForReadiness(run: ManagedRun, policy: ReadinessPolicy, options: ReadinessOptions): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const cleanups: (() => void)[] = [];
    let settled = false;

    const finish = (error?: Error): void => {
      if (settled) {
        return;
      }
      settled = true;
      for (const cleanup of cleanups) {
        cleanup();
      }
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    };

    if (options.signal.aborted) {
      finish(new StartCancelledError());
      return;
    }
    const onAbort = (): void => finish(new StartCancelledError());
    options.signal.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => options.signal.removeEventListener('abort', onAbort));

    let lastCheckError: string | undefined;
    const timer = setTimeout(() => finish(new ReadinessTimeoutError(options.timeoutMs, lastCheckError)), options.timeoutMs);
    cleanups.push(() => clearTimeout(timer));

    if (run.exit) {
      finish(new UnexpectedExitError(run.exit, 'starting', run.recentLines(5)));
      return;
    }
    void run.exited.then((exit) => finish(new UnexpectedExitError(exit, 'starting', run.recentLines(5))));

    switch (policy.kind) {
      case 'output': {
        if (run.recentLines().some((line) => policy.pattern.test(line))) {
          finish();
          return;
        }
        cleanups.push(run.onLine((line) => {
          if (policy.pattern.test(line)) {
            finish();
          }
        }));
        break;
      }
      case 'file': {
        const check = async (): Promise<void> => {
          try {
            const stats = await fs.stat(policy.path);
            if (stats.mtimeMs + MTIME_TOLERANCE_MS >= run.spawnedAt) {
              finish();
            }
          } catch (error: unknown) {
            if (!isMissingFile(error)) {
              lastCheckError = error instanceof Error ? error.message : String(error);
            }
          }
        };
        const interval = setInterval(() => {
          void check();
        }, options.pollIntervalMs);
        cleanups.push(() => clearInterval(interval));
        void check();
        break;
      }
      case 'grace': {
        const grace = setTimeout(() => finish(), policy.graceMs);
        cleanups.push(() => clearTimeout(grace));
        break;
      }
    }
  });
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
