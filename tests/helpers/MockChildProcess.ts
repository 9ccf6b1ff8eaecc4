import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import type { SpawnOptions } from 'node:child_process';
import { vi, type Mock } from 'vitest';
import type { ProcessKiller, SpawnedProcess } from '../../src/coordinator/types';

export interface MockBehaviour {
  /** Emit `error` instead of `spawn`. */
  spawnError?: Error;
  /** Print a progress line right after spawning. */
  readyOnSpawn?: boolean;
  ignoreSigterm?: boolean;
  ignoreSigkill?: boolean;
}

let nextPid = 1000;

export class MockChildProcess extends EventEmitter implements SpawnedProcess {
  public stdout = new PassThrough();
  public stderr = new PassThrough();
  public pid?: number;
  public readonly signals: NodeJS.Signals[] = [];
  public exited = false;

  public constructor(private readonly behaviour: MockBehaviour = {}) {
    super();
    process.nextTick(() => {
      if (behaviour.spawnError) {
        this.emit('error', behaviour.spawnError);
        return;
      }
      this.pid = nextPid++;
      this.emit('spawn');
      if (behaviour.readyOnSpawn) {
        this.ready();
      }
    });
  }

  public ready(): void {
    this.stdout.write('frame=1\nprogress=continue\n');
  }

  public kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal);
    if (signal === 'SIGTERM' && this.behaviour.ignoreSigterm) {
      return true;
    }
    if (signal === 'SIGKILL' && this.behaviour.ignoreSigkill) {
      return true;
    }
    this.crash(null, signal);
    return true;
  }

  /** Ends the fake process as if it exited by itself. */
  public crash(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) {
      return;
    }
    this.exited = true;
    setImmediate(() => this.emit('exit', code, signal));
  }
}

export interface MockFactory {
  factory: (command: string, args: string[], options: SpawnOptions) => MockChildProcess;
  spawn: Mock<[string, string[], SpawnOptions], MockChildProcess>;
  children: MockChildProcess[];
}

/**
 * Process factory handing out one `MockChildProcess` per call. `behaviours[i]` applies to the i-th spawn,
 * the last entry to every later one.
 */
export function createMockFactory(...behaviours: MockBehaviour[]): MockFactory {
  const children: MockChildProcess[] = [];
  const spawn = vi.fn((_command: string, _args: string[], _options: SpawnOptions): MockChildProcess => {
    const behaviour = behaviours[Math.min(children.length, behaviours.length - 1)] ?? {};
    const child = new MockChildProcess(behaviour);
    children.push(child);
    return child;
  });
  return { factory: spawn, spawn, children };
}

/** Signals the mock directly instead of going through tree-kill. */
export const directKiller: ProcessKiller = async (child, signal) => {
  child.kill(signal);
};
