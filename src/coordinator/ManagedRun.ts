import type { Readable } from 'node:stream';
import type { ExitInfo, SpawnedProcess, StreamParameters } from './types';

const MAX_RUN_LINES = 50;

export type LineListener = (line: string, source: 'stdout' | 'stderr') => void;

/**
 * One spawned external process and everything observed about it.
 * The coordinator creates a new run for every start and drops it once the process is gone.
 */
export class ManagedRun {
  public readonly spawnedAt = Date.now();
  public readonly exited: Promise<ExitInfo>;

  private exitInfo?: ExitInfo;
  private readonly lines: string[] = [];
  private readonly listeners = new Set<LineListener>();

  public constructor(
    public readonly runId: string,
    public readonly parameters: StreamParameters,
    public readonly child: SpawnedProcess,
  ) {
    this.exited = new Promise<ExitInfo>((resolve) => {
      child.once('exit', (code, signal) => {
        const info: ExitInfo = { code, signal };
        this.exitInfo = info;
        resolve(info);
      });
    });
    // An 'error' without a listener is thrown; late errors (failed kill) become output.
    child.on('error', (error) => {
      this.pushLine(`process error: ${error.message}`, 'stderr');
    });
    this.pipeLines(child.stdout, 'stdout');
    this.pipeLines(child.stderr, 'stderr');
  }

  public get pid(): number | undefined {
    return this.child.pid;
  }

  public get exit(): ExitInfo | undefined {
    return this.exitInfo;
  }

  /**
   * Resolves on the `spawn` event, rejects with the OS error when the executable cannot be started.
   */
  public async spawned(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        this.child.removeListener('error', onError);
        resolve();
      };
      const onError = (error: Error): void => {
        this.child.removeListener('spawn', onSpawn);
        reject(error);
      };
      this.child.once('spawn', onSpawn);
      this.child.once('error', onError);
    });
  }

  /**
   * Resolves with the exit info, or `undefined` if the process is still alive after `timeoutMs`.
   */
  public async waitForExit(timeoutMs: number): Promise<ExitInfo | undefined> {
    if (this.exitInfo) {
      return this.exitInfo;
    }
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<undefined>((resolve) => {
      timer = setTimeout(() => resolve(undefined), timeoutMs);
    });
    try {
      return await Promise.race([ this.exited, timeout ]);
    } finally {
      clearTimeout(timer);
    }
  }

  public onLine(listener: LineListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public recentLines(limit = MAX_RUN_LINES): string[] {
    return this.lines.slice(-limit);
  }

  private pipeLines(stream: Readable | null, source: 'stdout' | 'stderr'): void {
    if (!stream) {
      return;
    }
    let partial = '';
    stream.setEncoding('utf8');
    stream.on('data', (chunk: string) => {
      const parts = (partial + chunk).split(/\r?\n|\r/u);
      partial = parts.pop() ?? '';
      for (const part of parts) {
        this.pushLine(part, source);
      }
    });
    stream.on('end', () => {
      if (partial) {
        this.pushLine(partial, source);
        partial = '';
      }
    });
  }

  private pushLine(raw: string, source: 'stdout' | 'stderr'): void {
    const line = raw.trim();
    if (!line) {
      return;
    }
    this.lines.push(line);
    if (this.lines.length > MAX_RUN_LINES) {
      this.lines.splice(0, this.lines.length - MAX_RUN_LINES);
    }
    for (const listener of this.listeners) {
      listener(line, source);
    }
  }
}
