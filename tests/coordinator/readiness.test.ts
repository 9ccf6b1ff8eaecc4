import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { describe, it, expect, afterEach } from 'vitest';
import { ManagedRun } from '../../src/coordinator/ManagedRun';
import { FFMPEG_PROGRESS_PATTERN, waitForReadiness } from '../../src/coordinator/readiness';
import { MockChildProcess } from '../helpers/MockChildProcess';

function createRun(child = new MockChildProcess()): ManagedRun {
  return new ManagedRun('run-1', { format: 'flv', target: 'out.flv' }, child);
}

function options(timeoutMs = 500, signal = new AbortController().signal): { timeoutMs: number; pollIntervalMs: number; signal: AbortSignal } {
  return { timeoutMs, pollIntervalMs: 10, signal };
}

describe('ManagedRun', () => {
  it('splits output into trimmed lines across chunks and carriage returns', async () => {
    const child = new MockChildProcess();
    const run = createRun(child);
    const seen: string[] = [];
    run.onLine((line, source) => seen.push(`${source}:${line}`));

    child.stdout.write('fra');
    child.stdout.write('me=1\r\nprogress=con');
    child.stdout.write('tinue\n\n');
    child.stderr.write('  warning  \rlast');
    child.stderr.end();

    await new Promise((resolve) => setImmediate(resolve));
    expect(seen).toEqual([
      'stdout:frame=1',
      'stdout:progress=continue',
      'stderr:warning',
      'stderr:last',
    ]);
    expect(run.recentLines(2)).toEqual([ 'warning', 'last' ]);
  });

  it('resolves waitForExit with undefined while the process lives', async () => {
    const child = new MockChildProcess();
    const run = createRun(child);

    await expect(run.waitForExit(10)).resolves.toBeUndefined();
    child.crash(3);
    await expect(run.waitForExit(100)).resolves.toEqual({ code: 3, signal: null });
    expect(run.exit).toEqual({ code: 3, signal: null });
  });

  it('rejects spawned() with the spawn error', async () => {
    const run = createRun(new MockChildProcess({ spawnError: new Error('spawn nope ENOENT') }));

    await expect(run.spawned()).rejects.toThrow('spawn nope ENOENT');
  });
});

describe('waitForReadiness', () => {
  let tmpDir: string | undefined;

  afterEach(async () => {
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
      tmpDir = undefined;
    }
  });

  it('matches only complete ffmpeg progress markers', () => {
    expect(FFMPEG_PROGRESS_PATTERN.test('progress=continue')).toBe(true);
    expect(FFMPEG_PROGRESS_PATTERN.test('progress=end')).toBe(true);
    expect(FFMPEG_PROGRESS_PATTERN.test('progress=')).toBe(false);
    expect(FFMPEG_PROGRESS_PATTERN.test('out_time=00:00:01 progress=continue')).toBe(false);
  });

  it('resolves on the first matching output line', async () => {
    const child = new MockChildProcess();
    const run = createRun(child);
    const waiting = waitForReadiness(run, { kind: 'output', pattern: FFMPEG_PROGRESS_PATTERN }, options());

    child.stdout.write('frame=1\n');
    child.ready();

    await expect(waiting).resolves.toBeUndefined();
  });

  it('resolves when the marker was printed before waiting started', async () => {
    const child = new MockChildProcess();
    const run = createRun(child);
    child.ready();
    await new Promise((resolve) => setImmediate(resolve));

    await expect(waitForReadiness(run, { kind: 'output', pattern: FFMPEG_PROGRESS_PATTERN }, options())).resolves.toBeUndefined();
  });

  it('rejects with ReadinessTimeout', async () => {
    const run = createRun();

    await expect(waitForReadiness(run, { kind: 'output', pattern: FFMPEG_PROGRESS_PATTERN }, options(20)))
      .rejects.toThrow('Process did not report readiness within 20ms');
  });

  it('rejects with UnexpectedExit when the process dies first', async () => {
    const child = new MockChildProcess();
    const run = createRun(child);
    const waiting = waitForReadiness(run, { kind: 'output', pattern: FFMPEG_PROGRESS_PATTERN }, options());

    child.crash(null, 'SIGSEGV');

    await expect(waiting).rejects.toThrow('Process exited while starting (code=null signal=SIGSEGV)');
  });

  it('rejects with StartCancelled on abort', async () => {
    const controller = new AbortController();
    const run = createRun();
    const waiting = waitForReadiness(run, { kind: 'grace', graceMs: 1_000 }, options(2_000, controller.signal));

    controller.abort();

    await expect(waiting).rejects.toThrow('Start was cancelled by a stop request');
  });

  it('resolves after the grace period while the process lives', async () => {
    const run = createRun();

    await expect(waitForReadiness(run, { kind: 'grace', graceMs: 20 }, options())).resolves.toBeUndefined();
  });

  it('resolves once the output file appears', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'readiness-test-'));
    const output = path.join(tmpDir, 'out.flv');
    const run = createRun();
    const waiting = waitForReadiness(run, { kind: 'file', path: output }, options());

    await new Promise((resolve) => setTimeout(resolve, 30));
    await fs.writeFile(output, 'FLV');

    await expect(waiting).resolves.toBeUndefined();
  });

  it('ignores a file that is older than the process', async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'readiness-test-'));
    const output = path.join(tmpDir, 'stale.flv');
    await fs.writeFile(output, 'FLV');
    const old = new Date(Date.now() - 60_000);
    await fs.utimes(output, old, old);

    await expect(waitForReadiness(createRun(), { kind: 'file', path: output }, options(50)))
      .rejects.toThrow('Process did not report readiness within 50ms');
  });
});
