import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ApiServer } from '../../../src/api/ApiServer';
import { registerStreamRoutes, type StreamController } from '../../../src/api/handlers/StreamHandler';
import { ProcessCoordinator } from '../../../src/coordinator/ProcessCoordinator';
import { FFMPEG_PROGRESS_PATTERN } from '../../../src/coordinator/readiness';
import { ShutdownTimeoutError, SpawnFailureError } from '../../../src/coordinator/errors';
import { buildFfmpegArgs } from '../../../src/ffmpeg/FfmpegArguments';
import { createMockFactory, directKiller, type MockFactory } from '../../helpers/MockChildProcess';

async function listen(coordinator: StreamController): Promise<{ server: ApiServer; baseUrl: string }> {
  const server = new ApiServer({ port: 0, host: '127.0.0.1' });
  registerStreamRoutes(server, { coordinator });
  await server.start();
  return { server, baseUrl: `http://127.0.0.1:${server.address()?.port}` };
}

async function post(url: string, body?: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

describe('Stream control routes', () => {
  let mock: MockFactory;
  let coordinator: ProcessCoordinator;
  let server: ApiServer;
  let baseUrl: string;

  beforeEach(async () => {
    mock = createMockFactory({ readyOnSpawn: true });
    coordinator = new ProcessCoordinator({
      command: 'ffmpeg',
      buildArgs: (parameters) => buildFfmpegArgs(parameters),
      readiness: { kind: 'output', pattern: FFMPEG_PROGRESS_PATTERN },
      readinessTimeoutMs: 1_000,
      shutdownTimeoutMs: 200,
      processFactory: mock.factory,
      killer: directKiller,
    });
    ({ server, baseUrl } = await listen(coordinator));
  });

  afterEach(async () => {
    await coordinator.shutdown();
    await server.stop();
  });

  it('answers health checks', async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('application/json');
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  it('echoes or generates X-Request-ID', async () => {
    const echoed = await fetch(`${baseUrl}/health`, { headers: { 'X-Request-ID': 'req-42' } });
    const generated = await fetch(`${baseUrl}/health`);

    expect(echoed.headers.get('x-request-id')).toBe('req-42');
    expect(generated.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/u);
  });

  it('starts, reports and stops a stream', async () => {
    const started = await post(`${baseUrl}/stream/start`, { format: 'rtmp', target: 'x' });
    expect(started.status).toBe(201);
    expect(await started.json()).toEqual({
      runId: expect.any(String),
      pid: mock.children[0].pid,
      startedAt: expect.any(String),
      parameters: { format: 'rtmp', target: 'x' },
    });
    const { runId } = coordinator.status();

    const status = await fetch(`${baseUrl}/stream/status`);
    expect(await status.json()).toMatchObject({ status: 'running', runId, parameters: { format: 'rtmp', target: 'x' } });

    const again = await post(`${baseUrl}/stream/start`, { format: 'rtmp', target: 'x' });
    expect(again.status).toBe(409);
    expect(await again.json()).toEqual({ error: 'AlreadyRunning', message: 'A stream process is already running' });

    const stopped = await post(`${baseUrl}/stream/stop`);
    expect(stopped.status).toBe(200);
    expect(await stopped.json()).toEqual({ runId, forced: false, exitCode: null, signal: 'SIGTERM' });

    const idle = await fetch(`${baseUrl}/stream/status`);
    expect(await idle.json()).toMatchObject({ status: 'idle', restartCount: 0 });
  });

  it('rejects stop when nothing runs', async () => {
    const res = await post(`${baseUrl}/stream/stop`);

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ error: 'NotRunning', message: 'No stream process is running' });
  });

  it('rejects invalid start bodies', async () => {
    const missing = await post(`${baseUrl}/stream/start`, { format: 'rtmp' });
    expect(missing.status).toBe(400);
    expect(await missing.json()).toEqual({ error: 'InvalidParameters', message: 'target must be a non-empty string' });

    const malformed = await fetch(`${baseUrl}/stream/start`, { method: 'POST', body: '{not json' });
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toEqual({ error: 'InvalidParameters', message: 'Request body must be a JSON object' });

    expect(mock.spawn).not.toHaveBeenCalled();
  });

  it('returns recent output lines', async () => {
    await post(`${baseUrl}/stream/start`, { format: 'rtmp', target: 'x' });

    const res = await fetch(`${baseUrl}/stream/output?limit=1`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ lines: [ '[stdout] progress=continue' ] });

    const bad = await fetch(`${baseUrl}/stream/output?limit=zero`);
    expect(bad.status).toBe(400);
  });

  it('returns 404 for unknown routes', async () => {
    const res = await fetch(`${baseUrl}/stream/pause`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'NotFound', message: 'No route for GET /stream/pause' });
  });
});

describe('Stream control error mapping', () => {
  const failing = (error: unknown): StreamController => ({
    start: async () => {
      throw error;
    },
    stop: async () => {
      throw error;
    },
    status: () => ({ status: 'idle', restartCount: 0 }),
    output: () => [],
  });

  it('maps spawn failures to 502', async () => {
    const { server, baseUrl } = await listen(failing(new SpawnFailureError('ffmpeg', new Error('spawn ffmpeg ENOENT'))));
    try {
      const res = await post(`${baseUrl}/stream/start`, { format: 'rtmp', target: 'x' });
      expect(res.status).toBe(502);
      expect(await res.json()).toEqual({ error: 'SpawnFailure', message: 'Failed to spawn ffmpeg: spawn ffmpeg ENOENT' });
    } finally {
      await server.stop();
    }
  });

  it('maps timeouts to 504', async () => {
    const { server, baseUrl } = await listen(failing(new ShutdownTimeoutError(2_000)));
    try {
      const res = await post(`${baseUrl}/stream/stop`);
      expect(res.status).toBe(504);
      expect(await res.json()).toEqual({ error: 'ShutdownTimeout', message: 'Process did not exit within 2000ms of SIGKILL' });
    } finally {
      await server.stop();
    }
  });

  it('hides unexpected errors behind 500', async () => {
    const { server, baseUrl } = await listen(failing(new Error('disk on fire')));
    try {
      const res = await post(`${baseUrl}/stream/stop`);
      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: 'InternalError', message: 'Internal Server Error' });
    } finally {
      await server.stop();
    }
  });
});
