import type { ServerResponse } from 'node:http';
import { getLoggerFor } from 'global-logger-factory';
import { readJsonBody, sendJson, type ApiServer } from '../ApiServer';
import { isCoordinatorError, type CoordinatorErrorCode } from '../../coordinator/errors';
import type { ProcessCoordinator } from '../../coordinator/ProcessCoordinator';
import { toStreamParameters } from '../../ffmpeg/FfmpegArguments';

export type StreamController = Pick<ProcessCoordinator, 'start' | 'stop' | 'status' | 'output'>;

export interface StreamHandlerOptions {
  coordinator: StreamController;
}

const STATUS_BY_CODE: Record<CoordinatorErrorCode, number> = {
  InvalidParameters: 400,
  AlreadyRunning: 409,
  NotRunning: 409,
  StartCancelled: 409,
  SpawnFailure: 502,
  UnexpectedExit: 502,
  ReadinessTimeout: 504,
  ShutdownTimeout: 504,
};

/**
 * Stream control API
 *
 * GET  /health - Liveness
 * GET  /stream/status - Coordinator snapshot
 * POST /stream/start - Start ffmpeg with `{ format, target, source? }`
 * POST /stream/stop - Stop the running process
 * GET  /stream/output?limit=N - Recent ffmpeg output lines
 */
export function registerStreamRoutes(server: ApiServer, options: StreamHandlerOptions): void {
  const logger = getLoggerFor('StreamHandler');
  const { coordinator } = options;

  const sendError = (response: ServerResponse, error: unknown): void => {
    if (isCoordinatorError(error)) {
      sendJson(response, STATUS_BY_CODE[error.code], { error: error.code, message: error.message });
      return;
    }
    logger.error(`Unexpected stream control error: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
    sendJson(response, 500, { error: 'InternalError', message: 'Internal Server Error' });
  };

  server.get('/health', async (_request, response) => {
    sendJson(response, 200, { status: 'ok' });
  });

  server.get('/stream/status', async (_request, response) => {
    sendJson(response, 200, coordinator.status());
  });

  server.post('/stream/start', async (request, response) => {
    try {
      const parameters = toStreamParameters(await readJsonBody(request));
      const handle = await coordinator.start(parameters);
      sendJson(response, 201, handle);
    } catch (error: unknown) {
      sendError(response, error);
    }
  });

  server.post('/stream/stop', async (_request, response) => {
    try {
      sendJson(response, 200, await coordinator.stop());
    } catch (error: unknown) {
      sendError(response, error);
    }
  });

  server.get('/stream/output', async (_request, response, { query }) => {
    const raw = query.get('limit');
    const limit = raw === null ? undefined : Number(raw);
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      sendJson(response, 400, { error: 'InvalidParameters', message: 'limit must be a positive integer' });
      return;
    }
    sendJson(response, 200, { lines: coordinator.output(limit) });
  });
}
