import { randomUUID } from 'node:crypto';
import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { getLoggerFor } from 'global-logger-factory';
import { withRequestId } from '../logging/LogContext';

/**
 * Route handler function
 */
export type RouteHandler = (
  request: IncomingMessage,
  response: ServerResponse,
  context: RouteContext,
) => Promise<void>;

export interface RouteContext {
  query: URLSearchParams;
  requestId: string;
}

/**
 * Route definition
 */
export interface Route {
  method: string;
  path: string;
  handler: RouteHandler;
}

export interface ApiServerOptions {
  port: number;
  host?: string;
  /**
   * Bound for receiving a request and for running its handler.
   * A handler still running after this answers 503, or has its socket destroyed if it already replied.
   */
  requestTimeoutMs?: number;
}

/**
 * Minimal JSON-over-HTTP server the control routes are registered on.
 */
export class ApiServer {
  private readonly logger = getLoggerFor(this);
  private readonly port: number;
  private readonly host: string;
  private readonly requestTimeoutMs: number;
  private readonly routes: Route[] = [];
  private server?: Server;

  public constructor(options: ApiServerOptions) {
    this.port = options.port;
    this.host = options.host ?? '0.0.0.0';
    this.requestTimeoutMs = options.requestTimeoutMs ?? 120_000;
  }

  public route(method: string, path: string, handler: RouteHandler): void {
    this.routes.push({
      method: method.toUpperCase(),
      path,
      handler,
    });
    this.logger.debug(`Registered route: ${method.toUpperCase()} ${path}`);
  }

  public get(path: string, handler: RouteHandler): void {
    this.route('GET', path, handler);
  }

  public post(path: string, handler: RouteHandler): void {
    this.route('POST', path, handler);
  }

  public async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = createServer((req, res) => {
        this.handleRequest(req, res).catch((error: unknown) => {
          this.logger.error(`Unhandled error: ${String(error)}`);
          if (!res.headersSent) {
            sendJson(res, 500, { error: 'InternalError', message: 'Internal Server Error' });
          }
        });
      });
      this.server.requestTimeout = this.requestTimeoutMs;

      this.server.once('error', reject);

      this.server.listen(this.port, this.host, () => {
        this.logger.info(`Listening on ${this.host}:${this.address()?.port ?? this.port}`);
        resolve();
      });
    });
  }

  public async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }

      this.server.close((error) => {
        if (error) {
          reject(error);
        } else {
          this.logger.info('Server stopped');
          resolve();
        }
      });
      this.server.closeIdleConnections();
    });
  }

  /**
   * Bound address once listening; the port is the real one when 0 was requested.
   */
  public address(): AddressInfo | undefined {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : undefined;
  }

  private async handleRequest(request: IncomingMessage, response: ServerResponse): Promise<void> {
    const header = request.headers['x-request-id'];
    const requestId = (Array.isArray(header) ? header[0] : header) || randomUUID();
    response.setHeader('X-Request-ID', requestId);

    await withRequestId(requestId, async () => {
      const startTime = Date.now();
      const method = request.method?.toUpperCase() ?? 'GET';
      const url = new URL(request.url ?? '/', `http://${request.headers.host ?? 'localhost'}`);

      const route = this.routes.find((candidate) => candidate.method === method && candidate.path === url.pathname);
      if (!route) {
        sendJson(response, 404, { error: 'NotFound', message: `No route for ${method} ${url.pathname}` });
      } else {
        const timer = setTimeout(() => this.handleTimeout(method, url.pathname, response), this.requestTimeoutMs);
        try {
          await route.handler(request, response, { query: url.searchParams, requestId });
        } catch (error: unknown) {
          this.logger.error(`Route handler error: ${error instanceof Error ? error.message : String(error)}`);
          sendJson(response, 500, { error: 'InternalError', message: 'Internal Server Error' });
        } finally {
          clearTimeout(timer);
        }
      }

      const ms = Date.now() - startTime;
      const line = `${method} ${url.pathname} -> ${response.statusCode} (${ms}ms)`;
      if (response.statusCode < 400) {
        this.logger.info(line);
      } else {
        this.logger.warn(line);
      }
    });
  }

  private handleTimeout(method: string, path: string, response: ServerResponse): void {
    this.logger.warn(`${method} ${path} exceeded ${this.requestTimeoutMs}ms`);
    if (response.headersSent) {
      response.destroy();
      return;
    }
    sendJson(response, 503, { error: 'RequestTimeout', message: `Request exceeded ${this.requestTimeoutMs}ms` });
  }
}

export async function readJsonBody(request: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let data = '';
    request.setEncoding('utf8');
    request.on('data', (chunk: string) => {
      data += chunk;
    });
    request.on('end', () => {
      if (!data) {
        resolve(undefined);
        return;
      }
      try {
        resolve(JSON.parse(data));
      } catch {
        resolve(undefined);
      }
    });
    request.on('error', reject);
  });
}

/**
 * No-op once a reply was sent, e.g. by the request timeout.
 */
export function sendJson(response: ServerResponse, status: number, data: unknown): void {
  if (response.headersSent || response.writableEnded) {
    return;
  }
  response.statusCode = status;
  response.setHeader('Content-Type', 'application/json');
  response.end(JSON.stringify(data));
}
