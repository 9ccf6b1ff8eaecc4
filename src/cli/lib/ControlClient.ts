import type { CoordinatorSnapshot } from '../../coordinator/types';

export interface ControlResponse {
  status: number;
  ok: boolean;
  body: unknown;
}

export class ControlUnreachableError extends Error {
  public constructor(baseUrl: string, cause: unknown) {
    super(`Cannot connect to the stream server at ${baseUrl}. Is it running?`, { cause });
    this.name = 'ControlUnreachableError';
  }
}

export function baseUrlFor(host: string, port: number): string {
  return `http://${host}:${port}`;
}

/**
 * Calls the control server. Connection failures become `ControlUnreachableError`,
 * HTTP errors are returned with `ok: false`.
 */
export async function requestControl(baseUrl: string, path: string, init: { method?: string; body?: unknown } = {}): Promise<ControlResponse> {
  let res: Response;
  try {
    res = await fetch(`${baseUrl}${path}`, {
      method: init.method ?? 'GET',
      headers: init.body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: init.body === undefined ? undefined : JSON.stringify(init.body),
    });
  } catch (error: unknown) {
    throw new ControlUnreachableError(baseUrl, error);
  }

  const text = await res.text();
  let body: unknown = text;
  if (text) {
    try {
      body = JSON.parse(text);
    } catch {
      body = text;
    }
  }
  return { status: res.status, ok: res.ok, body };
}

/**
 * `Error: message` for the control server's `{ error, message }` bodies.
 */
export function describeFailure(response: ControlResponse): string {
  const { body } = response;
  if (body && typeof body === 'object') {
    const record = body as Record<string, unknown>;
    if (typeof record.error === 'string') {
      return typeof record.message === 'string' ? `${record.error}: ${record.message}` : record.error;
    }
  }
  return `HTTP ${response.status}`;
}

export function formatUptime(ms: number): string {
  const s = Math.floor(ms / 1000);
  if (s < 60) return `${s}s`;
  const m = Math.floor(s / 60);
  if (m < 60) return `${m}m${s % 60}s`;
  const h = Math.floor(m / 60);
  return `${h}h${m % 60}m`;
}

export function formatSnapshot(snapshot: CoordinatorSnapshot): string {
  const lines = [ `status: ${snapshot.status}` ];
  if (snapshot.runId) lines.push(`run: ${snapshot.runId}`);
  if (snapshot.pid !== undefined) lines.push(`pid: ${snapshot.pid}`);
  if (snapshot.parameters) lines.push(`target: ${snapshot.parameters.format} ${snapshot.parameters.target}`);
  if (snapshot.uptimeMs !== undefined) lines.push(`uptime: ${formatUptime(snapshot.uptimeMs)}`);
  if (snapshot.restartCount > 0) lines.push(`restarts: ${snapshot.restartCount}`);
  if (snapshot.lastError) lines.push(`last error: ${snapshot.lastError.code}: ${snapshot.lastError.message}`);
  return lines.join('\n');
}
