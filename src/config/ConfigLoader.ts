import fs from 'node:fs/promises';
import path from 'node:path';
import dotenv from 'dotenv';
import {
  DEFAULT_FORCE_KILL_TIMEOUT_MS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_READINESS_TIMEOUT_MS,
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
} from '../coordinator/ProcessCoordinator';
import { DEFAULT_FFMPEG_SETTINGS } from '../ffmpeg/FfmpegArguments';
import type { RestartPolicy } from '../coordinator/types';

export class ConfigurationError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export interface ServerConfig {
  port: number;
  host: string;
  /** Upper bound for any single request, coordinator calls included. */
  requestTimeoutMs: number;
  logLevel: string;
  /** winston-daily-rotate-file pattern; console only when unset. */
  logFile?: string;
  requireCredentials: boolean;
  twitch: {
    clientId?: string;
    secret?: string;
    category: string;
  };
  ffmpeg: {
    path: string;
    logLevel: string;
    defaultSource: string;
  };
  coordinator: {
    readinessTimeoutMs: number;
    shutdownTimeoutMs: number;
    forceKillTimeoutMs: number;
    pollIntervalMs: number;
    /** Watchdog policy; `undefined` when auto restart is off. */
    restart?: RestartPolicy;
  };
}

export interface ConfigOverrides {
  /** JSON file whose keys use the environment variable names. */
  config?: string;
  port?: number;
  host?: string;
  logLevel?: string;
  requireCredentials?: boolean;
}

type Source = Record<string, string | undefined>;

/**
 * Loads a `.env` file into `process.env` without overriding variables that are already set.
 * An explicit path must exist; the default `.env` is optional.
 */
export function loadEnvironment(envPath?: string): void {
  const resolved = path.resolve(envPath ?? '.env');
  const result = dotenv.config({ path: resolved });
  if (result.error && envPath) {
    throw new ConfigurationError(`Env file not found: ${resolved}`);
  }
}

/**
 * Precedence, lowest first: defaults, config file, environment, explicit overrides.
 */
export async function loadConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): Promise<ServerConfig> {
  const fileValues = overrides.config ? await readConfigFile(overrides.config) : {};
  const source: Source = { ...fileValues, ...pickDefined(env) };

  const autoRestart = readBoolean(source, 'FFMPEG_AUTO_RESTART', false);

  return {
    port: overrides.port ?? readInteger(source, 'PORT', 5000, 1),
    host: overrides.host ?? source.HOST ?? '0.0.0.0',
    requestTimeoutMs: readInteger(source, 'REQUEST_TIMEOUT_MS', 120_000, 1),
    logLevel: overrides.logLevel ?? source.LOG_LEVEL ?? 'info',
    logFile: source.LOG_FILE || undefined,
    requireCredentials: overrides.requireCredentials ?? readBoolean(source, 'REQUIRE_TWITCH_CREDENTIALS', false),
    twitch: {
      clientId: source.TWITCH_CLIENT_ID || undefined,
      secret: source.TWITCH_SECRET || undefined,
      category: source.TWITCH_CATEGORY || 'Just Chatting',
    },
    ffmpeg: {
      path: source.FFMPEG_PATH || 'ffmpeg',
      logLevel: source.FFMPEG_LOGLEVEL || DEFAULT_FFMPEG_SETTINGS.logLevel,
      defaultSource: source.FFMPEG_DEFAULT_SOURCE || DEFAULT_FFMPEG_SETTINGS.defaultSource,
    },
    coordinator: {
      readinessTimeoutMs: readInteger(source, 'READINESS_TIMEOUT_MS', DEFAULT_READINESS_TIMEOUT_MS, 1),
      shutdownTimeoutMs: readInteger(source, 'SHUTDOWN_TIMEOUT_MS', DEFAULT_SHUTDOWN_TIMEOUT_MS, 1),
      forceKillTimeoutMs: readInteger(source, 'FORCE_KILL_TIMEOUT_MS', DEFAULT_FORCE_KILL_TIMEOUT_MS, 1),
      pollIntervalMs: readInteger(source, 'READINESS_POLL_INTERVAL_MS', DEFAULT_POLL_INTERVAL_MS, 1),
      restart: autoRestart ?
        {
          maxRestarts: readInteger(source, 'FFMPEG_MAX_RESTARTS', 5, 0),
          delayMs: readInteger(source, 'FFMPEG_RESTART_DELAY_MS', 2_000, 0),
          minIntervalMs: readInteger(source, 'FFMPEG_RESTART_MIN_INTERVAL_MS', 10_000, 0),
        } :
        undefined,
    },
  };
}

/**
 * One warning per missing credential. The stream coordinator runs without them.
 */
export function collectStartupWarnings(config: ServerConfig): string[] {
  const warnings: string[] = [];
  if (!config.twitch.clientId) {
    warnings.push('TWITCH_CLIENT_ID is not set.');
  }
  if (!config.twitch.secret) {
    warnings.push('TWITCH_SECRET is not set.');
  }
  return warnings;
}

export function assertCredentials(config: ServerConfig): void {
  if (!config.requireCredentials) {
    return;
  }
  const missing = [
    config.twitch.clientId ? undefined : 'TWITCH_CLIENT_ID',
    config.twitch.secret ? undefined : 'TWITCH_SECRET',
  ].filter((name): name is string => name !== undefined);
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required credentials: ${missing.join(', ')}`);
  }
}

async function readConfigFile(configPath: string): Promise<Source> {
  const resolved = path.resolve(process.cwd(), configPath);
  let content: string;
  try {
    content = await fs.readFile(resolved, 'utf-8');
  } catch {
    throw new ConfigurationError(`Config file not found: ${resolved}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error: unknown) {
    throw new ConfigurationError(`Config file ${resolved} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigurationError(`Config file ${resolved} must contain a JSON object`);
  }

  const values: Source = {};
  for (const [ key, value ] of Object.entries(parsed)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      values[key] = String(value);
    }
  }
  return values;
}

function pickDefined(env: NodeJS.ProcessEnv): Source {
  const values: Source = {};
  for (const [ key, value ] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      values[key] = value;
    }
  }
  return values;
}

function readInteger(source: Source, key: string, fallback: number, min: number): number {
  const raw = source[key];
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readBoolean(source: Source, key: string, fallback: boolean): boolean {
  const raw = source[key]?.toLowerCase();
  if (raw === undefined) {
    return fallback;
  }
  if ([ 'true', '1', 'yes', 'on' ].includes(raw)) {
    return true;
  }
  if ([ 'false', '0', 'no', 'off' ].includes(raw)) {
    return false;
  }
  throw new ConfigurationError(`${key} must be a boolean, got "${raw}"`);
}
