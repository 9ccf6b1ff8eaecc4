import { setGlobalLoggerFactory, getLoggerFor } from 'global-logger-factory';
import { ApiServer } from './api/ApiServer';
import { registerStreamRoutes } from './api/handlers/StreamHandler';
import {
  assertCredentials,
  collectStartupWarnings,
  ConfigurationError,
  loadConfig,
  loadEnvironment,
  type ConfigOverrides,
  type ServerConfig,
} from './config/ConfigLoader';
import { ProcessCoordinator } from './coordinator/ProcessCoordinator';
import { FFMPEG_PROGRESS_PATTERN } from './coordinator/readiness';
import type { ProcessFactory } from './coordinator/types';
import { buildFfmpegArgs } from './ffmpeg/FfmpegArguments';
import { ConfigurableLoggerFactory } from './logging/ConfigurableLoggerFactory';

export const EXIT_OK = 0;
export const EXIT_CONFIG_ERROR = 20;
export const EXIT_INTERNAL_ERROR = 50;

export interface RunOptions extends ConfigOverrides {
  env?: string;
}

export interface Application {
  config: ServerConfig;
  coordinator: ProcessCoordinator;
  server: ApiServer;
}

let logger = getLoggerFor('Main');

function initLogger(level: string, fileName?: string): void {
  setGlobalLoggerFactory(new ConfigurableLoggerFactory(level, { fileName, showLocation: true }));
  logger = getLoggerFor('Main');
}

/**
 * Wires the coordinator and the control routes. Nothing is started.
 */
export function buildApplication(config: ServerConfig, processFactory?: ProcessFactory): Application {
  const settings = { logLevel: config.ffmpeg.logLevel, defaultSource: config.ffmpeg.defaultSource };
  const coordinator = new ProcessCoordinator({
    command: config.ffmpeg.path,
    buildArgs: (parameters) => buildFfmpegArgs(parameters, settings),
    readiness: { kind: 'output', pattern: FFMPEG_PROGRESS_PATTERN },
    readinessTimeoutMs: config.coordinator.readinessTimeoutMs,
    shutdownTimeoutMs: config.coordinator.shutdownTimeoutMs,
    forceKillTimeoutMs: config.coordinator.forceKillTimeoutMs,
    pollIntervalMs: config.coordinator.pollIntervalMs,
    restart: config.coordinator.restart,
    processFactory,
  });

  coordinator.setStatusChangeHandler((snapshot) => {
    logger.debug(`Stream status: ${snapshot.status}${snapshot.runId ? ` (run ${snapshot.runId})` : ''}`);
  });
  coordinator.onCrash((error) => {
    logger.error(`Stream process crashed: ${error.message}`);
  });

  const server = new ApiServer({
    port: config.port,
    host: config.host,
    requestTimeoutMs: config.requestTimeoutMs,
  });
  registerStreamRoutes(server, { coordinator });

  return { config, coordinator, server };
}

/**
 * Loads configuration, starts the control server and stays up until SIGINT or SIGTERM.
 */
export async function runServer(options: RunOptions = {}): Promise<Application> {
  try {
    loadEnvironment(options.env);
    const config = await loadConfig(options);
    initLogger(config.logLevel, config.logFile);

    for (const warning of collectStartupWarnings(config)) {
      logger.warn(warning);
    }
    assertCredentials(config);

    const app = buildApplication(config);
    await app.server.start();
    logger.info(`Twitch category: ${config.twitch.category}`);

    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;
      logger.info(`Received ${signal}, shutting down...`);
      try {
        await app.coordinator.shutdown();
        await app.server.stop();
        process.exit(EXIT_OK);
      } catch (error: unknown) {
        logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(EXIT_INTERNAL_ERROR);
      }
    };

    process.on('SIGTERM', () => {
      void shutdown('SIGTERM');
    });
    process.on('SIGINT', () => {
      void shutdown('SIGINT');
    });

    return app;
  } catch (error: unknown) {
    exitForStartupError(error);
  }
}

function exitForStartupError(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Failed to start: ${message}`);
  process.exit(error instanceof ConfigurationError ? EXIT_CONFIG_ERROR : EXIT_INTERNAL_ERROR);
}
