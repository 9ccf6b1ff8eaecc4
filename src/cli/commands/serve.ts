import type { CommandModule } from 'yargs';
import { runServer } from '../../main';

interface ServeArgs {
  config?: string;
  env?: string;
  port?: number;
  host?: string;
  'log-level'?: string;
  'require-credentials'?: boolean;
}

export const serveCommand: CommandModule<object, ServeArgs> = {
  command: 'serve',
  describe: 'Run the stream control server',
  builder: (yargs) =>
    yargs
      .option('config', {
        alias: 'c',
        type: 'string',
        description: 'Path to a JSON config file',
      })
      .option('env', {
        alias: 'e',
        type: 'string',
        description: 'Path to .env file',
      })
      .option('port', {
        alias: 'p',
        type: 'number',
        description: 'Listen port (default: PORT or 5000)',
      })
      .option('host', {
        type: 'string',
        description: 'Listen host (default: HOST or 0.0.0.0)',
      })
      .option('log-level', {
        type: 'string',
        description: 'Log level (default: LOG_LEVEL or info)',
      })
      .option('require-credentials', {
        type: 'boolean',
        description: 'Refuse to start without TWITCH_CLIENT_ID and TWITCH_SECRET',
      }),
  handler: async (argv) => {
    await runServer({
      config: argv.config,
      env: argv.env,
      port: argv.port,
      host: argv.host,
      logLevel: argv['log-level'],
      requireCredentials: argv['require-credentials'],
    });
  },
};
