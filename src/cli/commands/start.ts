import type { CommandModule } from 'yargs';
import type { RunHandle } from '../../coordinator/types';
import { baseUrlFor, describeFailure, requestControl } from '../lib/ControlClient';

interface StartArgs {
  format: string;
  target: string;
  source?: string;
  port: number;
  host: string;
}

export const startCommand: CommandModule<object, StartArgs> = {
  command: 'start',
  describe: 'Start streaming through ffmpeg',
  builder: (yargs) =>
    yargs
      .option('format', {
        alias: 'f',
        type: 'string',
        description: 'ffmpeg output format, e.g. flv',
        demandOption: true,
      })
      .option('target', {
        alias: 't',
        type: 'string',
        description: 'Output URL or path',
        demandOption: true,
      })
      .option('source', {
        alias: 's',
        type: 'string',
        description: 'Input URL or path (a test pattern when omitted)',
      })
      .option('port', {
        alias: 'p',
        type: 'number',
        description: 'Control server port',
        default: 5000,
      })
      .option('host', {
        type: 'string',
        description: 'Control server host',
        default: 'localhost',
      }),
  handler: async (argv) => {
    const body = { format: argv.format, target: argv.target, source: argv.source };
    try {
      const res = await requestControl(baseUrlFor(argv.host, argv.port), '/stream/start', { method: 'POST', body });
      if (!res.ok) {
        console.error(`Failed to start: ${describeFailure(res)}`);
        process.exit(1);
      }

      const handle = res.body as RunHandle;
      console.log(`Started run ${handle.runId} (pid ${handle.pid ?? 'unknown'})`);
    } catch (error: unknown) {
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  },
};
