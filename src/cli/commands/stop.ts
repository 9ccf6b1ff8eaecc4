import type { CommandModule } from 'yargs';
import type { StopResult } from '../../coordinator/types';
import { baseUrlFor, describeFailure, requestControl } from '../lib/ControlClient';

interface StopArgs {
  port: number;
  host: string;
}

export const stopCommand: CommandModule<object, StopArgs> = {
  command: 'stop',
  describe: 'Stop the running stream',
  builder: (yargs) =>
    yargs
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
    try {
      const res = await requestControl(baseUrlFor(argv.host, argv.port), '/stream/stop', { method: 'POST' });
      if (!res.ok) {
        console.error(`Failed to stop: ${describeFailure(res)}`);
        process.exit(1);
      }

      const result = res.body as StopResult;
      const exit = `code=${result.exitCode ?? 'null'} signal=${result.signal ?? 'null'}`;
      console.log(`Stopped${result.forced ? ' (forced)' : ''} ${exit}`);
    } catch (error: unknown) {
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  },
};
