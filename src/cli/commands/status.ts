import type { CommandModule } from 'yargs';
import type { CoordinatorSnapshot } from '../../coordinator/types';
import { baseUrlFor, describeFailure, formatSnapshot, requestControl } from '../lib/ControlClient';

interface StatusArgs {
  port: number;
  host: string;
  json: boolean;
}

export const statusCommand: CommandModule<object, StatusArgs> = {
  command: 'status',
  describe: 'Show the stream process status',
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
      })
      .option('json', {
        type: 'boolean',
        description: 'Output as JSON',
        default: false,
      }),
  handler: async (argv) => {
    try {
      const res = await requestControl(baseUrlFor(argv.host, argv.port), '/stream/status');
      if (!res.ok) {
        console.error(`Failed to get status: ${describeFailure(res)}`);
        process.exit(1);
      }

      const snapshot = res.body as CoordinatorSnapshot;
      console.log(argv.json ? JSON.stringify(snapshot, null, 2) : formatSnapshot(snapshot));
    } catch (error: unknown) {
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  },
};
