#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { serveCommand } from './commands/serve';
import { startCommand } from './commands/start';
import { stopCommand } from './commands/stop';
import { statusCommand } from './commands/status';

void yargs(hideBin(process.argv))
  .scriptName('kobo-twitch')
  .usage('$0 <command> [options]')
  .command(serveCommand)
  .command(startCommand)
  .command(stopCommand)
  .command(statusCommand)
  .demandCommand(1, 'Please specify a command')
  .strict()
  .help()
  .parse();
