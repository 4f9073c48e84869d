#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import uploadCmd from './commands/upload.js';
import uploadUrlCmd from './commands/upload-url.js';
import checkCmd from './commands/check.js';

void yargs(hideBin(process.argv))
  .command(uploadCmd)
  .command(uploadUrlCmd)
  .command(checkCmd)
  .scriptName('csv-deck-upload')
  .demandCommand(1, 'You must provide a valid command.')
  .strict()
  .help()
  .alias('h', 'help')
  .version()
  .alias('v', 'version')
  .parse();
