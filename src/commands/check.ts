import chalk from 'chalk';
import { AnkiConnectClient, createHttpTransport } from '../anki-connect.js';
import { logInfo } from '../logger.js';
import { verifyTarget } from '../upload/uploader.js';
import type { Command } from './types.js';
import { exitWithError, resolveUploadConfig } from './upload-shared.js';

interface CheckArgs {
  config: string;
  url?: string;
}

const command: Command<CheckArgs> = {
  command: 'check',
  describe: 'Verify AnkiConnect, the deck and the note type without uploading',

  builder: (yargs) => {
    return yargs
      .option('config', {
        alias: 'c',
        describe: 'Path to the upload config file (JSON or YAML)',
        type: 'string',
        demandOption: true,
      })
      .option('url', {
        describe: 'AnkiConnect endpoint (overrides anki_connect_url)',
        type: 'string',
      })
      .example('$0 check -c elements.json', 'Check an upload target');
  },

  handler: async (argv) => {
    try {
      const config = await resolveUploadConfig(argv, {
        requireCsvPath: false,
      });
      const client = new AnkiConnectClient(
        createHttpTransport(config.ankiConnectUrl),
      );
      await verifyTarget(client, config);
      logInfo(chalk.green('\n✓ Ready to upload.'));
    } catch (error) {
      await exitWithError(error);
    }
  },
};

export default command;
