import { ConfigError } from '../errors.js';
import { readCsvFile } from '../records/csv-source.js';
import type { Command } from './types.js';
import {
  applyCommonUploadOptions,
  executeUpload,
  type CommonUploadArgs,
} from './upload-shared.js';

const command: Command<CommonUploadArgs> = {
  command: 'upload',
  describe: 'Upload rows of the local CSV named by csv_path as notes',

  builder: (yargs) => {
    return applyCommonUploadOptions(yargs, { defaultPreflight: 'strict' })
      .example('$0 upload -c elements.json', 'Upload a local CSV')
      .example(
        '$0 upload -c elements.yaml --dry-run',
        'Check every note with canAddNotes without adding any',
      );
  },

  handler: async (argv) => {
    await executeUpload(argv, {
      title: 'CSV Upload',
      requireCsvPath: true,
      describeSource: (config) => config.csvPath ?? '(none)',
      loadRecords: async (config) => {
        if (config.csvPath === undefined) {
          throw new ConfigError('missing required key "csv_path"');
        }
        return readCsvFile(config.csvPath);
      },
    });
  },
};

export default command;
