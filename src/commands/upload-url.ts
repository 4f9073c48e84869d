import { fetchCsv } from '../records/csv-source.js';
import type { Command } from './types.js';
import {
  applyCommonUploadOptions,
  executeUpload,
  type CommonUploadArgs,
} from './upload-shared.js';

interface UploadUrlArgs extends CommonUploadArgs {
  source: string;
}

const command: Command<UploadUrlArgs> = {
  command: 'upload-url <source>',
  describe: 'Download a CSV and upload its rows as notes',

  builder: (yargs) => {
    return applyCommonUploadOptions(
      yargs.positional('source', {
        describe: 'URL of the CSV file',
        type: 'string',
        demandOption: true,
      }),
      { defaultPreflight: 'lenient' },
    ).example(
      '$0 upload-url https://example.com/authors.csv -c authors.json',
      'Upload a remote CSV, warning on notes canAddNotes rejects',
    );
  },

  handler: async (argv) => {
    await executeUpload(argv, {
      title: 'Remote CSV Upload',
      requireCsvPath: false,
      describeSource: () => argv.source,
      loadRecords: () => fetchCsv(argv.source),
    });
  },
};

export default command;
