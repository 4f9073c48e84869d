import chalk from 'chalk';
import * as path from 'path';
import type { Argv } from 'yargs';
import { AnkiConnectClient, createHttpTransport } from '../anki-connect.js';
import { loadUploadConfig, type UploadConfig } from '../config.js';
import { SetupError } from '../errors.js';
import {
  closeLogger,
  initLogger,
  logDebug,
  logError,
  logInfo,
} from '../logger.js';
import type { RawRecord } from '../notes/types.js';
import { runUpload } from '../pipeline.js';
import { printSummary } from '../upload/reporting.js';
import { PREFLIGHT_MODES, type PreflightMode } from '../upload/uploader.js';

export interface CommonUploadArgs {
  config: string;
  preflight: PreflightMode;
  'batch-size'?: number;
  url?: string;
  'dry-run': boolean;
  log: boolean;
  verbose: boolean;
}

export function applyCommonUploadOptions<T>(
  yargs: Argv<T>,
  options: { defaultPreflight: PreflightMode },
): Argv<T & CommonUploadArgs> {
  return yargs
    .option('config', {
      alias: 'c',
      describe: 'Path to the upload config file (JSON or YAML)',
      type: 'string',
      demandOption: true,
    })
    .option('preflight', {
      describe:
        'What to do when canAddNotes rejects a note: abort (strict) or warn and upload anyway (lenient)',
      type: 'string',
      choices: PREFLIGHT_MODES,
      default: options.defaultPreflight,
    })
    .option('batch-size', {
      alias: 'b',
      describe: 'Notes per AnkiConnect request (overrides batch_size)',
      type: 'number',
    })
    .option('url', {
      describe: 'AnkiConnect endpoint (overrides anki_connect_url)',
      type: 'string',
    })
    .option('dry-run', {
      alias: 'd',
      describe: 'Run all checks and canAddNotes, but add nothing',
      type: 'boolean',
      default: false,
    })
    .option('log', {
      describe: 'Write a log file next to the config file',
      type: 'boolean',
      default: false,
    })
    .option('verbose', {
      describe: 'Log AnkiConnect requests and responses (enables --log)',
      type: 'boolean',
      default: false,
    })
    .check((argv) => {
      const batchSize = argv['batch-size'];
      if (
        batchSize !== undefined &&
        (!Number.isInteger(batchSize) || batchSize <= 0)
      ) {
        throw new Error('Error: --batch-size must be a positive integer.');
      }
      return true;
    });
}

export async function setupUploadLogger(
  argv: CommonUploadArgs,
  sessionName: string,
): Promise<string | null> {
  if (!argv.log && !argv.verbose) {
    return null;
  }

  const configDir = path.dirname(argv.config);
  const configName = path.basename(argv.config, path.extname(argv.config));
  const logFilePath = path.join(configDir, `${configName}.log`);

  await initLogger(logFilePath, argv.verbose);
  await logDebug('='.repeat(60));
  await logDebug(`${sessionName} - Session Started`);
  await logDebug('='.repeat(60));
  return logFilePath;
}

/**
 * Loads the config file and applies command-line overrides.
 */
export async function resolveUploadConfig(
  argv: Pick<CommonUploadArgs, 'config' | 'batch-size' | 'url'>,
  options: { requireCsvPath: boolean },
): Promise<UploadConfig> {
  const config = await loadUploadConfig(argv.config, options);
  return {
    ...config,
    batchSize: argv['batch-size'] ?? config.batchSize,
    ankiConnectUrl: argv.url ?? config.ankiConnectUrl,
  };
}

export function printUploadHeader(options: {
  title: string;
  source: string;
  config: UploadConfig;
  preflight: PreflightMode;
  dryRun: boolean;
  logFilePath: string | null;
}): void {
  const { title, source, config, preflight, dryRun, logFilePath } = options;

  logInfo(chalk.bold('='.repeat(60)));
  logInfo(chalk.bold(title));
  logInfo(chalk.bold('='.repeat(60)));
  logInfo(`Source:            ${source}`);
  logInfo(`Deck:              ${config.deckName}`);
  logInfo(`Note type:         ${config.noteType}`);
  logInfo(
    `Field mapping:     ${config.columnsToFields.map(([column, field]) => `${column} → ${field}`).join(', ')}`,
  );
  if (config.indexField) {
    logInfo(`Index field:       ${config.indexField}`);
  }
  logInfo(`Allow duplicates:  ${config.allowDuplicates}`);
  logInfo(`Batch size:        ${config.batchSize}`);
  logInfo(`Pre-flight:        ${preflight}`);
  logInfo(`AnkiConnect:       ${config.ankiConnectUrl}`);
  if (logFilePath) {
    logInfo(`Log file:          ${logFilePath}`);
  }
  logInfo(`Dry run:           ${dryRun}`);
  logInfo(chalk.bold('='.repeat(60)));
}

/**
 * Reports a fatal error and terminates with a non-zero status.
 */
export async function exitWithError(error: unknown): Promise<never> {
  const message = error instanceof Error ? error.message : String(error);
  await logError(message, error);

  if (error instanceof SetupError) {
    logInfo('\nMake sure:');
    logInfo('  1. Anki Desktop is running with AnkiConnect installed.');
    logInfo('  2. The deck and note type in the config exist.');
    logInfo('  3. The config file and CSV path are correct.');
  }
  process.exit(1);
}

/**
 * Shared handler body for the upload commands.
 */
export async function executeUpload(
  argv: CommonUploadArgs,
  options: {
    title: string;
    requireCsvPath: boolean;
    describeSource: (config: UploadConfig) => string;
    loadRecords: (config: UploadConfig) => Promise<RawRecord[]>;
  },
): Promise<void> {
  const startTime = Date.now();

  try {
    const logFilePath = await setupUploadLogger(argv, options.title);
    const config = await resolveUploadConfig(argv, {
      requireCsvPath: options.requireCsvPath,
    });

    printUploadHeader({
      title: options.title,
      source: options.describeSource(config),
      config,
      preflight: argv.preflight,
      dryRun: argv['dry-run'],
      logFilePath,
    });

    const client = new AnkiConnectClient(
      createHttpTransport(config.ankiConnectUrl),
    );
    const report = await runUpload({
      client,
      config,
      loadRecords: () => options.loadRecords(config),
      preflight: argv.preflight,
      dryRun: argv['dry-run'],
    });

    await printSummary(report, config.deckName, Date.now() - startTime);
    await logDebug('Session completed');
    closeLogger();
  } catch (error) {
    await exitWithError(error);
  }
}
