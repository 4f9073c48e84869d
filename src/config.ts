import { readFile } from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ANKI_CONNECT_URL } from './anki-connect.js';
import { ConfigError, FileNotFoundError } from './errors.js';
import type { ColumnMapping } from './notes/types.js';
import { DEFAULT_BATCH_SIZE } from './upload/batcher.js';

const ColumnsToFields = z.record(z.string(), z.string().min(1));

const ConfigFile = z.object({
  deck_name: z.string().min(1),
  note_type: z.string().min(1),
  csv_columns_to_note_fields: ColumnsToFields.optional(),
  columns_to_note_fields: ColumnsToFields.optional(),
  csv_path: z.string().min(1).optional(),
  allow_duplicates: z.boolean().default(false),
  index_field: z.string().min(1).optional(),
  batch_size: z.number().int().positive().default(DEFAULT_BATCH_SIZE),
  anki_connect_url: z.url().optional(),
});

export type UploadConfig = {
  deckName: string;
  noteType: string;
  columnsToFields: ColumnMapping;
  indexField?: string;
  allowDuplicates: boolean;
  csvPath?: string;
  batchSize: number;
  ankiConnectUrl: string;
};

/**
 * Validates a decoded config file. Relative `csv_path` values are resolved
 * against `baseDir`.
 */
export function parseUploadConfig(
  raw: unknown,
  options: { baseDir?: string; requireCsvPath?: boolean } = {},
): UploadConfig {
  const result = ConfigFile.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`\n${z.prettifyError(result.error)}`);
  }
  const config = result.data;

  const mapping =
    config.csv_columns_to_note_fields ?? config.columns_to_note_fields;
  if (!mapping) {
    throw new ConfigError(
      'missing required key "csv_columns_to_note_fields" (or "columns_to_note_fields")',
    );
  }
  const columnsToFields = Object.entries(mapping);

  if (
    config.index_field !== undefined &&
    !columnsToFields.some(([, field]) => field === config.index_field)
  ) {
    throw new ConfigError(
      `index_field "${config.index_field}" is not one of the mapped note fields: ${columnsToFields.map(([, field]) => field).join(', ')}`,
    );
  }

  if (options.requireCsvPath && config.csv_path === undefined) {
    throw new ConfigError('missing required key "csv_path"');
  }

  const csvPath =
    config.csv_path !== undefined && options.baseDir !== undefined
      ? path.resolve(options.baseDir, config.csv_path)
      : config.csv_path;

  return {
    deckName: config.deck_name,
    noteType: config.note_type,
    columnsToFields,
    indexField: config.index_field,
    allowDuplicates: config.allow_duplicates,
    csvPath,
    batchSize: config.batch_size,
    ankiConnectUrl: config.anki_connect_url ?? ANKI_CONNECT_URL,
  };
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof (error as { code?: unknown }).code === 'string'
  );
}

/**
 * Reads a JSON or YAML config file (by extension) and validates it.
 */
export async function loadUploadConfig(
  configPath: string,
  options: { requireCsvPath?: boolean } = {},
): Promise<UploadConfig> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new FileNotFoundError(configPath);
    }
    throw error;
  }

  const extension = path.extname(configPath).toLowerCase();
  let raw: unknown;
  try {
    raw =
      extension === '.yaml' || extension === '.yml'
        ? yaml.load(content)
        : (JSON.parse(content) as unknown);
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`could not parse ${configPath}: ${details}`);
  }

  return parseUploadConfig(raw, {
    baseDir: path.dirname(configPath),
    requireCsvPath: options.requireCsvPath,
  });
}
