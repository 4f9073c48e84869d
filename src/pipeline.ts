import type { AnkiConnectClient } from './anki-connect.js';
import type { UploadConfig } from './config.js';
import { logInfoTee } from './logger.js';
import { buildNote } from './notes/build-note.js';
import { assertUniqueIndexField, filterByIndexField } from './notes/dedup.js';
import { mapRecordToFields } from './notes/field-mapper.js';
import type { Note, RawRecord } from './notes/types.js';
import type { UploadReport } from './upload/reporting.js';
import {
  uploadNotes,
  verifyTarget,
  type PreflightMode,
} from './upload/uploader.js';

/**
 * Turns raw records into notes: map, drop rows without the index field,
 * reject duplicate index values, then attach deck and note type.
 */
export function prepareNotes(
  records: readonly RawRecord[],
  config: UploadConfig,
): Note[] {
  let fieldsList = records.map((record) =>
    mapRecordToFields(record, config.columnsToFields),
  );

  if (config.indexField !== undefined) {
    fieldsList = filterByIndexField(fieldsList, config.indexField);
    if (!config.allowDuplicates) {
      assertUniqueIndexField(fieldsList, config.indexField);
    }
  }

  return fieldsList.map((fields) => buildNote(fields, config));
}

export interface RunUploadOptions {
  client: AnkiConnectClient;
  config: UploadConfig;
  loadRecords: () => Promise<RawRecord[]>;
  preflight: PreflightMode;
  dryRun?: boolean;
}

export async function runUpload(
  options: RunUploadOptions,
): Promise<UploadReport> {
  const { client, config } = options;

  await verifyTarget(client, config);

  const records = await options.loadRecords();
  await logInfoTee(`${records.length} rows in input csv`);

  const notes = prepareNotes(records, config);
  await logInfoTee(`${notes.length} notes to upload`);

  return uploadNotes(client, notes, {
    batchSize: config.batchSize,
    mode: options.preflight,
    dryRun: options.dryRun,
  });
}
