import { readFile } from 'fs/promises';
import Papa from 'papaparse';
import { FileNotFoundError, RecordSourceError, TransportError } from '../errors.js';
import { logDebug } from '../logger.js';
import type { RawRecord } from '../notes/types.js';

/**
 * Parses CSV text with a header row into records, in file order.
 * Short rows are kept; their missing columns read as undefined.
 */
export function parseCsv(content: string, source: string): RawRecord[] {
  const parseResult = Papa.parse<Record<string, string | undefined>>(content, {
    header: true,
    skipEmptyLines: true,
  });

  const errors = parseResult.errors.filter(
    (error) => error.type !== 'FieldMismatch',
  );
  if (errors.length > 0) {
    throw new RecordSourceError(
      `CSV parsing errors in ${source}: ${JSON.stringify(errors)}`,
    );
  }
  return parseResult.data;
}

export async function readCsvFile(filePath: string): Promise<RawRecord[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new FileNotFoundError(filePath);
    }
    throw error;
  }

  const records = parseCsv(content, filePath);
  await logDebug(`Read ${records.length} rows from ${filePath}`);
  return records;
}

export async function fetchCsv(url: string): Promise<RawRecord[]> {
  let response: Response;
  try {
    response = await fetch(url, { headers: { Accept: 'text/csv' } });
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    throw new TransportError(`Could not download ${url}: ${details}`, {
      cause: error,
    });
  }
  if (!response.ok) {
    throw new TransportError(
      `HTTP error! status: ${response.status} downloading ${url}`,
      { status: response.status },
    );
  }

  const records = parseCsv(await response.text(), url);
  await logDebug(`Downloaded ${records.length} rows from ${url}`);
  return records;
}
