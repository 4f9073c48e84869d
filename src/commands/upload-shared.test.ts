import { mkdtemp, readFile, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { logDebug } from '../logger.js';
import { executeUpload } from './upload-shared.js';

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

function answer(body: string): unknown {
  if (body.includes('"action":"version"')) {
    return { result: 6, error: null };
  }
  if (body.includes('"action":"deckNames"')) {
    return { result: ['Elements'], error: null };
  }
  if (body.includes('"action":"modelNames"')) {
    return { result: ['Element'], error: null };
  }
  return { result: null, error: 'unexpected request' };
}

describe('executeUpload', () => {
  it('closes the log file when the session ends', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.stubGlobal(
      'fetch',
      vi.fn((_url: string, init: RequestInit) =>
        Promise.resolve(
          new Response(JSON.stringify(answer(String(init.body))), {
            status: 200,
          }),
        ),
      ),
    );
    const dir = await mkdtemp(path.join(tmpdir(), 'csv-deck-upload-'));
    const configPath = path.join(dir, 'elements.json');
    await writeFile(
      configPath,
      JSON.stringify({
        deck_name: 'Elements',
        note_type: 'Element',
        csv_columns_to_note_fields: { Symbol: 'Front' },
      }),
    );

    await executeUpload(
      {
        config: configPath,
        preflight: 'strict',
        'dry-run': false,
        log: true,
        verbose: false,
      },
      {
        title: 'Upload',
        requireCsvPath: false,
        describeSource: () => 'inline rows',
        loadRecords: () => Promise.resolve([]),
      },
    );
    await logDebug('written after the session');

    const content = await readFile(path.join(dir, 'elements.log'), 'utf-8');
    const lines = content.trim().split('\n');
    expect(lines[lines.length - 1]).toMatch(/\] Session completed$/);
  });
});
