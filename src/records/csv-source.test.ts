import { mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { fetchCsv, parseCsv, readCsvFile } from './csv-source.js';
import { FileNotFoundError, TransportError } from '../errors.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('parseCsv', () => {
  it('returns one record per row in file order', () => {
    const records = parseCsv('Symbol,Name\nH,Hydrogen\nHe,Helium\n', 'test');
    expect(records).toEqual([
      { Symbol: 'H', Name: 'Hydrogen' },
      { Symbol: 'He', Name: 'Helium' },
    ]);
  });

  it('keeps quoted commas and skips empty lines', () => {
    const records = parseCsv(
      'Name,Works\n"Homer","Iliad, Odyssey"\n\nVirgil,Aeneid\n',
      'test',
    );
    expect(records).toEqual([
      { Name: 'Homer', Works: 'Iliad, Odyssey' },
      { Name: 'Virgil', Works: 'Aeneid' },
    ]);
  });

  it('leaves the missing columns of a short row undefined', () => {
    const [record] = parseCsv('Symbol,Name,Group\nH,Hydrogen\n', 'test');
    expect(record.Symbol).toBe('H');
    expect(record.Group).toBeUndefined();
  });
});

describe('readCsvFile', () => {
  it('reads a CSV file from disk', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'csv-deck-upload-'));
    const file = path.join(dir, 'elements.csv');
    await writeFile(file, 'Symbol,Name\nLi,Lithium\n', 'utf-8');

    expect(await readCsvFile(file)).toEqual([
      { Symbol: 'Li', Name: 'Lithium' },
    ]);
  });

  it('reports a missing file', async () => {
    await expect(
      readCsvFile(path.join(tmpdir(), 'no-such-dir', 'missing.csv')),
    ).rejects.toBeInstanceOf(FileNotFoundError);
  });
});

describe('fetchCsv', () => {
  it('downloads and parses a CSV', async () => {
    const fetchMock = vi.fn(() =>
      Promise.resolve(new Response('Name,Born\nOvid,43 BC\n')),
    );
    vi.stubGlobal('fetch', fetchMock);

    const records = await fetchCsv('https://example.com/authors.csv');

    expect(records).toEqual([{ Name: 'Ovid', Born: '43 BC' }]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('fails on a non-2xx status', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(() => Promise.resolve(new Response('gone', { status: 404 }))),
    );

    await expect(
      fetchCsv('https://example.com/missing.csv'),
    ).rejects.toMatchObject({ name: 'TransportError', status: 404 });
  });

  it('wraps network failures', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(() => Promise.reject(new Error('getaddrinfo ENOTFOUND'))),
    );

    await expect(
      fetchCsv('https://example.com/authors.csv'),
    ).rejects.toBeInstanceOf(TransportError);
  });
});
