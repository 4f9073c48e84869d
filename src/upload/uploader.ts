import { z } from 'zod';
import chalk from 'chalk';
import {
  ANKI_CONNECT_VERSION,
  type AnkiConnectClient,
  type AnkiResponse,
} from '../anki-connect.js';
import {
  ActionError,
  DeckNotFoundError,
  NoteTypeNotFoundError,
  PreflightRejectedError,
  ServiceUnavailableError,
  SetupError,
  TransportError,
  VersionMismatchError,
} from '../errors.js';
import { logInfoTee, logWarn } from '../logger.js';
import type { Note } from '../notes/types.js';
import { chunk, DEFAULT_BATCH_SIZE } from './batcher.js';
import {
  emptyReport,
  printBatchResult,
  recordCommit,
  recordPreflight,
  type UploadReport,
} from './reporting.js';

export const PREFLIGHT_MODES = ['strict', 'lenient'] as const;

/**
 * `strict` aborts the whole run when any note fails pre-flight.
 * `lenient` warns and commits anyway, leaving AnkiConnect to reject them.
 */
export type PreflightMode = (typeof PREFLIGHT_MODES)[number];

export interface UploadTarget {
  deckName: string;
  noteType: string;
}

export interface UploadOptions {
  batchSize?: number;
  mode: PreflightMode;
  dryRun?: boolean;
}

const NoteId = z.union([z.number(), z.string()]);

/**
 * Checks that AnkiConnect is up and speaks the expected protocol version.
 */
export async function verifyService(client: AnkiConnectClient): Promise<void> {
  let response: AnkiResponse<unknown>;
  try {
    response = await client.send('version', z.unknown());
  } catch (error) {
    if (error instanceof TransportError) {
      throw new ServiceUnavailableError(error.message, { cause: error });
    }
    throw error;
  }

  if (response.error !== null) {
    throw new ServiceUnavailableError(response.error);
  }
  if (response.result !== ANKI_CONNECT_VERSION) {
    throw new VersionMismatchError(ANKI_CONNECT_VERSION, response.result);
  }
  await logInfoTee(chalk.green('✓ AnkiConnect is up'));
}

// An error answer to a read-only lookup is still a setup failure
async function requestNames(
  client: AnkiConnectClient,
  action: 'deckNames' | 'modelNames',
): Promise<string[]> {
  try {
    return await client.request(action, z.array(z.string()));
  } catch (error) {
    if (error instanceof ActionError) {
      throw new SetupError(error.message, { cause: error });
    }
    throw error;
  }
}

export async function verifyDeck(
  client: AnkiConnectClient,
  deckName: string,
): Promise<void> {
  const deckNames = await requestNames(client, 'deckNames');
  if (!deckNames.includes(deckName)) {
    throw new DeckNotFoundError(deckName, deckNames);
  }
  await logInfoTee(chalk.green(`✓ Deck "${deckName}" exists`));
}

export async function verifyNoteType(
  client: AnkiConnectClient,
  noteType: string,
): Promise<void> {
  const modelNames = await requestNames(client, 'modelNames');
  if (!modelNames.includes(noteType)) {
    throw new NoteTypeNotFoundError(noteType, modelNames);
  }
  await logInfoTee(chalk.green(`✓ Note type "${noteType}" exists`));
}

/**
 * Runs the three setup checks in order. Any failure aborts before notes are sent.
 */
export async function verifyTarget(
  client: AnkiConnectClient,
  target: UploadTarget,
): Promise<void> {
  await verifyService(client);
  await verifyDeck(client, target.deckName);
  await verifyNoteType(client, target.noteType);
}

/**
 * Asks AnkiConnect whether every batch could be added, without adding anything.
 */
export async function preflightBatches(
  client: AnkiConnectClient,
  notes: readonly Note[],
  options: { batchSize: number; mode: PreflightMode },
  report: UploadReport = emptyReport(),
): Promise<UploadReport> {
  let totals = report;
  let batchIndex = 0;

  for (const batch of chunk(notes, options.batchSize)) {
    const results = await client.request(
      'canAddNotes',
      z.array(z.boolean()),
      { notes: batch },
    );
    // A missing entry means AnkiConnect did not vouch for that note
    const rejected = batch.filter((_, i) => results[i] !== true);

    if (rejected.length > 0) {
      for (const note of rejected) {
        await logWarn(`\tFailed Note Fields: ${JSON.stringify(note.fields)}`);
      }
      if (options.mode === 'strict') {
        throw new PreflightRejectedError(batchIndex, batch.length, rejected);
      }
      await logWarn(
        `⚠️  ${batch.length - rejected.length} / ${batch.length} notes in batch ${batchIndex + 1} are valid. Continuing anyway.`,
      );
    } else {
      await logInfoTee(`${batch.length} notes confirmed to be added`);
    }

    totals = recordPreflight(totals, {
      batchIndex,
      submitted: batch.length,
      rejected,
    });
    batchIndex++;
  }

  return totals;
}

/**
 * Adds every batch in order. Failures are recorded in the report and never
 * stop later batches.
 */
export async function commitBatches(
  client: AnkiConnectClient,
  notes: readonly Note[],
  options: { batchSize: number },
  report: UploadReport = emptyReport(),
): Promise<UploadReport> {
  let totals = report;
  let batchIndex = 0;

  for (const batch of chunk(notes, options.batchSize)) {
    const response = await client.send(
      'addNotes',
      z.array(NoteId.nullable()),
      { notes: batch },
    );
    if (response.error !== null) {
      await logWarn(`Error "${response.error}" adding notes`);
    }

    // With no result at all, every note in the batch is presumed unadded
    const results = response.result ?? [];
    const failed = batch.filter(
      (_, i) => results[i] === null || results[i] === undefined,
    );
    const outcome = {
      batchIndex,
      submitted: batch.length,
      added: batch.length - failed.length,
      failed,
      error: response.error,
    };

    totals = recordCommit(totals, outcome);
    await printBatchResult(outcome, totals);
    batchIndex++;
  }

  return totals;
}

/**
 * Pre-flights every batch, then commits every batch.
 * In dry-run mode, stops after pre-flight.
 */
export async function uploadNotes(
  client: AnkiConnectClient,
  notes: readonly Note[],
  options: UploadOptions,
): Promise<UploadReport> {
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;

  const preflighted = await preflightBatches(client, notes, {
    batchSize,
    mode: options.mode,
  });

  if (options.dryRun) {
    await logInfoTee(
      chalk.yellow(
        `\n⚠️  DRY RUN MODE - skipping upload of ${notes.length} notes`,
      ),
    );
    return preflighted;
  }

  return commitBatches(client, notes, { batchSize }, preflighted);
}
