import chalk from 'chalk';
import { logDebug, logInfo, logInfoTee } from '../logger.js';
import type { Note } from '../notes/types.js';

export type PreflightOutcome = {
  batchIndex: number;
  submitted: number;
  rejected: Note[];
};

export type CommitOutcome = {
  batchIndex: number;
  submitted: number;
  added: number;
  failed: Note[];
  error: string | null;
};

/**
 * Running totals across all batches of one upload.
 */
export type UploadReport = {
  batches: number;
  submitted: number;
  prevalidated: number;
  preflightRejected: Note[];
  committed: number;
  failed: Note[];
  batchErrors: string[];
};

export function emptyReport(): UploadReport {
  return {
    batches: 0,
    submitted: 0,
    prevalidated: 0,
    preflightRejected: [],
    committed: 0,
    failed: [],
    batchErrors: [],
  };
}

export function recordPreflight(
  report: UploadReport,
  outcome: PreflightOutcome,
): UploadReport {
  return {
    ...report,
    batches: report.batches + 1,
    submitted: report.submitted + outcome.submitted,
    prevalidated:
      report.prevalidated + outcome.submitted - outcome.rejected.length,
    preflightRejected: [...report.preflightRejected, ...outcome.rejected],
  };
}

export function recordCommit(
  report: UploadReport,
  outcome: CommitOutcome,
): UploadReport {
  return {
    ...report,
    committed: report.committed + outcome.added,
    failed: [...report.failed, ...outcome.failed],
    batchErrors:
      outcome.error === null
        ? report.batchErrors
        : [...report.batchErrors, outcome.error],
  };
}

export async function printBatchResult(
  outcome: CommitOutcome,
  totals: UploadReport,
): Promise<void> {
  if (outcome.failed.length > 0) {
    await logInfoTee(
      chalk.yellow(
        `Batch ${outcome.batchIndex + 1}: failed to add ${outcome.failed.length} / ${outcome.submitted} notes`,
      ),
    );
    for (const note of outcome.failed) {
      await logInfoTee(chalk.gray(`\tNote: ${JSON.stringify(note)}`));
    }
  } else {
    await logInfoTee(
      `Batch ${outcome.batchIndex + 1}: ${outcome.added} notes added`,
    );
  }
  await logInfoTee(
    `${totals.committed} notes added successfully, ${totals.failed.length} notes failed to add`,
  );
}

export async function printSummary(
  report: UploadReport,
  deckName: string,
  elapsedMs: number,
): Promise<void> {
  logInfo('\n' + '='.repeat(60));
  logInfo(chalk.bold('Summary'));
  logInfo('='.repeat(60));
  logInfo(`Deck:                 ${deckName}`);
  logInfo(`Batches:              ${report.batches}`);
  logInfo(`Notes submitted:      ${report.submitted}`);
  logInfo(`Passed pre-flight:    ${report.prevalidated}`);
  if (report.preflightRejected.length > 0) {
    logInfo(
      chalk.yellow(`Pre-flight warnings:  ${report.preflightRejected.length}`),
    );
  }
  logInfo(chalk.green(`✓ Added:              ${report.committed}`));
  if (report.failed.length > 0) {
    logInfo(chalk.red(`✗ Failed:             ${report.failed.length}`));
  }
  if (report.batchErrors.length > 0) {
    logInfo(chalk.yellow('\nErrors reported by AnkiConnect:'));
    for (const error of report.batchErrors) {
      logInfo(chalk.yellow(`  - ${error}`));
    }
  }
  logInfo(`\nTotal time: ${(elapsedMs / 1000).toFixed(2)}s`);

  await logDebug(
    `Summary: ${report.committed} added, ${report.failed.length} failed, ${report.preflightRejected.length} pre-flight warnings`,
  );
}
