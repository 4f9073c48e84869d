import { writeFile, appendFile } from 'fs/promises';
import chalk from 'chalk';

// null until initLogger; file writes are skipped while unset
let logFilePath: string | null = null;
let isVerbose = false;

export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Starts a fresh log file for this session, truncating the old one.
 */
export async function initLogger(
  path: string,
  verbose: boolean = false,
): Promise<void> {
  logFilePath = path;
  isVerbose = verbose;
  await writeFile(logFilePath, '', 'utf-8');
}

/** Ends the session's file logging. */
export function closeLogger(): void {
  logFilePath = null;
  isVerbose = false;
}

/**
 * File-only entry with an ISO timestamp and colours removed.
 */
export async function logDebug(message: string): Promise<void> {
  if (!logFilePath) return;

  const cleanMessage = stripAnsi(message);
  const timestamp = new Date().toISOString();
  const logEntry = `[${timestamp}] ${cleanMessage}\n`;

  try {
    await appendFile(logFilePath, logEntry, 'utf-8');
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`Failed to write to log file: ${errorMsg}`));
  }
}

export function logInfo(message: string): void {
  console.log(message);
}

/**
 * Console and file. Surrounding blank lines are kept for the console only.
 */
export async function logInfoTee(message: string): Promise<void> {
  logInfo(message);

  const trimmedMessage = message.trim();
  if (trimmedMessage) {
    await logDebug(trimmedMessage);
  }
}

export async function logWarn(message: string): Promise<void> {
  console.warn(chalk.yellow(message));
  const trimmedMessage = message.trim();
  if (trimmedMessage) {
    await logDebug(`WARN: ${trimmedMessage}`);
  }
}

export async function logError(
  message: string,
  error?: unknown,
): Promise<void> {
  const errorMessage = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`\n✗ Error: ${message}`));
  await logDebug(`ERROR: ${message}. Details: ${errorMessage}`);
}

// AnkiConnect payloads; written only under --verbose
export async function logVerbose(message: string): Promise<void> {
  if (!isVerbose) return;
  await logDebug(`[VERBOSE] ${message}`);
}
