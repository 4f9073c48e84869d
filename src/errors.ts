import type { Note } from './notes/types.js';

/**
 * Fatal problems found before anything is written to Anki: bad config,
 * missing files, an unreachable service, or a missing deck/note type.
 */
export class SetupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SetupError';
  }
}

export class ConfigError extends SetupError {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = 'ConfigError';
  }
}

export class FileNotFoundError extends SetupError {
  readonly path: string;

  constructor(path: string) {
    super(`File not found: ${path}`);
    this.name = 'FileNotFoundError';
    this.path = path;
  }
}

export class ServiceUnavailableError extends SetupError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`AnkiConnect is not available: ${message}`, options);
    this.name = 'ServiceUnavailableError';
  }
}

export class VersionMismatchError extends SetupError {
  readonly expected: number;
  readonly actual: unknown;

  constructor(expected: number, actual: unknown) {
    super(
      `AnkiConnect version mismatch: expected ${expected}, got ${JSON.stringify(actual)}`,
    );
    this.name = 'VersionMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class DeckNotFoundError extends SetupError {
  readonly deckName: string;

  constructor(deckName: string, available: string[]) {
    super(
      `Deck "${deckName}" does not exist in Anki. Available decks: ${available.join(', ')}`,
    );
    this.name = 'DeckNotFoundError';
    this.deckName = deckName;
  }
}

export class NoteTypeNotFoundError extends SetupError {
  readonly noteType: string;

  constructor(noteType: string, available: string[]) {
    super(
      `Note type "${noteType}" does not exist. Available note types: ${available.join(', ')}`,
    );
    this.name = 'NoteTypeNotFoundError';
    this.noteType = noteType;
  }
}

/**
 * The data itself is unfit for upload.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class DuplicateIndexError extends ValidationError {
  readonly field: string;
  readonly value: string;

  constructor(field: string, value: string) {
    super(`Index field "${field}" value "${value}" appears multiple times.`);
    this.name = 'DuplicateIndexError';
    this.field = field;
    this.value = value;
  }
}

export class PreflightRejectedError extends ValidationError {
  readonly batchIndex: number;
  readonly rejected: Note[];

  constructor(batchIndex: number, batchSize: number, rejected: Note[]) {
    super(
      `${batchSize - rejected.length} / ${batchSize} notes in batch ${batchIndex + 1} can be added. Nothing was uploaded.`,
    );
    this.name = 'PreflightRejectedError';
    this.batchIndex = batchIndex;
    this.rejected = rejected;
  }
}

/**
 * HTTP-level failure talking to AnkiConnect or downloading a CSV.
 */
export class TransportError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'TransportError';
    this.status = options?.status;
  }
}

/**
 * AnkiConnect answered, but with a non-null `error` for an action that must succeed.
 */
export class ActionError extends Error {
  readonly action: string;
  readonly serviceMessage: string;

  constructor(action: string, serviceMessage: string) {
    super(`AnkiConnect API error for "${action}": ${serviceMessage}`);
    this.name = 'ActionError';
    this.action = action;
    this.serviceMessage = serviceMessage;
  }
}

export class RecordSourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecordSourceError';
  }
}
