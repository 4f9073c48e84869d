import { DuplicateIndexError } from '../errors.js';
import type { NoteFields } from './types.js';

/**
 * Drops rows that did not produce a value for the index field.
 */
export function filterByIndexField(
  fieldsList: readonly NoteFields[],
  indexField: string,
): NoteFields[] {
  return fieldsList.filter((fields) => Object.hasOwn(fields, indexField));
}

/**
 * Throws on the first index-field value seen twice.
 * Rows without the index field are ignored here; filter them first.
 */
export function assertUniqueIndexField(
  fieldsList: Iterable<NoteFields>,
  indexField: string,
): void {
  const seen = new Set<string>();
  for (const fields of fieldsList) {
    if (!Object.hasOwn(fields, indexField)) {
      continue;
    }
    const value = fields[indexField];
    if (seen.has(value)) {
      throw new DuplicateIndexError(indexField, value);
    }
    seen.add(value);
  }
}
