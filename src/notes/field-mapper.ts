import type { ColumnMapping, NoteFields, RawRecord, RawValue } from './types.js';

function toFieldValue(raw: RawValue): string | undefined {
  if (raw === null || raw === undefined) {
    return undefined;
  }
  const value = String(raw).trim();
  return value ? value : undefined;
}

/**
 * Maps one CSV row onto note fields.
 * Columns that are missing, null or blank after trimming produce no field at all.
 */
export function mapRecordToFields(
  record: RawRecord,
  columnsToFields: ColumnMapping,
): NoteFields {
  // No prototype: a field named `__proto__` must stay an ordinary key
  const fields: NoteFields = Object.create(null);
  for (const [column, field] of columnsToFields) {
    const value = Object.hasOwn(record, column)
      ? toFieldValue(record[column])
      : undefined;
    if (value !== undefined) {
      fields[field] = value;
    }
  }
  return fields;
}
