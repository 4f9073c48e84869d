/**
 * A single cell as it comes out of the record source.
 * `null`/`undefined` means the column is missing for this row.
 */
export type RawValue = string | number | null | undefined;

export type RawRecord = Readonly<Record<string, RawValue>>;

/**
 * Ordered [column, field] pairs. Later pairs overwrite earlier ones
 * when they target the same field.
 */
export type ColumnMapping = ReadonlyArray<readonly [column: string, field: string]>;

// Field name -> non-empty trimmed value
export type NoteFields = Record<string, string>;

export type Note = {
  deckName: string;
  modelName: string;
  fields: NoteFields;
  options: { allowDuplicate: boolean };
  tags: string[];
};
