import type { Note, NoteFields } from './types.js';

export interface NoteTarget {
  deckName: string;
  noteType: string;
  allowDuplicates: boolean;
}

export function buildNote(fields: NoteFields, target: NoteTarget): Note {
  return {
    deckName: target.deckName,
    modelName: target.noteType,
    fields,
    options: { allowDuplicate: target.allowDuplicates },
    tags: [],
  };
}
