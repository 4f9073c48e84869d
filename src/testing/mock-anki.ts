import {
  AnkiConnectClient,
  type AnkiRequestPayload,
  type AnkiTransport,
} from '../anki-connect.js';
import type { Note } from '../notes/types.js';

export type ActionHandler = (payload: AnkiRequestPayload) => unknown;

/**
 * In-process AnkiConnect stand-in. Every request is recorded in `calls`.
 */
export function createMockAnki(
  overrides: Partial<Record<string, ActionHandler>> = {},
) {
  const handlers: Partial<Record<string, ActionHandler>> = {
    version: () => ({ result: 6, error: null }),
    deckNames: () => ({ result: ['Default', 'Elements'], error: null }),
    modelNames: () => ({ result: ['Basic', 'Element'], error: null }),
    canAddNotes: (payload) => ({
      result: notesOf(payload).map(() => true),
      error: null,
    }),
    addNotes: (payload) => ({
      result: notesOf(payload).map((_, i) => 1000 + i),
      error: null,
    }),
    ...overrides,
  };

  const calls: AnkiRequestPayload[] = [];
  const transport: AnkiTransport = (payload) => {
    calls.push(payload);
    const handler = handlers[payload.action];
    if (!handler) {
      return Promise.resolve({
        result: null,
        error: `unsupported action: ${payload.action}`,
      });
    }
    return Promise.resolve(handler(payload));
  };

  return {
    client: new AnkiConnectClient(transport),
    calls,
    actions: () => calls.map((call) => call.action),
    sentNotes: (action: string) =>
      calls.filter((call) => call.action === action).map(notesOf),
  };
}

export function notesOf(payload: AnkiRequestPayload): unknown[] {
  const notes = payload.params?.notes;
  return Array.isArray(notes) ? notes : [];
}

export function makeNote(front: string, back = `${front} back`): Note {
  return {
    deckName: 'Elements',
    modelName: 'Element',
    fields: { Front: front, Back: back },
    options: { allowDuplicate: false },
    tags: [],
  };
}
