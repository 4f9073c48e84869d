import { describe, it, expect } from 'vitest';
import { emptyReport, recordCommit, recordPreflight } from './reporting.js';
import { makeNote } from '../testing/mock-anki.js';

describe('report accumulation', () => {
  it('adds pre-flight counts without mutating the previous report', () => {
    const start = emptyReport();
    const rejected = makeNote('He');

    const next = recordPreflight(start, {
      batchIndex: 0,
      submitted: 3,
      rejected: [rejected],
    });

    expect(start).toEqual(emptyReport());
    expect(next).toMatchObject({
      batches: 1,
      submitted: 3,
      prevalidated: 2,
      preflightRejected: [rejected],
    });
  });

  it('accumulates commits across batches', () => {
    const failedNote = makeNote('Li');
    const afterFirst = recordCommit(emptyReport(), {
      batchIndex: 0,
      submitted: 2,
      added: 2,
      failed: [],
      error: null,
    });
    const afterSecond = recordCommit(afterFirst, {
      batchIndex: 1,
      submitted: 1,
      added: 0,
      failed: [failedNote],
      error: 'cannot create note because it is a duplicate',
    });

    expect(afterSecond.committed).toBe(2);
    expect(afterSecond.failed).toEqual([failedNote]);
    expect(afterSecond.batchErrors).toEqual([
      'cannot create note because it is a duplicate',
    ]);
  });
});
