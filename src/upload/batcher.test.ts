import { describe, it, expect } from 'vitest';
import { chunk } from './batcher.js';

describe('chunk', () => {
  it('splits into full batches with a shorter final batch', () => {
    expect([...chunk([1, 2, 3, 4, 5], 2)]).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('defaults to batches of 100', () => {
    const items = Array.from({ length: 250 }, (_, i) => i);
    const sizes = [...chunk(items)].map((batch) => batch.length);
    expect(sizes).toEqual([100, 100, 50]);
  });

  it('reproduces the input when batches are concatenated', () => {
    const items = Array.from({ length: 17 }, (_, i) => `note-${i}`);
    for (const size of [1, 3, 16, 17, 18]) {
      expect([...chunk(items, size)].flat()).toEqual(items);
    }
  });

  it('yields nothing for empty input', () => {
    expect([...chunk([], 5)]).toEqual([]);
  });

  it('is lazy and restartable by calling again', () => {
    const items = ['a', 'b', 'c'];
    const first = chunk(items, 2);
    expect(first.next().value).toEqual(['a', 'b']);
    expect([...chunk(items, 2)]).toEqual([['a', 'b'], ['c']]);
  });

  it('rejects a batch size below one', () => {
    expect(() => [...chunk([1], 0)]).toThrow(RangeError);
    expect(() => [...chunk([1], 1.5)]).toThrow(RangeError);
  });
});
