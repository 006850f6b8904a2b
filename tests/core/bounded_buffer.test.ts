import { describe, expect, it } from 'vitest';

import { BoundedBuffer } from '../../src/core/bounded-buffer.js';

describe('BoundedBuffer: eviction', () => {
  it('keeps the newest items oldest-first and returns the evicted one', () => {
    const buffer = new BoundedBuffer<string>(3);
    expect(buffer.push('a')).toBeUndefined();
    buffer.push('b');
    buffer.push('c');
    expect(buffer.push('d')).toBe('a');
    expect(buffer.toArray()).toEqual(['b', 'c', 'd']);
    expect(buffer.size).toBe(3);
  });

  it('latest(n) returns the n most recent, oldest first', () => {
    const buffer = BoundedBuffer.from(5, ['m1', 'm2', 'm3', 'm4']);
    expect(buffer.latest(2)).toEqual(['m3', 'm4']);
    expect(buffer.latest(10)).toEqual(['m1', 'm2', 'm3', 'm4']);
    expect(buffer.latest(0)).toEqual([]);
  });

  it('from() keeps only the newest capacity items', () => {
    const buffer = BoundedBuffer.from(2, [1, 2, 3, 4]);
    expect(buffer.toArray()).toEqual([3, 4]);
  });

  it('pushUnique refuses duplicates', () => {
    const buffer = new BoundedBuffer<string>(3);
    expect(buffer.pushUnique('rumour')).toBe(true);
    expect(buffer.pushUnique('rumour')).toBe(false);
    expect(buffer.toArray()).toEqual(['rumour']);
  });

  it('clear empties the buffer', () => {
    const buffer = BoundedBuffer.from(3, ['x', 'y']);
    buffer.clear();
    expect(buffer.size).toBe(0);
    expect(buffer.toArray()).toEqual([]);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new BoundedBuffer(0)).toThrow(RangeError);
    expect(() => new BoundedBuffer(1.5)).toThrow(RangeError);
  });
});
