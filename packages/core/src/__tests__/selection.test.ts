import { describe, it, expect } from 'vitest';
import { cancelled, isBackAnswer, isCancelled, selected } from '../types/selection.js';

describe('Selection', () => {
  it('keeps an empty selection distinct from a cancellation', () => {
    const empty = selected<number[]>([]);
    const back = cancelled<number[]>();

    expect(isCancelled(empty)).toBe(false);
    expect(isCancelled(back)).toBe(true);
    expect(empty).toEqual({ kind: 'selected', value: [] });
  });

  it('recognises the back answer in any case', () => {
    expect(isBackAnswer(' Q ')).toBe(true);
    expect(isBackAnswer('quit')).toBe(false);
  });
});
