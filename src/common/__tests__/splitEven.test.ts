import { describe, it, expect } from 'vitest';
import splitEven from '../splitEven';
import concatArrays from '../concatArrays';

describe('splitEven', () => {
  it('gives the leading slices the remainder', () => {
    expect(splitEven([1, 2, 3, 4, 5], 3)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('leaves trailing slices empty when there are fewer items', () => {
    expect(splitEven(['a'], 3)).toEqual([['a'], [], []]);
  });

  it('keeps every item in order', () => {
    const items = [...Array(17).keys()];

    expect(concatArrays(splitEven(items, 4))).toEqual(items);
  });
});
