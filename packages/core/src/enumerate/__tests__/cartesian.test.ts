import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import {
  candidateStream,
  cartesianProduct,
  joinCandidate,
  productSize,
} from '../cartesian.js';

const numRuns = Number(process.env.FC_NUM_RUNS ?? '100');

// Small factors keep products enumerable
const factorsArb = fc.array(
  fc.uniqueArray(fc.string({ minLength: 1, maxLength: 2 }), {
    minLength: 1,
    maxLength: 4,
  }),
  { minLength: 1, maxLength: 4 }
);

describe('cartesianProduct', () => {
  it('varies the last position fastest', () => {
    const tuples = Array.from(cartesianProduct([['a', 'b'], ['1', '2', '3']]));
    expect(tuples).toEqual([
      ['a', '1'],
      ['a', '2'],
      ['a', '3'],
      ['b', '1'],
      ['b', '2'],
      ['b', '3'],
    ]);
  });

  it('yields nothing when a factor is empty', () => {
    expect(Array.from(cartesianProduct([['a'], [], ['b']]))).toEqual([]);
  });

  it('yields one empty tuple for zero factors', () => {
    expect(Array.from(cartesianProduct([]))).toEqual([[]]);
  });

  it('yields exactly productSize tuples', () => {
    fc.assert(
      fc.property(factorsArb, (lists) => {
        const tuples = Array.from(cartesianProduct(lists));
        expect(BigInt(tuples.length)).toBe(productSize(lists));
      }),
      { numRuns }
    );
  });

  it('yields pairwise distinct tuples', () => {
    fc.assert(
      fc.property(factorsArb, (lists) => {
        const keys = Array.from(cartesianProduct(lists), (tuple) =>
          JSON.stringify(tuple)
        );
        expect(new Set(keys).size).toBe(keys.length);
      }),
      { numRuns }
    );
  });

  it('repeats the same sequence on every traversal', () => {
    fc.assert(
      fc.property(factorsArb, (lists) => {
        expect(Array.from(cartesianProduct(lists))).toEqual(
          Array.from(cartesianProduct(lists))
        );
      }),
      { numRuns }
    );
  });

  it('does not share tuple arrays between yields', () => {
    const tuples = Array.from(cartesianProduct([['x', 'y']]));
    expect(tuples[0]).not.toBe(tuples[1]);
    expect(tuples).toEqual([['x'], ['y']]);
  });
});

describe('candidateStream', () => {
  it('joins each tuple into a string', () => {
    expect(Array.from(candidateStream([['ab', 'c'], ['1']]))).toEqual([
      'ab1',
      'c1',
    ]);
  });

  it('joins arbitrary parts', () => {
    expect(joinCandidate(['a', 1, 'b'])).toBe('a1b');
  });
});

describe('productSize', () => {
  it('stays exact beyond 2^53', () => {
    const lists = Array.from({ length: 10 }, () =>
      Array.from({ length: 94 }, (_, i) => i)
    );
    expect(productSize(lists)).toBe(94n ** 10n);
  });
});
