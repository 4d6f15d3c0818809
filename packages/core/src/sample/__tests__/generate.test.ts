import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import { ClassRegistry } from '../../alphabet/class-registry.js';
import { ClassResolver } from '../../resolver/class-resolver.js';
import { ResolutionError } from '../../types/errors.js';
import { XorShift32 } from '../../util/rng.js';
import { generatePassphrase } from '../generate.js';

const numRuns = Number(process.env.FC_NUM_RUNS ?? '100');

const registry = new ClassRegistry();
const resolver = new ClassResolver(registry);

describe('generatePassphrase', () => {
  it('draws one member of each position class', () => {
    fc.assert(
      fc.property(fc.integer(), (seed) => {
        const random = new XorShift32(seed, 'upper digit punc').asSource();
        const sample = generatePassphrase(['upper', 'digit', 'punc'], resolver, random);
        const chars = Array.from(sample);

        expect(chars).toHaveLength(3);
        expect(registry.get('upper')).toContain(chars[0]);
        expect(registry.get('digit')).toContain(chars[1]);
        expect(registry.get('punc')).toContain(chars[2]);
      }),
      { numRuns }
    );
  });

  it('is reproducible for a fixed seed', () => {
    const a = new XorShift32(7, 'mask').asSource();
    const b = new XorShift32(7, 'mask').asSource();
    const mask = ['lower', 'lower', 'lower', 'digit'];
    expect(generatePassphrase(mask, resolver, a)).toBe(
      generatePassphrase(mask, resolver, b)
    );
  });

  it('picks by index from the random source', () => {
    expect(generatePassphrase(['digit'], resolver, () => 0)).toBe('0');
    expect(generatePassphrase(['digit'], resolver, () => 0.55)).toBe('5');
    // A source returning 1 still lands on the last member
    expect(generatePassphrase(['digit'], resolver, () => 1)).toBe('9');
  });

  it('fails for a class without members', () => {
    expect(() => generatePassphrase(['noun'], resolver)).toThrow(ResolutionError);
  });
});
