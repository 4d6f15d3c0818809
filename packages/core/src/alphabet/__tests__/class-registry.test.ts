import { describe, it, expect } from 'vitest';

import { ClassRegistry } from '../class-registry.js';

describe('ClassRegistry', () => {
  const registry = new ClassRegistry();

  it('holds the fixed class sizes', () => {
    expect(registry.get('lower')).toHaveLength(26);
    expect(registry.get('upper')).toHaveLength(26);
    expect(registry.get('punc')).toHaveLength(32);
    expect(registry.get('digit')).toHaveLength(10);
    expect(registry.get('letter')).toHaveLength(52);
    expect(registry.get('any')).toHaveLength(94);
  });

  it('orders letter as lowercase then uppercase', () => {
    const letter = registry.get('letter');
    expect(letter[0]).toBe('a');
    expect(letter[25]).toBe('z');
    expect(letter[26]).toBe('A');
    expect(letter[51]).toBe('Z');
  });

  it('orders any as punctuation, digits, then letters', () => {
    const any = registry.get('any');
    expect(any[0]).toBe('!');
    expect(any[31]).toBe('~');
    expect(any[32]).toBe('0');
    expect(any[41]).toBe('9');
    expect(any[42]).toBe('a');
    expect(any[93]).toBe('Z');
  });

  it('has no duplicate members in any', () => {
    const any = registry.get('any');
    expect(new Set(any).size).toBe(any.length);
  });

  it('treats anyc as any and unknown tokens as empty', () => {
    expect(registry.membersOf('anyc')).toEqual(registry.get('any'));
    expect(registry.membersOf('noun')).toEqual([]);
    expect(registry.has('noun')).toBe(false);
    expect(registry.has('digit')).toBe(true);
  });

  it('never changes version', () => {
    expect(registry.version).toBe(0);
  });
});
