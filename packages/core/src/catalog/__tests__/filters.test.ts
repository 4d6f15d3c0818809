import { describe, it, expect } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { ConfigError } from '../../types/errors.js';
import { FILTER_NAMES, NAMED_FILTERS, getNamedFilter, isFilterName } from '../filters.js';

describe('named dictionary filters', () => {
  it('bounds word length in code points', () => {
    expect(NAMED_FILTERS.shorter_than_8('seven77')).toBe(true);
    expect(NAMED_FILTERS.shorter_than_8('elephants')).toBe(false);
    expect(NAMED_FILTERS.shorter_than_10('elephants')).toBe(true);
    expect(NAMED_FILTERS.shorter_than_10('abcdefghij')).toBe(false);
    expect(NAMED_FILTERS.longer_than_3('abc')).toBe(false);
    expect(NAMED_FILTERS.longer_than_3('abcd')).toBe(true);
    // 7 code points, 14 UTF-16 units
    expect(NAMED_FILTERS.shorter_than_8('\u{1F600}'.repeat(7))).toBe(true);
  });

  it('keeps letters only for alpha_only', () => {
    expect(NAMED_FILTERS.alpha_only('café')).toBe(true);
    expect(NAMED_FILTERS.alpha_only('ab1')).toBe(false);
    expect(NAMED_FILTERS.alpha_only("don't")).toBe(false);
  });

  it('keeps 7-bit words for ascii_only', () => {
    expect(NAMED_FILTERS.ascii_only('plain')).toBe(true);
    expect(NAMED_FILTERS.ascii_only('café')).toBe(false);
  });

  it('looks filters up by name', () => {
    expect(isFilterName('alpha_only')).toBe(true);
    expect(isFilterName('constructor')).toBe(false);
    expect(getNamedFilter('longer_than_3')).toBe(NAMED_FILTERS.longer_than_3);
    expect(FILTER_NAMES).toEqual([
      'shorter_than_10',
      'shorter_than_8',
      'longer_than_3',
      'alpha_only',
      'ascii_only',
    ]);
  });

  it('rejects unknown names with a configuration error', () => {
    expect(() => getNamedFilter('shortest')).toThrow(ConfigError);
    try {
      getNamedFilter('shortest');
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      expect(error.errorCode).toBe(ErrorCode.CONFIGURATION_ERROR);
      expect(error.setting).toBe('filter');
      expect(error.message).toBe('Unknown dictionary filter "shortest"');
    }
  });
});
