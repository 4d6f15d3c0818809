import { ConfigError } from '../types/errors.js';
import type { WordPredicate } from './lexical-catalog.js';

// Lengths count code points, not UTF-16 units
const length = (word: string): number => Array.from(word).length;

export const NAMED_FILTERS = {
  shorter_than_10: (word: string) => length(word) < 10,
  shorter_than_8: (word: string) => length(word) < 8,
  longer_than_3: (word: string) => length(word) > 3,
  alpha_only: (word: string) => /^\p{L}+$/u.test(word),
  ascii_only: (word: string) => /^[\x00-\x7f]*$/.test(word), // eslint-disable-line no-control-regex
} satisfies Record<string, WordPredicate>;

export type FilterName = keyof typeof NAMED_FILTERS;

export const FILTER_NAMES = Object.keys(NAMED_FILTERS);

export function isFilterName(name: string): name is FilterName {
  return Object.prototype.hasOwnProperty.call(NAMED_FILTERS, name);
}

export function getNamedFilter(name: string): WordPredicate {
  if (!isFilterName(name)) {
    throw new ConfigError({
      message: `Unknown dictionary filter "${name}"`,
      context: {
        setting: 'filter',
        suggestion: `Use one of: ${FILTER_NAMES.join(', ')}`,
      },
    });
  }
  return NAMED_FILTERS[name];
}
