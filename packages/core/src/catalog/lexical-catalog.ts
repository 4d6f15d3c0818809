import {
  ANY_CHARACTER_TOKEN,
  BASE_CHARACTER_CLASSES,
  type ClassRegistry,
} from '../alphabet/class-registry.js';
import { CatalogError } from '../types/errors.js';

/** Grammatical categories a dictionary resource may assign to a word. */
export const PARTS_OF_SPEECH = [
  'noun',
  'verb',
  'adverb',
  'adjective',
  'pronoun',
  'conjunction',
  'preposition',
  'interjection',
] as const;

export type PartOfSpeech = (typeof PARTS_OF_SPEECH)[number];

/** Every category reported by {@link LexicalCatalog.categoryCounts}, in report order. */
export const COUNTED_CATEGORIES = [
  ...PARTS_OF_SPEECH,
  'anyc',
  'punc',
  'digit',
  'lower',
  'upper',
  'letter',
] as const;

export type CountedCategory = (typeof COUNTED_CATEGORIES)[number];

export type CategoryCounts = Record<CountedCategory | 'any', number>;

/** Token matching every entry regardless of its categories. */
export const ANY_ENTRY_TOKEN = 'any';

export type WordPredicate = (word: string) => boolean;

/**
 * Word → category-set mapping, iterated in insertion order.
 *
 * `version` increases on every mutation; resolvers compare it before
 * trusting a cached member list.
 */
export class LexicalCatalog {
  #entries: Map<string, ReadonlySet<string>>;
  #version = 0;

  constructor(entries: Iterable<[string, Iterable<string>]> = []) {
    this.#entries = new Map();
    for (const [word, categories] of entries) {
      this.#entries.set(word, new Set(categories));
    }
  }

  get version(): number {
    return this.#version;
  }

  get size(): number {
    return this.#entries.size;
  }

  has(word: string): boolean {
    return this.#entries.has(word);
  }

  words(): string[] {
    return Array.from(this.#entries.keys());
  }

  categoriesOf(word: string): readonly string[] {
    const categories = this.#entries.get(word);
    if (!categories) {
      throw new CatalogError({
        message: `Unknown catalog entry "${word}"`,
        context: { word },
      });
    }
    return Array.from(categories);
  }

  membersOf(token: string): readonly string[] {
    const members: string[] = [];
    for (const [word, categories] of this.#entries) {
      if (token === ANY_ENTRY_TOKEN || categories.has(token)) {
        members.push(word);
      }
    }
    return members;
  }

  /**
   * Keep entries whose word satisfies `predicate`. With `commit` the catalog
   * itself is replaced and its version bumped; otherwise a detached catalog
   * holding the subset is returned and this one is untouched.
   */
  filter(predicate: WordPredicate, commit = false): LexicalCatalog {
    const kept = new Map<string, ReadonlySet<string>>();
    for (const [word, categories] of this.#entries) {
      if (predicate(word)) kept.set(word, categories);
    }
    if (commit) {
      this.#entries = kept;
      this.#version += 1;
      return this;
    }
    return new LexicalCatalog(kept);
  }

  insert(word: string, categories: Iterable<string>): void {
    this.#entries.set(word, new Set(categories));
    this.#version += 1;
  }

  categoryCounts(subcatalog: LexicalCatalog = this): CategoryCounts {
    const counts: CategoryCounts = {
      noun: 0,
      verb: 0,
      adverb: 0,
      adjective: 0,
      pronoun: 0,
      conjunction: 0,
      preposition: 0,
      interjection: 0,
      anyc: 0,
      punc: 0,
      digit: 0,
      lower: 0,
      upper: 0,
      letter: 0,
      any: subcatalog.size,
    };
    for (const categories of subcatalog.#entries.values()) {
      for (const category of COUNTED_CATEGORIES) {
        if (categories.has(category)) counts[category] += 1;
      }
    }
    return counts;
  }

  /**
   * Add every registry character as a one-unit word tagged with its class
   * and `anyc`, plus `letter` for cased letters, so character tokens resolve
   * through the catalog the same way word tokens do.
   */
  seedCharacterClasses(registry: ClassRegistry): void {
    for (const cls of BASE_CHARACTER_CLASSES) {
      const categories: string[] = [cls, ANY_CHARACTER_TOKEN];
      if (cls === 'lower' || cls === 'upper') categories.push('letter');
      for (const ch of registry.get(cls)) {
        this.insert(ch, categories);
      }
    }
  }
}
