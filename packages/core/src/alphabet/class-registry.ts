/**
 * Fixed character classes that every mask can draw from.
 *
 * `letter` is lowercase followed by uppercase; `any` is punctuation, then
 * digits, then `letter`. Member order is load-bearing: it fixes the
 * enumeration order of every mask built on these classes.
 */

export const CHARACTER_CLASS_TOKENS = [
  'lower',
  'upper',
  'punc',
  'digit',
  'letter',
  'any',
] as const;

export type CharacterClassToken = (typeof CHARACTER_CLASS_TOKENS)[number];

/** Classes that hold single characters rather than unions of other classes. */
export const BASE_CHARACTER_CLASSES = ['lower', 'upper', 'punc', 'digit'] as const;

export type BaseCharacterClass = (typeof BASE_CHARACTER_CLASSES)[number];

/** Token accepted as "any single character" by translated templates. */
export const ANY_CHARACTER_TOKEN = 'anyc';

const LOWERCASE = 'abcdefghijklmnopqrstuvwxyz';
const UPPERCASE = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const DIGITS = '0123456789';
const PUNCTUATION = '!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~';

export class ClassRegistry {
  // Registries never mutate, so resolver caches built on them stay valid
  readonly version = 0;

  readonly #classes: ReadonlyMap<CharacterClassToken, readonly string[]>;

  constructor() {
    const lower = Array.from(LOWERCASE);
    const upper = Array.from(UPPERCASE);
    const punc = Array.from(PUNCTUATION);
    const digit = Array.from(DIGITS);
    const letter = [...lower, ...upper];
    this.#classes = new Map<CharacterClassToken, readonly string[]>([
      ['lower', lower],
      ['upper', upper],
      ['punc', punc],
      ['digit', digit],
      ['letter', letter],
      ['any', [...punc, ...digit, ...letter]],
    ]);
  }

  has(token: string): token is CharacterClassToken {
    return (CHARACTER_CLASS_TOKENS as readonly string[]).includes(token);
  }

  /** Ordered members of a fixed class. */
  get(token: CharacterClassToken): readonly string[] {
    return this.#classes.get(token) ?? [];
  }

  /**
   * Class lookup for the character-only engine. Unknown tokens have no
   * members; `anyc` is the same set as `any`.
   */
  membersOf(token: string): readonly string[] {
    const key = token === ANY_CHARACTER_TOKEN ? 'any' : token;
    return this.has(key) ? this.get(key) : [];
  }

  entries(): Iterable<[CharacterClassToken, readonly string[]]> {
    return this.#classes.entries();
  }
}
