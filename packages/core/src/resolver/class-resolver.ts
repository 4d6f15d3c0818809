import type { Mask } from '../mask/mask-grammar.js';
import { ErrorCode } from '../errors/codes.js';
import { ResolutionError } from '../types/errors.js';

/**
 * Anything that can list the members of a class token. `version` must
 * change whenever `membersOf` could start answering differently.
 */
export interface ClassSource {
  readonly version: number;
  membersOf(token: string): readonly string[];
}

export interface MemberCacheStats {
  hits: number;
  misses: number;
  invalidations: number;
}

/**
 * Token → member list memo, tagged with the source version it was filled
 * against. A version mismatch empties the cache before any read.
 */
export class MemberCache {
  readonly #lists = new Map<string, readonly string[]>();
  #generation: number;
  readonly #stats: MemberCacheStats = { hits: 0, misses: 0, invalidations: 0 };

  constructor(generation: number) {
    this.#generation = generation;
  }

  get generation(): number {
    return this.#generation;
  }

  get size(): number {
    return this.#lists.size;
  }

  get stats(): Readonly<MemberCacheStats> {
    return { ...this.#stats };
  }

  /** Drop every entry if `generation` differs from the one entries were built for. */
  sync(generation: number): void {
    if (generation === this.#generation) return;
    this.#lists.clear();
    this.#generation = generation;
    this.#stats.invalidations += 1;
  }

  get(token: string): readonly string[] | undefined {
    const list = this.#lists.get(token);
    if (list === undefined) {
      this.#stats.misses += 1;
    } else {
      this.#stats.hits += 1;
    }
    return list;
  }

  set(token: string, members: readonly string[]): void {
    this.#lists.set(token, members);
  }

  clear(): void {
    this.#lists.clear();
  }
}

export class ClassResolver {
  readonly #cache: MemberCache;

  constructor(private readonly source: ClassSource) {
    this.#cache = new MemberCache(source.version);
  }

  get cache(): MemberCache {
    return this.#cache;
  }

  /**
   * Ordered members of `token`, computed once per source version.
   * Fails with EMPTY_POSITION_CLASS when the source has no members for it.
   */
  resolve(token: string, position?: number): readonly string[] {
    this.#cache.sync(this.source.version);
    const cached = this.#cache.get(token);
    if (cached !== undefined) return cached;

    const members = this.source.membersOf(token);
    if (members.length === 0) {
      throw new ResolutionError({
        message: `Class "${token}" has no members`,
        context: {
          token,
          position,
          suggestion: 'Check the token spelling or the dictionary filters',
        },
      });
    }
    const frozen = Object.freeze([...members]);
    this.#cache.set(token, frozen);
    return frozen;
  }

  /** Resolve every position of a mask; a mask needs at least one token. */
  resolveMask(mask: Mask): Array<readonly string[]> {
    if (mask.length === 0) {
      throw new ResolutionError({
        message: 'Mask must contain at least one class token',
        errorCode: ErrorCode.INVALID_MASK,
      });
    }
    return mask.map((token, position) => this.resolve(token, position));
  }
}
