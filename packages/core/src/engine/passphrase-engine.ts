import { ClassRegistry } from '../alphabet/class-registry.js';
import { getNamedFilter } from '../catalog/filters.js';
import type {
  CategoryCounts,
  LexicalCatalog,
  WordPredicate,
} from '../catalog/lexical-catalog.js';
import { candidateStream } from '../enumerate/cartesian.js';
import {
  possibilityCount,
  securityReport,
  type SecurityReport,
} from '../entropy/entropy.js';
import { parseMask, type Mask } from '../mask/mask-grammar.js';
import { ClassResolver, type ClassSource } from '../resolver/class-resolver.js';
import { generatePassphrase } from '../sample/generate.js';
import {
  crack,
  type CrackTarget,
  type SearchOutcome,
} from '../search/cracking-search.js';
import {
  resolveEstimateOptions,
  type EstimateOptions,
  type SearchOptions,
} from '../types/options.js';
import type { RandomSource } from '../util/rng.js';

export type MaskInput = string | Mask;

/**
 * One engine for both class sources: the fixed character registry and a
 * lexical catalog. All operations share a single resolver cache, so the
 * entropy estimate always describes the space that enumeration walks.
 */
export class PassphraseEngine<S extends ClassSource = ClassSource> {
  readonly resolver: ClassResolver;
  readonly estimate: EstimateOptions;

  constructor(
    readonly source: S,
    options: Partial<EstimateOptions> = {}
  ) {
    this.resolver = new ClassResolver(source);
    this.estimate = resolveEstimateOptions(options);
  }

  parse(mask: MaskInput): Mask {
    return typeof mask === 'string' ? parseMask(mask) : mask;
  }

  resolveMask(mask: MaskInput): Array<readonly string[]> {
    return this.resolver.resolveMask(this.parse(mask));
  }

  possibilityCount(mask: MaskInput): bigint {
    return possibilityCount(this.parse(mask), this.resolver);
  }

  security(mask: MaskInput): SecurityReport {
    return securityReport(this.possibilityCount(mask), this.estimate.hashRate);
  }

  /**
   * Candidates of `mask` in odometer order. Resolution happens eagerly so
   * an empty class fails here rather than yielding an empty stream.
   */
  enumerate(mask: MaskInput): Generator<string, void, undefined> {
    return candidateStream(this.resolveMask(mask));
  }

  async crack(
    mask: MaskInput,
    target: CrackTarget,
    options: Partial<SearchOptions> = {}
  ): Promise<SearchOutcome> {
    // Mask errors reject before any candidate is hashed
    const lists = this.resolveMask(mask);
    return crack(lists, target, options);
  }

  generate(mask: MaskInput, random?: RandomSource): string {
    return generatePassphrase(this.parse(mask), this.resolver, random);
  }

  /**
   * Filter the engine's catalog by name or predicate. With `commit` the
   * catalog is replaced in place; the resolver notices the version bump and drops
   * every cached member list.
   */
  filterCatalog(
    this: PassphraseEngine<LexicalCatalog>,
    filter: string | WordPredicate,
    commit = false
  ): LexicalCatalog {
    const predicate = typeof filter === 'string' ? getNamedFilter(filter) : filter;
    return this.source.filter(predicate, commit);
  }

  categoryCounts(
    this: PassphraseEngine<LexicalCatalog>,
    subcatalog?: LexicalCatalog
  ): CategoryCounts {
    return this.source.categoryCounts(subcatalog);
  }
}

export function createCharacterEngine(
  options: Partial<EstimateOptions> = {}
): PassphraseEngine<ClassRegistry> {
  return new PassphraseEngine(new ClassRegistry(), options);
}

export function createLexicalEngine(
  catalog: LexicalCatalog,
  options: Partial<EstimateOptions> = {}
): PassphraseEngine<LexicalCatalog> {
  return new PassphraseEngine(catalog, options);
}
