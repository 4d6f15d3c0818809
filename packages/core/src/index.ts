// @phrasemask/core entry point
//
// Public API:
// - PassphraseEngine with createCharacterEngine/createLexicalEngine is the
//   preferred entry point; it ties every operation to one resolver cache.
// - Lower-level building blocks (registry, catalog, grammar, resolver,
//   enumerator, search, entropy math, loaders) are exported for callers that
//   wire their own pipeline.

export {
  PassphraseEngine,
  createCharacterEngine,
  createLexicalEngine,
  type MaskInput,
} from './engine/passphrase-engine.js';

export {
  ClassRegistry,
  CHARACTER_CLASS_TOKENS,
  BASE_CHARACTER_CLASSES,
  ANY_CHARACTER_TOKEN,
  type CharacterClassToken,
  type BaseCharacterClass,
} from './alphabet/class-registry.js';

export {
  LexicalCatalog,
  PARTS_OF_SPEECH,
  COUNTED_CATEGORIES,
  ANY_ENTRY_TOKEN,
  type PartOfSpeech,
  type CountedCategory,
  type CategoryCounts,
  type WordPredicate,
} from './catalog/lexical-catalog.js';
export {
  NAMED_FILTERS,
  FILTER_NAMES,
  getNamedFilter,
  isFilterName,
  type FilterName,
} from './catalog/filters.js';

export { parseMask, translateTemplate, type Mask } from './mask/mask-grammar.js';

export {
  ClassResolver,
  MemberCache,
  type ClassSource,
  type MemberCacheStats,
} from './resolver/class-resolver.js';

export {
  cartesianProduct,
  candidateStream,
  joinCandidate,
  productSize,
} from './enumerate/cartesian.js';

export {
  crack,
  isFound,
  type CrackTarget,
  type SearchState,
  type SearchOutcome,
  type FoundOutcome,
  type CountOutcome,
} from './search/cracking-search.js';
export { digestHex, normalizeDigest } from './search/digest.js';

export {
  bitsOfEntropy,
  crackTimeEstimate,
  hashRateLabel,
  possibilityCount,
  securityReport,
  formatSecurityReport,
  type Possibilities,
  type CrackTimeEstimate,
  type SecurityReport,
} from './entropy/entropy.js';

export { generatePassphrase } from './sample/generate.js';
export {
  XorShift32,
  fnv1a32,
  pickIndex,
  type RandomSource,
} from './util/rng.js';
export { stderrLog, silentLog, LOG_PREFIX } from './util/log.js';

export {
  loadDictionary,
  parseDictionary,
  catalogFromDocument,
} from './io/dictionary.js';
export { loadTargetHashes, parseTargetHashes } from './io/target-hashes.js';
export type {
  DictionaryDocument,
  DictionaryEntry,
  DictionaryDefinition,
} from './io/schemas.js';

export {
  DEFAULT_HASH_RATE,
  DEFAULT_SEARCH_OPTIONS,
  DEFAULT_ESTIMATE_OPTIONS,
  SUPPORTED_ALGORITHMS,
  resolveSearchOptions,
  resolveEstimateOptions,
  isDigestAlgorithm,
  type DigestAlgorithm,
  type SearchOptions,
  type EstimateOptions,
  type LogSink,
} from './types/options.js';

// Errors
export { ErrorCode, type Severity, getExitCode } from './errors/codes.js';
export { ErrorPresenter, type CLIErrorView } from './errors/presenter.js';
export {
  PhraseMaskError,
  CatalogError,
  ResolutionError,
  DomainError,
  ConfigError,
  ParseError,
  InternalError,
  isPhraseMaskError,
  type ErrorContext,
  type SerializedError,
} from './types/errors.js';
export {
  ok,
  err,
  isOk,
  isErr,
  unwrap,
  mapResult,
  type Result,
  type Ok,
  type Err,
} from './types/result.js';
