/**
 * Configuration options for the phrasemask engine
 *
 * All options are optional with conservative defaults.
 */

/** Illustrative GPU cluster throughput used for crack-time estimates. */
export const DEFAULT_HASH_RATE = 623_000_000_000;

export type DigestAlgorithm = 'sha1' | 'sha256' | 'sha512' | 'md5';

export const SUPPORTED_ALGORITHMS: readonly DigestAlgorithm[] = [
  'sha1',
  'sha256',
  'sha512',
  'md5',
];

export type LogSink = (message: string) => void;

/**
 * Cracking search configuration
 */
export interface SearchOptions {
  /** Wall-clock budget in seconds, 0 = unbounded (default: 0) */
  timeoutSeconds: number;
  /** Log elapsed time on found/interrupted (default: true) */
  reportElapsed: boolean;
  /** Digest algorithm used for candidates and targets (default: 'sha1') */
  algorithm: DigestAlgorithm;
  /** Set mode: stop as soon as every target has been matched (default: false) */
  stopWhenAllMatched: boolean;
  /** Yield to the event loop every N candidates, 0 = never (default: 4096) */
  yieldEvery: number;
  /** Cooperative cancellation, checked once per candidate */
  signal?: AbortSignal;
  /** Monotonic clock in milliseconds (default: performance.now) */
  clock?: () => number;
  /** Diagnostic sink (default: stderr with a [phrasemask] prefix) */
  log?: LogSink;
}

/**
 * Entropy estimate configuration
 */
export interface EstimateOptions {
  /** Hashes per second assumed by crack-time estimates (default: 623e9) */
  hashRate: number;
}

export const DEFAULT_SEARCH_OPTIONS: Readonly<SearchOptions> = {
  timeoutSeconds: 0,
  reportElapsed: true,
  algorithm: 'sha1',
  stopWhenAllMatched: false,
  yieldEvery: 4096,
};

export const DEFAULT_ESTIMATE_OPTIONS: Readonly<EstimateOptions> = {
  hashRate: DEFAULT_HASH_RATE,
};

/**
 * Merge user options over the defaults
 */
export function resolveSearchOptions(
  userOptions: Partial<SearchOptions> = {}
): SearchOptions {
  const defaults = DEFAULT_SEARCH_OPTIONS;
  return {
    timeoutSeconds: userOptions.timeoutSeconds ?? defaults.timeoutSeconds,
    reportElapsed: userOptions.reportElapsed ?? defaults.reportElapsed,
    algorithm: userOptions.algorithm ?? defaults.algorithm,
    stopWhenAllMatched:
      userOptions.stopWhenAllMatched ?? defaults.stopWhenAllMatched,
    yieldEvery: userOptions.yieldEvery ?? defaults.yieldEvery,
    signal: userOptions.signal,
    clock: userOptions.clock,
    log: userOptions.log,
  };
}

export function resolveEstimateOptions(
  userOptions: Partial<EstimateOptions> = {}
): EstimateOptions {
  return {
    hashRate: userOptions.hashRate ?? DEFAULT_ESTIMATE_OPTIONS.hashRate,
  };
}

export function isDigestAlgorithm(value: string): value is DigestAlgorithm {
  return (SUPPORTED_ALGORITHMS as readonly string[]).includes(value);
}
