import {
  ConfigError,
  SUPPORTED_ALGORITHMS,
  isDigestAlgorithm,
  translateTemplate,
  type DigestAlgorithm,
  type SearchOptions,
} from '@phrasemask/core';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  dict?: string;
  filter?: string[];
  template?: boolean;
  rate?: string | number;
  // crack
  hash?: string;
  hashes?: string;
  timeout?: string | number;
  algorithm?: string;
  time?: boolean;
  stopWhenAllMatched?: boolean;
  // generate
  count?: string | number;
  seed?: string | number;
  debug?: boolean;
  [key: string]: unknown;
}

/** `counts` declares --dict with requiredOption, so commander always sets it */
export interface CountsOptions {
  dict: string;
  filter?: string[];
}

/**
 * Join the variadic mask argument and translate it when --template is set.
 */
export function resolveMaskArgument(
  parts: readonly string[],
  template: boolean | undefined
): string {
  const joined = parts.join(' ');
  return template === true ? translateTemplate(joined) : joined;
}

function parseNumber(
  setting: string,
  value: unknown,
  accept: (n: number) => boolean,
  expected: string
): number {
  const num = typeof value === 'number' ? value : Number(String(value));
  if (!Number.isFinite(num) || !accept(num)) {
    throw new ConfigError({
      message: `Invalid --${setting} value "${String(value)}". Expected ${expected}.`,
      context: { setting },
    });
  }
  return num;
}

export function resolveTimeout(value: unknown): number {
  if (value === undefined) return 0;
  return parseNumber('timeout', value, (n) => n >= 0, 'a non-negative number of seconds');
}

export function resolveSampleCount(value: unknown): number {
  if (value === undefined) return 1;
  return parseNumber(
    'count',
    value,
    (n) => Number.isInteger(n) && n > 0,
    'a positive integer'
  );
}

export function resolveSeed(value: unknown): number | undefined {
  if (value === undefined) return undefined;
  return parseNumber('seed', value, Number.isInteger, 'an integer');
}

export function resolveHashRate(value: unknown): number | undefined {
  if (value === undefined) return undefined;
  return parseNumber('rate', value, (n) => n > 0, 'a positive number of hashes per second');
}

export function resolveAlgorithm(value: unknown): DigestAlgorithm {
  if (value === undefined) return 'sha1';
  const raw = String(value).toLowerCase();
  if (isDigestAlgorithm(raw)) return raw;
  throw new ConfigError({
    message: `Invalid --algorithm value "${String(value)}".`,
    context: {
      setting: 'algorithm',
      suggestion: `Supported algorithms are ${SUPPORTED_ALGORITHMS.join(', ')}`,
    },
  });
}

export type TargetSource =
  | { kind: 'single'; digest: string }
  | { kind: 'file'; path: string };

/**
 * Exactly one of --hash and --hashes must be given.
 */
export function resolveTargetSource(
  options: Pick<CliOptions, 'hash' | 'hashes'>
): TargetSource {
  const { hash, hashes } = options;
  if (hash !== undefined && hashes !== undefined) {
    throw new ConfigError({
      message: 'Use either --hash or --hashes, not both',
      context: { setting: 'hash' },
    });
  }
  if (hash !== undefined) {
    if (!/^[0-9a-fA-F]+$/.test(hash)) {
      throw new ConfigError({
        message: `Invalid --hash value "${hash}". Expected a hex digest.`,
        context: { setting: 'hash' },
      });
    }
    return { kind: 'single', digest: hash };
  }
  if (hashes !== undefined) return { kind: 'file', path: hashes };
  throw new ConfigError({
    message: 'Missing target: pass --hash <hex> or --hashes <file>',
    context: { setting: 'hash' },
  });
}

/**
 * Map crack flags onto search options. Commander sets time=false for --no-time.
 */
export function parseSearchOptions(
  options: CliOptions
): Partial<SearchOptions> {
  return {
    timeoutSeconds: resolveTimeout(options.timeout),
    algorithm: resolveAlgorithm(options.algorithm),
    reportElapsed: options.time !== false,
    stopWhenAllMatched: options.stopWhenAllMatched === true,
  };
}
