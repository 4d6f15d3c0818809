import { performance } from 'node:perf_hooks';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

import { candidateStream } from '../enumerate/cartesian.js';
import { resolveSearchOptions, type SearchOptions } from '../types/options.js';
import { stderrLog } from '../util/log.js';
import { digestHex, normalizeDigest } from './digest.js';

/** One digest to recover, or a set of digests whose matches are counted. */
export type CrackTarget = string | ReadonlySet<string>;

export type SearchState =
  | 'found'
  | 'exhausted'
  | 'timeout'
  | 'interrupted'
  | 'matched-all';

interface SearchProgress {
  /** Candidates hashed before the search stopped */
  examined: number;
  elapsedSeconds: number;
}

export interface FoundOutcome extends SearchProgress {
  state: 'found';
  plaintext: string;
}

export interface CountOutcome extends SearchProgress {
  state: Exclude<SearchState, 'found'>;
  count: number;
}

export type SearchOutcome = FoundOutcome | CountOutcome;

type Matcher =
  | { kind: 'single'; digest: string }
  | { kind: 'set'; digests: ReadonlySet<string>; matched: Set<string> };

function createMatcher(target: CrackTarget): Matcher {
  if (typeof target === 'string') {
    return { kind: 'single', digest: normalizeDigest(target) };
  }
  // Copy so the caller's set is never touched
  const digests = new Set<string>();
  for (const digest of target) digests.add(normalizeDigest(digest));
  return { kind: 'set', digests, matched: new Set() };
}

export function isFound(outcome: SearchOutcome): outcome is FoundOutcome {
  return outcome.state === 'found';
}

/**
 * Hash every candidate of the resolved member lists, in enumeration order,
 * and compare against `target`.
 *
 * Single digest: stops on the first match with state `found`. Digest set:
 * counts every match and runs to exhaustion (or `matched-all` when
 * `stopWhenAllMatched` is on). A nonzero timeout stops with `timeout`; an
 * aborted signal stops with `interrupted`. Both carry the count so far and
 * neither throws.
 */
export async function crack(
  lists: ReadonlyArray<readonly string[]>,
  target: CrackTarget,
  options: Partial<SearchOptions> = {}
): Promise<SearchOutcome> {
  const opts = resolveSearchOptions(options);
  const clock = opts.clock ?? (() => performance.now());
  const log = opts.log ?? stderrLog;
  const matcher = createMatcher(target);

  const start = clock();
  const elapsedSeconds = (): number => (clock() - start) / 1000;
  let count = 0;
  let examined = 0;

  const stop = (state: CountOutcome['state']): CountOutcome => {
    const outcome: CountOutcome = {
      state,
      count,
      examined,
      elapsedSeconds: elapsedSeconds(),
    };
    if (state === 'interrupted' && opts.reportElapsed) {
      log(
        `Cracked ${count} passwords in ${Math.trunc(outcome.elapsedSeconds)} seconds`
      );
    }
    return outcome;
  };

  for (const candidate of candidateStream(lists)) {
    if (opts.signal?.aborted) return stop('interrupted');
    if (opts.timeoutSeconds !== 0 && elapsedSeconds() >= opts.timeoutSeconds) {
      return stop('timeout');
    }

    const digest = digestHex(candidate, opts.algorithm);
    examined += 1;

    if (matcher.kind === 'single') {
      if (digest === matcher.digest) {
        const seconds = elapsedSeconds();
        if (opts.reportElapsed) {
          log(`Took ${Math.trunc(seconds)} seconds to crack`);
        }
        return { state: 'found', plaintext: candidate, examined, elapsedSeconds: seconds };
      }
    } else if (matcher.digests.has(digest)) {
      count += 1;
      matcher.matched.add(digest);
      if (
        opts.stopWhenAllMatched &&
        matcher.matched.size === matcher.digests.size
      ) {
        return stop('matched-all');
      }
    }

    // Let signal handlers run; the loop itself never blocks on I/O
    if (opts.yieldEvery > 0 && examined % opts.yieldEvery === 0) {
      await yieldToEventLoop();
    }
  }

  return stop('exhausted');
}
