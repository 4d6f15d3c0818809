import {
  ConfigError,
  createCharacterEngine,
  createLexicalEngine,
  getNamedFilter,
  loadDictionary,
  loadTargetHashes,
  unwrap,
  type CrackTarget,
  type LexicalCatalog,
  type PassphraseEngine,
} from '@phrasemask/core';

import type { TargetSource } from './flags.js';

export interface EngineFlags {
  dict?: string;
  filter?: string[];
  hashRate?: number;
}

/**
 * Load the dictionary named by --dict and commit every --filter to it.
 */
export async function loadCatalog(
  dict: string,
  filters: readonly string[] = []
): Promise<LexicalCatalog> {
  const catalog = unwrap(await loadDictionary(dict));
  for (const name of filters) {
    catalog.filter(getNamedFilter(name), true);
  }
  return catalog;
}

/**
 * Character engine by default; lexical engine when a dictionary is given.
 */
export async function buildEngine(
  flags: EngineFlags
): Promise<PassphraseEngine> {
  const estimate = flags.hashRate === undefined ? {} : { hashRate: flags.hashRate };
  if (flags.dict === undefined) {
    if (flags.filter !== undefined && flags.filter.length > 0) {
      throw new ConfigError({
        message: '--filter needs a dictionary',
        context: { setting: 'filter', suggestion: 'Pass --dict <file>' },
      });
    }
    return createCharacterEngine(estimate);
  }
  return createLexicalEngine(await loadCatalog(flags.dict, flags.filter), estimate);
}

export async function loadTarget(source: TargetSource): Promise<CrackTarget> {
  if (source.kind === 'single') return source.digest;
  return unwrap(await loadTargetHashes(source.path));
}
