import { readFile } from 'node:fs/promises';

import { ClassRegistry } from '../alphabet/class-registry.js';
import {
  LexicalCatalog,
  PARTS_OF_SPEECH,
  type PartOfSpeech,
} from '../catalog/lexical-catalog.js';
import { ParseError } from '../types/errors.js';
import { err, mapResult, type Result } from '../types/result.js';
import { validateDictionaryDocument } from './resource-validator.js';
import type { DictionaryDocument } from './schemas.js';

function isPartOfSpeech(value: unknown): value is PartOfSpeech {
  return (
    typeof value === 'string' &&
    (PARTS_OF_SPEECH as readonly string[]).includes(value)
  );
}

/**
 * Build a catalog from a validated dictionary document. Words keep document
 * order; registry characters are seeded afterwards so every character token
 * resolves through the catalog too.
 */
export function catalogFromDocument(
  document: DictionaryDocument,
  registry: ClassRegistry = new ClassRegistry()
): LexicalCatalog {
  const catalog = new LexicalCatalog();
  for (const [word, entry] of Object.entries(document)) {
    const categories = new Set<PartOfSpeech>();
    for (const definition of entry.definitions) {
      if (isPartOfSpeech(definition.part_of_speech)) {
        categories.add(definition.part_of_speech);
      }
    }
    catalog.insert(word, categories);
  }
  catalog.seedCharacterClasses(registry);
  return catalog;
}

export function parseDictionary(
  json: string,
  file?: string
): Result<LexicalCatalog, ParseError> {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (cause) {
    return err(
      new ParseError({
        message: 'Dictionary is not valid JSON',
        context: { file },
        cause: cause instanceof Error ? cause : undefined,
      })
    );
  }
  return mapResult(validateDictionaryDocument(data, file), (document) =>
    catalogFromDocument(document)
  );
}

export async function loadDictionary(
  file: string
): Promise<Result<LexicalCatalog, ParseError>> {
  let json: string;
  try {
    json = await readFile(file, 'utf8');
  } catch (cause) {
    return err(
      new ParseError({
        message: `Cannot read dictionary file`,
        context: { file },
        cause: cause instanceof Error ? cause : undefined,
      })
    );
  }
  return parseDictionary(json, file);
}
