import { readFile } from 'node:fs/promises';

import { normalizeDigest } from '../search/digest.js';
import { ParseError } from '../types/errors.js';
import { err, mapResult, type Result } from '../types/result.js';
import { validateTargetHashDocument } from './resource-validator.js';

export function parseTargetHashes(
  json: string,
  file?: string
): Result<ReadonlySet<string>, ParseError> {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (cause) {
    return err(
      new ParseError({
        message: 'Target hash list is not valid JSON',
        context: { file },
        cause: cause instanceof Error ? cause : undefined,
      })
    );
  }
  return mapResult(
    validateTargetHashDocument(data, file),
    (digests) => new Set(digests.map(normalizeDigest))
  );
}

export async function loadTargetHashes(
  file: string
): Promise<Result<ReadonlySet<string>, ParseError>> {
  let json: string;
  try {
    json = await readFile(file, 'utf8');
  } catch (cause) {
    return err(
      new ParseError({
        message: 'Cannot read target hash file',
        context: { file },
        cause: cause instanceof Error ? cause : undefined,
      })
    );
  }
  return parseTargetHashes(json, file);
}
