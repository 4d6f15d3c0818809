import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';

import type { Result } from '../types/result.js';
import { ok, err } from '../types/result.js';
import { ParseError } from '../types/errors.js';
import {
  DICTIONARY_SCHEMA,
  TARGET_HASHES_SCHEMA,
  type DictionaryDocument,
  type TargetHashDocument,
} from './schemas.js';

let sharedAjv: Ajv | undefined;

function getAjv(): Ajv {
  sharedAjv ??= new Ajv({
    allErrors: true,
    allowUnionTypes: true,
    logger: false,
  });
  return sharedAjv;
}

// Compiled lazily, once per process
let dictionaryValidator: ValidateFunction<DictionaryDocument> | undefined;
let targetHashValidator: ValidateFunction<TargetHashDocument> | undefined;

export function formatIssues(
  errors: ErrorObject[] | null | undefined
): string[] {
  return (errors ?? []).map((issue) => {
    const at = issue.instancePath === '' ? '(root)' : issue.instancePath;
    return `${at} ${issue.message ?? issue.keyword}`;
  });
}

function validateDocument<T>(
  validate: ValidateFunction<T>,
  data: unknown,
  label: string,
  file?: string
): Result<T, ParseError> {
  if (validate(data)) {
    return ok(data);
  }
  return err(
    new ParseError({
      message: `Invalid ${label} document`,
      issues: formatIssues(validate.errors),
      context: { file },
    })
  );
}

export function validateDictionaryDocument(
  data: unknown,
  file?: string
): Result<DictionaryDocument, ParseError> {
  dictionaryValidator ??= getAjv().compile<DictionaryDocument>(
    DICTIONARY_SCHEMA
  );
  return validateDocument(dictionaryValidator, data, 'dictionary', file);
}

export function validateTargetHashDocument(
  data: unknown,
  file?: string
): Result<TargetHashDocument, ParseError> {
  targetHashValidator ??= getAjv().compile<TargetHashDocument>(
    TARGET_HASHES_SCHEMA
  );
  return validateDocument(targetHashValidator, data, 'target hash', file);
}
