/**
 * Error hierarchy for phrasemask
 * Provides structured error handling with context and suggestions
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  token?: string; // Class token involved in the failure
  position?: number; // Zero-based mask position
  word?: string; // Catalog entry
  setting?: string; // Option or flag name
  file?: string; // Resource path
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface ErrorParams {
  message: string;
  errorCode?: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all phrasemask errors
 */
export abstract class PhraseMaskError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: ErrorParams & { errorCode: ErrorCode }) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack
   * - prod: excludes stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * A word was looked up that the catalog does not hold
 */
export class CatalogError extends PhraseMaskError {
  constructor(params: ErrorParams & { context: ErrorContext & { word: string } }) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.UNKNOWN_ENTRY });
  }

  get word(): string | undefined {
    return this.context?.word;
  }
}

/**
 * Mask resolution errors (empty masks, tokens with no members)
 */
export class ResolutionError extends PhraseMaskError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.EMPTY_POSITION_CLASS,
    });
  }

  get token(): string | undefined {
    return this.context?.token;
  }
  get position(): number | undefined {
    return this.context?.position;
  }
}

/**
 * Entropy math called outside its domain
 */
export class DomainError extends PhraseMaskError {
  constructor(params: ErrorParams) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.INVALID_DOMAIN });
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends PhraseMaskError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Resource parsing errors (dictionary and hash list files)
 */
export class ParseError extends PhraseMaskError {
  public readonly issues: string[];

  constructor(params: ErrorParams & { issues?: string[] }) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.PARSE_ERROR });
    this.issues = params.issues ?? [];
  }
}

/**
 * Wraps anything that is not a PhraseMaskError so the CLI can present it
 */
export class InternalError extends PhraseMaskError {
  constructor(params: ErrorParams) {
    super({ ...params, errorCode: ErrorCode.INTERNAL_ERROR });
  }
}

export function isPhraseMaskError(error: unknown): error is PhraseMaskError {
  return error instanceof PhraseMaskError;
}
