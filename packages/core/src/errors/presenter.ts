/**
 * ErrorPresenter - pure presentation layer for PhraseMaskError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import {
  ParseError,
  type ErrorContext,
  type PhraseMaskError,
  type SerializedError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  details: string[];
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: PhraseMaskError): CLIErrorView {
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      details: this.#formatDetails(error),
      workaround: this.#formatWorkaround(error),
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  formatForProduction(error: PhraseMaskError): SerializedError {
    return error.toJSON(this.env);
  }

  // Helpers
  #formatTitle(error: PhraseMaskError): string {
    return `Error ${error.errorCode}: ${error.message}`;
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    if (ctx.file !== undefined) return `File: ${ctx.file}`;
    if (ctx.position !== undefined && ctx.token !== undefined) {
      return `Mask position ${ctx.position} (${ctx.token})`;
    }
    if (ctx.setting !== undefined) return `Option: ${ctx.setting}`;
    return undefined;
  }

  #formatDetails(error: PhraseMaskError): string[] {
    // Parse errors carry schema issues worth listing; cap the noise
    if (error instanceof ParseError) {
      return error.issues.slice(0, 5);
    }
    return [];
  }

  #formatWorkaround(error: PhraseMaskError): string | undefined {
    return error.context?.suggestion;
  }

  #shouldUseColors(requested?: boolean): boolean {
    if (requested === false) return false;
    if (process.env.NO_COLOR !== undefined) return false;
    return process.stderr.isTTY === true;
  }

  #getTerminalWidth(requested?: number): number {
    if (typeof requested === 'number' && requested > 0) return requested;
    const columns = process.stderr.columns;
    return typeof columns === 'number' && columns > 0 ? columns : 80;
  }
}
