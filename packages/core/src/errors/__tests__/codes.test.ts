import { describe, it, expect } from 'vitest';

import { ErrorCode, EXIT_CODES, getExitCode } from '../codes.js';

describe('error codes', () => {
  it('maps every code to a distinct exit code', () => {
    const codes = Object.values(ErrorCode);
    const exits = codes.map(getExitCode);
    expect(new Set(exits).size).toBe(codes.length);
    expect(exits.every((exit) => exit > 1)).toBe(true);
  });

  it('keeps stable exit codes', () => {
    expect(getExitCode(ErrorCode.UNKNOWN_ENTRY)).toBe(10);
    expect(getExitCode(ErrorCode.EMPTY_POSITION_CLASS)).toBe(20);
    expect(getExitCode(ErrorCode.INVALID_MASK)).toBe(21);
    expect(getExitCode(ErrorCode.INVALID_DOMAIN)).toBe(30);
    expect(getExitCode(ErrorCode.CONFIGURATION_ERROR)).toBe(50);
    expect(getExitCode(ErrorCode.PARSE_ERROR)).toBe(60);
    expect(EXIT_CODES[ErrorCode.INTERNAL_ERROR]).toBe(99);
  });
});
