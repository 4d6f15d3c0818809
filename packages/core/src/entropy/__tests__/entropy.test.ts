import { describe, it, expect } from 'vitest';

import { ClassRegistry } from '../../alphabet/class-registry.js';
import { ErrorCode } from '../../errors/codes.js';
import { ClassResolver } from '../../resolver/class-resolver.js';
import { DomainError } from '../../types/errors.js';
import {
  bitsOfEntropy,
  crackTimeEstimate,
  formatSecurityReport,
  hashRateLabel,
  possibilityCount,
  securityReport,
} from '../entropy.js';

describe('bitsOfEntropy', () => {
  it('is the base-2 logarithm of the possibility count', () => {
    expect(bitsOfEntropy(1000)).toBeCloseTo(9.9658, 4);
    expect(bitsOfEntropy(1024n)).toBe(10);
    expect(bitsOfEntropy(1)).toBe(0);
  });

  it('stays finite for counts beyond the double range', () => {
    const possibilities = 94n ** 160n;
    expect(Number(possibilities)).toBe(Infinity);
    expect(bitsOfEntropy(possibilities)).toBeCloseTo(160 * Math.log2(94), 6);
  });

  it('rejects counts that are not positive', () => {
    expect(() => bitsOfEntropy(0)).toThrow(DomainError);
    expect(() => bitsOfEntropy(-4n)).toThrow(DomainError);
    try {
      bitsOfEntropy(0);
    } catch (error) {
      if (!(error instanceof DomainError)) throw error;
      expect(error.errorCode).toBe(ErrorCode.INVALID_DOMAIN);
    }
  });
});

describe('crackTimeEstimate', () => {
  it('divides possibilities by the hash rate', () => {
    expect(crackTimeEstimate(7200, 1)).toEqual({ seconds: 7200, hours: 2, days: 2 / 24 });
  });

  it('estimates times for counts beyond the double range', () => {
    const estimate = crackTimeEstimate(94n ** 160n);
    expect(Number.isFinite(estimate.hours)).toBe(true);
    expect(Math.log2(estimate.seconds)).toBeCloseTo(
      160 * Math.log2(94) - Math.log2(623_000_000_000),
      6
    );
  });

  it('rejects a non-positive hash rate', () => {
    expect(() => crackTimeEstimate(10, 0)).toThrow(DomainError);
  });
});

describe('hashRateLabel', () => {
  it('shows whole millions', () => {
    expect(hashRateLabel(623_000_000_000)).toBe('623000');
    expect(hashRateLabel(2_500_000)).toBe('2');
  });
});

describe('possibilityCount', () => {
  it('multiplies the class sizes of every position', () => {
    const resolver = new ClassResolver(new ClassRegistry());
    expect(possibilityCount(['digit', 'digit', 'digit'], resolver)).toBe(1000n);
    expect(possibilityCount(['lower', 'upper', 'punc'], resolver)).toBe(26n * 26n * 32n);
  });
});

describe('securityReport', () => {
  it('reports a three-digit mask at the default rate', () => {
    const report = securityReport(1000n);
    expect(report.possibilities).toBe(1000n);
    expect(report.hashRate).toBe(623_000_000_000);
    expect(formatSecurityReport(report)).toEqual([
      'Computed 1000 or approximately 2^9.9658 bits of entropy',
      'Time to crack: 0.00 hrs (0.00 days) @ 623000 M h/s',
    ]);
  });

  it('formats hours and days to two decimals', () => {
    const report = securityReport(3_600_000n, 1000);
    expect(report.hours).toBe(1);
    expect(formatSecurityReport(report)[1]).toBe(
      'Time to crack: 1.00 hrs (0.04 days) @ 0 M h/s'
    );
  });

  it('accepts plain numbers', () => {
    expect(securityReport(64).possibilities).toBe(64n);
    expect(securityReport(64).bits).toBe(6);
  });
});
