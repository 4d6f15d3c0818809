import type { Mask } from '../mask/mask-grammar.js';
import type { ClassResolver } from '../resolver/class-resolver.js';
import { productSize } from '../enumerate/cartesian.js';
import { DomainError } from '../types/errors.js';
import { DEFAULT_HASH_RATE } from '../types/options.js';

export type Possibilities = number | bigint;

export interface CrackTimeEstimate {
  seconds: number;
  hours: number;
  days: number;
}

export interface SecurityReport extends CrackTimeEstimate {
  possibilities: bigint;
  bits: number;
  hashRate: number;
  rateLabel: string;
}

function toPositiveNumber(possibilities: Possibilities): number {
  const value = Number(possibilities);
  if (!(value > 0)) {
    throw new DomainError({
      message: `Possibility count must be positive, got ${String(possibilities)}`,
      context: { value: String(possibilities) },
    });
  }
  return value;
}

// Largest bigint that converts to a finite double is just under 2^1024
const SAFE_BIT_LENGTH = 1000;

/**
 * log2 of the possibility count. Bigints too large for a double are shifted
 * down to 53 significant bits first, so the result stays finite.
 */
export function bitsOfEntropy(possibilities: Possibilities): number {
  const value = toPositiveNumber(possibilities);
  if (typeof possibilities === 'number') return Math.log2(value);
  const bitLength = possibilities.toString(2).length;
  if (bitLength <= SAFE_BIT_LENGTH) return Math.log2(value);
  const shift = bitLength - 53;
  return Math.log2(Number(possibilities >> BigInt(shift))) + shift;
}

/**
 * Seconds, hours and days to walk the whole space at `hashRate`. Beyond
 * roughly 2^1024 seconds the figures are Infinity.
 */
export function crackTimeEstimate(
  possibilities: Possibilities,
  hashRate: number = DEFAULT_HASH_RATE
): CrackTimeEstimate {
  if (!(hashRate > 0)) {
    throw new DomainError({
      message: `Hash rate must be positive, got ${hashRate}`,
      context: { value: String(hashRate) },
    });
  }
  const value = toPositiveNumber(possibilities);
  const seconds = Number.isFinite(value)
    ? value / hashRate
    : 2 ** (bitsOfEntropy(possibilities) - Math.log2(hashRate));
  const hours = seconds / (60 * 60);
  return { seconds, hours, days: hours / 24 };
}

/** Hash rate in whole millions of hashes per second, as shown in reports. */
export function hashRateLabel(hashRate: number): string {
  return String(Math.trunc(hashRate / 1_000_000));
}

/**
 * Size of the candidate space of `mask`, read through the same resolver
 * cache that enumeration uses.
 */
export function possibilityCount(mask: Mask, resolver: ClassResolver): bigint {
  return productSize(resolver.resolveMask(mask));
}

export function securityReport(
  possibilities: Possibilities,
  hashRate: number = DEFAULT_HASH_RATE
): SecurityReport {
  const bits = bitsOfEntropy(possibilities);
  return {
    possibilities:
      typeof possibilities === 'bigint'
        ? possibilities
        : BigInt(Math.trunc(possibilities)),
    bits,
    ...crackTimeEstimate(possibilities, hashRate),
    hashRate,
    rateLabel: hashRateLabel(hashRate),
  };
}

export function formatSecurityReport(report: SecurityReport): string[] {
  return [
    `Computed ${report.possibilities} or approximately 2^${report.bits.toFixed(4)} bits of entropy`,
    `Time to crack: ${report.hours.toFixed(2)} hrs (${report.days.toFixed(2)} days) @ ${report.rateLabel} M h/s`,
  ];
}
