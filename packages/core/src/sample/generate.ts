import type { Mask } from '../mask/mask-grammar.js';
import type { ClassResolver } from '../resolver/class-resolver.js';
import { pickIndex, type RandomSource } from '../util/rng.js';

/**
 * Draw one member per mask position, independently and uniformly, and
 * concatenate them. Samples are for demonstration; the default source is
 * Math.random.
 */
export function generatePassphrase(
  mask: Mask,
  resolver: ClassResolver,
  random: RandomSource = Math.random
): string {
  const lists = resolver.resolveMask(mask);
  let passphrase = '';
  for (const members of lists) {
    passphrase += members[pickIndex(members.length, random)] ?? '';
  }
  return passphrase;
}
