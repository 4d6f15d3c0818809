import { LOG_PREFIX, type PassphraseEngine } from '@phrasemask/core';

/**
 * Print the effective configuration and resolved mask shape to stderr.
 * Intended to be used behind the --debug flag.
 */
export function printEffectiveConfig(
  command: string,
  options: Record<string, unknown>
): void {
  process.stderr.write(
    `${LOG_PREFIX} ${command} effective config: ${JSON.stringify(options, null, 2)}\n`
  );
}

export function printMaskShape(engine: PassphraseEngine, mask: string): void {
  const tokens = engine.parse(mask);
  const sizes = engine
    .resolveMask(tokens)
    .map((members, position) => `${tokens[position] ?? '?'}=${members.length}`);
  process.stderr.write(`${LOG_PREFIX} mask: ${sizes.join(' ')}\n`);
}
