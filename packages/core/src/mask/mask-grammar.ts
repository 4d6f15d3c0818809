/**
 * Mask grammar: space-delimited class tokens, one per output position.
 *
 * Token legality is not checked here; a token is valid only if the active
 * class source resolves it to at least one member.
 */

export type Mask = readonly string[];

const TEMPLATE_CODES: ReadonlyMap<string, string> = new Map([
  ['u', 'upper'],
  ['l', 'lower'],
  ['d', 'digit'],
  ['s', 'punc'],
]);

const FALLBACK_TOKEN = 'anyc';

export function parseMask(mask: string): Mask {
  if (mask === '') return [];
  return mask.split(' ');
}

/**
 * Translate an external `?u?l?d?s` template into a mask string. Text ahead
 * of the first `?` is dropped; unknown codes become `anyc`.
 */
export function translateTemplate(template: string): string {
  const codes = template.split('?').slice(1);
  return codes
    .map((code) => TEMPLATE_CODES.get(code) ?? FALLBACK_TOKEN)
    .join(' ');
}
