/**
 * Best-effort conversion of operator input to whole numbers.
 *
 * `parseCount` keeps "left blank" and "could not parse" apart so the validator
 * can report bad input; `toInt` folds both to 0 for arithmetic.
 */

export type CountParse =
  | { readonly kind: 'value'; readonly value: number }
  | { readonly kind: 'empty' }
  | { readonly kind: 'unparseable'; readonly raw: string };

const INTEGER_TEXT = /^[+-]?\d+$/;

export function parseCount(value: unknown): CountParse {
  if (value == null) return { kind: 'empty' };

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return { kind: 'unparseable', raw: String(value) };
    // + 0 normalises -0
    return safeCount(Math.trunc(value) + 0, String(value));
  }

  if (typeof value === 'boolean') return { kind: 'value', value: value ? 1 : 0 };

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed.length === 0) return { kind: 'empty' };
    if (!INTEGER_TEXT.test(trimmed)) return { kind: 'unparseable', raw: value };
    return safeCount(parseInt(trimmed, 10) + 0, value);
  }

  return { kind: 'unparseable', raw: String(value) };
}

// Beyond 2^53 sums lose precision, so such input counts as unparseable.
function safeCount(value: number, raw: string): CountParse {
  return Number.isSafeInteger(value) ? { kind: 'value', value } : { kind: 'unparseable', raw };
}

/** Safe integer value of `value`, or 0 when it is blank, malformed or out of range. Never throws. */
export function toInt(value: unknown): number {
  const parsed = parseCount(value);
  return parsed.kind === 'value' ? parsed.value : 0;
}
