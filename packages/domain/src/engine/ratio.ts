import { toInt } from './numeric-coercion.js';

/**
 * `numerator / denominator * 100` on coerced integers, unrounded.
 * A zero denominator yields 0 so a zero-activity day still renders.
 */
export function percentage(numerator: unknown, denominator: unknown): number {
  const d = toInt(denominator);
  if (d === 0) return 0;
  return (toInt(numerator) / d) * 100;
}
