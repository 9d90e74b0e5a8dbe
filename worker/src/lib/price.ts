import type { PriceRange } from '../types.js';

const FREE_PATTERN = /gratis|free/i;
// digits with optional . or , group separators and an optional "k" multiplier
const NUMBER_PATTERN = /(\d[\d.,]*)(k)?/gi;

export const UNKNOWN_PRICE: Readonly<PriceRange> = Object.freeze({ min: null, max: null });

/**
 * Parse a free-text price ("Gratis", "50k", "Rp 25.000 - 50.000") into a
 * range. `{0, 0}` means explicitly free, `{null, null}` means unknown.
 */
export function parsePrice(text: string | null | undefined): PriceRange {
  if (!text || typeof text !== 'string') {
    return { ...UNKNOWN_PRICE };
  }

  if (FREE_PATTERN.test(text)) {
    return { min: 0, max: 0 };
  }

  const amounts: number[] = [];
  for (const match of text.matchAll(NUMBER_PATTERN)) {
    const digits = match[1].replace(/[.,]/g, '');
    const value = Number.parseInt(digits, 10);
    const amount = match[2] ? value * 1000 : value;
    // beyond 2^53 the digits are no longer exact
    if (!Number.isSafeInteger(amount)) continue;
    amounts.push(amount);
  }

  if (amounts.length === 0) {
    return { ...UNKNOWN_PRICE };
  }

  return {
    min: Math.min(...amounts),
    max: Math.max(...amounts),
  };
}
