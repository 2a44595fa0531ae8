import type { Decimal } from '../domain/decimal.js';

/** Cents, half away from zero. No grouping or locale. */
export function formatUsd(amount: Decimal): string {
  return `$${amount.toFixed(2)}`;
}
