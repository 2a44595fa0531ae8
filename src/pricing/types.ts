import type { Decimal } from '../domain/decimal.js';

export type PricingSchedule = Readonly<{
  /** API calls billed at `apiRateTier1` before `apiRateTier2` applies. */
  apiTierThreshold: number;
  apiRateTier1: Decimal;
  apiRateTier2: Decimal;
  storageRatePerGb: Decimal;
  computeRatePerMinute: Decimal;
}>;
