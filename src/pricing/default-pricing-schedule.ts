import { Decimal } from '../domain/decimal.js';
import type { PricingSchedule } from './types.js';

export type PricingScheduleInput = {
  apiTierThreshold: number;
  apiRateTier1: string;
  apiRateTier2: string;
  storageRatePerGb: string;
  computeRatePerMinute: string;
};

export function createPricingSchedule(input: PricingScheduleInput): PricingSchedule {
  if (!Number.isSafeInteger(input.apiTierThreshold) || input.apiTierThreshold < 0) {
    throw new Error('apiTierThreshold must be a non-negative integer');
  }

  return Object.freeze({
    apiTierThreshold: input.apiTierThreshold,
    apiRateTier1: Decimal.of(input.apiRateTier1),
    apiRateTier2: Decimal.of(input.apiRateTier2),
    storageRatePerGb: Decimal.of(input.storageRatePerGb),
    computeRatePerMinute: Decimal.of(input.computeRatePerMinute),
  });
}

export const DEFAULT_PRICING_SCHEDULE: PricingSchedule = createPricingSchedule({
  apiTierThreshold: 10_000,
  apiRateTier1: '0.01',
  apiRateTier2: '0.008',
  storageRatePerGb: '0.25',
  computeRatePerMinute: '0.05',
});
