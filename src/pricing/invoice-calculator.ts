import { Decimal } from '../domain/decimal.js';
import { createInvoice, type Invoice } from '../domain/invoice.js';
import type { UsageRecord } from '../domain/usage-record.js';
import { DEFAULT_PRICING_SCHEDULE } from './default-pricing-schedule.js';
import type { PricingSchedule } from './types.js';

export function calculateApiCost(apiCalls: number, schedule: PricingSchedule): Decimal {
  const tier1Units = Math.min(apiCalls, schedule.apiTierThreshold);
  const tier2Units = Math.max(apiCalls - schedule.apiTierThreshold, 0);

  return Decimal.fromInteger(tier1Units)
    .multiply(schedule.apiRateTier1)
    .add(Decimal.fromInteger(tier2Units).multiply(schedule.apiRateTier2));
}

export function calculateStorageCost(storageGb: Decimal, schedule: PricingSchedule): Decimal {
  return storageGb.multiply(schedule.storageRatePerGb);
}

export function calculateComputeCost(computeMinutes: number, schedule: PricingSchedule): Decimal {
  return Decimal.fromInteger(computeMinutes).multiply(schedule.computeRatePerMinute);
}

/**
 * Applies a pricing schedule to usage records. Costs are exact; rounding to cents is left to
 * the renderer. Negative quantities produce negative costs.
 */
export class InvoiceCalculator {
  constructor(readonly schedule: PricingSchedule = DEFAULT_PRICING_SCHEDULE) {}

  calculate(record: UsageRecord): Invoice {
    return createInvoice(record.customerId, {
      apiCost: calculateApiCost(record.apiCalls, this.schedule),
      storageCost: calculateStorageCost(record.storageGb, this.schedule),
      computeCost: calculateComputeCost(record.computeMinutes, this.schedule),
    });
  }

  calculateAll(records: readonly UsageRecord[]): Invoice[] {
    return records.map((record) => this.calculate(record));
  }
}
