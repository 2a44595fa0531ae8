import type { Decimal } from './decimal.js';

export const UNKNOWN_CUSTOMER_ID = 'UNKNOWN';

export type UsageRecord = Readonly<{
  customerId: string;
  apiCalls: number;
  storageGb: Decimal;
  computeMinutes: number;
}>;

export function createUsageRecord(input: {
  customerId: string;
  apiCalls: number;
  storageGb: Decimal;
  computeMinutes: number;
}): UsageRecord {
  if (input.customerId.trim().length === 0) {
    throw new Error('UsageRecord customerId must be a non-empty string');
  }

  if (!Number.isInteger(input.apiCalls) || !Number.isInteger(input.computeMinutes)) {
    throw new Error('UsageRecord apiCalls and computeMinutes must be integers');
  }

  return Object.freeze({
    customerId: input.customerId,
    apiCalls: input.apiCalls,
    storageGb: input.storageGb,
    computeMinutes: input.computeMinutes,
  });
}
