import type { Decimal } from './decimal.js';

export type Invoice = Readonly<{
  customerId: string;
  apiCost: Decimal;
  storageCost: Decimal;
  computeCost: Decimal;
  total: Decimal;
}>;

export type InvoiceCosts = {
  apiCost: Decimal;
  storageCost: Decimal;
  computeCost: Decimal;
};

/** `total` is always the sum of the three components; the result is frozen. */
export function createInvoice(customerId: string, costs: InvoiceCosts): Invoice {
  const { apiCost, storageCost, computeCost } = costs;

  return Object.freeze({
    customerId,
    apiCost,
    storageCost,
    computeCost,
    total: apiCost.add(storageCost).add(computeCost),
  });
}
