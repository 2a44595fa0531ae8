import { coerceDecimal, coerceIdentifierText, coerceInteger } from '../domain/coercion.js';
import { createUsageRecord, UNKNOWN_CUSTOMER_ID, type UsageRecord } from '../domain/usage-record.js';
import { asRecord } from '../utils/as-record.js';

export type RejectionCause =
  | 'Entry is not an object'
  | 'Missing CustomerId'
  | 'Empty CustomerId'
  | 'Invalid API_Calls'
  | 'Invalid Storage_GB'
  | 'Invalid Compute_Minutes';

export type RecordRejection = {
  index: number;
  customerId: string;
  cause: RejectionCause;
  message: string;
};

export type UsageEntryResult =
  | { accepted: true; record: UsageRecord }
  | { accepted: false; rejection: RecordRejection };

function reject(index: number, customerId: string, cause: RejectionCause): UsageEntryResult {
  const message =
    cause === 'Entry is not an object'
      ? cause
      : `Missing or invalid fields for CustomerId: ${customerId} (${cause})`;

  return {
    accepted: false,
    rejection: { index, customerId, cause, message },
  };
}

/**
 * Validates one input element. Fields are checked in a fixed order and the first failure
 * rejects the whole element.
 */
export function parseUsageEntry(entry: unknown, index: number): UsageEntryResult {
  const fields = asRecord(entry);

  if (!fields) {
    return reject(index, UNKNOWN_CUSTOMER_ID, 'Entry is not an object');
  }

  const customerId = coerceIdentifierText(fields.CustomerId);

  if (customerId === undefined) {
    return reject(index, UNKNOWN_CUSTOMER_ID, 'Missing CustomerId');
  }

  if (customerId.trim().length === 0) {
    return reject(index, UNKNOWN_CUSTOMER_ID, 'Empty CustomerId');
  }

  const apiCalls = coerceInteger(fields.API_Calls);

  if (!apiCalls.ok) {
    return reject(index, customerId, 'Invalid API_Calls');
  }

  const storageGb = coerceDecimal(fields.Storage_GB);

  if (!storageGb.ok) {
    return reject(index, customerId, 'Invalid Storage_GB');
  }

  const computeMinutes = coerceInteger(fields.Compute_Minutes);

  if (!computeMinutes.ok) {
    return reject(index, customerId, 'Invalid Compute_Minutes');
  }

  return {
    accepted: true,
    record: createUsageRecord({
      customerId,
      apiCalls: apiCalls.value,
      storageGb: storageGb.value,
      computeMinutes: computeMinutes.value,
    }),
  };
}
