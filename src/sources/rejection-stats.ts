import type { RecordRejection, RejectionCause } from './usage-entry-parser.js';

export type RejectionCauseStat = {
  cause: RejectionCause;
  count: number;
};

const causeOrder: readonly RejectionCause[] = [
  'Entry is not an object',
  'Missing CustomerId',
  'Empty CustomerId',
  'Invalid API_Calls',
  'Invalid Storage_GB',
  'Invalid Compute_Minutes',
];

/** Counts per cause, listed in field validation order. */
export function summarizeRejections(rejected: readonly RecordRejection[]): RejectionCauseStat[] {
  const counts = new Map<RejectionCause, number>();

  for (const rejection of rejected) {
    counts.set(rejection.cause, (counts.get(rejection.cause) ?? 0) + 1);
  }

  return causeOrder.flatMap((cause) => {
    const count = counts.get(cause);
    return count === undefined ? [] : [{ cause, count }];
  });
}
