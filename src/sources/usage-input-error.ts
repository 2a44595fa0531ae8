export type UsageInputErrorKind = 'not-found' | 'unreadable' | 'invalid-json' | 'not-array';

/** Batch-level load failure. No records are produced when one occurs. */
export class UsageInputError extends Error {
  constructor(
    readonly kind: UsageInputErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'UsageInputError';
  }
}
