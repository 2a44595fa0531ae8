import { Decimal } from './decimal.js';

export const INT32_MIN = -2_147_483_648;
export const INT32_MAX = 2_147_483_647;

export type CoercionFailure = { ok: false; reason: string };

export type Coercion<T> = { ok: true; value: T } | CoercionFailure;

export type CoercionAttempt<T> = (value: unknown) => Coercion<T>;

export function success<T>(value: T): Coercion<T> {
  return { ok: true, value };
}

export function failure(reason: string): CoercionFailure {
  return { ok: false, reason };
}

function isInt32(value: bigint): boolean {
  return value >= BigInt(INT32_MIN) && value <= BigInt(INT32_MAX);
}

function integralDecimalToInt32(decimal: Decimal): Coercion<number> {
  if (!decimal.isInteger()) {
    return failure('has a fractional part');
  }

  const integerValue = decimal.truncate();

  if (!isInt32(integerValue)) {
    return failure('outside the 32-bit integer range');
  }

  return success(Number(integerValue));
}

/**
 * Sees the value after `JSON.parse`, so a literal like `12.0000000000000001` has already been
 * rounded to the double `12` and passes. Fractions survive only within double precision.
 */
const integerFromNumber: CoercionAttempt<number> = (value) => {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return failure('not a finite number');
  }

  if (!Number.isInteger(value)) {
    return failure('has a fractional part');
  }

  if (value < INT32_MIN || value > INT32_MAX) {
    return failure('outside the 32-bit integer range');
  }

  return success(value === 0 ? 0 : value);
};

const integerFromIntegerText: CoercionAttempt<number> = (value) => {
  if (typeof value !== 'string' || !Decimal.isFixedIntegerText(value)) {
    return failure('not integer text');
  }

  const parsed = Decimal.parse(value);
  return parsed ? integralDecimalToInt32(parsed) : failure('not integer text');
};

const integerFromDecimalText: CoercionAttempt<number> = (value) => {
  if (typeof value !== 'string') {
    return failure('not text');
  }

  const parsed = Decimal.parse(value);
  return parsed ? integralDecimalToInt32(parsed) : failure('not decimal text');
};

/** Exact only to the precision `JSON.parse` kept; digits beyond a double are already gone. */
const decimalFromNumber: CoercionAttempt<Decimal> = (value) => {
  if (typeof value !== 'number') {
    return failure('not a number');
  }

  const decimal = Decimal.fromNumber(value);
  return decimal ? success(decimal) : failure('not a finite number');
};

const decimalFromText: CoercionAttempt<Decimal> = (value) => {
  if (typeof value !== 'string') {
    return failure('not text');
  }

  const decimal = Decimal.parse(value);
  return decimal ? success(decimal) : failure('not decimal text');
};

/** Evaluated in order; the first success wins. */
export const integerCoercionAttempts: readonly CoercionAttempt<number>[] = [
  integerFromNumber,
  integerFromIntegerText,
  integerFromDecimalText,
];

export const decimalCoercionAttempts: readonly CoercionAttempt<Decimal>[] = [
  decimalFromNumber,
  decimalFromText,
];

export function coerceWith<T>(
  value: unknown,
  attempts: readonly CoercionAttempt<T>[],
  failureReason: string,
): Coercion<T> {
  for (const attempt of attempts) {
    const result = attempt(value);

    if (result.ok) {
      return result;
    }
  }

  return failure(failureReason);
}

export function coerceInteger(
  value: unknown,
  failureReason = 'not a 32-bit integer',
): Coercion<number> {
  return coerceWith(value, integerCoercionAttempts, failureReason);
}

export function coerceDecimal(
  value: unknown,
  failureReason = 'not a decimal number',
): Coercion<Decimal> {
  return coerceWith(value, decimalCoercionAttempts, failureReason);
}

/**
 * Text form of an identifier value. Strings pass through untouched; other JSON values use
 * their JSON text. `undefined` and `null` have no text form.
 */
export function coerceIdentifierText(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value === 'string') {
    return value;
  }

  return JSON.stringify(value);
}
