// Both patterns match trimmed text.
const fixedDecimalPattern = /^([+-])?(\d+(?:,\d+)*)?(?:\.(\d*))?$/u;
const fixedIntegerPattern = /^[+-]?\d+$/u;
const scientificPattern = /^(-)?(\d+)(?:\.(\d+))?(?:e([+-]?\d+))?$/u;

function powerOfTen(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

function absolute(value: bigint): bigint {
  return value < 0n ? -value : value;
}

/**
 * Exact base-10 number stored as `coefficient × 10^-scale`.
 *
 * Instances are immutable and keep the scale they were built with, so `"10.50"` prints back
 * as `10.50`. Arithmetic never goes through binary floating point.
 */
export class Decimal {
  static readonly ZERO = new Decimal(0n, 0);

  private constructor(
    readonly coefficient: bigint,
    readonly scale: number,
  ) {}

  static fromInteger(value: number | bigint): Decimal {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      throw new Error(`Decimal.fromInteger expects a safe integer, received ${value}`);
    }

    return new Decimal(BigInt(value), 0);
  }

  /**
   * Parses fixed-format text: optional sign, digits with optional `,` group separators,
   * optional fraction. Exponents, hex and currency symbols are not accepted.
   */
  static parse(text: string): Decimal | undefined {
    const match = fixedDecimalPattern.exec(text.trim());

    if (!match) {
      return undefined;
    }

    const [, sign, integerPart = '', fractionPart = ''] = match;
    const integerDigits = integerPart.replace(/,/gu, '');

    if (integerDigits.length === 0 && fractionPart.length === 0) {
      return undefined;
    }

    const magnitude = BigInt(`${integerDigits}${fractionPart}` || '0');
    return new Decimal(sign === '-' ? -magnitude : magnitude, fractionPart.length);
  }

  /**
   * Converts a finite number through its shortest round-trip text, so `0.1` becomes exactly
   * `0.1` rather than the nearest binary fraction.
   */
  static fromNumber(value: number): Decimal | undefined {
    if (!Number.isFinite(value)) {
      return undefined;
    }

    const match = scientificPattern.exec(String(value));

    if (!match) {
      return undefined;
    }

    const [, sign, integerDigits, fractionDigits = '', exponentText = '0'] = match;
    const magnitude = BigInt(`${integerDigits}${fractionDigits}`);
    const coefficient = sign === '-' ? -magnitude : magnitude;
    const scale = fractionDigits.length - Number.parseInt(exponentText, 10);

    if (scale >= 0) {
      return new Decimal(coefficient, scale);
    }

    return new Decimal(coefficient * powerOfTen(-scale), 0);
  }

  /** For literals in code; throws on malformed text. */
  static of(literal: string): Decimal {
    const parsed = Decimal.parse(literal);

    if (!parsed) {
      throw new Error(`Invalid decimal literal: ${literal}`);
    }

    return parsed;
  }

  static isFixedIntegerText(text: string): boolean {
    return fixedIntegerPattern.test(text.trim());
  }

  private rescale(scale: number): bigint {
    return this.coefficient * powerOfTen(scale - this.scale);
  }

  add(other: Decimal): Decimal {
    const scale = Math.max(this.scale, other.scale);
    return new Decimal(this.rescale(scale) + other.rescale(scale), scale);
  }

  multiply(other: Decimal): Decimal {
    return new Decimal(this.coefficient * other.coefficient, this.scale + other.scale);
  }

  compare(other: Decimal): -1 | 0 | 1 {
    const scale = Math.max(this.scale, other.scale);
    const left = this.rescale(scale);
    const right = other.rescale(scale);

    if (left === right) {
      return 0;
    }

    return left < right ? -1 : 1;
  }

  equals(other: Decimal): boolean {
    return this.compare(other) === 0;
  }

  isNegative(): boolean {
    return this.coefficient < 0n;
  }

  isInteger(): boolean {
    return this.coefficient % powerOfTen(this.scale) === 0n;
  }

  /** Integer part, rounding toward zero. */
  truncate(): bigint {
    return this.coefficient / powerOfTen(this.scale);
  }

  /** Rounds half away from zero. Never increases the scale beyond `places`. */
  round(places: number): Decimal {
    if (this.scale <= places) {
      return this;
    }

    const divisor = powerOfTen(this.scale - places);
    const quotient = this.coefficient / divisor;
    const remainder = absolute(this.coefficient % divisor);

    if (remainder * 2n < divisor) {
      return new Decimal(quotient, places);
    }

    return new Decimal(quotient + (this.coefficient < 0n ? -1n : 1n), places);
  }

  toFixed(places: number): string {
    const rounded = this.round(places);
    const padded = new Decimal(rounded.rescale(places), places);
    return padded.toString();
  }

  toString(): string {
    const digits = absolute(this.coefficient).toString().padStart(this.scale + 1, '0');
    const sign = this.coefficient < 0n ? '-' : '';

    if (this.scale === 0) {
      return `${sign}${digits}`;
    }

    const splitAt = digits.length - this.scale;
    return `${sign}${digits.slice(0, splitAt)}.${digits.slice(splitAt)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
