import { OverflowError } from './errors.js';

const MIN_UNITS = -(2n ** 63n);
const MAX_UNITS = 2n ** 63n - 1n;

/**
 * Money value object: a fixed-point amount stored as an integer number of
 * units, where one unit is 1/10,000 of the currency.
 * Amounts live in the signed 64-bit range; any arithmetic leaving it throws
 * OverflowError instead of wrapping.
 */
export class Money {
  static readonly SCALE = 10_000n;
  static readonly FRACTION_DIGITS = 4;

  private constructor(public readonly units: bigint) {}

  static fromUnits(units: bigint | number): Money {
    if (typeof units === 'number' && !Number.isSafeInteger(units)) {
      throw new TypeError(`Money units must be a safe integer, got ${units}`);
    }
    const value = typeof units === 'bigint' ? units : BigInt(units);
    if (value < MIN_UNITS || value > MAX_UNITS) {
      throw new OverflowError();
    }
    return new Money(value);
  }

  static zero(): Money {
    return new Money(0n);
  }

  add(other: Money): Money {
    return Money.fromUnits(this.units + other.units);
  }

  subtract(other: Money): Money {
    // Negative results are allowed (disputes may push available below zero)
    return Money.fromUnits(this.units - other.units);
  }

  equals(other: Money): boolean {
    return this.units === other.units;
  }

  compare(other: Money): -1 | 0 | 1 {
    if (this.units < other.units) return -1;
    if (this.units > other.units) return 1;
    return 0;
  }

  /**
   * Canonical text form: `[-]<integer>.<4-digit fraction>`.
   * Zero is never signed.
   */
  toString(): string {
    const sign = this.units < 0n ? '-' : '';
    const magnitude = this.units < 0n ? -this.units : this.units;
    const integerPart = magnitude / Money.SCALE;
    const fractionPart = (magnitude % Money.SCALE)
      .toString()
      .padStart(Money.FRACTION_DIGITS, '0');
    return `${sign}${integerPart}.${fractionPart}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
