import { Decimal } from 'decimal.js';
import { type Result, err, ok } from 'neverthrow';

import { InvalidAmountError } from './amount.errors.js';

/** Number of fractional digits every amount carries. */
export const AMOUNT_SCALE = 4;

const UNITS_PER_WHOLE = 10n ** BigInt(AMOUNT_SCALE);

const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Signed fixed-point monetary amount with four fractional digits.
 *
 * Stored as a bigint count of minor units (1 unit = 0.0001), so addition,
 * subtraction and comparison are exact, whatever the magnitude. decimal.js
 * only reads decimal text.
 */
export class Amount {
  /**
   * Parse decimal text, truncating toward zero past the fourth fractional digit.
   */
  static parse(text: string): Result<Amount, InvalidAmountError> {
    const trimmed = text.trim();

    if (trimmed === '') {
      return err(new InvalidAmountError(text, 'value is empty'));
    }

    if (!DECIMAL_TEXT.test(trimmed)) {
      return err(new InvalidAmountError(text, 'not a decimal number'));
    }

    try {
      // toFixed rounds by decimal places, never by significant digits
      const fixed = new Decimal(trimmed).toFixed(AMOUNT_SCALE, Decimal.ROUND_DOWN);

      return ok(new Amount(BigInt(fixed.replace('.', ''))));
    } catch (error) {
      return err(new InvalidAmountError(text, error instanceof Error ? error.message : 'Unknown error'));
    }
  }

  static fromMinorUnits(units: bigint): Amount {
    return new Amount(units);
  }

  static zero(): Amount {
    return ZERO;
  }

  private constructor(private readonly _units: bigint) {}

  get minorUnits(): bigint {
    return this._units;
  }

  add(other: Amount): Amount {
    return new Amount(this._units + other._units);
  }

  subtract(other: Amount): Amount {
    return new Amount(this._units - other._units);
  }

  /**
   * @returns -1 if this < other, 0 if equal, 1 if this > other
   */
  compare(other: Amount): -1 | 0 | 1 {
    if (this._units < other._units) return -1;
    if (this._units > other._units) return 1;
    return 0;
  }

  equals(other: Amount): boolean {
    return this._units === other._units;
  }

  isLessThan(other: Amount): boolean {
    return this._units < other._units;
  }

  isGreaterThanOrEqual(other: Amount): boolean {
    return this._units >= other._units;
  }

  isZero(): boolean {
    return this._units === 0n;
  }

  isNegative(): boolean {
    return this._units < 0n;
  }

  /**
   * Normalized decimal text: no trailing fractional zeros, no exponent.
   */
  toString(): string {
    const negative = this._units < 0n;
    const magnitude = negative ? -this._units : this._units;
    const whole = (magnitude / UNITS_PER_WHOLE).toString();
    const fraction = (magnitude % UNITS_PER_WHOLE).toString().padStart(AMOUNT_SCALE, '0').replace(/0+$/, '');

    return `${negative ? '-' : ''}${whole}${fraction === '' ? '' : `.${fraction}`}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

const ZERO = Amount.fromMinorUnits(0n);
