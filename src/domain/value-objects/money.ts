/**
 * Money
 *
 * Amounts are held as integer minor units (cents) with an ISO 4217 code,
 * so sums and comparisons are exact. All amounts in checkout are
 * non-negative and belong to the session's single currency.
 */

import { ValidationError } from '../../shared/errors/domain.errors';

export interface MoneyJson {
  amountMinor: number;
  currency: string;
}

const CURRENCY_PATTERN = /^[A-Z]{3}$/;

export class Money {
  private constructor(
    readonly amountMinor: number,
    readonly currency: string,
  ) {}

  static ofMinor(amountMinor: number, currency: string): Money {
    if (!Number.isSafeInteger(amountMinor)) {
      throw ValidationError.forField(
        'amount',
        `Amount must be an integer number of minor units, got ${amountMinor}`,
      );
    }
    if (amountMinor < 0) {
      throw ValidationError.forField('amount', 'Amount cannot be negative');
    }
    if (!CURRENCY_PATTERN.test(currency)) {
      throw ValidationError.forField(
        'currency',
        `Invalid currency code '${currency}'`,
      );
    }
    return new Money(amountMinor, currency);
  }

  /**
   * Build from a decimal major-unit amount, e.g. `Money.of(4.99, 'EUR')`.
   * Rounds half up to whole cents on the amount's shortest decimal form,
   * so 1.005 becomes 101 cents although `1.005 * 100` is 100.49999...
   */
  static of(amount: number, currency: string): Money {
    if (!Number.isFinite(amount)) {
      throw ValidationError.forField('amount', 'Amount must be a finite number');
    }
    const [digits, exponent] = amount.toExponential().split('e');
    const cents = Number(`${digits}e${Number(exponent) + 2}`);
    return Money.ofMinor(Math.round(cents), currency);
  }

  static zero(currency: string): Money {
    return Money.ofMinor(0, currency);
  }

  static fromJSON(json: MoneyJson): Money {
    return Money.ofMinor(json.amountMinor, json.currency);
  }

  add(other: Money): Money {
    this.assertSameCurrency(other);
    return new Money(this.amountMinor + other.amountMinor, this.currency);
  }

  multiply(quantity: number): Money {
    if (!Number.isSafeInteger(quantity) || quantity < 0) {
      throw ValidationError.forField(
        'quantity',
        `Quantity must be a non-negative integer, got ${quantity}`,
      );
    }
    return new Money(this.amountMinor * quantity, this.currency);
  }

  isZero(): boolean {
    return this.amountMinor === 0;
  }

  equals(other: Money): boolean {
    return (
      this.currency === other.currency && this.amountMinor === other.amountMinor
    );
  }

  isGreaterThan(other: Money): boolean {
    this.assertSameCurrency(other);
    return this.amountMinor > other.amountMinor;
  }

  /** Two-decimal major units, e.g. "55.00". */
  format(): string {
    const major = Math.floor(this.amountMinor / 100);
    const minor = String(this.amountMinor % 100).padStart(2, '0');
    return `${major}.${minor}`;
  }

  toString(): string {
    return `${this.format()} ${this.currency}`;
  }

  toJSON(): MoneyJson {
    return { amountMinor: this.amountMinor, currency: this.currency };
  }

  private assertSameCurrency(other: Money): void {
    if (this.currency !== other.currency) {
      throw new ValidationError('Currency mismatch', [
        {
          field: 'currency',
          message: `Cannot combine ${this.currency} with ${other.currency}`,
        },
      ]);
    }
  }
}
