import { ValidationError } from '../../shared/errors/domain.errors';
import { CheckoutLineItem } from './checkout-line-item';
import { Money, MoneyJson } from './money';

export interface CheckoutTotalsJson {
  subtotal: MoneyJson;
  shipping: MoneyJson;
  tax: MoneyJson;
  total: MoneyJson;
}

/**
 * Derived amounts for a session. Never mutated: every change of shipping
 * or line items produces a new instance.
 */
export class CheckoutTotals {
  private constructor(
    readonly subtotal: Money,
    readonly shipping: Money,
    readonly tax: Money,
    readonly total: Money,
  ) {}

  static calculate(subtotal: Money, shipping: Money, tax: Money): CheckoutTotals {
    return new CheckoutTotals(
      subtotal,
      shipping,
      tax,
      subtotal.add(shipping).add(tax),
    );
  }

  /**
   * Totals before any shipping option was chosen.
   */
  static forSubtotal(subtotal: Money): CheckoutTotals {
    const zero = Money.zero(subtotal.currency);
    return CheckoutTotals.calculate(subtotal, zero, zero);
  }

  static sumLineItems(lineItems: readonly CheckoutLineItem[], currency: string): Money {
    return lineItems.reduce(
      (sum, item) => sum.add(item.lineTotal()),
      Money.zero(currency),
    );
  }

  static fromJSON(json: CheckoutTotalsJson): CheckoutTotals {
    const totals = CheckoutTotals.calculate(
      Money.fromJSON(json.subtotal),
      Money.fromJSON(json.shipping),
      Money.fromJSON(json.tax),
    );
    if (!totals.total.equals(Money.fromJSON(json.total))) {
      throw ValidationError.forField('totals.total', 'Stored total does not add up');
    }
    return totals;
  }

  get currency(): string {
    return this.total.currency;
  }

  withShipping(shipping: Money): CheckoutTotals {
    return CheckoutTotals.calculate(this.subtotal, shipping, this.tax);
  }

  withSubtotal(subtotal: Money): CheckoutTotals {
    return CheckoutTotals.calculate(subtotal, this.shipping, this.tax);
  }

  equals(other: CheckoutTotals): boolean {
    return (
      this.subtotal.equals(other.subtotal) &&
      this.shipping.equals(other.shipping) &&
      this.tax.equals(other.tax) &&
      this.total.equals(other.total)
    );
  }

  toJSON(): CheckoutTotalsJson {
    return {
      subtotal: this.subtotal.toJSON(),
      shipping: this.shipping.toJSON(),
      tax: this.tax.toJSON(),
      total: this.total.toJSON(),
    };
  }
}
