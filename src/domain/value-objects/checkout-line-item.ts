import { FieldChecker } from './guards';
import { LineItemId, ProductId } from './identifiers';
import { Money, MoneyJson } from './money';

export interface CheckoutLineItemJson {
  id: string;
  productId: string;
  productName: string;
  unitPrice: MoneyJson;
  quantity: number;
}

/**
 * One product captured from the cart when checkout started, with the unit
 * price the buyer saw at that moment.
 */
export class CheckoutLineItem {
  private constructor(
    readonly id: LineItemId,
    readonly productId: ProductId,
    readonly productName: string,
    readonly unitPrice: Money,
    readonly quantity: number,
  ) {}

  static create(input: {
    id?: string;
    productId: string;
    productName: string;
    unitPrice: Money;
    quantity: number;
  }): CheckoutLineItem {
    const checker = new FieldChecker();
    checker.requireText('productId', input.productId);
    const productName = checker.requireText('productName', input.productName);
    checker.check(
      Number.isSafeInteger(input.quantity) && input.quantity > 0,
      'quantity',
      'quantity must be a positive integer',
    );
    checker.throwIfInvalid('line item');

    return new CheckoutLineItem(
      input.id === undefined ? LineItemId.generate() : LineItemId.of(input.id),
      ProductId.of(input.productId),
      productName,
      input.unitPrice,
      input.quantity,
    );
  }

  static fromJSON(json: CheckoutLineItemJson): CheckoutLineItem {
    return CheckoutLineItem.create({
      id: json.id,
      productId: json.productId,
      productName: json.productName,
      unitPrice: Money.fromJSON(json.unitPrice),
      quantity: json.quantity,
    });
  }

  lineTotal(): Money {
    return this.unitPrice.multiply(this.quantity);
  }

  /**
   * Same line item at a different unit price.
   */
  withUnitPrice(unitPrice: Money): CheckoutLineItem {
    return new CheckoutLineItem(
      this.id,
      this.productId,
      this.productName,
      unitPrice,
      this.quantity,
    );
  }

  toJSON(): CheckoutLineItemJson {
    return {
      id: this.id,
      productId: this.productId,
      productName: this.productName,
      unitPrice: this.unitPrice.toJSON(),
      quantity: this.quantity,
    };
  }
}
