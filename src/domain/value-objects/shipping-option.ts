import { FieldChecker } from './guards';
import { Money, MoneyJson } from './money';

export interface ShippingOptionJson {
  id: string;
  name: string;
  estimatedDelivery: string;
  cost: MoneyJson;
}

export class ShippingOption {
  private constructor(
    readonly id: string,
    readonly name: string,
    readonly estimatedDelivery: string,
    readonly cost: Money,
  ) {}

  static create(input: {
    id: string;
    name: string;
    estimatedDelivery: string;
    cost: Money;
  }): ShippingOption {
    const checker = new FieldChecker();
    const id = checker.requireText('shippingOption.id', input.id);
    const name = checker.requireText('shippingOption.name', input.name);
    const estimatedDelivery = checker.requireText(
      'shippingOption.estimatedDelivery',
      input.estimatedDelivery,
    );
    checker.throwIfInvalid('shipping option');

    return new ShippingOption(id, name, estimatedDelivery, input.cost);
  }

  static fromJSON(json: ShippingOptionJson): ShippingOption {
    return ShippingOption.create({
      id: json.id,
      name: json.name,
      estimatedDelivery: json.estimatedDelivery,
      cost: Money.fromJSON(json.cost),
    });
  }

  isFree(): boolean {
    return this.cost.isZero();
  }

  toJSON(): ShippingOptionJson {
    return {
      id: this.id,
      name: this.name,
      estimatedDelivery: this.estimatedDelivery,
      cost: this.cost.toJSON(),
    };
  }
}
