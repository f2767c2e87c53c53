/**
 * Shipping Catalog
 *
 * The fixed set of shipping options offered at the delivery step, priced
 * in the shop currency.
 */

import { ValidationError } from '../../shared/errors/domain.errors';
import { Money } from '../value-objects/money';
import { ShippingOption } from '../value-objects/shipping-option';

interface ShippingOptionDefinition {
  id: string;
  name: string;
  estimatedDelivery: string;
  costMinor: number;
}

const DEFINITIONS: readonly ShippingOptionDefinition[] = [
  { id: 'standard', name: 'Standard Shipping', estimatedDelivery: '5-7 business days', costMinor: 499 },
  { id: 'express', name: 'Express Shipping', estimatedDelivery: '2-3 business days', costMinor: 999 },
  { id: 'overnight', name: 'Overnight Shipping', estimatedDelivery: 'Next business day', costMinor: 1999 },
  { id: 'free', name: 'Free Shipping', estimatedDelivery: '7-10 business days', costMinor: 0 },
];

export class ShippingCatalog {
  private readonly options: ReadonlyMap<string, ShippingOption>;

  constructor(readonly currency: string) {
    this.options = new Map(
      DEFINITIONS.map((definition) => [
        definition.id,
        ShippingOption.create({
          id: definition.id,
          name: definition.name,
          estimatedDelivery: definition.estimatedDelivery,
          cost: Money.ofMinor(definition.costMinor, currency),
        }),
      ]),
    );
  }

  list(): ShippingOption[] {
    return [...this.options.values()];
  }

  find(id: string): ShippingOption | undefined {
    return this.options.get(id);
  }

  findOrFail(id: string): ShippingOption {
    const option = this.options.get(id);
    if (!option) {
      throw ValidationError.forField(
        'shippingOptionId',
        `Unknown shipping option '${id}'`,
      );
    }
    return option;
  }
}
