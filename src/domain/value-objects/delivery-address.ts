import { FieldChecker } from './guards';

export interface DeliveryAddressProps {
  street: string;
  streetLine2?: string;
  city: string;
  postalCode: string;
  country: string;
  state?: string;
}

export class DeliveryAddress {
  private constructor(private readonly props: DeliveryAddressProps) {}

  static create(input: DeliveryAddressProps): DeliveryAddress {
    const checker = new FieldChecker();
    const street = checker.requireText('street', input.street);
    const city = checker.requireText('city', input.city);
    const postalCode = checker.requireText('postalCode', input.postalCode);
    const country = checker.requireText('country', input.country);
    checker.throwIfInvalid('delivery address');

    return new DeliveryAddress({
      street,
      streetLine2: checker.optionalText(input.streetLine2),
      city,
      postalCode,
      country,
      state: checker.optionalText(input.state),
    });
  }

  get street(): string {
    return this.props.street;
  }

  get streetLine2(): string | undefined {
    return this.props.streetLine2;
  }

  get city(): string {
    return this.props.city;
  }

  get postalCode(): string {
    return this.props.postalCode;
  }

  get country(): string {
    return this.props.country;
  }

  get state(): string | undefined {
    return this.props.state;
  }

  /**
   * Single-line rendering, e.g. "Main St 1, Apt 4, 10115 Berlin, DE".
   */
  formattedAddress(): string {
    const locality = [this.props.postalCode, this.props.city].join(' ');
    return [
      this.props.street,
      this.props.streetLine2,
      locality,
      this.props.state,
      this.props.country,
    ]
      .filter((part): part is string => part !== undefined)
      .join(', ');
  }

  toJSON(): DeliveryAddressProps {
    const json: DeliveryAddressProps = {
      street: this.props.street,
      city: this.props.city,
      postalCode: this.props.postalCode,
      country: this.props.country,
    };
    if (this.props.streetLine2 !== undefined) {
      json.streetLine2 = this.props.streetLine2;
    }
    if (this.props.state !== undefined) {
      json.state = this.props.state;
    }
    return json;
  }
}
