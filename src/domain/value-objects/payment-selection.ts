import { FieldChecker } from './guards';

export interface PaymentSelectionJson {
  providerId: string;
  providerReference?: string;
}

/**
 * The payment provider chosen by the buyer and, when the provider has
 * already authorized, its opaque authorization token. Checkout never
 * interprets the token.
 */
export class PaymentSelection {
  private constructor(
    readonly providerId: string,
    readonly providerReference: string | undefined,
  ) {}

  static create(input: PaymentSelectionJson): PaymentSelection {
    const checker = new FieldChecker();
    const providerId = checker.requireText('providerId', input.providerId);
    checker.throwIfInvalid('payment selection');

    return new PaymentSelection(
      providerId,
      checker.optionalText(input.providerReference),
    );
  }

  hasAuthorization(): boolean {
    return this.providerReference !== undefined;
  }

  toJSON(): PaymentSelectionJson {
    return this.providerReference === undefined
      ? { providerId: this.providerId }
      : { providerId: this.providerId, providerReference: this.providerReference };
  }
}
