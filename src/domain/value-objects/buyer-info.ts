import { FieldChecker } from './guards';

export interface BuyerInfoProps {
  email: string;
  firstName: string;
  lastName: string;
  phone: string;
}

/**
 * Buyer contact details captured on the buyer-info step.
 * Replaced wholesale on resubmission.
 */
export class BuyerInfo {
  private constructor(private readonly props: BuyerInfoProps) {}

  static create(input: BuyerInfoProps): BuyerInfo {
    const checker = new FieldChecker();
    const email = checker.requireText('email', input.email);
    const firstName = checker.requireText('firstName', input.firstName);
    const lastName = checker.requireText('lastName', input.lastName);
    const phone = checker.requireText('phone', input.phone);

    if (!checker.hasViolation('email')) {
      checker.check(email.includes('@'), 'email', 'email must contain @');
    }
    checker.throwIfInvalid('buyer info');

    return new BuyerInfo({ email, firstName, lastName, phone });
  }

  get email(): string {
    return this.props.email;
  }

  get firstName(): string {
    return this.props.firstName;
  }

  get lastName(): string {
    return this.props.lastName;
  }

  get phone(): string {
    return this.props.phone;
  }

  fullName(): string {
    return `${this.props.firstName} ${this.props.lastName}`;
  }

  toJSON(): BuyerInfoProps {
    return { ...this.props };
  }
}
