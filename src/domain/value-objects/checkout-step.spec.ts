import {
  CheckoutSteps,
  isCheckoutStep,
  isProgressStep,
  isTerminalStep,
  nextStep,
  previousStep,
  stepRank,
} from './checkout-step';

describe('checkout steps', () => {
  it('ranks progress steps in checkout order', () => {
    expect(stepRank(CheckoutSteps.STARTED)).toBe(0);
    expect(stepRank(CheckoutSteps.REVIEW)).toBe(4);
    expect(stepRank(CheckoutSteps.CONFIRMED)).toBe(5);
  });

  it('walks forward and backward one step at a time', () => {
    expect(nextStep(CheckoutSteps.BUYER_INFO)).toBe(CheckoutSteps.DELIVERY);
    expect(nextStep(CheckoutSteps.CONFIRMED)).toBeNull();
    expect(previousStep(CheckoutSteps.DELIVERY)).toBe(CheckoutSteps.BUYER_INFO);
    expect(previousStep(CheckoutSteps.STARTED)).toBeNull();
  });

  it('separates progress steps from outcomes', () => {
    expect(isProgressStep(CheckoutSteps.CONFIRMED)).toBe(true);
    expect(isProgressStep(CheckoutSteps.COMPLETED)).toBe(false);
    expect(isTerminalStep(CheckoutSteps.EXPIRED)).toBe(true);
    expect(isTerminalStep(CheckoutSteps.PAYMENT)).toBe(false);
  });

  it('recognizes step names', () => {
    expect(isCheckoutStep('abandoned')).toBe(true);
    expect(isCheckoutStep('shipping')).toBe(false);
  });
});
