import {
  CART_PATH,
  entryTarget,
  stepForPath,
  stepPath,
  targetPath,
  validateAccess,
} from './step-access.validator';
import { CheckoutSteps, PROGRESS_STEPS } from '../value-objects/checkout-step';

describe('validateAccess', () => {
  it('sends callers without a session to the cart', () => {
    expect(validateAccess(null, CheckoutSteps.DELIVERY)).toEqual({
      kind: 'redirect',
      target: { type: 'cart' },
    });
  });

  it('allows the current step and every earlier one', () => {
    const session = { currentStep: CheckoutSteps.PAYMENT };

    for (const step of [
      CheckoutSteps.STARTED,
      CheckoutSteps.BUYER_INFO,
      CheckoutSteps.DELIVERY,
      CheckoutSteps.PAYMENT,
    ]) {
      expect(validateAccess(session, step)).toEqual({ kind: 'allow' });
    }
  });

  it('redirects steps ahead of the session to the current step', () => {
    const session = { currentStep: CheckoutSteps.BUYER_INFO };

    expect(validateAccess(session, CheckoutSteps.REVIEW)).toEqual({
      kind: 'redirect',
      target: { type: 'step', step: CheckoutSteps.BUYER_INFO },
    });
  });

  it('sends closed sessions to the confirmation view', () => {
    for (const currentStep of [
      CheckoutSteps.COMPLETED,
      CheckoutSteps.ABANDONED,
      CheckoutSteps.EXPIRED,
    ]) {
      expect(validateAccess({ currentStep }, CheckoutSteps.PAYMENT)).toEqual({
        kind: 'redirect',
        target: { type: 'step', step: CheckoutSteps.CONFIRMED },
      });
      expect(validateAccess({ currentStep }, CheckoutSteps.CONFIRMED)).toEqual({
        kind: 'allow',
      });
    }
  });

  it('lets a confirmed session look back at earlier steps', () => {
    expect(
      validateAccess({ currentStep: CheckoutSteps.CONFIRMED }, CheckoutSteps.DELIVERY),
    ).toEqual({ kind: 'allow' });
  });
});

describe('step paths', () => {
  it('maps every progress step to a path and back', () => {
    for (const step of PROGRESS_STEPS) {
      expect(stepForPath(stepPath(step))).toBe(step);
    }
  });

  it('ignores trailing slashes and rejects unknown paths', () => {
    expect(stepForPath('/checkout/buyer-info/')).toBe(CheckoutSteps.BUYER_INFO);
    expect(stepForPath('/checkout/shipping')).toBeUndefined();
  });

  it('resolves redirect targets to paths', () => {
    expect(targetPath({ type: 'cart' })).toBe(CART_PATH);
    expect(targetPath(entryTarget({ currentStep: CheckoutSteps.DELIVERY }))).toBe(
      '/checkout/delivery',
    );
    expect(targetPath(entryTarget({ currentStep: CheckoutSteps.EXPIRED }))).toBe(
      '/checkout/confirmation',
    );
    expect(targetPath(entryTarget(undefined))).toBe('/cart');
  });
});
