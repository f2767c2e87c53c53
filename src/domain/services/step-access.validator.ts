/**
 * Step Access Validator
 *
 * Decides whether a caller may view a checkout step, or where to send
 * them instead. Pure: it reads the session's current step and changes
 * nothing.
 *
 * Rules, first match wins:
 * 1. No session                         -> redirect to the cart
 * 2. Closed session, not confirmation   -> redirect to the confirmation view
 * 3. Requested step ahead of current    -> redirect to the current step
 * 4. Otherwise (current or earlier)     -> allow
 *
 * Rule 4 is what makes backward navigation possible without the session's
 * step ever moving backwards.
 */

import {
  CheckoutStep,
  CheckoutSteps,
  PROGRESS_STEPS,
  ProgressStep,
  isProgressStep,
  stepRank,
} from '../value-objects/checkout-step';

export interface SessionStepView {
  readonly currentStep: CheckoutStep;
}

export type RedirectTarget =
  | { type: 'cart' }
  | { type: 'step'; step: ProgressStep };

export type AccessDecision =
  | { kind: 'allow' }
  | { kind: 'redirect'; target: RedirectTarget };

/** The step whose view shows the order confirmation. */
export const CONFIRMATION_VIEW: ProgressStep = CheckoutSteps.CONFIRMED;

export const CART_PATH = '/cart';

const STEP_PATHS: Record<ProgressStep, string> = {
  [CheckoutSteps.STARTED]: '/checkout/start',
  [CheckoutSteps.BUYER_INFO]: '/checkout/buyer-info',
  [CheckoutSteps.DELIVERY]: '/checkout/delivery',
  [CheckoutSteps.PAYMENT]: '/checkout/payment',
  [CheckoutSteps.REVIEW]: '/checkout/review',
  [CheckoutSteps.CONFIRMED]: '/checkout/confirmation',
};

const ALLOW: AccessDecision = { kind: 'allow' };

function redirectTo(target: RedirectTarget): AccessDecision {
  return { kind: 'redirect', target };
}

export function validateAccess(
  session: SessionStepView | null | undefined,
  requestedStep: ProgressStep,
): AccessDecision {
  if (!session) {
    return redirectTo({ type: 'cart' });
  }

  const current = session.currentStep;

  if (!isProgressStep(current)) {
    return requestedStep === CONFIRMATION_VIEW
      ? ALLOW
      : redirectTo({ type: 'step', step: CONFIRMATION_VIEW });
  }

  if (stepRank(requestedStep) > stepRank(current)) {
    return redirectTo({ type: 'step', step: current });
  }

  return ALLOW;
}

/**
 * Where a caller without a specific step in mind should land.
 */
export function entryTarget(session: SessionStepView | null | undefined): RedirectTarget {
  if (!session) {
    return { type: 'cart' };
  }
  const current = session.currentStep;
  return isProgressStep(current)
    ? { type: 'step', step: current }
    : { type: 'step', step: CONFIRMATION_VIEW };
}

export function stepPath(step: ProgressStep): string {
  return STEP_PATHS[step];
}

export function targetPath(target: RedirectTarget): string {
  return target.type === 'cart' ? CART_PATH : stepPath(target.step);
}

/**
 * Map a view path back to its step, e.g. "/checkout/buyer-info".
 */
export function stepForPath(path: string): ProgressStep | undefined {
  const normalized = path.replace(/\/+$/, '');
  return PROGRESS_STEPS.find((step) => STEP_PATHS[step] === normalized);
}
