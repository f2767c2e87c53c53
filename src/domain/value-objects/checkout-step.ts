/**
 * Checkout steps.
 *
 * The six progress steps are totally ordered by an explicit rank. The
 * three outcomes (completed, abandoned, expired) carry no rank and are
 * absorbing.
 */

export const CheckoutSteps = {
  STARTED: 'started',
  BUYER_INFO: 'buyer_info',
  DELIVERY: 'delivery',
  PAYMENT: 'payment',
  REVIEW: 'review',
  CONFIRMED: 'confirmed',
  COMPLETED: 'completed',
  ABANDONED: 'abandoned',
  EXPIRED: 'expired',
} as const;

export type CheckoutStep = (typeof CheckoutSteps)[keyof typeof CheckoutSteps];

export type ProgressStep =
  | typeof CheckoutSteps.STARTED
  | typeof CheckoutSteps.BUYER_INFO
  | typeof CheckoutSteps.DELIVERY
  | typeof CheckoutSteps.PAYMENT
  | typeof CheckoutSteps.REVIEW
  | typeof CheckoutSteps.CONFIRMED;

export type TerminalStep =
  | typeof CheckoutSteps.COMPLETED
  | typeof CheckoutSteps.ABANDONED
  | typeof CheckoutSteps.EXPIRED;

const STEP_RANK: Record<ProgressStep, number> = {
  [CheckoutSteps.STARTED]: 0,
  [CheckoutSteps.BUYER_INFO]: 1,
  [CheckoutSteps.DELIVERY]: 2,
  [CheckoutSteps.PAYMENT]: 3,
  [CheckoutSteps.REVIEW]: 4,
  [CheckoutSteps.CONFIRMED]: 5,
};

export const PROGRESS_STEPS: readonly ProgressStep[] = [
  CheckoutSteps.STARTED,
  CheckoutSteps.BUYER_INFO,
  CheckoutSteps.DELIVERY,
  CheckoutSteps.PAYMENT,
  CheckoutSteps.REVIEW,
  CheckoutSteps.CONFIRMED,
];

export const TERMINAL_STEPS: readonly TerminalStep[] = [
  CheckoutSteps.COMPLETED,
  CheckoutSteps.ABANDONED,
  CheckoutSteps.EXPIRED,
];

export const ALL_STEPS: readonly CheckoutStep[] = [
  ...PROGRESS_STEPS,
  ...TERMINAL_STEPS,
];

export function isCheckoutStep(value: string): value is CheckoutStep {
  return ALL_STEPS.some((step) => step === value);
}

export function isProgressStep(step: CheckoutStep): step is ProgressStep {
  return step in STEP_RANK;
}

export function isTerminalStep(step: CheckoutStep): step is TerminalStep {
  return !isProgressStep(step);
}

export function stepRank(step: ProgressStep): number {
  return STEP_RANK[step];
}

/**
 * The step that immediately follows `step`, or null for confirmed.
 */
export function nextStep(step: ProgressStep): ProgressStep | null {
  return PROGRESS_STEPS[stepRank(step) + 1] ?? null;
}

/**
 * The step immediately before `step`, or null for started.
 */
export function previousStep(step: ProgressStep): ProgressStep | null {
  const rank = stepRank(step);
  return rank === 0 ? null : PROGRESS_STEPS[rank - 1];
}
