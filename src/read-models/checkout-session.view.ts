/**
 * Checkout Session View
 *
 * What callers see of a session: its snapshot plus derived status and
 * navigation paths. Also the shape cached by the read model.
 */

import {
  CheckoutSession,
  CheckoutSessionSnapshot,
  CheckoutSessionStatus,
} from '../domain/aggregates/checkout-session.aggregate';
import { entryTarget, targetPath } from '../domain/services/step-access.validator';

export interface CheckoutSessionView extends CheckoutSessionSnapshot {
  status: CheckoutSessionStatus;
  isTerminal: boolean;
  /** Where the buyer continues, e.g. "/checkout/delivery". */
  entryPath: string;
}

export function toSessionView(session: CheckoutSession): CheckoutSessionView {
  return {
    ...session.toSnapshot(),
    status: session.status,
    isTerminal: session.isTerminal,
    entryPath: targetPath(entryTarget(session)),
  };
}
