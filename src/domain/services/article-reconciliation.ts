/**
 * Article Reconciliation
 *
 * Compares the line items captured at checkout start against current,
 * externally owned price and stock data and produces a verdict.
 *
 * This module does no I/O. The confirm use case fetches the article data
 * (bounded by a timeout) and hands it in as a lookup; the aggregate then
 * decides with the verdict.
 *
 * Per line item:
 * - no data for the product           -> ARTICLE_DATA_MISSING (blocking)
 * - product flagged unavailable       -> PRODUCT_UNAVAILABLE (blocking)
 * - quantity > stock                  -> INSUFFICIENT_STOCK (blocking);
 *                                        the quantity is summed over every
 *                                        line of the product
 * - price in another currency         -> CURRENCY_MISMATCH (blocking)
 * - price differs from captured price -> PRICE_CHANGED (blocking only if
 *                                        the policy says so)
 */

import { CheckoutLineItem } from '../value-objects/checkout-line-item';
import { CheckoutTotals } from '../value-objects/checkout-totals';
import { LineItemId, ProductId } from '../value-objects/identifiers';
import { Money, MoneyJson } from '../value-objects/money';

// ============================================================================
// ARTICLE DATA
// ============================================================================

/**
 * Current authoritative data for one product.
 */
export interface ArticleData {
  productId: string;
  name?: string;
  currentPrice: Money;
  availableStock: number;
  isAvailable: boolean;
}

export type ArticleDataLookup = (productId: ProductId) => ArticleData | undefined;

export function lookupFromArticles(articles: readonly ArticleData[]): ArticleDataLookup {
  const byProduct = new Map(articles.map((article) => [article.productId, article]));
  return (productId) => byProduct.get(productId);
}

export interface ReconciliationPolicy {
  /** Refuse confirmation when any captured unit price differs from the current one. */
  blockOnPriceChange: boolean;
}

export const DEFAULT_RECONCILIATION_POLICY: ReconciliationPolicy = {
  blockOnPriceChange: false,
};

// ============================================================================
// PROBLEMS
// ============================================================================

export const ProblemTypes = {
  ARTICLE_DATA_MISSING: 'ARTICLE_DATA_MISSING',
  PRODUCT_UNAVAILABLE: 'PRODUCT_UNAVAILABLE',
  INSUFFICIENT_STOCK: 'INSUFFICIENT_STOCK',
  CURRENCY_MISMATCH: 'CURRENCY_MISMATCH',
  PRICE_CHANGED: 'PRICE_CHANGED',
} as const;

export type ProblemType = (typeof ProblemTypes)[keyof typeof ProblemTypes];

interface ProblemBase {
  lineItemId: LineItemId;
  productId: ProductId;
  productName: string;
  message: string;
  blocking: boolean;
}

export interface ArticleDataMissingProblem extends ProblemBase {
  type: typeof ProblemTypes.ARTICLE_DATA_MISSING;
}

export interface ProductUnavailableProblem extends ProblemBase {
  type: typeof ProblemTypes.PRODUCT_UNAVAILABLE;
}

export interface InsufficientStockProblem extends ProblemBase {
  type: typeof ProblemTypes.INSUFFICIENT_STOCK;
  requested: number;
  available: number;
}

export interface CurrencyMismatchProblem extends ProblemBase {
  type: typeof ProblemTypes.CURRENCY_MISMATCH;
  expectedCurrency: string;
  actualCurrency: string;
}

export interface PriceChangedProblem extends ProblemBase {
  type: typeof ProblemTypes.PRICE_CHANGED;
  capturedPrice: MoneyJson;
  currentPrice: MoneyJson;
}

export type ReconciliationProblem =
  | ArticleDataMissingProblem
  | ProductUnavailableProblem
  | InsufficientStockProblem
  | CurrencyMismatchProblem
  | PriceChangedProblem;

// ============================================================================
// VERDICT
// ============================================================================

export class CheckoutVerdict {
  constructor(
    readonly problems: readonly ReconciliationProblem[],
    /** Line items carrying the current prices wherever a usable price was found. */
    readonly repricedLineItems: readonly CheckoutLineItem[],
    readonly subtotal: Money,
  ) {}

  get isValid(): boolean {
    return this.blockingProblems.length === 0;
  }

  get blockingProblems(): ReconciliationProblem[] {
    return this.problems.filter((problem) => problem.blocking);
  }

  get priceChanges(): PriceChangedProblem[] {
    return this.problems.filter(
      (problem): problem is PriceChangedProblem =>
        problem.type === ProblemTypes.PRICE_CHANGED,
    );
  }

  hasPriceChanges(): boolean {
    return this.priceChanges.length > 0;
  }

  problemsFor(lineItemId: string): ReconciliationProblem[] {
    return this.problems.filter((problem) => problem.lineItemId === lineItemId);
  }

  /**
   * Totals recomputed from the verdict's subtotal, keeping shipping and tax.
   */
  applyTo(totals: CheckoutTotals): CheckoutTotals {
    return totals.withSubtotal(this.subtotal);
  }
}

// ============================================================================
// RECONCILIATION
// ============================================================================

export function reconcileLineItems(
  lineItems: readonly CheckoutLineItem[],
  lookup: ArticleDataLookup,
  currency: string,
  policy: ReconciliationPolicy = DEFAULT_RECONCILIATION_POLICY,
): CheckoutVerdict {
  const problems: ReconciliationProblem[] = [];
  const repriced: CheckoutLineItem[] = [];
  const requestedByProduct = new Map<string, number>();
  for (const item of lineItems) {
    requestedByProduct.set(
      item.productId,
      (requestedByProduct.get(item.productId) ?? 0) + item.quantity,
    );
  }

  for (const item of lineItems) {
    const requested = requestedByProduct.get(item.productId) ?? item.quantity;
    const base = {
      lineItemId: item.id,
      productId: item.productId,
      productName: item.productName,
    };
    const article = lookup(item.productId);

    if (!article) {
      problems.push({
        ...base,
        type: ProblemTypes.ARTICLE_DATA_MISSING,
        message: 'No current price or stock data for product',
        blocking: true,
      });
      repriced.push(item);
      continue;
    }

    if (!article.isAvailable) {
      problems.push({
        ...base,
        type: ProblemTypes.PRODUCT_UNAVAILABLE,
        message: 'Product is not available for purchase',
        blocking: true,
      });
    } else if (requested > article.availableStock) {
      problems.push({
        ...base,
        type: ProblemTypes.INSUFFICIENT_STOCK,
        message: `Insufficient stock: requested ${requested}, available ${article.availableStock}`,
        requested,
        available: article.availableStock,
        blocking: true,
      });
    }

    if (article.currentPrice.currency !== currency) {
      problems.push({
        ...base,
        type: ProblemTypes.CURRENCY_MISMATCH,
        message: `Current price is in ${article.currentPrice.currency}, session is in ${currency}`,
        expectedCurrency: currency,
        actualCurrency: article.currentPrice.currency,
        blocking: true,
      });
      repriced.push(item);
      continue;
    }

    if (!article.currentPrice.equals(item.unitPrice)) {
      problems.push({
        ...base,
        type: ProblemTypes.PRICE_CHANGED,
        message: `Price changed from ${item.unitPrice.toString()} to ${article.currentPrice.toString()}`,
        capturedPrice: item.unitPrice.toJSON(),
        currentPrice: article.currentPrice.toJSON(),
        blocking: policy.blockOnPriceChange,
      });
    }

    repriced.push(item.withUnitPrice(article.currentPrice));
  }

  return new CheckoutVerdict(
    problems,
    repriced,
    CheckoutTotals.sumLineItems(repriced, currency),
  );
}
