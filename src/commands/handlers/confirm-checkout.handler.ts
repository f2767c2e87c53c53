/**
 * Confirm Checkout Command Handler
 *
 * Fetches current price and stock for the session's products, bounded by
 * ARTICLE_DATA_TIMEOUT_MS, and lets the aggregate decide. A slow or
 * failing lookup is reported as RESOLVER_UNAVAILABLE (retryable) and the
 * session stays where it was.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom, from, timeout, TimeoutError } from 'rxjs';
import { CommandHandler } from '../bus/command-bus';
import { CLOCK, Clock } from '../../shared/context/clock';
import { CheckoutConfig } from '../../config';
import {
  CheckoutSession,
  TransitionContext,
} from '../../domain/aggregates/checkout-session.aggregate';
import { ResolverUnavailableError } from '../../domain/errors/checkout.errors';
import {
  ArticleData,
  PriceChangedProblem,
  ReconciliationPolicy,
  lookupFromArticles,
} from '../../domain/services/article-reconciliation';
import { ProductId } from '../../domain/value-objects/identifiers';
import {
  ARTICLE_DATA_PORT,
  ArticleDataPort,
} from '../../integrations/catalog/article-data.port';
import {
  CHECKOUT_SESSION_REPOSITORY,
  CheckoutSessionRepository,
} from '../../repositories/checkout-session.repository';
import { ExpiringSessionLoader } from '../../repositories/expiring-session.loader';
import { CheckoutCommandTypes, ConfirmCheckoutCommand } from '../checkout.commands';
import { SessionTransitionHandler } from './session-transition.handler';

export interface ConfirmCheckoutExtra {
  /** Non-blocking price differences the buyer should be told about. */
  priceChanges: PriceChangedProblem[];
}

@Injectable()
@CommandHandler(CheckoutCommandTypes.CONFIRM)
export class ConfirmCheckoutHandler extends SessionTransitionHandler<
  ConfirmCheckoutCommand,
  ConfirmCheckoutExtra
> {
  protected readonly logger = new Logger(ConfirmCheckoutHandler.name);
  private readonly timeoutMs: number;
  private readonly policy: ReconciliationPolicy;

  constructor(
    loader: ExpiringSessionLoader,
    @Inject(CHECKOUT_SESSION_REPOSITORY) repository: CheckoutSessionRepository,
    @Inject(CLOCK) clock: Clock,
    @Inject(ARTICLE_DATA_PORT) private readonly articleData: ArticleDataPort,
    configService: ConfigService,
  ) {
    super(loader, repository, clock);
    const config = configService.getOrThrow<CheckoutConfig>('checkout');
    this.timeoutMs = config.articleDataTimeoutMs;
    this.policy = { blockOnPriceChange: config.blockOnPriceChange };
  }

  protected async apply(
    session: CheckoutSession,
    _command: ConfirmCheckoutCommand,
    ctx: TransitionContext,
  ): Promise<ConfirmCheckoutExtra> {
    session.assertCanConfirm();

    const productIds = [...new Set(session.lineItems.map((item) => item.productId))];
    const articles = await this.fetchArticleData(productIds, ctx.correlationId);

    const verdict = session.confirm(lookupFromArticles(articles), ctx, this.policy);
    if (verdict.hasPriceChanges()) {
      this.logger.log({
        message: 'Checkout confirmed with changed prices',
        correlationId: ctx.correlationId,
        sessionId: session.id,
        productIds: verdict.priceChanges.map((change) => change.productId),
      });
    }

    return { priceChanges: verdict.priceChanges };
  }

  private async fetchArticleData(
    productIds: ProductId[],
    correlationId: string,
  ): Promise<ArticleData[]> {
    try {
      return await firstValueFrom(
        from(this.articleData.getArticleData(productIds)).pipe(timeout(this.timeoutMs)),
      );
    } catch (error) {
      const reason =
        error instanceof TimeoutError
          ? `no response within ${this.timeoutMs}ms`
          : 'lookup failed';
      this.logger.warn({
        message: 'Article data lookup failed',
        correlationId,
        reason,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new ResolverUnavailableError(reason, error);
    }
  }
}
