import { Injectable, Logger } from '@nestjs/common';
import { eq, inArray } from 'drizzle-orm';
import { DrizzleService } from '../../helpers/drizzle/drizzle.service';
import { productPrices, productStock } from '../../db/schema';
import { ArticleData } from '../../domain/services/article-reconciliation';
import { ProductId } from '../../domain/value-objects/identifiers';
import { Money } from '../../domain/value-objects/money';
import { ArticleDataPort } from './article-data.port';

/**
 * Reads `product_prices` joined with `product_stock`. A product without a
 * stock row has no stock.
 */
@Injectable()
export class DrizzleArticleDataAdapter implements ArticleDataPort {
  private readonly logger = new Logger(DrizzleArticleDataAdapter.name);

  constructor(private readonly drizzleService: DrizzleService) {}

  async getArticleData(productIds: readonly ProductId[]): Promise<ArticleData[]> {
    if (productIds.length === 0) {
      return [];
    }

    const rows = await this.drizzleService.db
      .select({
        productId: productPrices.productId,
        name: productPrices.name,
        priceMinor: productPrices.priceMinor,
        currency: productPrices.currency,
        isAvailable: productPrices.isAvailable,
        availableStock: productStock.availableStock,
      })
      .from(productPrices)
      .leftJoin(productStock, eq(productStock.productId, productPrices.productId))
      .where(inArray(productPrices.productId, [...productIds]));

    this.logger.debug({
      message: 'Article data loaded',
      requested: productIds.length,
      found: rows.length,
    });

    return rows.map((row) => ({
      productId: ProductId.of(row.productId),
      name: row.name,
      currentPrice: Money.ofMinor(row.priceMinor, row.currency),
      availableStock: row.availableStock ?? 0,
      isAvailable: row.isAvailable,
    }));
  }
}
