/**
 * Article Data Port
 *
 * Current price, stock and availability of products, owned by the catalog
 * and inventory contexts. Implementations must read fresh data on every
 * call; confirmation depends on it.
 */

import { ArticleData } from '../../domain/services/article-reconciliation';
import { ProductId } from '../../domain/value-objects/identifiers';

export const ARTICLE_DATA_PORT = Symbol('ARTICLE_DATA_PORT');

export interface ArticleDataPort {
  /**
   * Data for each known product. Unknown products are left out of the
   * result rather than reported as errors.
   */
  getArticleData(productIds: readonly ProductId[]): Promise<ArticleData[]>;
}
