import { Global, Module } from '@nestjs/common';
import { ARTICLE_DATA_PORT } from './catalog/article-data.port';
import { DrizzleArticleDataAdapter } from './catalog/drizzle-article-data.adapter';
import { INVENTORY_PORT } from './inventory/inventory.port';
import { DrizzleInventoryAdapter } from './inventory/drizzle-inventory.adapter';

@Global()
@Module({
  providers: [
    { provide: ARTICLE_DATA_PORT, useClass: DrizzleArticleDataAdapter },
    { provide: INVENTORY_PORT, useClass: DrizzleInventoryAdapter },
  ],
  exports: [ARTICLE_DATA_PORT, INVENTORY_PORT],
})
export class IntegrationsModule {}
