/**
 * Read Models Module
 *
 * Query services, kept apart from the command side.
 */

import { Module } from '@nestjs/common';
import { CheckoutSessionReadModel } from './checkout-session.read-model';
import { CacheModule } from '../helpers/cache/cache.module';

@Module({
  imports: [CacheModule],
  providers: [CheckoutSessionReadModel],
  exports: [CheckoutSessionReadModel],
})
export class ReadModelsModule {}
