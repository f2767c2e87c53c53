/**
 * Repository Module
 *
 * Global module providing checkout session persistence.
 */

import { Global, Module } from '@nestjs/common';
import { EventBusModule } from '../event-bus/event-bus.module';
import { CHECKOUT_SESSION_REPOSITORY } from './checkout-session.repository';
import { CheckoutSessionsRepo } from './checkout-sessions.repo';
import { ExpiringSessionLoader } from './expiring-session.loader';

@Global()
@Module({
  imports: [EventBusModule],
  providers: [
    { provide: CHECKOUT_SESSION_REPOSITORY, useClass: CheckoutSessionsRepo },
    ExpiringSessionLoader,
  ],
  exports: [CHECKOUT_SESSION_REPOSITORY, ExpiringSessionLoader],
})
export class RepositoryModule {}
