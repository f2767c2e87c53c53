/**
 * Checkout Module
 *
 * Feature module for checkout sessions: HTTP API, command handlers,
 * event handlers and the expiration sweep.
 */

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CheckoutController } from './checkout.controller';
import { CHECKOUT_COMMAND_HANDLERS } from '../../commands/handlers';
import { CommandsModule } from '../../commands/commands.module';
import { EventBusModule } from '../../event-bus/event-bus.module';
import { AuditModule } from '../../audit/audit.module';
import { ReadModelsModule } from '../../read-models/read-models.module';
import { ShippingCatalog } from '../../domain/services/shipping-catalog';
import { CheckoutConfig } from '../../config';
import { CheckoutAuditHandler } from '../../workers/handlers/checkout-audit.handler';
import { CheckoutConfirmedInventoryHandler } from '../../workers/handlers/checkout-confirmed-inventory.handler';
import { ExpirationSweepService } from '../../workers/expiration-sweep.service';

@Module({
  imports: [CommandsModule, EventBusModule, AuditModule, ReadModelsModule],
  controllers: [CheckoutController],
  providers: [
    ...CHECKOUT_COMMAND_HANDLERS,
    {
      provide: ShippingCatalog,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        new ShippingCatalog(configService.getOrThrow<CheckoutConfig>('checkout').currency),
    },
    CheckoutAuditHandler,
    CheckoutConfirmedInventoryHandler,
    ExpirationSweepService,
  ],
})
export class CheckoutModule {}
