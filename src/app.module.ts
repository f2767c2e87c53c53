/**
 * Application Module
 *
 * Root module. Data flow:
 * HTTP Request -> Command -> CheckoutSession -> Event -> Outbox -> Queue -> Worker -> Audit
 */

import { MiddlewareConsumer, Module, RequestMethod } from '@nestjs/common';
import { SentryModule } from '@sentry/nestjs/setup';
import { ConfigModule } from '@nestjs/config';
import { BullModule } from '@nestjs/bullmq';
import { TerminusModule } from '@nestjs/terminus';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { APP_GUARD } from '@nestjs/core';

import configuration from './config';
import { AppController } from './app.controller';
import { AppService } from './app.service';

import { DrizzleModule } from './helpers/drizzle/drizzle.module';
import { CacheModule } from './helpers/cache/cache.module';
import { DrizzleHealthIndicator } from './helpers/drizzle/drizzle.health';
import { CacheService } from './helpers/cache/cache.service';

import { LoggerMiddleware } from './middlewares/logger.middleware';

import { ContextModule } from './shared/context/context.module';
import { ObservabilityModule } from './observability/observability.module';
import { CommandsModule } from './commands/commands.module';
import { EventBusModule } from './event-bus/event-bus.module';
import { WorkersModule } from './workers/workers.module';
import { AuditModule } from './audit/audit.module';
import { ReadModelsModule } from './read-models/read-models.module';
import { RepositoryModule } from './repositories/repository.module';
import { IntegrationsModule } from './integrations/integrations.module';

import { CheckoutModule } from './api/checkout/checkout.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      ignoreEnvFile: true,
      cache: true,
    }),
    SentryModule.forRoot(),

    ThrottlerModule.forRoot({
      throttlers: [
        {
          ttl: 60000,
          limit: 50,
        },
      ],
    }),

    BullModule.forRootAsync({
      inject: [CacheService],
      useFactory: (cacheService: CacheService) => ({
        connection: cacheService.client,
      }),
    }),

    TerminusModule.forRoot({ errorLogStyle: 'pretty' }),

    CacheModule,
    DrizzleModule,
    ContextModule,

    ObservabilityModule,
    CommandsModule,
    EventBusModule,
    WorkersModule,
    AuditModule,
    ReadModelsModule,
    RepositoryModule,
    IntegrationsModule,

    CheckoutModule,
  ],
  controllers: [AppController],
  providers: [
    AppService,
    DrizzleHealthIndicator,
    { provide: APP_GUARD, useClass: ThrottlerGuard },
  ],
})
export class AppModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer
      .apply(LoggerMiddleware)
      .exclude({
        path: '/health',
        method: RequestMethod.GET,
      })
      .forRoutes('*');
  }
}
