import { Injectable, Logger } from '@nestjs/common';
import { HealthCheckService, MemoryHealthIndicator } from '@nestjs/terminus';
import { DrizzleHealthIndicator } from './helpers/drizzle/drizzle.health';

const HEAP_LIMIT_BYTES = 150 * 1024 * 1024;

@Injectable()
export class AppService {
  private readonly logger = new Logger(AppService.name);

  constructor(
    private readonly health: HealthCheckService,
    private readonly memory: MemoryHealthIndicator,
    private readonly dbCheck: DrizzleHealthIndicator,
  ) {}

  healthCheck() {
    this.logger.debug('Health check started');
    return this.health.check([
      () => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES),
      () => this.dbCheck.isHealthy('db_check'),
    ]);
  }
}
