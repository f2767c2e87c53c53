import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { drizzle, PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import * as schema from '../../db/schema';
import postgres from 'postgres';
import { ConfigService } from '@nestjs/config';
import { NodeEnvironment } from '../../config';

export type Database = PostgresJsDatabase<typeof schema>;

export type DrizzleTransaction = Parameters<Parameters<Database['transaction']>[0]>[0];

@Injectable()
export class DrizzleService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DrizzleService.name);
  private client?: postgres.Sql;
  private database?: Database;

  constructor(private readonly configService: ConfigService) {}

  get db(): Database {
    if (!this.database) {
      throw new Error('Database is not connected yet.');
    }
    return this.database;
  }

  onModuleInit() {
    const databaseUrl = this.configService.get<string>('dbUrl');
    if (!databaseUrl) {
      throw new Error('Database URL is not defined in the configuration.');
    }
    const ssl = this.configService.get<boolean>('dbSsl') ? 'require' : false;
    this.client = postgres(databaseUrl, { ssl });

    this.logger.log({ message: 'Connecting to Postgres', ssl: ssl !== false });
    this.database = drizzle(this.client, {
      schema,
      logger: this.configService.get('nodeEnv') === NodeEnvironment.Development,
    });
  }

  async onModuleDestroy() {
    if (this.client) {
      await this.client.end({ timeout: 5 });
    }
  }
}
