import { plainToInstance, Transform, TransformFnParams } from 'class-transformer';
import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Min,
  validateSync,
} from 'class-validator';
import * as dotenv from 'dotenv';
import * as process from 'process';

dotenv.config();

export enum NodeEnvironment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
  Staging = 'staging',
}

// Reads the raw value: implicit conversion would already have turned
// the string 'false' into true.
const toBoolean = ({ key, obj }: TransformFnParams): unknown => {
  const raw: unknown = obj[key];
  return typeof raw === 'string' ? raw.trim().toLowerCase() === 'true' : raw;
};

export class EnvironmentVariables {
  @IsEnum(NodeEnvironment)
  @IsOptional()
  NODE_ENV: NodeEnvironment = NodeEnvironment.Development;

  @IsInt()
  @IsOptional()
  PORT: number = 3000;

  @IsString()
  @IsNotEmpty()
  DB_URL!: string;

  @Transform(toBoolean)
  @IsBoolean()
  @IsOptional()
  DB_SSL: boolean = false;

  @IsString()
  @IsNotEmpty()
  CACHE_HOST!: string;

  @IsInt()
  @IsOptional()
  CACHE_PORT: number = 6379;

  @Transform(toBoolean)
  @IsBoolean()
  @IsOptional()
  USE_TLS: boolean = false;

  @Transform(toBoolean)
  @IsBoolean()
  @IsOptional()
  IS_REDIS_CLUSTER: boolean = false;

  @IsString()
  @IsOptional()
  CACHE_PASSWORD?: string;

  @IsInt()
  @Min(1)
  @IsOptional()
  CHECKOUT_IDLE_TIMEOUT_MINUTES: number = 30;

  @IsInt()
  @Min(1000)
  @IsOptional()
  EXPIRATION_SWEEP_INTERVAL_MS: number = 120000;

  @IsInt()
  @Min(1)
  @IsOptional()
  EXPIRATION_SWEEP_BATCH_SIZE: number = 100;

  @IsInt()
  @Min(1)
  @IsOptional()
  ARTICLE_DATA_TIMEOUT_MS: number = 3000;

  @Transform(toBoolean)
  @IsBoolean()
  @IsOptional()
  BLOCK_ON_PRICE_CHANGE: boolean = false;

  @Matches(/^[A-Z]{3}$/)
  @IsOptional()
  CHECKOUT_CURRENCY: string = 'EUR';

  @IsString()
  @IsOptional()
  PAYMENT_PROVIDERS: string = 'mock,invoice';

  @IsString()
  @IsOptional()
  SENTRY_DSN?: string;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }
  return validatedConfig;
}

export interface CheckoutConfig {
  idleTimeoutMs: number;
  sweepIntervalMs: number;
  sweepBatchSize: number;
  articleDataTimeoutMs: number;
  blockOnPriceChange: boolean;
  currency: string;
  paymentProviders: string[];
}

export function buildConfig(env: EnvironmentVariables) {
  const checkout: CheckoutConfig = {
    idleTimeoutMs: env.CHECKOUT_IDLE_TIMEOUT_MINUTES * 60_000,
    sweepIntervalMs: env.EXPIRATION_SWEEP_INTERVAL_MS,
    sweepBatchSize: env.EXPIRATION_SWEEP_BATCH_SIZE,
    articleDataTimeoutMs: env.ARTICLE_DATA_TIMEOUT_MS,
    blockOnPriceChange: env.BLOCK_ON_PRICE_CHANGE,
    currency: env.CHECKOUT_CURRENCY,
    paymentProviders: env.PAYMENT_PROVIDERS.split(',')
      .map((provider) => provider.trim())
      .filter((provider) => provider.length > 0),
  };

  return {
    port: env.PORT,
    dbUrl: env.DB_URL,
    dbSsl: env.DB_SSL,
    nodeEnv: env.NODE_ENV,
    cacheHost: env.CACHE_HOST,
    useTls: env.USE_TLS,
    cachePassword: env.CACHE_PASSWORD,
    isRedisCluster: env.IS_REDIS_CLUSTER,
    cachePort: env.CACHE_PORT,
    sentryDsn: env.SENTRY_DSN,
    checkout,
  };
}

export type AppConfig = ReturnType<typeof buildConfig>;

export default (): AppConfig => buildConfig(validate(process.env));
