import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis, { Cluster, ClusterNode, ClusterOptions } from 'ioredis';
import { CacheMapper } from './cache.mapper';
import { CacheValue, TtlCache } from './cache.types';
import { CACHE_TTL } from '../../utils/constants';
import { AppConfig } from '../../config';

/**
 * Redis access shared by the read-model cache and BullMQ. Cache reads and
 * writes never fail the caller: a broken cache degrades to a miss.
 */
@Injectable()
export class CacheService implements OnModuleDestroy {
  readonly client: Redis | Cluster;
  private readonly logger = new Logger(CacheService.name);

  constructor(
    private readonly cacheMapper: CacheMapper,
    private readonly configService: ConfigService,
  ) {
    const env = this.configService.get<AppConfig['nodeEnv']>('nodeEnv');
    const host = this.configService.getOrThrow<string>('cacheHost');
    const useTls = this.configService.get<boolean>('useTls') ?? false;
    const cachePassword = this.configService.get<string>('cachePassword');
    const isCluster = this.configService.get<boolean>('isRedisCluster') ?? false;
    const cachePort = this.configService.get<number>('cachePort') ?? 6379;

    if (isCluster) {
      const nodes: ClusterNode[] = [{ host, port: cachePort }];

      const options: ClusterOptions = {
        dnsLookup: (address, callback) => callback(null, address),
        redisOptions: {
          maxRetriesPerRequest: null,
          password: cachePassword,
          tls: useTls ? {} : undefined,
        },
      };
      this.client = new Redis.Cluster(nodes, options);
    } else {
      this.client = new Redis({
        host,
        port: cachePort,
        maxRetriesPerRequest: null,
        password: cachePassword,
        tls: useTls ? {} : undefined,
        username: 'default',
      });
    }

    const logMeta = {
      host,
      port: cachePort,
      useTls,
      isRedisCluster: isCluster,
      nodeEnv: env,
    };

    this.logger.log({ message: 'Connecting to Redis', ...logMeta });

    this.client.on('connect', () => this.logger.log('Redis connected'));
    this.client.on('error', (error: Error) => {
      this.logger.error({
        message: 'Redis error',
        ...logMeta,
        error: error.message,
      });
    });
  }

  async get(key: string): Promise<string | null> {
    try {
      return await this.client.get(key);
    } catch (error: unknown) {
      this.logger.error({
        message: 'Error occurred while performing get from cache',
        key,
        error: describe(error),
      });
      return null;
    }
  }

  async getJson<T extends CacheValue>(
    key: string,
    isValid: (value: unknown) => value is T,
  ): Promise<T | null> {
    const data = await this.get(key);
    if (data === null) {
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(data);
      return isValid(parsed) ? parsed : null;
    } catch (error: unknown) {
      this.logger.warn({
        message: 'Discarding unreadable cache entry',
        key,
        error: describe(error),
      });
      return null;
    }
  }

  async set(key: string, value: string | CacheValue, ttl?: number): Promise<'OK' | null> {
    try {
      const data = typeof value === 'string' ? value : JSON.stringify(value);
      return ttl
        ? await this.client.set(key, data, 'EX', ttl)
        : await this.client.set(key, data);
    } catch (error: unknown) {
      this.logger.error({
        message: 'Error occurred while performing set data',
        key,
        error: describe(error),
      });
      return null;
    }
  }

  /**
   * Cache-aside: return the cached value when present and valid,
   * otherwise compute it with `func` and store it.
   */
  async cache<T extends CacheValue>(
    getCacheConfig: (cacheMapper: CacheMapper) => TtlCache<T>,
    isValid: (value: unknown) => value is T,
  ): Promise<T | null> {
    const { func, key, ttl = CACHE_TTL.DAY } = getCacheConfig(this.cacheMapper);

    const cached = await this.getJson(key, isValid);
    if (cached !== null) {
      return cached;
    }

    const result = await func(key, ttl);
    if (result !== null) {
      await this.set(key, result, ttl);
    }
    return result;
  }

  async del(key: string): Promise<void> {
    try {
      const deleted = await this.client.del(key);
      if (deleted) {
        this.logger.verbose(`deleted cache for key: ${key}`);
      }
    } catch (error: unknown) {
      this.logger.error({
        message: 'Error occurred while performing `del` data',
        key,
        error: describe(error),
      });
    }
  }

  async onModuleDestroy() {
    await this.client.quit();
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
