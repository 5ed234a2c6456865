import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { AppEnv } from '../config/env.validation';

export const REDIS_CLIENT = Symbol('REDIS_CLIENT');

/** The hash commands the segment registry relies on. */
export interface RedisHashClient {
  hsetnx(key: string, field: string, value: string): Promise<number>;
  hset(key: string, field: string, value: string): Promise<number>;
  hget(key: string, field: string): Promise<string | null>;
  hscan(
    key: string,
    cursor: string,
    countToken: 'COUNT',
    count: number,
  ): Promise<[string, string[]]>;
  expire(key: string, seconds: number): Promise<number>;
}

/**
 * Owns the Redis connection. The client is created eagerly so that every
 * consumer receives the same, already-configured instance through DI.
 */
@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly log = new Logger(RedisService.name);
  readonly client: Redis;

  constructor(cfg: ConfigService<AppEnv, true>) {
    this.client = new Redis({
      host: cfg.get('REDIS_HOST', { infer: true }),
      port: cfg.get('REDIS_PORT', { infer: true }),
      password: cfg.get('REDIS_PASSWORD', { infer: true }),
      db: cfg.get('REDIS_DB', { infer: true }),
      lazyConnect: false,
    });

    this.client.on('connect', () => {
      this.log.log('✅ Redis connection established successfully');
    });

    this.client.on('error', (error: Error) => {
      this.log.error(`❌ Redis connection error: ${error.message}`);
    });
  }

  get hashClient(): RedisHashClient {
    return this.client;
  }

  async onModuleDestroy() {
    await this.client.quit();
  }
}
