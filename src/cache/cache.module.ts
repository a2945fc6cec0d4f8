import { Global, Logger, Module } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { caching } from 'cache-manager';
import type { Cache } from 'cache-manager';
import { redisStore } from 'cache-manager-redis-yet';
import { upsStatsConfig } from '../config/ups-stats.config';

export const CACHE_TOKEN = Symbol('UPS_STATS_CACHE');

/**
 * 집계 결과 캐시. Redis URL 이 있으면 Redis, 없으면 in-memory 저장소를 쓴다.
 * TTL 은 poll 주기 이하로 유지한다.
 */
@Global()
@Module({
  providers: [
    {
      provide: CACHE_TOKEN,
      inject: [upsStatsConfig.KEY],
      useFactory: async (config: ConfigType<typeof upsStatsConfig>): Promise<Cache> => {
        const ttl = Math.max(config.aggregation.cacheTtlMs, 1);

        if (config.redisUrl) {
          Logger.log('Using Redis aggregate cache', 'CacheModule');
          const store = await redisStore({
            url: config.redisUrl,
            ttl,
          });
          return caching(store);
        }

        return caching('memory', {
          ttl,
          max: 100,
        });
      },
    },
  ],
  exports: [CACHE_TOKEN],
})
export class CacheModule {}
