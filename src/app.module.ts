import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import type { ConfigType } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { TypeOrmModule } from '@nestjs/typeorm';
import { isAbsolute, join } from 'path';
import { AggregationModule } from './aggregation/aggregation.module';
import { AlertEntity } from './alerts/alert.entity';
import { AlertsModule } from './alerts/alerts.module';
import { AppController } from './app.controller';
import { CacheModule } from './cache/cache.module';
import { upsStatsConfig } from './config/ups-stats.config';
import { UpsSampleEntity } from './persistence/ups-sample.entity';
import { PollerModule } from './poller/poller.module';
import { SamplesModule } from './samples/samples.module';
import { ShutdownEventEntity } from './shutdown/shutdown-event.entity';
import { ShutdownModule } from './shutdown/shutdown.module';
import { StatsModule } from './stats/stats.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [upsStatsConfig],
    }),
    ScheduleModule.forRoot(),
    TypeOrmModule.forRootAsync({
      inject: [upsStatsConfig.KEY],
      useFactory: (config: ConfigType<typeof upsStatsConfig>) => {
        const { path, inMemory } = config.database;
        const sqlitePath = inMemory ? ':memory:' : isAbsolute(path) ? path : join(process.cwd(), path);

        return {
          type: 'sqlite',
          database: sqlitePath,
          entities: [UpsSampleEntity, ShutdownEventEntity, AlertEntity],
          synchronize: true,
          enableWAL: !inMemory,
        };
      },
    }),
    CacheModule,
    SamplesModule,
    AggregationModule,
    AlertsModule,
    ShutdownModule,
    PollerModule,
    StatsModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
