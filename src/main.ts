import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { ZodValidationPipe } from 'nestjs-zod';
import { AppModule } from './app.module';
import { upsStatsConfig } from './config/ups-stats.config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    cors: {
      origin: true,
      credentials: true,
    },
  });

  app.setGlobalPrefix('api');
  app.useGlobalPipes(new ZodValidationPipe());
  app.enableShutdownHooks();

  const config = app.get<ConfigType<typeof upsStatsConfig>>(upsStatsConfig.KEY);
  await app.listen(config.port);
  Logger.log(`ups-stats listening on http://localhost:${config.port}`, 'Bootstrap');
}
bootstrap().catch((error) => {
  Logger.error(error, 'Bootstrap');
  process.exit(1);
});
