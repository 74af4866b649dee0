import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { APP_CONFIG, type AppConfig } from './config/configuration';
import { QueueService } from './queue/queue.service';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { bufferLogs: true });
  const config = app.get<AppConfig>(APP_CONFIG);
  app.useLogger(config.logLevels);
  app.enableShutdownHooks();

  configureApp(app);

  if (config.queue.workerEnabled) {
    app.get(QueueService).startWorker();
  }

  await app.listen(config.port);
  Logger.log(`API listening on port ${config.port} (${config.environment})`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error('Failed to start API', error instanceof Error ? error.stack : String(error), 'Bootstrap');
  process.exit(1);
});
