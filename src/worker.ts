import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { APP_CONFIG, type AppConfig } from './config/configuration';
import { QueueService } from './queue/queue.service';

/**
 * Standalone job worker: boots the application context without HTTP and polls the jobs table.
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, { bufferLogs: true });
  const config = app.get<AppConfig>(APP_CONFIG);
  app.useLogger(config.logLevels);
  app.enableShutdownHooks();

  app.get(QueueService).startWorker();
  Logger.log('Worker process started', 'Worker');
}

bootstrap().catch((error: unknown) => {
  Logger.error('Failed to start worker', error instanceof Error ? error.stack : String(error), 'Worker');
  process.exit(1);
});
