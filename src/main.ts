import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger as PinoLogger } from 'nestjs-pino';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';

async function bootstrap() {
  // No HTTP surface: the simulation runs on its scheduler
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  // Replace default NestJS logger with nestjs-pino
  app.useLogger(app.get(PinoLogger));
  app.enableShutdownHooks();

  const logger = new Logger('Bootstrap');
  logger.log('Venue simulator is running');
}

void bootstrap();
