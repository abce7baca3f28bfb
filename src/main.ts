import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { errorMessage } from './collector/error-message';

async function bootstrap(): Promise<void> {
  // No HTTP server: the collector only needs the DI container and lifecycle
  const app = await NestFactory.createApplicationContext(AppModule);

  // SIGINT/SIGTERM stop the scheduler before the process exits
  app.enableShutdownHooks();
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Collector failed to start: ${errorMessage(error)}`,
  );
  process.exit(1);
});
