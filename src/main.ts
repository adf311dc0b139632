import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { Logger as PinoLogger } from 'nestjs-pino';
import { AppModule } from './app.module';

const DEFAULT_PORT = 3000;

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  // Use pino logger for all NestJS logs
  app.useLogger(app.get(PinoLogger));

  const logger = new Logger('Bootstrap');

  // Closes Redis and stops the BullMQ workers on SIGTERM
  app.enableShutdownHooks();

  const port = app.get(ConfigService).get<number>('port', DEFAULT_PORT);
  await app.listen(port);

  logger.log(`Conversation lifecycle service listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error);
  process.exit(1);
});
