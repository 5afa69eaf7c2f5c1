import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AppConfig } from './config/configuration';
import { ConsumerService } from './consumer/consumer.service';
import { describeCause } from './domain/errors/consumer.errors';
import { SqsMessageQueueAdapter } from './infrastructure/adapters/messaging/sqs-message-queue.adapter';
import { JsonLoggingHandler } from './processing/handlers/json-logging.handler';
import { PinoLoggerService } from './shared/logging/pino-logger.service';

/**
 * Bootstrap the consumer
 * Application context only (no HTTP); exits once the poll loop terminates
 */
async function bootstrap(): Promise<number> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  const configService = app.get(ConfigService<AppConfig>);
  const logger = app.get(PinoLoggerService);

  app.useLogger(logger);
  logger.setContext('Bootstrap');

  const consumer = app.get(ConsumerService);
  const queue = app.get(SqsMessageQueueAdapter);
  const handler = app.get(JsonLoggingHandler);

  const shutdownHandler = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal, stopping consumer...');
    await consumer.stop();
  };

  process.once('SIGTERM', () => void shutdownHandler('SIGTERM'));
  process.once('SIGINT', () => void shutdownHandler('SIGINT'));

  let exitCode = 0;
  try {
    const attributes = await queue.verifyQueue();
    logger.info(
      {
        nodeEnv: configService.get('nodeEnv', { infer: true }),
        pid: process.pid,
        queueUrl: configService.get('sqs', { infer: true })?.queueUrl,
        ...attributes,
      },
      'Queue consumer started',
    );

    consumer.registerHandler(handler.handle);
    await consumer.run();
  } catch (error) {
    logger.error({ error: describeCause(error) }, 'Consumer terminated with an error');
    exitCode = 1;
  }

  await app.close();
  return exitCode;
}

bootstrap()
  .then((exitCode) => process.exit(exitCode))
  .catch((error: unknown) => {
    console.error('Failed to start consumer:', error);
    process.exit(1);
  });
