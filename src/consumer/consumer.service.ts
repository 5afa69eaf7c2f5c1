import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/configuration';
import { FaultSinkPort, MessageQueuePort } from '../application/ports/output';
import { ConfigError } from '../domain/errors/consumer.errors';
import { FAULT_SINK_PORT, MESSAGE_QUEUE_PORT } from '../infrastructure/infrastructure.module';
import { AppLogger } from '../shared/logging/pino-logger.service';
import { APP_LOGGER } from '../shared/logging/logging.module';
import { Consumer } from './consumer';
import { ConsumerConfig } from './interfaces/consumer-config.interface';

/**
 * Consumer Service
 * The Consumer wired to configuration and the infrastructure adapters.
 * Stops the poll loop and drains handlers when the application closes.
 */
@Injectable()
export class ConsumerService extends Consumer implements OnModuleDestroy {
  constructor(
    configService: ConfigService<AppConfig>,
    @Inject(MESSAGE_QUEUE_PORT) queue: MessageQueuePort,
    @Inject(FAULT_SINK_PORT) faultSink: FaultSinkPort,
    @Inject(APP_LOGGER) logger: AppLogger,
  ) {
    super(
      ConsumerService.readConfig(configService),
      queue,
      faultSink,
      logger.child({ context: ConsumerService.name }),
    );
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  private static readConfig(configService: ConfigService<AppConfig>): ConsumerConfig {
    const config = configService.get('consumer', { infer: true });
    if (!config) {
      throw new ConfigError(['consumer: configuration section is missing']);
    }
    return config;
  }
}
