import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { ConsumerModule } from './consumer/consumer.module';
import { InfrastructureModule } from './infrastructure/infrastructure.module';
import { ProcessingModule } from './processing/processing.module';
import { SharedModule } from './shared/shared.module';

/**
 * Application Module
 * Queue consumer (no HTTP server): the poll loop is driven from main.ts
 */
@Module({
  imports: [ConfigModule, SharedModule, InfrastructureModule, ConsumerModule, ProcessingModule],
})
export class AppModule {}
