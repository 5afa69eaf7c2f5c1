import { Module } from '@nestjs/common';
import { SqsModule } from './aws/sqs/sqs.module';
import { LoggingModule } from './logging/logging.module';

@Module({
  imports: [SqsModule, LoggingModule],
  exports: [SqsModule, LoggingModule],
})
export class SharedModule {}
