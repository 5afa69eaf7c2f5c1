import { Module } from '@nestjs/common';
import { SharedModule } from '../shared/shared.module';
import { JsonLoggingHandler } from './handlers/json-logging.handler';

@Module({
  imports: [SharedModule],
  providers: [JsonLoggingHandler],
  exports: [JsonLoggingHandler],
})
export class ProcessingModule {}
