import { Module } from '@nestjs/common';
import { SqsModule } from '../shared/aws/sqs/sqs.module';
import { LoggingModule } from '../shared/logging/logging.module';
import { SqsMessageQueueAdapter } from './adapters/messaging/sqs-message-queue.adapter';
import { LoggingFaultSinkAdapter } from './adapters/faults/logging-fault-sink.adapter';

// Injection tokens (string symbols for DI)
export const MESSAGE_QUEUE_PORT = 'MessageQueuePort';
export const FAULT_SINK_PORT = 'FaultSinkPort';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for the consumer's output ports
 */
@Module({
  imports: [LoggingModule, SqsModule],
  providers: [
    SqsMessageQueueAdapter,
    {
      provide: MESSAGE_QUEUE_PORT,
      useExisting: SqsMessageQueueAdapter,
    },

    LoggingFaultSinkAdapter,
    {
      provide: FAULT_SINK_PORT,
      useExisting: LoggingFaultSinkAdapter,
    },
  ],
  exports: [MESSAGE_QUEUE_PORT, FAULT_SINK_PORT, SqsMessageQueueAdapter],
})
export class InfrastructureModule {}
