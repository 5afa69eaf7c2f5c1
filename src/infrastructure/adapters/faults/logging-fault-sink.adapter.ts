import { Inject, Injectable } from '@nestjs/common';
import { FaultSinkPort, MessageFault } from '../../../application/ports/output';
import { ReceivedMessage } from '../../../domain/entities/received-message.entity';
import { AppLogger } from '../../../shared/logging/pino-logger.service';
import { APP_LOGGER } from '../../../shared/logging/logging.module';

/**
 * Logging Fault Sink Adapter (Simple Implementation)
 * Implements FaultSinkPort by writing each fault as a structured error log.
 *
 * Replace with an alerting or error-tracking sink where faults need to page.
 */
@Injectable()
export class LoggingFaultSinkAdapter implements FaultSinkPort {
  private readonly logger: AppLogger;

  constructor(@Inject(APP_LOGGER) logger: AppLogger) {
    this.logger = logger.child({ context: LoggingFaultSinkAdapter.name });
  }

  report(fault: MessageFault, message: ReceivedMessage): void {
    this.logger.error(
      {
        fault: fault.name,
        code: fault.code,
        error: fault.message,
        stack: fault.stack,
        messageId: message.messageId,
        batch: message.batchNumber,
        receiveCount: message.receiveCount,
      },
      '[FAULT] Message processing fault',
    );
  }
}
