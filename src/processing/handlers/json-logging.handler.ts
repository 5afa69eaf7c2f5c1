import { Inject, Injectable } from '@nestjs/common';
import { ReceivedMessage, parseJsonBody } from '../../domain/entities/received-message.entity';
import { HandlerOutcome } from '../../domain/value-objects/handler-outcome.vo';
import { HandlerContext } from '../../consumer/interfaces/message-handler.interface';
import { AppLogger } from '../../shared/logging/pino-logger.service';
import { APP_LOGGER } from '../../shared/logging/logging.module';

/**
 * Example handler: logs each message body and completes it.
 * Bodies that are not JSON are logged and deleted, since redelivery
 * would not make them parse.
 */
@Injectable()
export class JsonLoggingHandler {
  private readonly logger: AppLogger;

  constructor(@Inject(APP_LOGGER) logger: AppLogger) {
    this.logger = logger.child({ context: JsonLoggingHandler.name });
  }

  readonly handle = async (
    message: ReceivedMessage,
    context: HandlerContext,
  ): Promise<HandlerOutcome> => {
    const body = parseJsonBody(message);

    if (body === undefined) {
      this.logger.warn(
        { messageId: message.messageId, batch: message.batchNumber },
        'Message body is not valid JSON, deleting',
      );
      return HandlerOutcome.completed();
    }

    this.logger.info(
      {
        messageId: message.messageId,
        batch: message.batchNumber,
        receiveCount: message.receiveCount,
        leaseRemainingMs: context.lease.remainingMs(),
        body,
      },
      'Received message',
    );
    return HandlerOutcome.completed();
  };
}
