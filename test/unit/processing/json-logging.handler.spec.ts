import { describe, it, expect, vi } from 'vitest';
import { HandlerContext } from '../../../src/consumer/interfaces/message-handler.interface';
import {
  ReceivedMessage,
  createReceivedMessage,
} from '../../../src/domain/entities/received-message.entity';
import { OutcomeKind } from '../../../src/domain/value-objects/handler-outcome.vo';
import { JsonLoggingHandler } from '../../../src/processing/handlers/json-logging.handler';
import { TEST_FIXTURES, createMockLogger } from '../helpers/mock-factories';

describe('JsonLoggingHandler', () => {
  const contextFor = (message: ReceivedMessage): HandlerContext => ({
    message,
    signal: new AbortController().signal,
    lease: { messageId: message.messageId, remainingMs: () => 15000, extensions: 0 },
    extendVisibility: vi.fn(),
  });

  const messageWith = (body: string) =>
    createReceivedMessage({ messageId: 'msg-1', receiptHandle: 'rh-1', body, batchNumber: 1 });

  it('should log the parsed body and complete', async () => {
    const logger = createMockLogger();
    const handler = new JsonLoggingHandler(logger);
    const message = messageWith(TEST_FIXTURES.messageBody);

    const outcome = await handler.handle(message, contextFor(message));

    expect(outcome.kind).toBe(OutcomeKind.COMPLETED);
    expect(logger.info).toHaveBeenCalledWith(
      {
        messageId: 'msg-1',
        batch: 1,
        receiveCount: 1,
        leaseRemainingMs: 15000,
        body: { orderId: 'order-1', amount: 42 },
      },
      'Received message',
    );
  });

  it('should complete a body that is not JSON so it is not redelivered', async () => {
    const logger = createMockLogger();
    const handler = new JsonLoggingHandler(logger);
    const message = messageWith('plain text');

    const outcome = await handler.handle(message, contextFor(message));

    expect(outcome.kind).toBe(OutcomeKind.COMPLETED);
    expect(logger.warn).toHaveBeenCalledWith(
      { messageId: 'msg-1', batch: 1 },
      'Message body is not valid JSON, deleting',
    );
    expect(logger.info).not.toHaveBeenCalled();
  });
});
