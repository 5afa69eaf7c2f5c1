import { describe, it, expect } from 'vitest';
import { createReceivedMessage } from '../../../src/domain/entities/received-message.entity';
import { HandlerFault, TransportError } from '../../../src/domain/errors/consumer.errors';
import { LoggingFaultSinkAdapter } from '../../../src/infrastructure/adapters/faults/logging-fault-sink.adapter';
import { createMockLogger } from '../helpers/mock-factories';

describe('LoggingFaultSinkAdapter', () => {
  const message = createReceivedMessage({
    messageId: 'msg-1',
    receiptHandle: 'rh-1',
    body: '{}',
    batchNumber: 4,
    receiveCount: 2,
  });

  it('should log a handler fault with the message context', () => {
    const logger = createMockLogger();
    const sink = new LoggingFaultSinkAdapter(logger);
    const fault = new HandlerFault('msg-1', new Error('boom'));

    sink.report(fault, message);

    expect(logger.child).toHaveBeenCalledWith({ context: 'LoggingFaultSinkAdapter' });
    expect(logger.error).toHaveBeenCalledWith(
      {
        fault: 'HandlerFault',
        code: 'HANDLER_FAULT',
        error: 'Handler for message msg-1 threw: boom',
        stack: fault.stack,
        messageId: 'msg-1',
        batch: 4,
        receiveCount: 2,
      },
      '[FAULT] Message processing fault',
    );
  });

  it('should log a transport fault', () => {
    const logger = createMockLogger();
    const sink = new LoggingFaultSinkAdapter(logger);

    sink.report(new TransportError('changeVisibility', 'timeout'), message);

    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({
        fault: 'TransportError',
        code: 'TRANSPORT_FAILED',
        error: 'changeVisibility failed: timeout',
      }),
      '[FAULT] Message processing fault',
    );
  });
});
