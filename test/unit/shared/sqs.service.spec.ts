import { describe, it, expect, beforeEach } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import {
  ChangeMessageVisibilityCommand,
  DeleteMessageCommand,
  GetQueueAttributesCommand,
  ReceiveMessageCommand,
  SQSClient,
  SendMessageBatchCommand,
} from '@aws-sdk/client-sqs';
import { SqsService } from '../../../src/shared/aws/sqs/sqs.service';
import {
  MockLogger,
  TEST_FIXTURES,
  createConfigService,
  createMockLogger,
} from '../helpers/mock-factories';

describe('SqsService', () => {
  const sqsMock = mockClient(SQSClient);
  const queueUrl = TEST_FIXTURES.queueUrl;
  let service: SqsService;
  let logger: MockLogger;

  beforeEach(() => {
    sqsMock.reset();
    logger = createMockLogger();
    service = new SqsService(createConfigService(), logger);
  });

  describe('receiveMessages', () => {
    it('should request the batch with receive count and message attributes', async () => {
      sqsMock.on(ReceiveMessageCommand).resolves({ Messages: [] });

      await service.receiveMessages(queueUrl, {
        maxMessages: 5,
        waitTimeSeconds: 20,
        visibilityTimeout: 30,
      });

      const calls = sqsMock.commandCalls(ReceiveMessageCommand);
      expect(calls).toHaveLength(1);
      expect(calls[0].args[0].input).toEqual({
        QueueUrl: queueUrl,
        MaxNumberOfMessages: 5,
        WaitTimeSeconds: 20,
        VisibilityTimeout: 30,
        MessageSystemAttributeNames: ['ApproximateReceiveCount'],
        MessageAttributeNames: ['All'],
      });
    });

    it('should send a visibility timeout of 0 as given', async () => {
      sqsMock.on(ReceiveMessageCommand).resolves({});

      const messages = await service.receiveMessages(queueUrl, {
        maxMessages: 10,
        waitTimeSeconds: 0,
        visibilityTimeout: 0,
      });

      expect(messages).toEqual([]);
      expect(sqsMock.commandCalls(ReceiveMessageCommand)[0].args[0].input).toMatchObject({
        VisibilityTimeout: 0,
      });
    });

    it('should map messages and skip those without a receipt handle', async () => {
      sqsMock.on(ReceiveMessageCommand).resolves({
        Messages: [
          {
            MessageId: 'm-1',
            ReceiptHandle: 'rh-1',
            Body: '{"n":1}',
            Attributes: { ApproximateReceiveCount: '3' },
            MessageAttributes: {
              tenant: { DataType: 'String', StringValue: 'acme' },
            },
          },
          { MessageId: 'm-2', Body: '{"n":2}' },
        ],
      });

      const messages = await service.receiveMessages(queueUrl, {
        maxMessages: 10,
        waitTimeSeconds: 0,
        visibilityTimeout: 20,
      });

      expect(messages).toEqual([
        {
          messageId: 'm-1',
          receiptHandle: 'rh-1',
          body: '{"n":1}',
          approximateReceiveCount: 3,
          attributes: { tenant: 'acme' },
        },
      ]);
      expect(logger.warn).toHaveBeenCalledWith(
        { messageId: 'm-2' },
        'Skipping message without id or receipt handle',
      );
    });

    it('should propagate SDK errors unchanged', async () => {
      const error = new Error('AccessDenied');
      sqsMock.on(ReceiveMessageCommand).rejects(error);

      await expect(
        service.receiveMessages(queueUrl, { maxMessages: 1, waitTimeSeconds: 0, visibilityTimeout: 0 }),
      ).rejects.toThrow('AccessDenied');
    });
  });

  it('should delete a message by receipt handle', async () => {
    sqsMock.on(DeleteMessageCommand).resolves({});

    await service.deleteMessage(queueUrl, 'rh-1');

    expect(sqsMock.commandCalls(DeleteMessageCommand)[0].args[0].input).toEqual({
      QueueUrl: queueUrl,
      ReceiptHandle: 'rh-1',
    });
  });

  it('should change message visibility', async () => {
    sqsMock.on(ChangeMessageVisibilityCommand).resolves({});

    await service.changeVisibility(queueUrl, 'rh-1', 0);

    expect(sqsMock.commandCalls(ChangeMessageVisibilityCommand)[0].args[0].input).toEqual({
      QueueUrl: queueUrl,
      ReceiptHandle: 'rh-1',
      VisibilityTimeout: 0,
    });
  });

  it('should send a batch and report successful and failed entries', async () => {
    sqsMock.on(SendMessageBatchCommand).resolves({
      Successful: [{ Id: 'a', MessageId: 'm-1', MD5OfMessageBody: 'md5' }],
      Failed: [{ Id: 'b', Code: 'InvalidParameterValue', Message: 'bad body', SenderFault: true }],
    });

    const result = await service.sendMessageBatch(queueUrl, [
      { id: 'a', body: 'first' },
      { id: 'b', body: 'second', groupId: 'g-1', deduplicationId: 'd-1' },
    ]);

    expect(result).toEqual({
      successful: [{ id: 'a', messageId: 'm-1' }],
      failed: [{ id: 'b', code: 'InvalidParameterValue', message: 'bad body', senderFault: true }],
    });
    expect(sqsMock.commandCalls(SendMessageBatchCommand)[0].args[0].input.Entries).toEqual([
      {
        Id: 'a',
        MessageBody: 'first',
        DelaySeconds: undefined,
        MessageGroupId: undefined,
        MessageDeduplicationId: undefined,
      },
      {
        Id: 'b',
        MessageBody: 'second',
        DelaySeconds: undefined,
        MessageGroupId: 'g-1',
        MessageDeduplicationId: 'd-1',
      },
    ]);
  });

  it('should parse queue attributes', async () => {
    sqsMock.on(GetQueueAttributesCommand).resolves({
      Attributes: {
        ApproximateNumberOfMessages: '12',
        ApproximateNumberOfMessagesNotVisible: '3',
        VisibilityTimeout: '30',
      },
    });

    await expect(service.getQueueAttributes(queueUrl)).resolves.toEqual({
      approximateMessages: 12,
      approximateMessagesNotVisible: 3,
      visibilityTimeout: 30,
    });
  });
});
