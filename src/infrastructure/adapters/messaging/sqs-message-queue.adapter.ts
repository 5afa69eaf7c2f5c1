import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { AppConfig } from '../../../config/configuration';
import {
  MessageQueuePort,
  QueueMessage,
  ReceiveBatchRequest,
  SendBatchEntry,
  SendBatchResult,
} from '../../../application/ports/output';
import { ConfigError, QueueOperation, TransportError } from '../../../domain/errors/consumer.errors';
import { SqsService } from '../../../shared/aws/sqs/sqs.service';
import { SqsQueueAttributes } from '../../../shared/aws/interfaces/sqs-message.interface';

/**
 * SQS Message Queue Adapter
 * Implements MessageQueuePort against a single queue URL using SqsService.
 * Every SDK failure surfaces as a TransportError naming the operation.
 */
@Injectable()
export class SqsMessageQueueAdapter implements MessageQueuePort {
  private readonly queueUrl: string;

  constructor(
    private readonly sqsService: SqsService,
    configService: ConfigService<AppConfig>,
  ) {
    const queueUrl = configService.get('sqs', { infer: true })?.queueUrl;
    if (!queueUrl) {
      throw new ConfigError(['sqs.queueUrl is required']);
    }
    this.queueUrl = queueUrl;
  }

  async receiveBatch(
    request: ReceiveBatchRequest,
    signal?: AbortSignal,
  ): Promise<QueueMessage[]> {
    const envelopes = await this.call('receiveBatch', () =>
      this.sqsService.receiveMessages(
        this.queueUrl,
        {
          maxMessages: request.maxCount,
          waitTimeSeconds: request.waitTimeSeconds,
          visibilityTimeout: request.visibilityTimeoutSeconds,
        },
        signal,
      ),
    );

    return envelopes.map((envelope) => ({
      messageId: envelope.messageId,
      body: envelope.body,
      receiptHandle: envelope.receiptHandle,
      receiveCount: envelope.approximateReceiveCount,
      attributes: envelope.attributes,
    }));
  }

  async deleteMessage(receiptHandle: string): Promise<void> {
    await this.call('deleteMessage', () =>
      this.sqsService.deleteMessage(this.queueUrl, receiptHandle),
    );
  }

  async changeVisibility(
    receiptHandle: string,
    visibilityTimeoutSeconds: number,
  ): Promise<void> {
    await this.call('changeVisibility', () =>
      this.sqsService.changeVisibility(this.queueUrl, receiptHandle, visibilityTimeoutSeconds),
    );
  }

  async sendBatch(entries: SendBatchEntry[]): Promise<SendBatchResult> {
    const batchPrefix = uuidv4();

    return this.call('sendBatch', () =>
      this.sqsService.sendMessageBatch(
        this.queueUrl,
        entries.map((entry, index) => ({
          id: entry.id ?? `${batchPrefix}-${index}`,
          body: entry.body,
          groupId: entry.groupId,
          deduplicationId: entry.deduplicationId,
          delaySeconds: entry.delaySeconds,
        })),
      ),
    );
  }

  /**
   * Fetch queue attributes to confirm the queue exists and credentials work
   */
  async verifyQueue(): Promise<SqsQueueAttributes> {
    return this.call('getQueueAttributes', () =>
      this.sqsService.getQueueAttributes(this.queueUrl),
    );
  }

  private async call<T>(operation: QueueOperation, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new TransportError(operation, error);
    }
  }
}
