import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  SQSClient,
  ReceiveMessageCommand,
  DeleteMessageCommand,
  SendMessageBatchCommand,
  ChangeMessageVisibilityCommand,
  GetQueueAttributesCommand,
  Message,
} from '@aws-sdk/client-sqs';
import { AppConfig } from '../../../config/configuration';
import {
  SqsMessageEnvelope,
  SqsReceiveOptions,
  SqsSendBatchEntry,
  SqsSendBatchResult,
  SqsQueueAttributes,
} from '../interfaces/sqs-message.interface';
import { AppLogger } from '../../logging/pino-logger.service';
import { APP_LOGGER } from '../../logging/logging.module';

/**
 * Thin wrapper around the AWS SDK v3 SQS client.
 * SDK errors propagate unchanged; callers decide how to classify them.
 */
@Injectable()
export class SqsService implements OnModuleDestroy {
  private readonly client: SQSClient;
  private readonly logger: AppLogger;

  constructor(
    private readonly configService: ConfigService<AppConfig>,
    @Inject(APP_LOGGER) logger: AppLogger,
  ) {
    const awsConfig = this.configService.get('aws', { infer: true });

    this.client = new SQSClient({
      region: awsConfig?.region,
      maxAttempts: awsConfig?.maxAttempts,
      ...(awsConfig?.endpoint && { endpoint: awsConfig.endpoint }),
      ...(awsConfig?.credentials && { credentials: awsConfig.credentials }),
    });

    this.logger = logger.child({ context: SqsService.name });
  }

  async receiveMessages(
    queueUrl: string,
    options: SqsReceiveOptions,
    abortSignal?: AbortSignal,
  ): Promise<SqsMessageEnvelope[]> {
    const command = new ReceiveMessageCommand({
      QueueUrl: queueUrl,
      MaxNumberOfMessages: options.maxMessages,
      WaitTimeSeconds: options.waitTimeSeconds,
      VisibilityTimeout: options.visibilityTimeout,
      MessageSystemAttributeNames: ['ApproximateReceiveCount'],
      MessageAttributeNames: ['All'],
    });

    const response = await this.client.send(command, { abortSignal });

    if (!response.Messages || response.Messages.length === 0) {
      return [];
    }

    return response.Messages.flatMap((message) => {
      const envelope = this.toEnvelope(message);
      if (!envelope) {
        this.logger.warn(
          { messageId: message.MessageId },
          'Skipping message without id or receipt handle',
        );
        return [];
      }
      return [envelope];
    });
  }

  async deleteMessage(queueUrl: string, receiptHandle: string): Promise<void> {
    await this.client.send(
      new DeleteMessageCommand({
        QueueUrl: queueUrl,
        ReceiptHandle: receiptHandle,
      }),
    );
  }

  async changeVisibility(
    queueUrl: string,
    receiptHandle: string,
    visibilityTimeout: number,
  ): Promise<void> {
    await this.client.send(
      new ChangeMessageVisibilityCommand({
        QueueUrl: queueUrl,
        ReceiptHandle: receiptHandle,
        VisibilityTimeout: visibilityTimeout,
      }),
    );
  }

  async sendMessageBatch(
    queueUrl: string,
    entries: SqsSendBatchEntry[],
  ): Promise<SqsSendBatchResult> {
    const command = new SendMessageBatchCommand({
      QueueUrl: queueUrl,
      Entries: entries.map((entry) => ({
        Id: entry.id,
        MessageBody: entry.body,
        DelaySeconds: entry.delaySeconds,
        MessageGroupId: entry.groupId,
        MessageDeduplicationId: entry.deduplicationId,
      })),
    });

    const response = await this.client.send(command);

    return {
      successful: (response.Successful ?? []).map((s) => ({
        id: s.Id ?? '',
        messageId: s.MessageId ?? '',
      })),
      failed: (response.Failed ?? []).map((f) => ({
        id: f.Id ?? '',
        code: f.Code ?? 'Unknown',
        message: f.Message,
        senderFault: f.SenderFault ?? false,
      })),
    };
  }

  async getQueueAttributes(queueUrl: string): Promise<SqsQueueAttributes> {
    const response = await this.client.send(
      new GetQueueAttributesCommand({
        QueueUrl: queueUrl,
        AttributeNames: [
          'ApproximateNumberOfMessages',
          'ApproximateNumberOfMessagesNotVisible',
          'VisibilityTimeout',
        ],
      }),
    );

    return {
      approximateMessages: parseInt(
        response.Attributes?.ApproximateNumberOfMessages || '0',
        10,
      ),
      approximateMessagesNotVisible: parseInt(
        response.Attributes?.ApproximateNumberOfMessagesNotVisible || '0',
        10,
      ),
      visibilityTimeout: parseInt(response.Attributes?.VisibilityTimeout || '0', 10),
    };
  }

  onModuleDestroy() {
    this.client.destroy();
  }

  private toEnvelope(message: Message): SqsMessageEnvelope | undefined {
    if (!message.MessageId || !message.ReceiptHandle) {
      return undefined;
    }

    const attributes: Record<string, string> = {};
    for (const [name, value] of Object.entries(message.MessageAttributes ?? {})) {
      if (value.StringValue !== undefined) {
        attributes[name] = value.StringValue;
      }
    }

    return {
      messageId: message.MessageId,
      receiptHandle: message.ReceiptHandle,
      body: message.Body ?? '',
      approximateReceiveCount: parseInt(
        message.Attributes?.ApproximateReceiveCount || '1',
        10,
      ),
      attributes,
    };
  }
}
