export interface SqsMessageEnvelope {
  messageId: string;
  receiptHandle: string;
  body: string;
  approximateReceiveCount: number;
  attributes: Record<string, string>;
}

export interface SqsReceiveOptions {
  maxMessages: number;
  waitTimeSeconds: number;
  visibilityTimeout: number;
}

export interface SqsSendBatchEntry {
  id: string;
  body: string;
  delaySeconds?: number;
  groupId?: string;
  deduplicationId?: string;
}

export interface SqsSendBatchResult {
  successful: Array<{ id: string; messageId: string }>;
  failed: Array<{ id: string; code: string; message?: string; senderFault: boolean }>;
}

export interface SqsQueueAttributes {
  approximateMessages: number;
  approximateMessagesNotVisible: number;
  visibilityTimeout: number;
}
