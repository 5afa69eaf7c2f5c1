/**
 * Message as returned by the queue, before the consumer stamps it with a
 * batch number.
 */
export interface QueueMessage {
  messageId: string;
  body: string;
  receiptHandle: string;
  receiveCount?: number;
  attributes?: Record<string, string>;
}

/**
 * Receive Batch Request
 */
export interface ReceiveBatchRequest {
  maxCount: number;
  waitTimeSeconds: number;
  visibilityTimeoutSeconds: number;
}

/**
 * Send Batch Entry
 * groupId and deduplicationId apply to FIFO queues only
 */
export interface SendBatchEntry {
  id?: string;
  body: string;
  groupId?: string;
  deduplicationId?: string;
  delaySeconds?: number;
}

export interface SendBatchResult {
  successful: Array<{ id: string; messageId: string }>;
  failed: Array<{ id: string; code: string; message?: string; senderFault: boolean }>;
}

/**
 * Message Queue Port (Driven Port)
 * The narrow set of queue operations the consumer core calls.
 * Every method rejects with TransportError when the queue call fails.
 */
export interface MessageQueuePort {
  /**
   * Receive up to maxCount messages, long-polling for waitTimeSeconds
   */
  receiveBatch(request: ReceiveBatchRequest, signal?: AbortSignal): Promise<QueueMessage[]>;

  /**
   * Delete a message after it has been handled
   */
  deleteMessage(receiptHandle: string): Promise<void>;

  /**
   * Set the remaining visibility of a received message
   */
  changeVisibility(receiptHandle: string, visibilityTimeoutSeconds: number): Promise<void>;

  /**
   * Send up to 10 messages in one call
   */
  sendBatch(entries: SendBatchEntry[]): Promise<SendBatchResult>;
}
