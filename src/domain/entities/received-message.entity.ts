/**
 * A message as handed to a handler. Frozen on creation; the dispatcher owns
 * it exclusively until its lease is resolved.
 */
export interface ReceivedMessage {
  readonly messageId: string;
  readonly body: string;
  readonly receiptHandle: string;
  readonly batchNumber: number;
  readonly receiveCount: number;
  readonly attributes: Readonly<Record<string, string>>;
  readonly receivedAt: Date;
}

export interface ReceivedMessageProps {
  messageId: string;
  body: string;
  receiptHandle: string;
  batchNumber: number;
  receiveCount?: number;
  attributes?: Record<string, string>;
  receivedAt?: Date;
}

export function createReceivedMessage(props: ReceivedMessageProps): ReceivedMessage {
  if (!props.messageId) {
    throw new Error('Message ID is required');
  }
  if (!props.receiptHandle) {
    throw new Error('Receipt handle is required');
  }

  return Object.freeze({
    messageId: props.messageId,
    body: props.body,
    receiptHandle: props.receiptHandle,
    batchNumber: props.batchNumber,
    receiveCount: props.receiveCount ?? 1,
    attributes: Object.freeze({ ...(props.attributes ?? {}) }),
    receivedAt: props.receivedAt ?? new Date(),
  });
}

/**
 * Parse the body as JSON. Returns undefined for bodies that are not JSON.
 */
export function parseJsonBody(message: ReceivedMessage): unknown {
  try {
    return JSON.parse(message.body);
  } catch {
    return undefined;
  }
}
