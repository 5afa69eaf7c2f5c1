/**
 * Consumer Error Taxonomy
 *
 * - ConfigError: invalid construction parameters, raised before any queue call
 * - TransportError: a queue call failed. Fatal to the poll loop when raised by
 *   receiveBatch; isolated to one message for delete / change-visibility
 * - HandlerFault: a handler threw. Converted to a retry and sent to the fault sink
 * - LeaseResolvedError: a lease was read or extended after resolution
 * - ConsumerStateError: run() called while the consumer is already running
 */
export enum ConsumerErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  TRANSPORT_FAILED = 'TRANSPORT_FAILED',
  HANDLER_FAULT = 'HANDLER_FAULT',
  LEASE_RESOLVED = 'LEASE_RESOLVED',
  INVALID_STATE = 'INVALID_STATE',
}

export type QueueOperation =
  | 'receiveBatch'
  | 'deleteMessage'
  | 'changeVisibility'
  | 'sendBatch'
  | 'getQueueAttributes';

export abstract class ConsumerError extends Error {
  abstract readonly code: ConsumerErrorCode;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends ConsumerError {
  readonly code = ConsumerErrorCode.CONFIG_INVALID;

  constructor(public readonly issues: string[]) {
    super(`Invalid consumer configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
  }
}

export class TransportError extends ConsumerError {
  readonly code = ConsumerErrorCode.TRANSPORT_FAILED;

  constructor(
    public readonly operation: QueueOperation,
    cause: unknown,
  ) {
    super(`${operation} failed: ${describeCause(cause)}`, { cause });
  }
}

export class HandlerFault extends ConsumerError {
  readonly code = ConsumerErrorCode.HANDLER_FAULT;

  constructor(
    public readonly messageId: string,
    cause: unknown,
  ) {
    super(`Handler for message ${messageId} threw: ${describeCause(cause)}`, { cause });
  }
}

export class LeaseResolvedError extends ConsumerError {
  readonly code = ConsumerErrorCode.LEASE_RESOLVED;

  constructor(public readonly messageId: string) {
    super(`Lease for message ${messageId} is already resolved`);
  }
}

export class ConsumerStateError extends ConsumerError {
  readonly code = ConsumerErrorCode.INVALID_STATE;

  constructor(message: string) {
    super(message);
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return typeof cause === 'string' ? cause : 'Unknown error';
}
