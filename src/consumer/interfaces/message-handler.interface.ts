import { ReceivedMessage } from '../../domain/entities/received-message.entity';
import { HandlerOutcome } from '../../domain/value-objects/handler-outcome.vo';

/**
 * Read-only view of a message's lease handed to handlers
 */
export interface LeaseView {
  readonly messageId: string;
  remainingMs(): number;
  readonly extensions: number;
}

export interface HandlerContext {
  readonly message: ReceivedMessage;
  readonly lease: LeaseView;
  /** Aborted when the consumer is stopping; handlers may use it to finish early */
  readonly signal: AbortSignal;
  /** Push the visibility deadline to now + seconds */
  extendVisibility(visibilityTimeoutSeconds: number): Promise<void>;
}

export type MessageHandler = (
  message: ReceivedMessage,
  context: HandlerContext,
) => Promise<HandlerOutcome>;
