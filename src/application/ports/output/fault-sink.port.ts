import { HandlerFault, TransportError } from '../../../domain/errors/consumer.errors';
import { ReceivedMessage } from '../../../domain/entities/received-message.entity';

export type MessageFault = HandlerFault | TransportError;

/**
 * Fault Sink Port (Driven Port)
 * Receives per-message failures that must not stop the poll loop:
 * handler faults and failed delete / change-visibility calls.
 */
export interface FaultSinkPort {
  report(fault: MessageFault, message: ReceivedMessage): void;
}
