import { MessageHandler } from '../../../consumer/interfaces/message-handler.interface';
import { ConsumerStats } from '../../../consumer/interfaces/consumer-stats.interface';
import { SendBatchEntry, SendBatchResult } from '../output/message-queue.port';

/**
 * Consumer Port (Driving Port)
 * What the embedding application can do with a consumer
 */
export interface ConsumerPort {
  /**
   * Set the handler every received message is dispatched to.
   * Must be called before run().
   */
  registerHandler(handler: MessageHandler): void;

  /**
   * Run the poll loop until it terminates. Rejects with the fatal error
   * that stopped it, if any.
   */
  run(): Promise<void>;

  /**
   * Request cancellation and wait for run() to settle
   */
  stop(): Promise<void>;

  /**
   * Send messages to the queue (producer side, independent of the loop)
   */
  enqueue(entries: SendBatchEntry[]): Promise<SendBatchResult>;

  stats(): ConsumerStats;
}
