import { MessageQueuePort, QueueMessage } from '../application/ports/output/message-queue.port';
import { createReceivedMessage } from '../domain/entities/received-message.entity';
import { TransportError } from '../domain/errors/consumer.errors';
import { PollState, PollStateVO } from '../domain/value-objects/poll-state.vo';
import { AppLogger } from '../shared/logging/pino-logger.service';
import { abortableDelay } from '../shared/utils/abortable-delay';
import { AdmissionController } from './admission-controller';
import { Dispatcher } from './dispatcher';
import { ResolvedConsumerConfig } from './interfaces/consumer-config.interface';
import { MessageHandler } from './interfaces/message-handler.interface';

/**
 * Poll Loop
 *
 * IDLE → FETCHING → DISPATCHING → WAITING → FETCHING ...
 *                 ↘ WAITING (at capacity, busy delay, no queue call)
 * any → DRAINING → TERMINATED (run once, cancellation or fetch error)
 *
 * Dispatching never waits for handlers; the next fetch overlaps with
 * handlers still running from earlier batches, bounded by admission.
 * A fetch error stops the loop for good: after draining, run() rejects
 * with it. Cancellation is not an error.
 */
export class PollLoop {
  private state = PollStateVO.idle();
  private batch = 0;
  private terminalError?: TransportError;

  constructor(
    private readonly config: ResolvedConsumerConfig,
    private readonly queue: MessageQueuePort,
    private readonly admission: AdmissionController,
    private readonly dispatcher: Dispatcher,
    private readonly logger: AppLogger,
  ) {}

  get currentState(): PollState {
    return this.state.value;
  }

  get batchNumber(): number {
    return this.batch;
  }

  get error(): TransportError | undefined {
    return this.terminalError;
  }

  async run(handler: MessageHandler, signal: AbortSignal): Promise<void> {
    if (this.state.value !== PollState.IDLE) {
      throw new Error(`Poll loop cannot start from state ${this.state.value}`);
    }

    while (!signal.aborted) {
      this.transition(PollState.FETCHING);
      this.batch++;
      const batchLogger = this.logger.child({ batch: this.batch });

      const granted = this.admission.reserve(this.config.maxBatchSize);
      if (granted === 0) {
        batchLogger.info(
          {
            inFlight: this.admission.inFlight,
            max: this.admission.max,
            busyRetrySeconds: this.config.busyRetrySeconds,
          },
          'Running at full capacity, waiting before polling again',
        );
        this.transition(PollState.WAITING);
        if ((await abortableDelay(this.admission.busyDelayMs, signal)) === 'aborted') {
          break;
        }
        continue;
      }

      batchLogger.debug({ maxMessages: granted }, 'Start receiving messages');

      let received: QueueMessage[];
      try {
        received = await this.queue.receiveBatch(
          {
            maxCount: granted,
            waitTimeSeconds: this.config.maxWaitSeconds,
            visibilityTimeoutSeconds: this.config.visibilityTimeoutSeconds,
          },
          signal,
        );
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        this.terminalError =
          error instanceof TransportError ? error : new TransportError('receiveBatch', error);
        batchLogger.error(
          { error: this.terminalError.message },
          'Receive failed, stopping the poll loop',
        );
        break;
      }

      const messages = received.flatMap((message) => {
        if (!message.messageId || !message.receiptHandle) {
          batchLogger.warn(
            { messageId: message.messageId },
            'Skipping message without id or receipt handle',
          );
          return [];
        }
        return [createReceivedMessage({ ...message, batchNumber: this.batch })];
      });

      if (signal.aborted) {
        // Received after cancellation: hand the messages straight back
        this.dispatcher.release(messages);
        break;
      }

      this.transition(PollState.DISPATCHING);
      if (messages.length === 0) {
        batchLogger.debug({}, 'Queue is empty');
      } else {
        batchLogger.info({ count: messages.length }, 'Fetched messages');
        this.dispatcher.dispatch(messages, handler, signal);
      }

      if (this.config.runOnce) {
        batchLogger.info({}, 'Exiting since configured to run once');
        break;
      }

      batchLogger.debug(
        { intervalSeconds: this.config.intervalSeconds },
        'Waiting before polling for next batch',
      );
      this.transition(PollState.WAITING);
      if ((await abortableDelay(this.config.intervalSeconds * 1000, signal)) === 'aborted') {
        break;
      }
    }

    this.transition(PollState.DRAINING);
    await this.drain(signal);
    this.transition(PollState.TERMINATED);

    if (this.terminalError) {
      throw this.terminalError;
    }
  }

  /**
   * Wait for outstanding handlers. Unbounded until cancellation; once
   * cancelled, bounded by shutdownTimeoutSeconds.
   */
  private async drain(signal: AbortSignal): Promise<void> {
    if (this.dispatcher.pendingCount === 0) {
      return;
    }

    this.logger.info(
      { pending: this.dispatcher.pendingCount, inFlight: this.admission.inFlight },
      'Waiting for in-flight handlers to finish',
    );

    if (!signal.aborted && (await this.dispatcher.drain(signal))) {
      return;
    }

    const drained = await this.dispatcher.drain(
      AbortSignal.timeout(this.config.shutdownTimeoutSeconds * 1000),
    );
    if (!drained) {
      this.logger.warn(
        {
          pending: this.dispatcher.pendingCount,
          shutdownTimeoutSeconds: this.config.shutdownTimeoutSeconds,
        },
        'Shutdown timeout reached with handlers still running',
      );
    }
  }

  private transition(next: PollState): void {
    this.state = this.state.transitionTo(next);
  }
}
