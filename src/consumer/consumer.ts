import { ConsumerPort } from '../application/ports/input';
import { FaultSinkPort } from '../application/ports/output/fault-sink.port';
import {
  MessageQueuePort,
  SendBatchEntry,
  SendBatchResult,
} from '../application/ports/output/message-queue.port';
import { ConfigError, ConsumerStateError } from '../domain/errors/consumer.errors';
import { PollState } from '../domain/value-objects/poll-state.vo';
import { AppLogger } from '../shared/logging/pino-logger.service';
import { AdmissionController } from './admission-controller';
import { parseConsumerConfig } from './consumer-config.schema';
import { Dispatcher } from './dispatcher';
import { ConsumerConfig, ResolvedConsumerConfig } from './interfaces/consumer-config.interface';
import { ConsumerStats } from './interfaces/consumer-stats.interface';
import { MessageHandler } from './interfaces/message-handler.interface';
import { PollLoop } from './poll-loop';

const MAX_SEND_BATCH_SIZE = 10;

/**
 * Bounded-concurrency queue consumer.
 *
 * ```typescript
 * const consumer = new Consumer(config, queue, faultSink, logger);
 * consumer.registerHandler(async (message) => {
 *   await process(message.body);
 *   return HandlerOutcome.completed();
 * });
 * await consumer.run();
 * ```
 *
 * Admission state and counters live for the lifetime of the instance; each
 * run() gets a fresh poll loop.
 */
export class Consumer implements ConsumerPort {
  protected readonly config: ResolvedConsumerConfig;
  private readonly admission: AdmissionController;
  private readonly dispatcher: Dispatcher;
  private handler?: MessageHandler;
  private pollLoop?: PollLoop;
  private abortController?: AbortController;
  private settled?: Promise<void>;

  constructor(
    config: ConsumerConfig,
    private readonly queue: MessageQueuePort,
    faultSink: FaultSinkPort,
    protected readonly logger: AppLogger,
  ) {
    this.config = parseConsumerConfig(config);

    this.admission = new AdmissionController(
      this.config.maxConcurrentHandlers,
      this.config.busyRetrySeconds * 1000,
    );
    this.dispatcher = new Dispatcher(
      queue,
      this.admission,
      faultSink,
      logger.child({ component: Dispatcher.name }),
      {
        visibilityTimeoutSeconds: this.config.visibilityTimeoutSeconds,
        leaseWarningMarginSeconds: this.config.leaseWarningMarginSeconds,
      },
    );
  }

  registerHandler(handler: MessageHandler): void {
    if (typeof handler !== 'function') {
      throw new ConfigError(['handler: must be a function']);
    }
    this.handler = handler;
  }

  async run(): Promise<void> {
    const handler = this.handler;
    if (!handler) {
      throw new ConfigError(['handler: no handler registered, call registerHandler() before run()']);
    }
    if (this.abortController) {
      throw new ConsumerStateError('Consumer is already running');
    }

    const abortController = new AbortController();
    const pollLoop = new PollLoop(
      this.config,
      this.queue,
      this.admission,
      this.dispatcher,
      this.logger.child({ component: PollLoop.name }),
    );
    this.abortController = abortController;
    this.pollLoop = pollLoop;

    this.logger.info(
      {
        runOnce: this.config.runOnce,
        maxBatchSize: this.config.maxBatchSize,
        maxConcurrentHandlers: this.config.maxConcurrentHandlers,
      },
      'Starting consumer',
    );

    const running = pollLoop.run(handler, abortController.signal);
    // stop() only waits for the loop to settle; run() reports the outcome
    this.settled = running.then(
      () => undefined,
      () => undefined,
    );

    try {
      await running;
      this.logger.info({ batches: pollLoop.batchNumber }, 'Consumer stopped');
    } finally {
      this.abortController = undefined;
      this.settled = undefined;
    }
  }

  async stop(): Promise<void> {
    const settled = this.settled;
    if (!this.abortController || !settled) {
      return;
    }

    this.logger.info({ inFlight: this.admission.inFlight }, 'Stopping consumer');
    this.abortController.abort();
    await settled;
  }

  isRunning(): boolean {
    return this.abortController !== undefined;
  }

  async enqueue(entries: SendBatchEntry[]): Promise<SendBatchResult> {
    if (entries.length === 0 || entries.length > MAX_SEND_BATCH_SIZE) {
      throw new ConfigError([
        `entries: batch must contain between 1 and ${MAX_SEND_BATCH_SIZE} messages`,
      ]);
    }

    this.logger.debug({ count: entries.length }, 'Enqueueing messages');
    const result = await this.queue.sendBatch(entries);

    this.logger.info(
      { successful: result.successful.length, failed: result.failed.length },
      'Enqueued message batch',
    );
    return result;
  }

  stats(): ConsumerStats {
    return {
      ...this.dispatcher.stats(),
      state: this.pollLoop?.currentState ?? PollState.IDLE,
      batchNumber: this.pollLoop?.batchNumber ?? 0,
      maxConcurrentHandlers: this.config.maxConcurrentHandlers,
    };
  }
}
