import { MessageQueuePort } from '../application/ports/output/message-queue.port';
import { FaultSinkPort, MessageFault } from '../application/ports/output/fault-sink.port';
import { LeaseEntity } from '../domain/entities/lease.entity';
import { ReceivedMessage } from '../domain/entities/received-message.entity';
import {
  HandlerFault,
  LeaseResolvedError,
  TransportError,
} from '../domain/errors/consumer.errors';
import {
  LeaseAction,
  MAX_VISIBILITY_TIMEOUT_SECONDS,
  ResolutionKind,
  isHandlerOutcome,
  isVisibilityTimeout,
  toLeaseAction,
  toResolutionKind,
} from '../domain/value-objects/handler-outcome.vo';
import { AppLogger } from '../shared/logging/pino-logger.service';
import { raceAbort } from '../shared/utils/abortable-delay';
import { AdmissionController } from './admission-controller';
import { DispatchStats } from './interfaces/consumer-stats.interface';
import { HandlerContext, MessageHandler } from './interfaces/message-handler.interface';

export interface DispatcherOptions {
  visibilityTimeoutSeconds: number;
  leaseWarningMarginSeconds: number;
}

export interface DispatchResult {
  messageId: string;
  resolution: ResolutionKind;
  /** False when the delete / change-visibility call itself failed */
  resolved: boolean;
}

/**
 * Dispatcher
 *
 * Runs one handler per admitted message and resolves its lease exactly once:
 *
 * - COMPLETED → deleteMessage
 * - RETRY(n) / FAILED(n) → changeVisibility(n, default 0)
 * - handler throws → changeVisibility(0) and HandlerFault to the fault sink
 *
 * The admission slot is released in a `finally`, so the in-flight count is
 * decremented once per message whatever the handler or the queue does.
 * A message that cannot be admitted is released straight back to the queue.
 */
export class Dispatcher {
  private readonly pending = new Set<Promise<DispatchResult>>();
  private readonly counters: Omit<DispatchStats, 'inFlight'> = {
    dispatched: 0,
    completed: 0,
    retried: 0,
    failed: 0,
    crashed: 0,
    rejected: 0,
    resolutionFailures: 0,
  };

  constructor(
    private readonly queue: MessageQueuePort,
    private readonly admission: AdmissionController,
    private readonly faultSink: FaultSinkPort,
    private readonly logger: AppLogger,
    private readonly options: DispatcherOptions,
  ) {}

  dispatch(
    batch: ReceivedMessage[],
    handler: MessageHandler,
    signal: AbortSignal,
  ): Promise<DispatchResult>[] {
    return batch.map((message) => {
      const result = this.admission.tryAcquire()
        ? this.handle(message, handler, signal)
        : this.reject(message);

      this.pending.add(result);
      void result.then(
        () => this.pending.delete(result),
        () => this.pending.delete(result),
      );

      return result;
    });
  }

  /**
   * Return received messages to the queue without running a handler
   */
  release(batch: ReceivedMessage[]): Promise<DispatchResult>[] {
    return batch.map((message) => {
      const result = this.reject(message);
      this.pending.add(result);
      void result.then(
        () => this.pending.delete(result),
        () => this.pending.delete(result),
      );
      return result;
    });
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Wait until every dispatched message has been resolved. Returns false
   * when the signal aborts first; the handlers keep running.
   */
  async drain(signal?: AbortSignal): Promise<boolean> {
    while (this.pending.size > 0) {
      const settled = await raceAbort(Promise.allSettled([...this.pending]), signal);
      if (settled === 'aborted') {
        return false;
      }
    }
    return true;
  }

  stats(): DispatchStats {
    return { ...this.counters, inFlight: this.admission.inFlight };
  }

  private async reject(message: ReceivedMessage): Promise<DispatchResult> {
    this.counters.rejected++;
    this.logger.warn(
      { messageId: message.messageId, inFlight: this.admission.inFlight, max: this.admission.max },
      'Admission limit reached, releasing message back to the queue',
    );

    const resolved = await this.applyLeaseAction(message, {
      type: 'changeVisibility',
      visibilityTimeoutSeconds: 0,
    });

    return { messageId: message.messageId, resolution: ResolutionKind.REJECTED, resolved };
  }

  private async handle(
    message: ReceivedMessage,
    handler: MessageHandler,
    signal: AbortSignal,
  ): Promise<DispatchResult> {
    this.counters.dispatched++;
    try {
      return await this.execute(message, handler, signal);
    } finally {
      this.admission.release(1);
    }
  }

  private async execute(
    message: ReceivedMessage,
    handler: MessageHandler,
    signal: AbortSignal,
  ): Promise<DispatchResult> {
    const messageLogger = this.logger.child({ messageId: message.messageId });

    let lease = LeaseEntity.create({
      messageId: message.messageId,
      receiptHandle: message.receiptHandle,
      visibilityTimeoutSeconds: this.options.visibilityTimeoutSeconds,
    });
    // A 0 timeout hands the message back at once; there is no window to warn about
    let deadlineKnown = this.options.visibilityTimeoutSeconds > 0;
    let warningTimer: NodeJS.Timeout | undefined;
    const extensionsInFlight = new Set<Promise<void>>();

    const armLeaseWarning = () => {
      clearTimeout(warningTimer);
      if (!deadlineKnown) {
        return;
      }

      const marginMs = this.options.leaseWarningMarginSeconds * 1000;
      warningTimer = setTimeout(
        () => {
          if (lease.isResolved()) {
            return;
          }
          messageLogger.warn(
            {
              remainingMs: lease.remainingMs(),
              extensions: lease.extensions,
              receiveCount: message.receiveCount,
            },
            'Handler still running near lease expiry, message may be redelivered',
          );
        },
        Math.max(0, lease.remainingMs() - marginMs),
      );
      warningTimer.unref();
    };

    const context: HandlerContext = {
      message,
      signal,
      lease: {
        messageId: message.messageId,
        remainingMs: () => lease.remainingMs(),
        get extensions() {
          return lease.extensions;
        },
      },
      extendVisibility: async (visibilityTimeoutSeconds: number) => {
        if (lease.isResolved()) {
          throw new LeaseResolvedError(message.messageId);
        }
        if (!isVisibilityTimeout(visibilityTimeoutSeconds)) {
          throw new RangeError(
            `Visibility timeout must be an integer between 0 and ${MAX_VISIBILITY_TIMEOUT_SECONDS}`,
          );
        }

        const requestedAt = Date.now();
        const request = this.queue.changeVisibility(message.receiptHandle, visibilityTimeoutSeconds);
        extensionsInFlight.add(request);
        try {
          await request;
        } finally {
          extensionsInFlight.delete(request);
        }

        // The handler may have returned without awaiting this call
        if (!lease.isResolved()) {
          lease = lease.extend(visibilityTimeoutSeconds, requestedAt);
          deadlineKnown = true;
          armLeaseWarning();
          messageLogger.debug({ visibilityTimeoutSeconds }, 'Lease extended');
        }
      },
    };

    armLeaseWarning();

    try {
      let action: LeaseAction;
      let resolution: ResolutionKind;

      try {
        const outcome: unknown = await handler(message, context);
        if (!isHandlerOutcome(outcome)) {
          throw new TypeError('Handler did not return a valid HandlerOutcome');
        }
        action = toLeaseAction(outcome);
        resolution = toResolutionKind(outcome);
      } catch (error) {
        const fault = new HandlerFault(message.messageId, error);
        messageLogger.error({ error: fault.message }, 'Handler fault, message will be retried');
        this.reportFault(fault, message);

        action = { type: 'changeVisibility', visibilityTimeoutSeconds: 0 };
        resolution = ResolutionKind.CRASHED;
      }

      clearTimeout(warningTimer);
      // Resolved before the terminal call so no extension can follow it
      lease = lease.resolve();
      await Promise.allSettled([...extensionsInFlight]);
      const resolved = await this.applyLeaseAction(message, action);
      this.countResolution(resolution);

      messageLogger.debug({ resolution, resolved }, 'Message resolved');
      return { messageId: message.messageId, resolution, resolved };
    } finally {
      clearTimeout(warningTimer);
    }
  }

  /**
   * Perform the single terminal queue call for a message. Failures are
   * logged and reported; the message becomes visible again on its own.
   */
  private async applyLeaseAction(message: ReceivedMessage, action: LeaseAction): Promise<boolean> {
    try {
      if (action.type === 'delete') {
        await this.queue.deleteMessage(message.receiptHandle);
      } else {
        await this.queue.changeVisibility(message.receiptHandle, action.visibilityTimeoutSeconds);
      }
      return true;
    } catch (error) {
      this.counters.resolutionFailures++;
      const fault =
        error instanceof TransportError
          ? error
          : new TransportError(action.type === 'delete' ? 'deleteMessage' : 'changeVisibility', error);

      this.logger.warn(
        { messageId: message.messageId, action: action.type, error: fault.message },
        'Failed to resolve message lease',
      );
      this.reportFault(fault, message);
      return false;
    }
  }

  private reportFault(fault: MessageFault, message: ReceivedMessage): void {
    try {
      this.faultSink.report(fault, message);
    } catch (error) {
      this.logger.error(
        { messageId: message.messageId, error: error instanceof Error ? error.message : error },
        'Fault sink threw while reporting a fault',
      );
    }
  }

  private countResolution(resolution: ResolutionKind): void {
    switch (resolution) {
      case ResolutionKind.COMPLETED:
        this.counters.completed++;
        break;
      case ResolutionKind.RETRIED:
        this.counters.retried++;
        break;
      case ResolutionKind.FAILED:
        this.counters.failed++;
        break;
      case ResolutionKind.CRASHED:
        this.counters.crashed++;
        break;
    }
  }
}
