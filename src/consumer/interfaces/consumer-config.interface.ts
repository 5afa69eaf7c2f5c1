/**
 * Explicit consumer configuration. All durations are in seconds; fractions
 * are accepted for the local waits (interval, busy retry, margins).
 */
export interface ConsumerConfig {
  /** Upper bound for one receive call (1-10) */
  maxBatchSize: number;
  /** Long-poll wait of the receive call (0-20) */
  maxWaitSeconds: number;
  /** Visibility timeout requested on receive (0-43200, 0 = visible again at once) */
  visibilityTimeoutSeconds: number;
  runOnce: boolean;
  /** Pause between batches, used only when runOnce is false */
  intervalSeconds: number;
  /** 0 = unbounded */
  maxConcurrentHandlers: number;
  busyRetrySeconds: number;
  leaseWarningMarginSeconds?: number;
  shutdownTimeoutSeconds?: number;
}

export type ResolvedConsumerConfig = Required<ConsumerConfig>;
