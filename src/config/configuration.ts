/**
 * Application Configuration Module
 *
 * Loads and validates environment variables and maps them onto the typed
 * AppConfig object consumed through `ConfigService<AppConfig>`.
 *
 * ## Configuration Sources:
 * 1. Environment variables (`.env` file or system environment)
 * 2. Validated by Zod schema in `validation.schema.ts`
 * 3. Transformed into typed AppConfig object
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const consumer = this.configService.get('consumer', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';
import { ConsumerConfig } from '../consumer/interfaces/consumer-config.interface';

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  aws: {
    region: string;
    endpoint?: string;
    maxAttempts: number;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
  sqs: {
    queueUrl: string;
  };
  /**
   * Poll loop and admission settings.
   *
   * ### maxBatchSize (SQS_BATCH_SIZE)
   * - Upper bound for a single ReceiveMessage call (1-10)
   * - The granted batch is further reduced to the free handler capacity
   *
   * ### maxConcurrentHandlers (MAX_CONCURRENT_HANDLERS)
   * - Maximum number of handlers running at once, 0 for unbounded
   * - While at capacity the loop waits BUSY_RETRY_SECONDS and re-checks
   *   without calling the queue
   *
   * ### runOnce (RUN_ONCE)
   * - Fetch a single batch, wait for its handlers, then exit
   *
   * ### intervalSeconds (RUN_INTERVAL_SECONDS)
   * - Pause between batches when runOnce is false
   *
   * ### leaseWarningMarginSeconds (LEASE_WARNING_MARGIN_SECONDS)
   * - A handler still running this close to its visibility deadline is
   *   logged as a warning; the queue may redeliver the message
   *
   * ### shutdownTimeoutSeconds (SHUTDOWN_TIMEOUT_SECONDS)
   * - How long stop() waits for in-flight handlers before returning
   */
  consumer: ConsumerConfig;
}

export default (): AppConfig => {
  const env: EnvConfig = validateEnv(process.env);

  const config: AppConfig = {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    aws: {
      region: env.AWS_REGION,
      endpoint: env.AWS_ENDPOINT,
      maxAttempts: env.AWS_MAX_ATTEMPTS,
    },
    sqs: {
      queueUrl: env.SQS_QUEUE_URL,
    },
    consumer: {
      maxBatchSize: env.SQS_BATCH_SIZE,
      maxWaitSeconds: env.SQS_WAIT_TIME_SECONDS,
      visibilityTimeoutSeconds: env.SQS_VISIBILITY_TIMEOUT,
      runOnce: env.RUN_ONCE,
      intervalSeconds: env.RUN_INTERVAL_SECONDS,
      maxConcurrentHandlers: env.MAX_CONCURRENT_HANDLERS,
      busyRetrySeconds: env.BUSY_RETRY_SECONDS,
      leaseWarningMarginSeconds: env.LEASE_WARNING_MARGIN_SECONDS,
      shutdownTimeoutSeconds: env.SHUTDOWN_TIMEOUT_SECONDS,
    },
  };

  // Add AWS credentials only if explicitly provided
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.aws.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    };
  }

  return config;
};
