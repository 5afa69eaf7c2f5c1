import { z } from 'zod';
import { ConfigError } from '../domain/errors/consumer.errors';
import { ResolvedConsumerConfig } from './interfaces/consumer-config.interface';

export const DEFAULT_LEASE_WARNING_MARGIN_SECONDS = 5;
export const DEFAULT_SHUTDOWN_TIMEOUT_SECONDS = 30;
/** Longest delay setTimeout can hold (2^31 - 1 ms) */
export const MAX_TIMER_SECONDS = 2147483;

export const consumerConfigSchema = z
  .object({
    maxBatchSize: z.number().int().min(1).max(10),
    maxWaitSeconds: z.number().int().min(0).max(20),
    visibilityTimeoutSeconds: z.number().int().min(0).max(43200),
    runOnce: z.boolean(),
    intervalSeconds: z.number().min(0).max(MAX_TIMER_SECONDS),
    maxConcurrentHandlers: z.number().int().min(0),
    busyRetrySeconds: z.number().min(0).max(MAX_TIMER_SECONDS),
    leaseWarningMarginSeconds: z
      .number()
      .min(0)
      .max(MAX_TIMER_SECONDS)
      .default(DEFAULT_LEASE_WARNING_MARGIN_SECONDS),
    shutdownTimeoutSeconds: z
      .number()
      .min(0)
      .max(MAX_TIMER_SECONDS)
      .default(DEFAULT_SHUTDOWN_TIMEOUT_SECONDS),
  })
  .superRefine((config, ctx) => {
    if (!config.runOnce && config.intervalSeconds <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['intervalSeconds'],
        message: 'Must be greater than 0 when runOnce is false',
      });
    }
  });

/**
 * Validate a consumer configuration, collecting every violated bound.
 * Throws ConfigError; never touches the queue.
 */
export function parseConsumerConfig(input: unknown): ResolvedConsumerConfig {
  const result = consumerConfigSchema.safeParse(input);

  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((e) => `${e.path.join('.') || 'config'}: ${e.message}`),
    );
  }

  return result.data;
}
