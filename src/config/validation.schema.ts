import { z } from 'zod';
import { MAX_TIMER_SECONDS } from '../consumer/consumer-config.schema';
import { ConfigError } from '../domain/errors/consumer.errors';

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // AWS
  AWS_REGION: z.string().default('us-east-2'),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  AWS_ENDPOINT: z.string().url().optional(), // For LocalStack
  AWS_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),

  // SQS
  SQS_QUEUE_URL: z.string().url(),
  SQS_BATCH_SIZE: z.coerce.number().int().min(1).max(10).default(10),
  SQS_WAIT_TIME_SECONDS: z.coerce.number().int().min(0).max(20).default(20),
  SQS_VISIBILITY_TIMEOUT: z.coerce.number().int().min(0).max(43200).default(20),

  // Consumer
  RUN_ONCE: booleanString.default('true'),
  RUN_INTERVAL_SECONDS: z.coerce.number().min(0).max(MAX_TIMER_SECONDS).default(10),
  MAX_CONCURRENT_HANDLERS: z.coerce.number().int().min(0).default(0),
  BUSY_RETRY_SECONDS: z.coerce.number().min(0).max(MAX_TIMER_SECONDS).default(1),
  LEASE_WARNING_MARGIN_SECONDS: z.coerce.number().min(0).max(MAX_TIMER_SECONDS).default(5),
  SHUTDOWN_TIMEOUT_SECONDS: z.coerce.number().min(0).max(MAX_TIMER_SECONDS).default(30),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
    );
  }

  return result.data;
}
