import { vi } from 'vitest';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../../src/config/configuration';
import { ConsumerConfig } from '../../../src/consumer/interfaces/consumer-config.interface';
import { AppLogger } from '../../../src/shared/logging/pino-logger.service';

/**
 * Mock Factories for the consumer tests
 */

/**
 * Test fixtures
 */
export const TEST_FIXTURES = {
  queueUrl: 'http://localhost:4566/000000000000/test-queue',
  messageBody: JSON.stringify({ orderId: 'order-1', amount: 42 }),
};

/**
 * Create a mock AppLogger. child() returns the same mock, so calls made
 * through child loggers land on the same spies.
 */
export function createMockLogger() {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn<(bindings: Record<string, unknown>) => AppLogger>(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

export type MockLogger = ReturnType<typeof createMockLogger>;

/**
 * Consumer settings with short local waits, suitable for real timers
 */
export function createConsumerConfig(overrides: Partial<ConsumerConfig> = {}): ConsumerConfig {
  return {
    maxBatchSize: 10,
    maxWaitSeconds: 0,
    visibilityTimeoutSeconds: 20,
    runOnce: true,
    intervalSeconds: 0.01,
    maxConcurrentHandlers: 0,
    busyRetrySeconds: 0.01,
    leaseWarningMarginSeconds: 5,
    shutdownTimeoutSeconds: 1,
    ...overrides,
  };
}

/**
 * ConfigService backed by a plain AppConfig object
 */
export function createConfigService(overrides: Partial<AppConfig> = {}): ConfigService<AppConfig> {
  const config: AppConfig = {
    nodeEnv: 'test',
    logLevel: 'error',
    aws: { region: 'us-east-1', maxAttempts: 1 },
    sqs: { queueUrl: TEST_FIXTURES.queueUrl },
    consumer: createConsumerConfig(),
    ...overrides,
  };
  return new ConfigService<AppConfig>(config);
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(reason: unknown): void;
}

/**
 * Promise with its resolve/reject exposed, for holding handlers open
 */
export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
