import { describe, it, expect, afterEach, vi } from 'vitest';
import configuration from '../../../src/config/configuration';
import { validateEnv } from '../../../src/config/validation.schema';
import { ConfigError } from '../../../src/domain/errors/consumer.errors';
import { TEST_FIXTURES } from '../helpers/mock-factories';

describe('validateEnv', () => {
  it('should apply defaults for every consumer setting', () => {
    const env = validateEnv({ SQS_QUEUE_URL: TEST_FIXTURES.queueUrl });

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      AWS_MAX_ATTEMPTS: 3,
      SQS_BATCH_SIZE: 10,
      SQS_WAIT_TIME_SECONDS: 20,
      SQS_VISIBILITY_TIMEOUT: 20,
      RUN_ONCE: true,
      RUN_INTERVAL_SECONDS: 10,
      MAX_CONCURRENT_HANDLERS: 0,
      BUSY_RETRY_SECONDS: 1,
      LEASE_WARNING_MARGIN_SECONDS: 5,
      SHUTDOWN_TIMEOUT_SECONDS: 30,
    });
  });

  it('should coerce numeric and boolean strings', () => {
    const env = validateEnv({
      SQS_QUEUE_URL: TEST_FIXTURES.queueUrl,
      SQS_BATCH_SIZE: '5',
      RUN_ONCE: 'false',
      MAX_CONCURRENT_HANDLERS: '4',
      BUSY_RETRY_SECONDS: '0.5',
    });

    expect(env.SQS_BATCH_SIZE).toBe(5);
    expect(env.RUN_ONCE).toBe(false);
    expect(env.MAX_CONCURRENT_HANDLERS).toBe(4);
    expect(env.BUSY_RETRY_SECONDS).toBe(0.5);
  });

  it('should require the queue URL', () => {
    expect(() => validateEnv({})).toThrow(ConfigError);
    expect(() => validateEnv({})).toThrow('SQS_QUEUE_URL: Required');
  });

  it('should reject an out of range batch size', () => {
    expect(() =>
      validateEnv({ SQS_QUEUE_URL: TEST_FIXTURES.queueUrl, SQS_BATCH_SIZE: '11' }),
    ).toThrow('SQS_BATCH_SIZE: Number must be less than or equal to 10');
  });

  it('should reject an unknown RUN_ONCE value', () => {
    expect(() => validateEnv({ SQS_QUEUE_URL: TEST_FIXTURES.queueUrl, RUN_ONCE: 'yes' })).toThrow(
      ConfigError,
    );
  });
});

describe('configuration', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should map the environment onto AppConfig', () => {
    vi.stubEnv('SQS_QUEUE_URL', TEST_FIXTURES.queueUrl);
    vi.stubEnv('AWS_REGION', 'eu-west-1');
    vi.stubEnv('RUN_ONCE', 'false');
    vi.stubEnv('MAX_CONCURRENT_HANDLERS', '8');

    const config = configuration();

    expect(config.aws.region).toBe('eu-west-1');
    expect(config.sqs.queueUrl).toBe(TEST_FIXTURES.queueUrl);
    expect(config.consumer).toMatchObject({
      maxBatchSize: 10,
      runOnce: false,
      maxConcurrentHandlers: 8,
      intervalSeconds: 10,
    });
  });

  it('should add credentials only when both keys are set', () => {
    vi.stubEnv('SQS_QUEUE_URL', TEST_FIXTURES.queueUrl);
    vi.stubEnv('AWS_ACCESS_KEY_ID', 'test');
    vi.stubEnv('AWS_SECRET_ACCESS_KEY', 'test-secret');

    expect(configuration().aws.credentials).toEqual({
      accessKeyId: 'test',
      secretAccessKey: 'test-secret',
    });
  });
});
