import { HttpStatus } from '@nestjs/common';
import {
  classifyInferenceError,
  computeBackoffDelay,
  readProviderErrorCode,
  withThrottleBackoff,
} from '../throttle-backoff';
import { InferenceProviderException } from '../../errors/inference-provider.exception';
import { FakeClock } from '../../__tests__/support/fake-clock';

function providerError(code: string): InferenceProviderException {
  return new InferenceProviderException(
    'anthropic',
    code,
    code,
    HttpStatus.SERVICE_UNAVAILABLE,
    429,
  );
}

function namedError(name: string): Error {
  const error = new Error(`${name} raised`);
  error.name = name;
  return error;
}

describe('classifyInferenceError', () => {
  it.each(['rate_limit_error', 'overloaded_error', 'rate_limit_exceeded'])(
    'should classify provider code %s as throttling',
    (code) => {
      expect(classifyInferenceError(providerError(code))).toBe('throttling');
    },
  );

  it.each([
    'ThrottlingException',
    'TooManyRequestsException',
    'ProvisionedThroughputExceededException',
  ])(
    'should classify AWS-style exception %s as throttling',
    (name) => {
      expect(classifyInferenceError(namedError(name))).toBe('throttling');
    },
  );

  it('should prefer an explicit code over the error name', () => {
    const error = Object.assign(namedError('ThrottlingException'), {
      code: 'insufficient_quota',
    });

    expect(readProviderErrorCode(error)).toBe('insufficient_quota');
    expect(classifyInferenceError(error)).toBe('other');
  });

  it('should classify everything else as other', () => {
    expect(classifyInferenceError(providerError('authentication_error'))).toBe('other');
    expect(classifyInferenceError(new Error('socket hang up'))).toBe('other');
    expect(classifyInferenceError('rate_limit_error')).toBe('other');
    expect(classifyInferenceError(undefined)).toBe('other');
  });
});

describe('computeBackoffDelay', () => {
  const policy = { baseDelayMs: 1000, maxDelayMs: 30000 };

  it('should double the base delay per attempt', () => {
    expect(computeBackoffDelay(0, policy, () => 0)).toBe(1000);
    expect(computeBackoffDelay(1, policy, () => 0)).toBe(2000);
    expect(computeBackoffDelay(3, policy, () => 0)).toBe(8000);
  });

  it('should add up to half the delay as jitter', () => {
    expect(computeBackoffDelay(3, policy, () => 0.5)).toBe(10000);
  });

  it('should cap the delay before jitter', () => {
    expect(computeBackoffDelay(10, policy, () => 0)).toBe(30000);
    expect(computeBackoffDelay(10, policy, () => 0.5)).toBe(37500);
  });
});

describe('withThrottleBackoff', () => {
  const policy = { maxRetries: 2, baseDelayMs: 100, maxDelayMs: 1000 };
  let clock: FakeClock;

  beforeEach(() => {
    clock = new FakeClock();
  });

  it('should return the first successful result without sleeping', async () => {
    const operation = jest.fn().mockResolvedValue('ok');

    await expect(withThrottleBackoff(operation, policy, { clock })).resolves.toBe('ok');

    expect(operation).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('should retry throttling errors until the operation succeeds', async () => {
    const operation = jest
      .fn()
      .mockRejectedValueOnce(providerError('rate_limit_error'))
      .mockResolvedValueOnce('recovered');

    await expect(
      withThrottleBackoff(operation, policy, { clock, random: () => 0 }),
    ).resolves.toBe('recovered');

    expect(operation).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([100]);
  });

  it('should invoke maxRetries + 1 times and rethrow the last throttling error', async () => {
    const errors = [
      providerError('rate_limit_error'),
      providerError('rate_limit_error'),
      providerError('overloaded_error'),
    ];
    const operation = jest
      .fn()
      .mockRejectedValueOnce(errors[0])
      .mockRejectedValueOnce(errors[1])
      .mockRejectedValueOnce(errors[2]);
    const onRetry = jest.fn();

    const outcome = withThrottleBackoff(operation, policy, {
      clock,
      random: () => 0,
      onRetry,
    });

    await expect(outcome).rejects.toBe(errors[2]);
    expect(operation).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([100, 200]);
    expect(onRetry.mock.calls).toEqual([
      [1, 100, errors[0]],
      [2, 200, errors[1]],
    ]);
  });

  it('should rethrow non-throttling errors immediately', async () => {
    const failure = providerError('invalid_request_error');
    const operation = jest.fn().mockRejectedValue(failure);

    await expect(
      withThrottleBackoff(operation, policy, { clock }),
    ).rejects.toBe(failure);

    expect(operation).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('should not retry at all with maxRetries 0', async () => {
    const failure = providerError('rate_limit_error');
    const operation = jest.fn().mockRejectedValue(failure);

    await expect(
      withThrottleBackoff(operation, { ...policy, maxRetries: 0 }, { clock }),
    ).rejects.toBe(failure);

    expect(operation).toHaveBeenCalledTimes(1);
  });
});
