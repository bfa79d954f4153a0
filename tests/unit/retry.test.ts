import { AllProvidersFailedError } from '../../src/llm/errors';
import { isTransientError, withRetry } from '../../src/llm/retry';
import { httpError } from '../helpers/fake-provider';

describe('withRetry', () => {
  const sleep = jest.fn<Promise<void>, [number]>();

  beforeEach(() => {
    sleep.mockReset();
    sleep.mockResolvedValue(undefined);
  });

  it('should retry transient failures with exponential backoff', async () => {
    const operation = jest.fn<Promise<string>, []>()
      .mockRejectedValueOnce(httpError(429, 'Too many requests'))
      .mockRejectedValueOnce(httpError(503, 'Service unavailable'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(operation, { retries: 2, baseDelayMs: 100, sleep })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('should give up after the configured retries', async () => {
    const err = httpError(500, 'Internal error');
    const operation = jest.fn<Promise<string>, []>().mockRejectedValue(err);

    await expect(withRetry(operation, { retries: 2, baseDelayMs: 10, sleep })).rejects.toBe(err);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('should not retry a permanent failure', async () => {
    const operation = jest.fn<Promise<string>, []>().mockRejectedValue(httpError(401, 'Invalid API key'));

    await expect(withRetry(operation, { retries: 3, baseDelayMs: 10, sleep })).rejects.toThrow('Invalid API key');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should report each retry', async () => {
    const onRetry = jest.fn();
    const err = httpError(429, 'slow down');
    const operation = jest.fn<Promise<number>, []>().mockRejectedValueOnce(err).mockResolvedValueOnce(1);

    await withRetry(operation, { retries: 1, baseDelayMs: 50, sleep, onRetry });

    expect(onRetry).toHaveBeenCalledWith(err, 1, 50);
  });
});

describe('isTransientError', () => {
  it.each([
    ['429', httpError(429, 'rate limited')],
    ['408', httpError(408, 'request timeout')],
    ['502', httpError(502, 'bad gateway')],
    ['connection reset', Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' })],
    ['timeout name', Object.assign(new Error('aborted'), { name: 'APIConnectionTimeoutError' })],
    ['quota message', new Error('[429 Too Many Requests] Resource has been exhausted (e.g. check quota).')],
  ])('should treat %s as transient', (_label, err) => {
    expect(isTransientError(err)).toBe(true);
  });

  it.each([
    ['401', httpError(401, 'unauthorized')],
    ['400', httpError(400, 'bad request')],
    ['plain error', new Error('something else')],
    ['non-error', 'oops'],
  ])('should treat %s as permanent', (_label, err) => {
    expect(isTransientError(err)).toBe(false);
  });

  it('should judge a failover error by its last provider error', () => {
    expect(isTransientError(new AllProvidersFailedError(['openai'], httpError(503, 'down')))).toBe(true);
    expect(isTransientError(new AllProvidersFailedError(['openai'], httpError(401, 'bad key')))).toBe(false);
    expect(isTransientError(new AllProvidersFailedError([]))).toBe(false);
  });
});
