import { describe, expect, it, vi } from 'vitest';
import { apiError, instantRetry } from '../test-helpers';
import { CallTimeoutError, ExtractionError, classifyExtractionError } from './errors';
import { withRetry, withTimeout } from './retry';

describe('withRetry', () => {
  it('retries transient failures until the operation succeeds', async () => {
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(apiError(503))
      .mockRejectedValueOnce(apiError(429))
      .mockResolvedValue('ok');

    const result = await withRetry(operation, {
      label: 'test',
      policy: instantRetry(3),
      classify: classifyExtractionError,
    });

    expect(result).toBe('ok');
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
  });

  it('stops at the first non-retryable failure', async () => {
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(apiError(403));

    const result = withRetry(operation, { label: 'test', policy: instantRetry(3), classify: classifyExtractionError });

    await expect(result).rejects.toBeInstanceOf(ExtractionError);
    await expect(result).rejects.toMatchObject({ kind: 'permission-denied' });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('rejects with the classified error once attempts are spent', async () => {
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(apiError(429));

    const result = withRetry(operation, { label: 'test', policy: instantRetry(2), classify: classifyExtractionError });

    await expect(result).rejects.toMatchObject({ kind: 'quota', retryable: true });
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('runs once with a single attempt', async () => {
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(apiError(503));

    await expect(
      withRetry(operation, { label: 'test', policy: instantRetry(1), classify: classifyExtractionError })
    ).rejects.toMatchObject({ kind: 'transient' });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('does not retry after the signal is aborted', async () => {
    const controller = new AbortController();
    const operation = vi.fn<(attempt: number) => Promise<string>>(async () => {
      controller.abort(new Error('deployment timeout'));
      throw apiError(503);
    });

    const result = withRetry(operation, {
      label: 'test',
      policy: instantRetry(3),
      classify: classifyExtractionError,
      signal: controller.signal,
    });

    await expect(result).rejects.toThrow();
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  it('resolves with the value of a fast operation', async () => {
    await expect(withTimeout(Promise.resolve(42), 1000, 'fast call')).resolves.toBe(42);
  });

  it('rejects a call that does not settle in time', async () => {
    const never = new Promise<never>(() => {});
    const result = withTimeout(never, 20, 'slow call');

    await expect(result).rejects.toBeInstanceOf(CallTimeoutError);
    await expect(result).rejects.toThrow('slow call timed out after 20ms');
  });

  it('passes the operation failure through', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 1000, 'failing call')).rejects.toThrow('boom');
  });
});
