import assert from 'node:assert/strict';
import { test } from 'node:test';

import { computeExponentialBackoff, RetryExhaustedError, retryWithBackoff } from '../src';

test('doubles the delay per attempt and caps it', () => {
  const options = { baseMs: 4_000, factor: 2, maxMs: 20_000 };
  assert.equal(computeExponentialBackoff(1, options), 4_000);
  assert.equal(computeExponentialBackoff(2, options), 8_000);
  assert.equal(computeExponentialBackoff(3, options), 16_000);
  assert.equal(computeExponentialBackoff(4, options), 20_000);
  assert.equal(computeExponentialBackoff(0, options), 4_000);
});

test('applies jitter within the configured ratio', () => {
  const options = { baseMs: 1_000, factor: 2, maxMs: 10_000, jitterRatio: 0.5 };
  assert.equal(computeExponentialBackoff(2, { ...options, random: () => 1 }), 3_000);
  assert.equal(computeExponentialBackoff(2, { ...options, random: () => 0 }), 1_000);
  assert.equal(computeExponentialBackoff(2, { ...options, random: () => 0.5 }), 2_000);
});

test('retries failed attempts with backoff until one succeeds', async () => {
  const sleeps: number[] = [];
  let calls = 0;
  const result = await retryWithBackoff(
    async () => {
      calls += 1;
      if (calls < 3) {
        throw new Error(`transient ${calls}`);
      }
      return 'ok';
    },
    { maxAttempts: 4, backoff: { baseMs: 10, factor: 2 }, sleep: async (ms) => void sleeps.push(ms) }
  );

  assert.equal(result, 'ok');
  assert.equal(calls, 3);
  assert.deepEqual(sleeps, [10, 20]);
});

test('treats rejected results as retryable and surfaces the last error', async () => {
  const retried: number[] = [];
  await assert.rejects(
    retryWithBackoff(async (): Promise<number[]> => [], {
      maxAttempts: 3,
      backoff: { baseMs: 1 },
      shouldRetryResult: (rows) => rows.length === 0,
      onRetry: (info) => retried.push(info.attempt),
      sleep: async () => {}
    }),
    (error: unknown) => {
      assert.ok(error instanceof RetryExhaustedError);
      assert.equal(error.attempts, 3);
      assert.equal(error.message, 'Gave up after 3 attempt(s): Result rejected by retry predicate');
      return true;
    }
  );
  assert.deepEqual(retried, [1, 2]);
});
