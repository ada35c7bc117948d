import { describe, it } from 'node:test';
import assert from 'node:assert';
import { RetryPolicy, categorizeError } from '../retry-policy.js';
import { TimeoutError } from '../timeout-guard.js';
import { UpstreamError } from '../../errors/upstream-error.js';

const transportError = () => new UpstreamError('socket hang up', { kind: 'NETWORK_ERROR', provider: 'test', stage: 'unit' });
const fatalError = () => new UpstreamError('denied', { kind: 'API_STATUS', provider: 'test', stage: 'unit', apiStatus: 'REQUEST_DENIED' });

describe('categorizeError', () => {
  it('maps timeouts, retriable upstream errors and everything else', () => {
    assert.strictEqual(categorizeError(new TimeoutError('op', 10)), 'timeout');
    assert.strictEqual(categorizeError(transportError()), 'transport');
    assert.strictEqual(
      categorizeError(new UpstreamError('busy', { kind: 'HTTP_ERROR', provider: 'test', stage: 'unit', statusCode: 503 })),
      'transport'
    );
    assert.strictEqual(
      categorizeError(new UpstreamError('bad', { kind: 'HTTP_ERROR', provider: 'test', stage: 'unit', statusCode: 400 })),
      'fatal'
    );
    assert.strictEqual(categorizeError(fatalError()), 'fatal');
    assert.strictEqual(categorizeError(new Error('plain')), 'fatal');
  });
});

describe('RetryPolicy', () => {
  it('retries a transport failure and returns the later success', async () => {
    const policy = new RetryPolicy({ maxAttempts: 2, backoffMs: [0, 0], timeoutMs: 1000 });
    const attempts: number[] = [];

    const result = await policy.execute('unit', async (_signal, attempt) => {
      attempts.push(attempt);
      if (attempt === 0) throw transportError();
      return 'ok';
    });

    assert.strictEqual(result, 'ok');
    assert.deepStrictEqual(attempts, [0, 1]);
  });

  it('fails fast on a non-retriable error', async () => {
    const policy = new RetryPolicy({ maxAttempts: 3, backoffMs: [0, 0, 0], timeoutMs: 1000 });
    let calls = 0;

    await assert.rejects(
      policy.execute('unit', async () => {
        calls++;
        throw fatalError();
      }),
      (error: unknown) => error instanceof UpstreamError && error.apiStatus === 'REQUEST_DENIED'
    );
    assert.strictEqual(calls, 1);
  });

  it('throws the last error once attempts run out', async () => {
    const policy = new RetryPolicy({ maxAttempts: 2, backoffMs: [0, 0], timeoutMs: 1000 });
    let calls = 0;

    await assert.rejects(
      policy.execute('unit', async () => {
        calls++;
        throw transportError();
      }),
      /socket hang up/
    );
    assert.strictEqual(calls, 2);
  });

  it('times out a slow attempt and aborts its signal', async () => {
    const policy = new RetryPolicy({ maxAttempts: 1, backoffMs: [0], timeoutMs: 20 });
    let seenSignal: AbortSignal | undefined;

    await assert.rejects(
      policy.execute('slow', (signal) => {
        seenSignal = signal;
        return new Promise<string>(resolve => setTimeout(() => resolve('late'), 200));
      }),
      TimeoutError
    );
    assert.strictEqual(seenSignal?.aborted, true);
  });
});
