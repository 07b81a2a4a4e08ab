import assert from 'assert';
import { AuthError } from '../../../src/lib/errors.ts';
import { computeBackoff, refreshWithRetries, type SleepFn } from '../../../src/lib/refresh-driver.ts';
import { Token } from '../../../src/lib/token.ts';
import { createRecordingLogger, logger } from '../../lib/test-utils.ts';

const token = new Token('refreshed', 0, 3600_000);

function recordingSleep(): SleepFn & { delays: number[] } {
  const delays: number[] = [];
  const sleep: SleepFn = async (ms) => {
    delays.push(ms);
  };
  return Object.assign(sleep, { delays });
}

describe('computeBackoff', () => {
  it('doubles from 100 ms and caps at 10 s', () => {
    const max = { random: () => 1 };
    assert.deepStrictEqual(
      [1, 2, 3, 4, 5, 8, 9].map((i) => computeBackoff(i, max)),
      [100, 200, 400, 800, 1600, 10_000, 10_000]
    );
  });

  it('applies equal jitter', () => {
    assert.strictEqual(computeBackoff(1, { random: () => 0 }), 50);
    assert.strictEqual(computeBackoff(3, { random: () => 0.5 }), 300);
  });
});

describe('refreshWithRetries', () => {
  it('returns the first successful token without sleeping', async () => {
    const sleep = recordingSleep();
    const result = await refreshWithRetries(async () => token, { sleep, logger });
    assert.strictEqual(result, token);
    assert.deepStrictEqual(sleep.delays, []);
  });

  it('retries transient errors with backoff', async () => {
    const sleep = recordingSleep();
    const attempts: number[] = [];
    const result = await refreshWithRetries(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 3) throw AuthError.fromResponse('http://t', 503, 'unavailable');
        return token;
      },
      { sleep, random: () => 1, logger }
    );
    assert.strictEqual(result, token);
    assert.deepStrictEqual(attempts, [1, 2, 3]);
    assert.deepStrictEqual(sleep.delays, [100, 200]);
  });

  it('stops at the first fatal error', async () => {
    const sleep = recordingSleep();
    let calls = 0;
    await assert.rejects(
      refreshWithRetries(
        async () => {
          calls++;
          throw AuthError.fromResponse('http://t', 400, '{"error":"invalid_grant"}');
        },
        { sleep, logger }
      ),
      (error: unknown) => error instanceof AuthError && error.status === 400
    );
    assert.strictEqual(calls, 1);
    assert.deepStrictEqual(sleep.delays, []);
  });

  it('gives up after maxRetries and rethrows the last error', async () => {
    const sleep = recordingSleep();
    let calls = 0;
    await assert.rejects(
      refreshWithRetries(
        async () => {
          calls++;
          throw new Error(`failure ${calls}`);
        },
        { sleep, maxRetries: 2, random: () => 1, logger }
      ),
      { message: 'failure 3' }
    );
    assert.strictEqual(calls, 3);
    assert.deepStrictEqual(sleep.delays, [100, 200]);
  });

  it('uses five retries by default', async () => {
    const sleep = recordingSleep();
    let calls = 0;
    await assert.rejects(
      refreshWithRetries(
        async () => {
          calls++;
          throw new AuthError('Transport', 'refused');
        },
        { sleep, logger }
      )
    );
    assert.strictEqual(calls, 6);
    assert.strictEqual(sleep.delays.length, 5);
  });

  it('logs each retry at warn with provider and attempt', async () => {
    const recording = createRecordingLogger();
    await refreshWithRetries(
      async (attempt) => {
        if (attempt === 1) throw new AuthError('Transport', 'refused');
        return token;
      },
      { sleep: recordingSleep(), random: () => 1, logger: recording, providerName: 'metadata server' }
    );
    const warnings = recording.entries.filter((entry) => entry.level === 'warn');
    assert.strictEqual(warnings.length, 1);
    assert.deepStrictEqual(warnings[0]?.meta, { provider: 'metadata server', attempt: 1, delayMs: 100, error: 'refused' });
  });

  it('stops when the signal is aborted during a sleep', async () => {
    const controller = new AbortController();
    const reason = new AuthError('Revoked', 'closed');
    let calls = 0;
    const pending = refreshWithRetries(
      async () => {
        calls++;
        throw new AuthError('Transport', 'refused');
      },
      { signal: controller.signal, initialDelayMs: 60_000, logger }
    );
    setImmediate(() => controller.abort(reason));
    await assert.rejects(pending, (error: unknown) => error === reason);
    assert.strictEqual(calls, 1);
  });
});
