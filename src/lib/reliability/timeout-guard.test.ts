import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { isTimeoutError, sleep, TimeoutError, withTimeout } from './timeout-guard.js';

describe('withTimeout', () => {
  it('resolves with the wrapped value when it settles in time', async () => {
    assert.equal(await withTimeout(Promise.resolve(42), 100, 'fast_op'), 42);
  });

  it('propagates the wrapped rejection', async () => {
    await assert.rejects(withTimeout(Promise.reject(new Error('boom')), 100, 'failing_op'), /boom/);
  });

  it('rejects with TimeoutError and runs the callback when the deadline passes', async () => {
    let timedOut = false;
    const never = new Promise<string>(() => undefined);

    await assert.rejects(
      withTimeout(never, 10, 'slow_op', () => { timedOut = true; }),
      (err: unknown) => {
        assert.ok(isTimeoutError(err));
        assert.equal(err.message, 'slow_op timed out after 10ms');
        assert.equal(err.operation, 'slow_op');
        assert.equal(err.timeoutMs, 10);
        return true;
      }
    );
    assert.equal(timedOut, true);
  });
});

describe('isTimeoutError', () => {
  it('recognizes only TimeoutError', () => {
    assert.equal(isTimeoutError(new TimeoutError('op', 5)), true);
    assert.equal(isTimeoutError(new Error('op timed out')), false);
    assert.equal(isTimeoutError('timeout'), false);
  });
});

describe('sleep', () => {
  it('waits at least the given time', async () => {
    const t0 = Date.now();
    await sleep(20);
    assert.ok(Date.now() - t0 >= 15);
  });
});
