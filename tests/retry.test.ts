import { callWithRetry, CollaboratorTimeoutError } from '../src/core/index.js';

const policy = { retries: 2, timeoutMs: 200, retryDelayMs: 0 };

describe('callWithRetry', () => {
  it('returns the first successful value with its try count', async () => {
    const outcome = await callWithRetry(async () => 42, policy, 'decision');

    expect(outcome).toEqual({ ok: true, value: 42, tries: 1 });
  });

  it('retries a failing call and reports each retry', async () => {
    let calls = 0;
    const retries: [number, string][] = [];

    const outcome = await callWithRetry(
      async () => {
        calls++;
        if (calls < 3) throw new Error(`boom ${String(calls)}`);
        return 'ok';
      },
      policy,
      'decision',
      (tryNumber, error) => retries.push([tryNumber, error.message]),
    );

    expect(outcome).toEqual({ ok: true, value: 'ok', tries: 3 });
    expect(retries).toEqual([
      [1, 'boom 1'],
      [2, 'boom 2'],
    ]);
  });

  it('gives up after retries + 1 tries with the last error', async () => {
    let calls = 0;
    const outcome = await callWithRetry(
      async () => {
        calls++;
        throw new Error(`fail ${String(calls)}`);
      },
      policy,
      'verification',
    );

    expect(calls).toBe(3);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.tries).toBe(3);
      expect(outcome.error.message).toBe('fail 3');
    }
  });

  it('bounds a hanging call with a timeout error', async () => {
    const outcome = await callWithRetry(
      () => new Promise<string>(() => undefined),
      { retries: 0, timeoutMs: 20, retryDelayMs: 0 },
      'decision',
    );

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(CollaboratorTimeoutError);
      expect(outcome.error.message).toBe('decision call timed out after 20ms');
    }
  });

  it('aborts a timed-out call before the next try starts', async () => {
    const signals: AbortSignal[] = [];
    const abortedAtNextStart: boolean[] = [];

    const outcome = await callWithRetry(
      (signal) => {
        const previous = signals[signals.length - 1];
        if (previous) abortedAtNextStart.push(previous.aborted);
        signals.push(signal);
        return signals.length === 1 ? new Promise<string>(() => undefined) : Promise.resolve('late');
      },
      { retries: 1, timeoutMs: 20, retryDelayMs: 0 },
      'verification',
    );

    expect(outcome).toEqual({ ok: true, value: 'late', tries: 2 });
    expect(abortedAtNextStart).toEqual([true]);
    expect(signals[0]?.reason).toBeInstanceOf(CollaboratorTimeoutError);
    expect(signals[1]?.aborted).toBe(false);
  });

  it('wraps non-Error rejections', async () => {
    const outcome = await callWithRetry(
      () => Promise.reject('plain string'),
      { retries: 0, timeoutMs: 100, retryDelayMs: 0 },
      'decision',
    );

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error.message).toBe('plain string');
  });
});
