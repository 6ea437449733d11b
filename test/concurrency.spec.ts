import { afterEach, describe, expect, it, vi } from 'vitest';
import { DeadlineExceededError, runWithConcurrency, withDeadline } from '@libs/market-data';

describe('runWithConcurrency', () => {
  it('never has more than the limit in flight', async () => {
    const items = Array.from({ length: 25 }, (_, index) => index);
    let inFlight = 0;
    let peak = 0;

    const results = await runWithConcurrency(items, 4, async (item) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 1));
      inFlight -= 1;
      return item * 2;
    });

    expect(peak).toBe(4);
    expect(inFlight).toBe(0);
    expect(results).toEqual(items.map((item) => item * 2));
  });

  it('keeps input order when items finish out of order', async () => {
    const delays = [30, 5, 15, 0];

    const results = await runWithConcurrency(delays, 4, async (delay, index) => {
      await new Promise((resolve) => setTimeout(resolve, delay));
      return `item-${index}`;
    });

    expect(results).toEqual(['item-0', 'item-1', 'item-2', 'item-3']);
  });

  it('handles an empty list', async () => {
    const worker = vi.fn(async () => 1);

    await expect(runWithConcurrency([], 10, worker)).resolves.toEqual([]);
    expect(worker).not.toHaveBeenCalled();
  });
});

describe('withDeadline', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the task result before the deadline', async () => {
    await expect(withDeadline(1000, async () => 'done')).resolves.toBe('done');
  });

  it('rejects and aborts the task signal once the deadline passes', async () => {
    vi.useFakeTimers();
    let taskSignal: AbortSignal | undefined;

    const pending = withDeadline(500, (signal) => {
      taskSignal = signal;
      return new Promise<string>(() => undefined);
    });
    const assertion = expect(pending).rejects.toBeInstanceOf(DeadlineExceededError);

    await vi.advanceTimersByTimeAsync(500);
    await assertion;
    expect(taskSignal?.aborted).toBe(true);
  });

  it('follows an aborted parent signal', async () => {
    const parent = new AbortController();
    const reason = new Error('shutting down');
    parent.abort(reason);

    await expect(withDeadline(1000, async () => 'never', parent.signal)).rejects.toBe(reason);
  });
});
