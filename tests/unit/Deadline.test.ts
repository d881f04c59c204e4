import { describe, it, expect, vi, afterEach } from 'vitest';
import { throwIfAborted, withDeadline } from '../../src/common/Deadline';
import { DeadlineExceededError, RequestAbortedError } from '../../src/common/Errors';

describe('withDeadline', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the task result', async () => {
    await expect(withDeadline('GET', 100, undefined, async () => 42)).resolves.toBe(42);
  });

  it('passes a task rejection through', async () => {
    const failure = new Error('boom');
    await expect(withDeadline('GET', 100, undefined, () => Promise.reject(failure))).rejects.toBe(failure);
  });

  it('rejects once the timeout passes and aborts the task signal', async () => {
    vi.useFakeTimers();
    let taskSignal: AbortSignal | undefined;

    const pending = withDeadline('GET', 50, undefined, (signal) => {
      taskSignal = signal;
      return new Promise<never>(() => {});
    });
    const outcome = expect(pending).rejects.toThrow('GET timed out after 50ms');

    vi.advanceTimersByTime(50);
    await outcome;
    await expect(pending).rejects.toBeInstanceOf(DeadlineExceededError);
    expect(taskSignal?.aborted).toBe(true);
  });

  it('does not fire before the timeout', async () => {
    vi.useFakeTimers();
    let settled = false;

    const pending = withDeadline('GET', 50, undefined, () => new Promise<never>(() => {}));
    pending.catch(() => {
      settled = true;
    });

    vi.advanceTimersByTime(49);
    await Promise.resolve();
    expect(settled).toBe(false);

    vi.advanceTimersByTime(1);
    await expect(pending).rejects.toBeInstanceOf(DeadlineExceededError);
  });

  it('rejects when the parent signal aborts', async () => {
    const parent = new AbortController();
    const pending = withDeadline('SCAN', 1000, parent.signal, () => new Promise<never>(() => {}));
    const outcome = expect(pending).rejects.toBeInstanceOf(RequestAbortedError);

    parent.abort();
    await outcome;
  });

  it('never starts the task when the parent is already aborted', async () => {
    const parent = new AbortController();
    parent.abort();
    const task = vi.fn(async () => 'never');

    await expect(withDeadline('GET', 1000, parent.signal, task)).rejects.toThrow('GET cancelled');
    expect(task).not.toHaveBeenCalled();
  });
});

describe('throwIfAborted', () => {
  it('does nothing for a live signal', () => {
    expect(() => throwIfAborted(new AbortController().signal, 'SCAN')).not.toThrow();
  });

  it('throws for an aborted signal', () => {
    const controller = new AbortController();
    controller.abort();
    expect(() => throwIfAborted(controller.signal, 'SCAN')).toThrow(RequestAbortedError);
  });
});
