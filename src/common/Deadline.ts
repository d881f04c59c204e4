import { DeadlineExceededError, RequestAbortedError } from './Errors';

/**
 * Run `task` under a deadline.
 *
 * The returned promise rejects with DeadlineExceededError once `timeoutMs`
 * passes, or with RequestAbortedError as soon as `parent` aborts, whichever
 * comes first. The signal handed to `task` aborts at the same moment, so a
 * multi-step task can stop issuing work. A late settlement of `task` after
 * the deadline is dropped.
 */
export function withDeadline<T>(
  operation: string,
  timeoutMs: number,
  parent: AbortSignal | undefined,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const onParentAbort = (): void => {
      fail(new RequestAbortedError(operation));
    };

    const cleanup = (): void => {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
      parent?.removeEventListener('abort', onParentAbort);
    };

    const fail = (err: Error): void => {
      cleanup();
      controller.abort(err);
      reject(err);
    };

    if (parent?.aborted) {
      fail(new RequestAbortedError(operation));
      return;
    }

    timer = setTimeout(() => fail(new DeadlineExceededError(operation, timeoutMs)), timeoutMs);
    parent?.addEventListener('abort', onParentAbort, { once: true });

    task(controller.signal).then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      }
    );
  });
}

/**
 * Throw the abort reason if `signal` has fired. Checked between the steps of
 * a multi-step task.
 */
export function throwIfAborted(signal: AbortSignal, operation: string): void {
  if (signal.aborted) {
    throw new RequestAbortedError(operation);
  }
}
