/**
 * Serial Queue
 *
 * Runs submitted tasks strictly one after another, so the server has one
 * classification in flight at a time. Later requests wait for their turn.
 */

export interface SerialQueue {
  run<T>(task: () => Promise<T>): Promise<T>;
  /** Tasks submitted and not yet settled, including the running one */
  readonly pending: number;
}

export function createSerialQueue(): SerialQueue {
  let tail: Promise<void> = Promise.resolve();
  let pending = 0;

  return {
    run<T>(task: () => Promise<T>): Promise<T> {
      pending++;
      const result = tail.then(task).finally(() => {
        pending--;
      });
      // The caller receives the rejection through `result`; the chain only orders tasks
      tail = result.then(
        () => undefined,
        () => undefined,
      );
      return result;
    },
    get pending() {
      return pending;
    },
  };
}
