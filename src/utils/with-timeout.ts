export type DeadlineResult<T> =
  | { readonly kind: 'completed'; readonly value: T }
  | {
      readonly kind: 'timed_out';
      readonly operationName: string;
      readonly timeoutMs: number;
      /** Resolves once the abandoned operation has finished, whichever way it ended. */
      readonly settled: Promise<void>;
    };

/**
 * Races an abortable operation against a timeout.
 *
 * The operation receives a signal that is aborted when the timeout fires, so it can stop
 * its own work. A rejection before the timeout propagates unchanged; one after it goes to
 * `onLateFailure`. The timer is always cleared, also when `operation` throws synchronously.
 */
export async function runWithDeadline<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operationName: string,
  onLateFailure: (error: unknown) => void,
): Promise<DeadlineResult<T>> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<'timed_out'>((resolve) => {
    timer = setTimeout(() => {
      controller.abort(new Error(`${operationName} timed out after ${timeoutMs}ms`));
      resolve('timed_out');
    }, timeoutMs);
  });

  try {
    const completed = operation(controller.signal).then((value) => ({ kind: 'completed' as const, value }));
    const winner = await Promise.race([completed, timeout]);
    if (winner !== 'timed_out') return winner;

    const settled = completed.then(() => undefined, onLateFailure);
    return { kind: 'timed_out', operationName, timeoutMs, settled };
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}
