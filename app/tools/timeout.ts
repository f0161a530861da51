/**
 * Races an operation against a timer. The operation receives a signal that aborts when the
 * timer fires, and the returned promise rejects with the error built by `onTimeout`.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>(function (_resolve, reject) {
    timer = setTimeout(function () {
      reject(onTimeout());
      controller.abort();
    }, timeoutMs);
  });
  try {
    return await Promise.race([operation(controller.signal), timeout]);
  }
  finally {
    clearTimeout(timer);
  }
}
