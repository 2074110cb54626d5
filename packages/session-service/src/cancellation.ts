export class OperationCancelledError extends Error {
  constructor(
    readonly step: string,
    readonly reason?: unknown,
  ) {
    super(`Operation cancelled before ${step} completed`);
    this.name = "OperationCancelledError";
  }
}

/**
 * Runs `operation` unless `signal` has already fired, and stops waiting for it
 * as soon as the signal fires. The underlying call is not interrupted; its
 * outcome is ignored.
 */
export const runUnlessAborted = <T>(
  signal: AbortSignal | undefined,
  step: string,
  operation: () => Promise<T>,
): Promise<T> => {
  if (!signal) {
    return operation();
  }
  if (signal.aborted) {
    return Promise.reject(new OperationCancelledError(step, signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(new OperationCancelledError(step, signal.reason));
    };
    signal.addEventListener("abort", onAbort, { once: true });

    Promise.resolve()
      .then(operation)
      .then(
        (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(error);
        },
      );
  });
};
