/**
 * Wait `ms` milliseconds. Resolves early, without throwing, when the signal
 * aborts; the returned flag tells the caller which one happened.
 */
export function abortableDelay(ms: number, signal?: AbortSignal): Promise<'elapsed' | 'aborted'> {
  if (signal?.aborted) {
    return Promise.resolve('aborted');
  }

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve('aborted');
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve('elapsed');
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settle with the promise, or with 'aborted' once the signal aborts.
 * The underlying promise keeps running.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T | 'aborted'> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.resolve('aborted');
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => resolve('aborted');
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
