/** Random integer in `[min, max]`. */
export function randomInt(min: number, max: number): number {
  return min + Math.floor(Math.random() * (max - min + 1));
}

/** Wait a random number of milliseconds within the bounds. Rejects with the abort reason of the signal. */
export function randomDelay({ min, max }: { min: number; max: number }, signal?: AbortSignal): Promise<void> {
  const ms = randomInt(min, max);

  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    if (ms <= 0) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
