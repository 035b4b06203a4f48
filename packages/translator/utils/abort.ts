/** Signal aborting after `timeout` milliseconds, or earlier if the caller's signal aborts. */
export function timeoutSignal(timeout: number, signal?: AbortSignal): AbortSignal {
  const timer = AbortSignal.timeout(timeout);
  return signal ? AbortSignal.any([signal, timer]) : timer;
}
