/**
 * Cancellation helpers built on AbortSignal
 */

/**
 * Handle for a teardown callback registered against a signal
 */
export interface TeardownRegistration {
  /** Unregister the callback; calling it again does nothing */
  release(): void;
}

const NOOP_REGISTRATION: TeardownRegistration = { release: () => {} };

/**
 * Register a callback that runs once when `signal` aborts.
 *
 * Callers release the registration in a `finally` block so it never outlives
 * the operation it guards. An already aborted signal runs the callback
 * immediately.
 */
export function registerTeardown(
  signal: AbortSignal | undefined,
  onAbort: () => void
): TeardownRegistration {
  if (!signal) {
    return NOOP_REGISTRATION;
  }
  if (signal.aborted) {
    onAbort();
    return NOOP_REGISTRATION;
  }

  let released = false;
  const listener = () => {
    released = true;
    onAbort();
  };
  signal.addEventListener('abort', listener, { once: true });

  return {
    release() {
      if (released) return;
      released = true;
      signal.removeEventListener('abort', listener);
    },
  };
}
