export interface Cancelable {
  /** Idempotent; a no-op once the callback has run. */
  cancel(): void;
}

/**
 * Runs `fn` once after `delayMs`. Cancelling before the deadline guarantees the
 * callback never runs.
 */
export const scheduleOnce = (delayMs: number, fn: () => void): Cancelable => {
  let settled = false;
  const timer = setTimeout(
    () => {
      if (settled) return;
      settled = true;
      fn();
    },
    Math.max(0, delayMs),
  );
  return {
    cancel: () => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
    },
  };
};
