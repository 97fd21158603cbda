// Longest delay setTimeout honours; anything larger fires after 1ms.
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/** Sleep helper. Delays above {@link MAX_TIMER_DELAY_MS} are capped. */
export const sleep = (ms: number) =>
  new Promise<void>((resolve) =>
    setTimeout(resolve, Math.min(ms, MAX_TIMER_DELAY_MS)),
  );

/**
 * Waits for `ms` to elapse or for `signal` to abort, whichever comes first.
 * Resolves `true` when the timer elapsed and `false` on abort. The timer is
 * unref'd so a pending wait never keeps the process alive. Delays above
 * {@link MAX_TIMER_DELAY_MS} are capped, so callers recompute after waking.
 */
export function waitOrAbort(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(
      () => {
        signal.removeEventListener("abort", onAbort);
        resolve(true);
      },
      Math.min(ms, MAX_TIMER_DELAY_MS),
    );
    timer.unref();
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
