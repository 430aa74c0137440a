/**
 * Longest delay setTimeout honours; larger values fire after 1 ms
 */
export const MAX_TIMER_DELAY = 2_147_483_647;

/** Why a `Wakeup.wait` call returned */
export type WakeReason = "timeout" | "signal" | "aborted";

/**
 * Per-unit wake condition: "sleep until the interval elapses or a click
 * arrives". A signal sent while nobody waits is latched and consumed by the
 * next wait.
 */
export class Wakeup {
  private pending = false;
  private notify: (() => void) | null = null;

  /** Wake the waiter now, or the next one if none is waiting */
  signal(): void {
    if (this.notify) {
      this.notify();
    } else {
      this.pending = true;
    }
  }

  /** Whether a signal is latched */
  get isPending(): boolean {
    return this.pending;
  }

  /**
   * Wait for `ms` milliseconds, a signal, or `abort`, whichever comes first.
   * The wake condition is reset before this resolves. Intervals longer
   * than MAX_TIMER_DELAY wait MAX_TIMER_DELAY.
   */
  wait(ms: number, abort?: AbortSignal): Promise<WakeReason> {
    if (abort?.aborted) {
      return Promise.resolve("aborted");
    }
    if (this.pending) {
      this.pending = false;
      return Promise.resolve("signal");
    }

    return new Promise<WakeReason>((resolve) => {
      const finish = (reason: WakeReason) => {
        clearTimeout(timer);
        abort?.removeEventListener("abort", onAbort);
        this.notify = null;
        resolve(reason);
      };
      const onAbort = () => finish("aborted");
      const timer = setTimeout(
        () => finish("timeout"),
        Math.min(ms, MAX_TIMER_DELAY),
      );

      this.notify = () => finish("signal");
      abort?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
