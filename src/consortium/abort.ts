/**
 * Abort plumbing shared by the dispatcher and the arbiter call.
 */

export interface Deadline {
  /** Fires on run cancellation or when the timer runs out */
  readonly signal: AbortSignal;
  timedOut(): boolean;
  /** Clear the timer and detach from the parent signal */
  dispose(): void;
}

/**
 * One abort signal per invocation, linked to the run's signal and,
 * when `timeoutMs` is given, to its own timer.
 */
export function createDeadline(parent: AbortSignal | undefined, timeoutMs: number | undefined): Deadline {
  const controller = new AbortController();
  let timedOut = false;

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) controller.abort(parent.reason);
  else parent?.addEventListener("abort", onParentAbort, { once: true });

  const timer = timeoutMs !== undefined
    ? setTimeout(() => {
        timedOut = true;
        controller.abort(new Error(`timed out after ${timeoutMs}ms`));
      }, timeoutMs)
    : undefined;

  return {
    signal: controller.signal,
    timedOut: () => timedOut,
    dispose: () => {
      if (timer !== undefined) clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

/**
 * Settle with `promise`, or reject with the abort reason as soon as
 * `signal` fires. An adapter that ignores its signal cannot hold a round open.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  let onAbort = () => {};
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(signal.reason);
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });
  });
  return Promise.race([promise, aborted]).finally(() => signal.removeEventListener("abort", onAbort));
}
