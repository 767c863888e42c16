import { CommandCancelledError, DeadlineExceededError } from "../errors.js";

export interface DeadlineOptions {
  label: string;
  /** Omit for waits with no deadline of their own (e.g. a person answering). */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Runs `work` with its own AbortSignal that fires when either the parent
 * signal aborts or `timeoutMs` elapses. The returned promise settles as soon
 * as the signal fires, even if `work` ignores it; the abort reason
 * (DeadlineExceededError or the parent's reason) is the rejection.
 */
export function withDeadline<T>(work: (signal: AbortSignal) => Promise<T>, opts: DeadlineOptions): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(abortReason(opts.signal));
  const { timeoutMs } = opts;
  const timer = timeoutMs === undefined
    ? undefined
    : setTimeout(() => controller.abort(new DeadlineExceededError(opts.label, timeoutMs)), Math.max(0, timeoutMs));

  if (opts.signal?.aborted) onParentAbort();
  else opts.signal?.addEventListener("abort", onParentAbort, { once: true });

  const cleanup = () => {
    clearTimeout(timer);
    opts.signal?.removeEventListener("abort", onParentAbort);
  };

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      cleanup();
      reject(controller.signal.reason);
    };
    if (controller.signal.aborted) {
      onAbort();
      return;
    }
    controller.signal.addEventListener("abort", onAbort, { once: true });
    Promise.resolve()
      .then(() => work(controller.signal))
      .then(
        value => {
          cleanup();
          controller.signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        err => {
          cleanup();
          controller.signal.removeEventListener("abort", onAbort);
          reject(err);
        }
      );
  });
}

// A bare abort() carries a DOMException named AbortError; treat it as a cancellation.
function abortReason(signal: AbortSignal | undefined): unknown {
  const reason: unknown = signal?.reason;
  return reason instanceof Error && reason.name !== "AbortError" ? reason : new CommandCancelledError();
}

export function isCancellation(err: unknown): err is CommandCancelledError {
  return err instanceof CommandCancelledError;
}

export function isDeadline(err: unknown): err is DeadlineExceededError {
  return err instanceof DeadlineExceededError;
}
