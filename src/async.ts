import { TimeoutError } from "./errors.js";

/**
 * Run `task` with its own AbortSignal, aborting it after `timeoutMs` or when
 * `parent` aborts. Rejects with TimeoutError on timeout.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options?: { parent?: AbortSignal; what?: string },
): Promise<T> {
  const controller = new AbortController();
  const parent = options?.parent;
  const onParentAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const err = new TimeoutError(timeoutMs, options?.what);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
    parent?.removeEventListener("abort", onParentAbort);
  }
}
