/** Run `task` over `items` with at most `limit` in flight, starting items in order. */
export async function runBounded<T>(
  items: readonly T[],
  limit: number,
  task: (item: T) => Promise<void>
): Promise<void> {
  let next = 0;
  const lanes = Math.min(Math.max(1, Math.floor(limit)), items.length);
  const workers = Array.from({ length: lanes }, async () => {
    while (next < items.length) {
      const item = items[next++];
      await task(item);
    }
  });
  await Promise.all(workers);
}

export class WorkAbandoned extends Error {
  constructor(message = "abandoned after run cancellation") {
    super(message);
    this.name = "WorkAbandoned";
  }
}

/**
 * Settle with `work`, or reject with WorkAbandoned as soon as `signal` aborts.
 * Abandoned work keeps running; its eventual outcome is ignored.
 */
export function untilAbandoned<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    work.catch(() => undefined);
    return Promise.reject(new WorkAbandoned());
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new WorkAbandoned());
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}
