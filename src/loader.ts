import type { ChannelLogger } from "./logging";

export const DEFAULT_CONCURRENCY = 5;

export interface ProgressEvent {
  completed: number;
  total: number;
  /** Id whose fetch just settled; absent on the empty-run event. */
  currentId?: string;
}

export interface BulkLoadOptions {
  isCached(id: string): boolean;
  fetch(id: string): Promise<unknown>;
  concurrency?: number;
  signal?: AbortSignal;
  logger?: ChannelLogger;
}

/**
 * Warm the cache for many ids with at most `concurrency` fetches in flight.
 *
 * Yields one event per settled fetch, in completion order. When every id is
 * already cached a single `{ completed: 0, total: 0 }` event is yielded.
 * Aborting `signal` stops new fetches from starting; running ones finish and
 * are still reported. Breaking out of the loop also stops new fetches.
 */
export async function* bulkLoad(
  ids: Iterable<string>,
  options: BulkLoadOptions
): AsyncGenerator<ProgressEvent, void, undefined> {
  const pending = [...new Set(ids)].filter((id) => !options.isCached(id));
  const total = pending.length;

  if (total === 0) {
    yield { completed: 0, total: 0 };
    return;
  }

  const limit = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  const settled: string[] = [];
  let wake: (() => void) | undefined;
  let next = 0;
  let running = 0;
  let stopped = false;

  const launch = (): void => {
    while (
      !stopped &&
      !options.signal?.aborted &&
      running < limit &&
      next < total
    ) {
      const id = pending[next++];
      running++;
      void Promise.resolve()
        .then(() => options.fetch(id))
        .then(
          () => undefined,
          (err: unknown) => {
            options.logger?.warn("bulk fetch rejected", {
              id,
              error: err instanceof Error ? err.message : String(err),
            });
          }
        )
        .then(() => {
          running--;
          settled.push(id);
          launch();
          wake?.();
        });
    }
  };

  let completed = 0;
  try {
    launch();
    while (running > 0 || settled.length > 0) {
      const id = settled.shift();
      if (id === undefined) {
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
        wake = undefined;
        continue;
      }
      completed++;
      yield { completed, total, currentId: id };
    }
  } finally {
    stopped = true;
  }

  if (options.signal?.aborted) {
    options.logger?.debug("bulk load cancelled", { completed, total });
  }
}

/** Drain a progress stream into a callback. */
export async function runBulkLoad(
  events: AsyncIterable<ProgressEvent>,
  onProgress: (event: ProgressEvent) => void
): Promise<void> {
  for await (const event of events) {
    onProgress(event);
  }
}
