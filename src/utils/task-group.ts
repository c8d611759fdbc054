/**
 * Task Group
 * Bounded worker pool for the per-font and per-image work units of a phase
 */

export interface TaskGroupOptions<T> {
  // Maximum number of units in flight (values below 1 count as 1)
  concurrency: number;
  // Called once per unit that completed successfully
  onComplete?: (item: T) => void;
}

/**
 * Run `task` for every item with at most `concurrency` units in flight.
 *
 * Resolves when every unit has completed. After the first rejection no further units
 * are started; units already in flight run to the end, their results are ignored, and
 * the group then rejects with that first error. Completion order is unspecified.
 */
export function runTaskGroup<T>(
  items: readonly T[],
  task: (item: T) => Promise<unknown>,
  options: TaskGroupOptions<T>,
): Promise<void> {
  const limit = Math.max(1, Math.floor(options.concurrency) || 1);

  return new Promise<void>((resolve, reject) => {
    const inFlight = new Set<Promise<void>>();
    let cursor = 0;
    let failure: { error: unknown } | undefined;

    const settle = (): void => {
      if (inFlight.size > 0) return;
      if (failure) {
        reject(failure.error);
      } else if (cursor >= items.length) {
        resolve();
      }
    };

    const schedule = (): void => {
      while (!failure && inFlight.size < limit && cursor < items.length) {
        const item = items[cursor];
        cursor++;

        const unit: Promise<void> = Promise.resolve()
          .then(() => task(item))
          .then(
            () => {
              if (!failure) options.onComplete?.(item);
            },
            (error: unknown) => {
              failure ??= { error };
            },
          )
          .finally(() => {
            inFlight.delete(unit);
            schedule();
          });
        inFlight.add(unit);
      }
      settle();
    };

    schedule();
  });
}
