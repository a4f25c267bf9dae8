/**
 * Bounded-concurrency task runner. Results keep the order of the input tasks.
 */

export type ConcurrencyResult<T> =
  | { index: number; status: 'fulfilled'; value: T }
  | { index: number; status: 'rejected'; error: Error };

export interface ConcurrencyOptions {
  /** Stop starting new tasks after the first failure (default: false) */
  failFast?: boolean;
}

export interface ConcurrencyRunResult<T> {
  /** One entry per task; tasks never started under failFast are left out */
  results: Array<ConcurrencyResult<T>>;
  aborted: boolean;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export async function runWithConcurrency<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  limit: number,
  options: ConcurrencyOptions = {}
): Promise<ConcurrencyRunResult<T>> {
  const slots: Array<ConcurrencyResult<T> | undefined> = new Array(tasks.length);
  const workerCount = Math.max(1, Math.min(Math.floor(limit) || 1, tasks.length));
  let next = 0;
  let aborted = false;

  const worker = async (): Promise<void> => {
    while (!aborted && next < tasks.length) {
      const index = next++;
      try {
        slots[index] = { index, status: 'fulfilled', value: await tasks[index]() };
      } catch (error) {
        slots[index] = { index, status: 'rejected', error: toError(error) };
        if (options.failFast) {
          aborted = true;
        }
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  const results: Array<ConcurrencyResult<T>> = [];
  for (const slot of slots) {
    if (slot) results.push(slot);
  }
  return { results, aborted };
}
