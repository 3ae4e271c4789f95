/**
 * Run task factories with at most `concurrency` in flight.
 * Results keep the input order regardless of completion order.
 * After the first rejection no further task is started.
 */
export async function runWithConcurrency<T>(tasks: Array<() => Promise<T>>, concurrency: number): Promise<T[]> {
  const safeConcurrency = Math.max(1, Math.floor(concurrency));
  const results: T[] = new Array(tasks.length);
  let nextIndex = 0;
  let stopped = false;

  async function worker(): Promise<void> {
    while (!stopped && nextIndex < tasks.length) {
      const current = nextIndex;
      nextIndex += 1;
      try {
        results[current] = await tasks[current]();
      } catch (error) {
        stopped = true;
        throw error;
      }
    }
  }

  const workers = Array.from({ length: Math.min(safeConcurrency, tasks.length) }, () => worker());
  await Promise.all(workers);
  return results;
}
