/**
 * Run tasks with at most `workers` in flight. Results keep task order.
 */
export async function runWithConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  workers: number
): Promise<T[]> {
  const concurrency = Math.max(1, Math.min(16, Math.round(workers)));
  const results: T[] = new Array(tasks.length);
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < tasks.length) {
      const current = nextIndex;
      nextIndex += 1;
      results[current] = await tasks[current]();
    }
  };

  const runners = Array.from({ length: Math.min(concurrency, tasks.length) }, () => worker());
  await Promise.all(runners);
  return results;
}
