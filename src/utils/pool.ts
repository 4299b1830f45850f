/**
 * Run tasks with at most `limit` in flight and wait for all of them.
 * Results keep task order. Tasks are expected to settle on their own;
 * a rejection rejects the whole pool.
 */
export async function runPool<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  limit: number
): Promise<T[]> {
  const results: T[] = new Array(tasks.length);
  let next = 0;

  const worker = async () => {
    while (next < tasks.length) {
      const i = next++;
      results[i] = await tasks[i]();
    }
  };

  const workers = Math.max(1, Math.min(limit, tasks.length));
  await Promise.all(Array.from({ length: workers }, worker));
  return results;
}
