/**
 * A parallel map over independent units of work. Implementations must return
 * one settled result per task, at the task's own index.
 */
export type ParallelMap = <T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  limit: number
) => Promise<readonly PromiseSettledResult<T>[]>

/**
 * Runs `tasks` with at most `limit` concurrent executions.
 * All tasks run regardless of failures; results keep input order.
 * Tasks share the calling thread, so CPU-bound tasks interleave rather than
 * overlap.
 */
export const runWithConcurrency: ParallelMap = async <T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  limit: number
): Promise<readonly PromiseSettledResult<T>[]> => {
  const results: PromiseSettledResult<T>[] = new Array(tasks.length)
  let idx = 0

  async function runNext(): Promise<void> {
    while (idx < tasks.length) {
      const taskIdx = idx++
      const task = tasks[taskIdx]
      try {
        const value = await task()
        results[taskIdx] = { status: 'fulfilled', value }
      } catch (reason) {
        results[taskIdx] = { status: 'rejected', reason }
      }
    }
  }

  const workers = Array.from({ length: Math.min(Math.max(1, limit), tasks.length) }, () => runNext())
  await Promise.all(workers)

  return results
}
