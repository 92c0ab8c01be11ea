/** Outcome of one pooled task. The pool itself never rejects. */
export type Settled<R> = { ok: true; value: R } | { ok: false; error: unknown }

/**
 * Run `task` over `items` with at most `concurrency` tasks in flight.
 * Results keep the input order. A failing task does not stop the others.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>
): Promise<Settled<R>[]> {
  const results = new Array<Settled<R>>(items.length)
  let next = 0

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++
      try {
        results[index] = { ok: true, value: await task(items[index], index) }
      } catch (error) {
        results[index] = { ok: false, error }
      }
    }
  }

  const workerCount = Math.min(Math.max(1, Math.floor(concurrency)), items.length)
  await Promise.all(Array.from({ length: workerCount }, () => worker()))
  return results
}

/** Error of the last failed task in input order, if any failed. */
export function lastFailure<R>(results: readonly Settled<R>[]): { error: unknown } | undefined {
  for (let i = results.length - 1; i >= 0; i -= 1) {
    const result = results[i]
    if (!result.ok) {
      return { error: result.error }
    }
  }
  return undefined
}
