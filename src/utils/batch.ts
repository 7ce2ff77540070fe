/**
 * Runs `processFunction` over `items` in consecutive slices of `batchSize`,
 * items within a slice in parallel. Results keep input order.
 *
 * A failing item rejects the batch only after every item of its slice has
 * settled, and no later slice is started.
 */
export async function batch<T, R>(
    items: readonly T[],
    processFunction: (item: T, index: number) => Promise<R>,
    batchSize: number = 4,
    afterBatchMethod?: (processedCount: number, total: number) => void
): Promise<R[]> {
    const size = Math.max(1, Math.floor(batchSize))
    const total = items.length
    const results: R[] = []

    for (let i = 0; i < total; i += size) {
        const slice = items.slice(i, i + size)
        const settled = await Promise.allSettled(slice.map((item, offset) => processFunction(item, i + offset)))
        for (const outcome of settled) {
            if (outcome.status === 'rejected') throw outcome.reason
            results.push(outcome.value)
        }

        if (afterBatchMethod) afterBatchMethod(results.length, total)
    }

    return results
}
