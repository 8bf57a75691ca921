/**
 * Run `worker` over `items` with at most `limit` in flight. Results keep input order.
 */
export async function mapWithConcurrency<T, R>(items: readonly T[], limit: number, worker: (item: T, index: number) => Promise<R>): Promise<R[]> {
    const results = new Array<R>(items.length)
    let next = 0

    async function lane(): Promise<void> {
        while (next < items.length) {
            const index = next++
            results[index] = await worker(items[index], index)
        }
    }

    const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => lane())
    await Promise.all(lanes)
    return results
}
