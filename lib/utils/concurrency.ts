/**
 * Maps `items` through `fn` with at most `limit` calls in flight.
 * Results keep input order. The first rejection rejects the whole call;
 * workers stop picking up new items once one has failed.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;
    let failed = false;

    const worker = async () => {
        while (!failed && next < items.length) {
            const index = next++;
            try {
                results[index] = await fn(items[index], index);
            } catch (err) {
                failed = true;
                throw err;
            }
        }
    };

    const workerCount = Math.max(1, Math.min(limit, items.length));
    await Promise.all(Array.from({ length: workerCount }, worker));
    return results;
}
