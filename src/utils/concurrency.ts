/**
 * Executes async functions with at most `concurrency` in flight, using a
 * worker pool: each worker pulls the next item as soon as its previous one
 * settles, so a slow item never stalls a whole batch.
 *
 * Once any item rejects, workers stop pulling new items and the returned
 * promise rejects with that first error. Items already in flight are left
 * to settle on their own. The signal is checked before every item.
 *
 * @returns results in the same order as `items`
 */
export async function runConcurrent<T, R>(
    items: readonly T[],
    concurrency: number,
    fn: (item: T, index: number) => Promise<R>,
    signal?: AbortSignal
): Promise<R[]> {
    if (items.length === 0) {
        return [];
    }

    const results: R[] = new Array(items.length);
    let nextIndex = 0;
    let failed = false;

    async function worker(): Promise<void> {
        while (!failed && nextIndex < items.length) {
            signal?.throwIfAborted();
            const index = nextIndex++;
            try {
                results[index] = await fn(items[index], index);
            } catch (error) {
                failed = true;
                throw error;
            }
        }
    }

    const workerCount = Math.max(1, Math.min(concurrency, items.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    return results;
}

/**
 * Like runConcurrent, except that a concurrency of 0 (or less) starts one
 * task per item with no pool cap.
 */
export async function runBounded<T, R>(
    items: readonly T[],
    concurrency: number,
    fn: (item: T, index: number) => Promise<R>,
    signal?: AbortSignal
): Promise<R[]> {
    if (concurrency <= 0) {
        signal?.throwIfAborted();
        return await Promise.all(items.map((item, index) => fn(item, index)));
    }
    return await runConcurrent(items, concurrency, fn, signal);
}
