import { err, ok, type Result, type ResultAsync } from 'neverthrow';

/**
 * Run `task` over `items` at most `concurrency` at a time, batch by batch, keeping input order.
 * Stops at the first batch that contains an error.
 */
export async function mapInBatches<T, R, E>(
    items: readonly T[],
    concurrency: number,
    task: (item: T) => ResultAsync<R, E>,
): Promise<Result<R[], E>> {
    const size = Math.max(1, concurrency);
    const results: R[] = [];

    for (let start = 0; start < items.length; start += size) {
        const batch = await Promise.all(items.slice(start, start + size).map((item) => task(item)));
        for (const result of batch) {
            if (result.isErr()) return err(result.error);
            results.push(result.value);
        }
    }
    return ok(results);
}
