/**
 * Maps `items` with at most `limit` mappers in flight, keeping results in input order. After the
 * first failure no new item starts; in-flight mappers finish and the first error is rethrown.
 */
export async function runWithConcurrency<T, U>(
    items: readonly T[],
    limit: number,
    mapper: (item: T, index: number) => Promise<U>,
): Promise<U[]> {
    const results = new Array<U>(items.length);
    const state: { nextIndex: number; failure: { error: unknown } | null } = { nextIndex: 0, failure: null };

    const worker = async (): Promise<void> => {
        while (state.failure === null && state.nextIndex < items.length) {
            const index = state.nextIndex;
            state.nextIndex += 1;

            try {
                results[index] = await mapper(items[index], index);
            } catch (error) {
                state.failure = state.failure ?? { error };
            }
        }
    };

    const workerCount = Math.max(1, Math.min(Math.floor(limit), items.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    if (state.failure !== null) {
        throw state.failure.error;
    }

    return results;
}
