/**
 * Serializes async work per key inside one process. Work for different keys runs freely.
 */
export class KeyedLock {
    private readonly tails = new Map<string, Promise<void>>();

    async run<T>(key: string, work: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release = (): void => {};
        const gate = new Promise<void>((resolve) => {
            release = () => resolve();
        });
        const tail = previous.then(() => gate);
        this.tails.set(key, tail);

        await previous;
        try {
            return await work();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    get size(): number {
        return this.tails.size;
    }
}
