/**
 * Keyed Mutex
 *
 * One FIFO lock per key. Work for the same key runs one at a time in call
 * order; work for different keys never waits on each other.
 */

export class KeyedMutex {
    private tails: Map<string, Promise<void>> = new Map();

    /**
     * Runs `work` once every earlier holder of `key` has finished.
     * The result or error of `work` is passed through.
     */
    async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);
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

    /**
     * Whether any work is running or queued for `key`.
     */
    isLocked(key: string): boolean {
        return this.tails.has(key);
    }

    get size(): number {
        return this.tails.size;
    }
}
