/**
 * Keyed Mutex
 * Serializes async critical sections per key. Sections on different keys run
 * independently; sections on the same key run strictly in arrival order.
 */
export class KeyedMutex {
    private tails: Map<string, Promise<void>> = new Map();

    public async runExclusive<T>(key: string, section: () => Promise<T> | T): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let release: () => void = () => { };
        const current = new Promise<void>(resolve => { release = resolve; });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;
        try {
            return await section();
        } finally {
            release();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        }
    }

    public isLocked(key: string): boolean {
        return this.tails.has(key);
    }
}
