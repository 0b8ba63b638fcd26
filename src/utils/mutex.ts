/**
 * Minimal async mutex. Critical sections run one at a time in call order;
 * a rejected section does not poison the ones queued behind it.
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve();

    runExclusive<T>(fn: () => Promise<T>): Promise<T> {
        const run = this.tail.then(fn);
        this.tail = run.then(() => undefined, () => undefined);
        return run;
    }
}

/**
 * One mutex per key. Sections for different keys run concurrently; a key's
 * chain is dropped once its last section settles.
 */
export class KeyedMutex<K> {
    private readonly tails = new Map<K, Promise<void>>();

    runExclusive<T>(key: K, fn: () => Promise<T>): Promise<T> {
        const run = (this.tails.get(key) ?? Promise.resolve()).then(fn);
        const tail: Promise<void> = run.then(() => undefined, () => undefined).then(() => {
            if (this.tails.get(key) === tail) this.tails.delete(key);
        });
        this.tails.set(key, tail);
        return run;
    }

    get size(): number {
        return this.tails.size;
    }
}
