/**
 * Keyed Mutex
 *
 * In-process lock partitioned by key. Waiters on the same key run strictly
 * one after another; different keys never block each other. Multi-key
 * acquisition takes keys in sorted order so two callers cannot deadlock.
 */

export type Release = () => void;

export class KeyedMutex {
    private tails = new Map<string, Promise<void>>();

    async acquire(key: string): Promise<Release> {
        const previous = this.tails.get(key) ?? Promise.resolve();

        let unlock: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            unlock = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(key, tail);

        await previous;

        let released = false;
        return () => {
            if (released) return;
            released = true;
            unlock();
            if (this.tails.get(key) === tail) {
                this.tails.delete(key);
            }
        };
    }

    async acquireAll(keys: Iterable<string>): Promise<Release> {
        const ordered = [...new Set(keys)].sort();
        const releases: Release[] = [];
        for (const key of ordered) {
            releases.push(await this.acquire(key));
        }
        return () => {
            for (const release of releases.reverse()) {
                release();
            }
        };
    }
}
