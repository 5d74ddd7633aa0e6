/**
 * Tracks which fetch keys have work in flight. At most one task per key.
 */
export class FetchKeyGuard<T> {
    private readonly inFlight = new Map<string, Promise<T>>();

    has(key: string): boolean {
        return this.inFlight.has(key);
    }

    get size(): number {
        return this.inFlight.size;
    }

    /**
     * Runs `task` while holding `key`. A caller arriving while the key is held
     * gets the running task's promise and starts nothing. The key is released
     * however the task ends.
     */
    run(key: string, task: () => Promise<T>): Promise<T> {
        const running = this.inFlight.get(key);
        if (running) {
            console.log(`[FetchKeyGuard] Joining in-flight fetch for ${key}`);
            return running;
        }

        const promise = Promise.resolve()
            .then(task)
            .finally(() => {
                if (this.inFlight.get(key) === promise) this.inFlight.delete(key);
            });
        this.inFlight.set(key, promise);
        return promise;
    }
}
